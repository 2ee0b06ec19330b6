// =============================================================================
// ACCOUNT STORE -- Single source of truth for balances and status
// =============================================================================
// `applyDelta` is the only code that writes `balance`. Callers must already
// hold the row (via getForUpdate / lockInOrder) inside the same transaction.

import type { Account, AccountStatus, FiscusContext, FiscusTransactionAdapter } from "@fiscus/core";
import { FiscusError, hashLockKey, lockOrder } from "@fiscus/core";
import { MODELS, type RawAccountRow, rawToAccount } from "./rows.js";

function requireText(value: string, field: string): void {
	if (typeof value !== "string" || value.trim().length === 0) {
		throw FiscusError.invalidArgument(`${field} must not be empty`);
	}
}

// =============================================================================
// OPEN
// =============================================================================

export async function openAccount(
	ctx: FiscusContext,
	tx: FiscusTransactionAdapter,
	params: { customerId: string; branchId: string; accountTypeCode: string },
): Promise<Account> {
	requireText(params.customerId, "customerId");
	requireText(params.branchId, "branchId");

	const accountTypeId = await ctx.catalog.resolveAccountTypeId(params.accountTypeCode);
	if (accountTypeId === null) {
		throw FiscusError.notFound(`Account type "${params.accountTypeCode}" not found`);
	}

	// Account numbers are unique; an identity service that repeats one is rejected.
	const accountNumber = ctx.identity.nextAccountNumber();
	await tx.advisoryLock(hashLockKey(`account-number:${accountNumber}`));
	const taken = await tx.findOne<{ id: string }>({
		model: MODELS.account,
		where: [{ field: "accountNumber", operator: "eq", value: accountNumber }],
	});
	if (taken) {
		throw FiscusError.duplicate(`Account number ${accountNumber} is already assigned`, {
			details: { accountNumber },
		});
	}

	const row = await tx.create<RawAccountRow>({
		model: MODELS.account,
		data: {
			id: ctx.identity.nextId("account"),
			accountNumber,
			customerId: params.customerId,
			branchId: params.branchId,
			accountTypeId,
			balance: 0,
			status: "ACTIVE",
			openedAt: ctx.clock(),
			closedAt: null,
		},
	});
	return rawToAccount(row);
}

// =============================================================================
// LOCKING READS
// =============================================================================

/** Hold the account row until the enclosing transaction ends. */
export async function getForUpdate(
	tx: FiscusTransactionAdapter,
	accountId: string,
): Promise<Account> {
	const row = await tx.findOne<RawAccountRow>({
		model: MODELS.account,
		where: [{ field: "id", operator: "eq", value: accountId }],
		forUpdate: true,
	});
	if (!row) {
		throw FiscusError.notFound(`Account ${accountId} not found`);
	}
	return rawToAccount(row);
}

/** Hold several accounts, always in ascending id order. */
export async function lockInOrder(
	tx: FiscusTransactionAdapter,
	accountIds: readonly string[],
): Promise<Map<string, Account>> {
	const locked = new Map<string, Account>();
	for (const id of lockOrder(accountIds)) {
		locked.set(id, await getForUpdate(tx, id));
	}
	return locked;
}

// =============================================================================
// WRITERS
// =============================================================================

/**
 * The only balance writer. Re-reads the held row, so a stale caller-side
 * balance can never be written back.
 */
export async function applyDelta(
	tx: FiscusTransactionAdapter,
	accountId: string,
	delta: number,
): Promise<Account> {
	if (!Number.isSafeInteger(delta) || delta === 0) {
		throw FiscusError.invariantViolation(
			`Balance delta for account ${accountId} must be a non-zero integer, got ${delta}`,
		);
	}

	const current = await getForUpdate(tx, accountId);
	const next = current.balance + delta;
	if (next < 0) {
		throw FiscusError.invariantViolation(
			`Balance of account ${accountId} would become negative (${current.balance} + ${delta})`,
		);
	}
	if (!Number.isSafeInteger(next)) {
		throw FiscusError.invariantViolation(`Balance of account ${accountId} would overflow`);
	}

	const row = await tx.update<RawAccountRow>({
		model: MODELS.account,
		where: [{ field: "id", operator: "eq", value: accountId }],
		update: { balance: next },
	});
	if (!row) {
		throw FiscusError.internal(`Account ${accountId} disappeared during balance update`);
	}
	return rawToAccount(row);
}

export async function setStatus(
	tx: FiscusTransactionAdapter,
	accountId: string,
	status: AccountStatus,
	closedAt: Date | null = null,
): Promise<Account> {
	const row = await tx.update<RawAccountRow>({
		model: MODELS.account,
		where: [{ field: "id", operator: "eq", value: accountId }],
		update: { status, closedAt },
	});
	if (!row) {
		throw FiscusError.notFound(`Account ${accountId} not found`);
	}
	return rawToAccount(row);
}

// =============================================================================
// READS
// =============================================================================

export async function findAccount(ctx: FiscusContext, accountId: string): Promise<Account> {
	const row = await ctx.adapter.findOne<RawAccountRow>({
		model: MODELS.account,
		where: [{ field: "id", operator: "eq", value: accountId }],
	});
	if (!row) {
		throw FiscusError.notFound(`Account ${accountId} not found`);
	}
	return rawToAccount(row);
}

export async function findAccountByNumber(
	ctx: FiscusContext,
	accountNumber: string,
): Promise<Account> {
	const row = await ctx.adapter.findOne<RawAccountRow>({
		model: MODELS.account,
		where: [{ field: "accountNumber", operator: "eq", value: accountNumber }],
	});
	if (!row) {
		throw FiscusError.notFound(`Account ${accountNumber} not found`);
	}
	return rawToAccount(row);
}

/** Ids of ACTIVE accounts of a type holding a positive balance, in lock order. */
export async function findCohort(
	tx: FiscusTransactionAdapter,
	accountTypeId: string,
): Promise<string[]> {
	const rows = await tx.findMany<RawAccountRow>({
		model: MODELS.account,
		where: [
			{ field: "accountTypeId", operator: "eq", value: accountTypeId },
			{ field: "status", operator: "eq", value: "ACTIVE" },
			{ field: "balance", operator: "gt", value: 0 },
		],
	});
	return lockOrder(rows.map((r) => r.id));
}
