// =============================================================================
// TRANSACTION ENGINE -- Deposits, withdrawals, transfers and fees
// =============================================================================
// Each operation has an in-transaction form (`...InTx`) used by the loan and
// lifecycle managers, and a public form that wraps it in one atomic unit with
// plugin hooks.
//
// Order inside every operation: validate input, take holds (ascending id
// order), check preconditions, then write. Nothing is written before the
// last precondition has passed.

import type {
	Account,
	FeePosting,
	FiscusContext,
	FiscusTransactionAdapter,
	TransactionRecord,
	TransferResult,
} from "@fiscus/core";
import { FiscusError } from "@fiscus/core";
import { runOperation } from "../infrastructure/atomic.js";
import { applyDelta, getForUpdate, lockInOrder } from "./account-store.js";
import { appendTransaction } from "./ledger.js";

export const DEFAULT_ACTOR = "SYSTEM";

export interface MovementParams {
	accountId: string;
	/** Minor units */
	amount: number;
	reference?: string | null;
	actor?: string;
}

export interface TransferParams {
	fromAccountId: string;
	toAccountId: string;
	/** Minor units */
	amount: number;
	reference?: string | null;
	actor?: string;
}

// =============================================================================
// VALIDATION
// =============================================================================

export function validateAmount(ctx: FiscusContext, amount: number, label = "Amount"): void {
	if (typeof amount !== "number" || !Number.isSafeInteger(amount) || amount <= 0) {
		throw FiscusError.invalidAmount(
			`${label} must be a positive integer in minor units, got ${amount}`,
		);
	}
	const max = ctx.options.advanced.maxTransactionAmount;
	if (amount > max) {
		throw FiscusError.invalidAmount(`${label} ${amount} exceeds the maximum of ${max}`);
	}
}

export function requireActive(account: Account): void {
	if (account.status !== "ACTIVE") {
		throw FiscusError.accountNotActive(`Account ${account.id} is ${account.status}`, {
			details: { accountId: account.id, status: account.status },
		});
	}
}

function requireFunds(account: Account, amount: number): void {
	if (account.balance < amount) {
		throw FiscusError.insufficientFunds(
			`Insufficient funds. Available: ${account.balance}, Required: ${amount}`,
			{ details: { accountId: account.id, available: account.balance, required: amount } },
		);
	}
}

function heldAccount(locked: Map<string, Account>, accountId: string): Account {
	const account = locked.get(accountId);
	if (!account) {
		throw FiscusError.internal(`Account ${accountId} was not locked`);
	}
	return account;
}

// =============================================================================
// IN-TRANSACTION OPERATIONS
// =============================================================================

export async function depositInTx(
	ctx: FiscusContext,
	tx: FiscusTransactionAdapter,
	params: MovementParams,
): Promise<TransactionRecord> {
	validateAmount(ctx, params.amount);

	const account = await getForUpdate(tx, params.accountId);
	requireActive(account);

	await applyDelta(tx, account.id, params.amount);
	return appendTransaction(ctx, tx, {
		accountId: account.id,
		type: "DEPOSIT",
		amount: params.amount,
		reference: params.reference,
		actor: params.actor ?? DEFAULT_ACTOR,
	});
}

export async function withdrawInTx(
	ctx: FiscusContext,
	tx: FiscusTransactionAdapter,
	params: MovementParams,
): Promise<TransactionRecord> {
	validateAmount(ctx, params.amount);

	const account = await getForUpdate(tx, params.accountId);
	requireActive(account);
	requireFunds(account, params.amount);

	await applyDelta(tx, account.id, -params.amount);
	return appendTransaction(ctx, tx, {
		accountId: account.id,
		type: "WITHDRAWAL",
		amount: params.amount,
		reference: params.reference,
		actor: params.actor ?? DEFAULT_ACTOR,
	});
}

export async function transferInTx(
	ctx: FiscusContext,
	tx: FiscusTransactionAdapter,
	params: TransferParams,
): Promise<TransferResult> {
	if (params.fromAccountId === params.toAccountId) {
		throw FiscusError.selfTransfer();
	}
	validateAmount(ctx, params.amount);
	return moveFunds(ctx, tx, params);
}

/**
 * Transfer without the amount ceiling. Used by account closure, whose sweep
 * amount is an existing balance rather than caller input.
 */
export async function moveFunds(
	ctx: FiscusContext,
	tx: FiscusTransactionAdapter,
	params: TransferParams,
): Promise<TransferResult> {
	const { fromAccountId, toAccountId, amount } = params;
	const actor = params.actor ?? DEFAULT_ACTOR;

	const locked = await lockInOrder(tx, [fromAccountId, toAccountId]);
	const source = heldAccount(locked, fromAccountId);
	const destination = heldAccount(locked, toAccountId);

	requireActive(source);
	requireActive(destination);
	requireFunds(source, amount);

	await applyDelta(tx, fromAccountId, -amount);
	await applyDelta(tx, toAccountId, amount);

	const outgoing = await appendTransaction(ctx, tx, {
		accountId: fromAccountId,
		type: "TRANSFER_OUT",
		amount,
		counterpartyAccountId: toAccountId,
		reference: params.reference,
		actor,
	});
	const incoming = await appendTransaction(ctx, tx, {
		accountId: toAccountId,
		type: "TRANSFER_IN",
		amount,
		counterpartyAccountId: fromAccountId,
		reference: params.reference,
		actor,
	});

	return { outgoing, incoming };
}

/**
 * Debit a fee. The balance never goes below zero: only min(balance, fee) is
 * taken, while the FEE record keeps the nominal amount.
 */
export async function postFeeInTx(
	ctx: FiscusContext,
	tx: FiscusTransactionAdapter,
	params: MovementParams,
): Promise<FeePosting> {
	validateAmount(ctx, params.amount, "Fee");

	const account = await getForUpdate(tx, params.accountId);
	requireActive(account);

	const debited = Math.min(account.balance, params.amount);
	if (debited < params.amount) {
		ctx.logger.warn("Fee exceeds balance; debiting the available balance only", {
			accountId: account.id,
			fee: params.amount,
			debited,
		});
	}
	if (debited > 0) {
		await applyDelta(tx, account.id, -debited);
	}

	const transaction = await appendTransaction(ctx, tx, {
		accountId: account.id,
		type: "FEE",
		amount: params.amount,
		reference: params.reference,
		actor: params.actor ?? DEFAULT_ACTOR,
	});
	return { transaction, debited };
}

// =============================================================================
// PUBLIC OPERATIONS
// =============================================================================

export async function deposit(ctx: FiscusContext, params: MovementParams): Promise<TransactionRecord> {
	validateAmount(ctx, params.amount);
	return runOperation(
		ctx,
		{ type: "transaction.deposit", params: { ...params } },
		(tx) => depositInTx(ctx, tx, params),
	);
}

export async function withdraw(
	ctx: FiscusContext,
	params: MovementParams,
): Promise<TransactionRecord> {
	validateAmount(ctx, params.amount);
	return runOperation(
		ctx,
		{ type: "transaction.withdraw", params: { ...params } },
		(tx) => withdrawInTx(ctx, tx, params),
	);
}

export async function transfer(ctx: FiscusContext, params: TransferParams): Promise<TransferResult> {
	if (params.fromAccountId === params.toAccountId) {
		throw FiscusError.selfTransfer();
	}
	validateAmount(ctx, params.amount);
	return runOperation(
		ctx,
		{ type: "transaction.transfer", params: { ...params } },
		(tx) => transferInTx(ctx, tx, params),
	);
}

export async function postFee(ctx: FiscusContext, params: MovementParams): Promise<FeePosting> {
	validateAmount(ctx, params.amount, "Fee");
	return runOperation(
		ctx,
		{ type: "transaction.fee", params: { ...params } },
		(tx) => postFeeInTx(ctx, tx, params),
	);
}
