// =============================================================================
// ACCOUNT MANAGER -- Account lifecycle operations
// =============================================================================
// Opens, reads, freezes, unfreezes and closes accounts. Status changes go
// through the Account Store's setStatus; balances only move through the
// Transaction Engine.

import type { Account, FiscusContext } from "@fiscus/core";
import { FiscusError } from "@fiscus/core";
import { runOperation } from "../infrastructure/atomic.js";
import {
	findAccount,
	findAccountByNumber,
	getForUpdate,
	lockInOrder,
	openAccount as openAccountRow,
	setStatus,
} from "./account-store.js";
import { appendAudit } from "./audit-log.js";
import { DEFAULT_ACTOR, depositInTx, moveFunds, validateAmount } from "./transaction-engine.js";

// =============================================================================
// OPEN
// =============================================================================

export async function openAccount(
	ctx: FiscusContext,
	params: {
		customerId: string;
		branchId: string;
		accountTypeCode: string;
		/** Minor units deposited in the same transaction. */
		initialDeposit?: number;
		actor?: string;
	},
): Promise<Account> {
	const { initialDeposit = 0 } = params;
	const actor = params.actor ?? DEFAULT_ACTOR;
	if (initialDeposit !== 0) {
		validateAmount(ctx, initialDeposit, "Initial deposit");
	}

	return runOperation(
		ctx,
		{
			type: "account.open",
			params: {
				customerId: params.customerId,
				branchId: params.branchId,
				accountTypeCode: params.accountTypeCode,
				initialDeposit,
			},
		},
		async (tx) => {
			const account = await openAccountRow(ctx, tx, params);

			await appendAudit(ctx, tx, {
				actor,
				action: "CREATE",
				entityType: "ACCOUNT",
				entityId: account.id,
				details: {
					accountNumber: account.accountNumber,
					accountTypeCode: params.accountTypeCode,
				},
			});

			if (initialDeposit === 0) return account;

			await depositInTx(ctx, tx, {
				accountId: account.id,
				amount: initialDeposit,
				reference: "Initial Deposit",
				actor,
			});
			return getForUpdate(tx, account.id);
		},
	);
}

// =============================================================================
// READS
// =============================================================================

export function getAccount(ctx: FiscusContext, accountId: string): Promise<Account> {
	return findAccount(ctx, accountId);
}

export function getAccountByNumber(ctx: FiscusContext, accountNumber: string): Promise<Account> {
	return findAccountByNumber(ctx, accountNumber);
}

// =============================================================================
// FREEZE / UNFREEZE
// =============================================================================

export async function freezeAccount(
	ctx: FiscusContext,
	params: { accountId: string; actor?: string; reason?: string },
): Promise<Account> {
	const { accountId, reason } = params;

	return runOperation(ctx, { type: "account.freeze", params: { accountId, reason } }, async (tx) => {
		// Lock and read inside transaction to prevent TOCTOU race
		const account = await getForUpdate(tx, accountId);

		if (account.status === "FROZEN") {
			// Idempotent retry -- account already frozen
			return account;
		}
		if (account.status === "CLOSED") {
			throw FiscusError.accountNotActive(`Account ${accountId} is closed`);
		}

		const frozen = await setStatus(tx, accountId, "FROZEN");
		await appendAudit(ctx, tx, {
			actor: params.actor ?? DEFAULT_ACTOR,
			action: "FREEZE",
			entityType: "ACCOUNT",
			entityId: accountId,
			details: { reason: reason ?? null },
		});
		return frozen;
	});
}

export async function unfreezeAccount(
	ctx: FiscusContext,
	params: { accountId: string; actor?: string; reason?: string },
): Promise<Account> {
	const { accountId, reason } = params;

	return runOperation(
		ctx,
		{ type: "account.unfreeze", params: { accountId, reason } },
		async (tx) => {
			const account = await getForUpdate(tx, accountId);

			if (account.status === "ACTIVE") {
				return account;
			}
			if (account.status === "CLOSED") {
				throw FiscusError.accountNotActive(`Account ${accountId} is closed`);
			}

			const active = await setStatus(tx, accountId, "ACTIVE");
			await appendAudit(ctx, tx, {
				actor: params.actor ?? DEFAULT_ACTOR,
				action: "UNFREEZE",
				entityType: "ACCOUNT",
				entityId: accountId,
				details: { reason: reason ?? null },
			});
			return active;
		},
	);
}

// =============================================================================
// CLOSE
// =============================================================================

/**
 * Close an ACTIVE account. A positive balance is first swept to
 * `transferToAccountId`; without one, a funded account cannot be closed.
 */
export async function closeAccount(
	ctx: FiscusContext,
	params: { accountId: string; transferToAccountId?: string; actor?: string; reason?: string },
): Promise<Account> {
	const { accountId, transferToAccountId, reason } = params;
	const actor = params.actor ?? DEFAULT_ACTOR;

	if (transferToAccountId === accountId) {
		throw FiscusError.selfTransfer("Cannot sweep an account into itself");
	}

	return runOperation(
		ctx,
		{ type: "account.close", params: { accountId, transferToAccountId, reason } },
		async (tx) => {
			const locked = await lockInOrder(
				tx,
				transferToAccountId ? [accountId, transferToAccountId] : [accountId],
			);
			const account = locked.get(accountId);
			if (!account) {
				throw FiscusError.notFound(`Account ${accountId} not found`);
			}
			if (account.status !== "ACTIVE") {
				throw FiscusError.accountNotActive(`Account ${accountId} is ${account.status}`);
			}

			let sweptAmount = 0;
			if (account.balance > 0) {
				if (!transferToAccountId) {
					throw FiscusError.conflict(
						`Account ${accountId} has a balance of ${account.balance}; provide transferToAccountId to sweep it before closing`,
						{ details: { accountId, balance: account.balance } },
					);
				}
				await moveFunds(ctx, tx, {
					fromAccountId: accountId,
					toAccountId: transferToAccountId,
					amount: account.balance,
					reference: `Account closure ${accountId}`,
					actor,
				});
				sweptAmount = account.balance;
			}

			const closed = await setStatus(tx, accountId, "CLOSED", ctx.clock());
			await appendAudit(ctx, tx, {
				actor,
				action: "CLOSE",
				entityType: "ACCOUNT",
				entityId: accountId,
				details: {
					reason: reason ?? null,
					transferToAccountId: transferToAccountId ?? null,
					sweptAmount,
				},
			});
			return closed;
		},
	);
}
