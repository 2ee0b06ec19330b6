// =============================================================================
// FISCUS -- Main entry point
// =============================================================================
// Creates the fiscus instance that provides the full ledger API.

import type {
	Account,
	AuditAction,
	AuditEntityType,
	FeePosting,
	FiscusContext,
	FiscusOptions,
	InterestBatchResult,
	Loan,
	LoanPayment,
	LoanPaymentResult,
	PaymentMethod,
	TransactionRecord,
	TransactionType,
	TransferResult,
} from "@fiscus/core";
import { DEFAULT_CURRENCY, minorToDecimal, toMinorUnits } from "@fiscus/core";
import { validateConfig } from "../config/index.js";
import { buildContext } from "../context/context.js";
import { createWorkerRunner, type FiscusWorkerRunner } from "../infrastructure/worker-runner.js";
import * as accounts from "../managers/account-manager.js";
import { type AuditListResult, listAudit } from "../managers/audit-log.js";
import { postInterestBatch } from "../managers/interest-batch.js";
import * as ledger from "../managers/ledger.js";
import * as loans from "../managers/loan-manager.js";
import * as engine from "../managers/transaction-engine.js";

// =============================================================================
// FISCUS INTERFACE
// =============================================================================

export interface Fiscus {
	accounts: {
		open: (params: {
			customerId: string;
			branchId: string;
			accountTypeCode: string;
			initialDeposit?: number;
			actor?: string;
		}) => Promise<Account>;
		get: (accountId: string) => Promise<Account>;
		getByNumber: (accountNumber: string) => Promise<Account>;
		freeze: (params: { accountId: string; actor?: string; reason?: string }) => Promise<Account>;
		unfreeze: (params: { accountId: string; actor?: string; reason?: string }) => Promise<Account>;
		close: (params: {
			accountId: string;
			transferToAccountId?: string;
			actor?: string;
			reason?: string;
		}) => Promise<Account>;
	};
	transactions: {
		deposit: (params: engine.MovementParams) => Promise<TransactionRecord>;
		withdraw: (params: engine.MovementParams) => Promise<TransactionRecord>;
		transfer: (params: engine.TransferParams) => Promise<TransferResult>;
		postFee: (params: engine.MovementParams) => Promise<FeePosting>;
		get: (transactionId: string) => Promise<TransactionRecord>;
		list: (params: {
			accountId: string;
			type?: TransactionType;
			limit?: number;
			offset?: number;
		}) => Promise<ledger.TransactionListResult>;
	};
	interest: {
		postBatch: (params: {
			accountTypeCode: string;
			annualRatePercent: number | string;
			actor?: string;
			batchKey?: string;
		}) => Promise<InterestBatchResult>;
	};
	loans: {
		createAndDisburse: (params: {
			customerId: string;
			branchId: string;
			productCode: string;
			principal: number;
			targetAccountId: string;
			actor?: string;
		}) => Promise<Loan>;
		recordPayment: (params: {
			loanId: string;
			fundingAccountId: string;
			amount: number;
			actor?: string;
			method?: PaymentMethod;
			reference?: string;
		}) => Promise<LoanPaymentResult>;
		markDefaulted: (params: { loanId: string; actor?: string; reason?: string }) => Promise<Loan>;
		get: (loanId: string) => Promise<Loan>;
		listPayments: (loanId: string) => Promise<LoanPayment[]>;
	};
	audit: {
		list: (params?: {
			entityType?: AuditEntityType;
			entityId?: string;
			action?: AuditAction;
			limit?: number;
			offset?: number;
		}) => Promise<AuditListResult>;
	};
	/** Conversions in the configured currency. The engine itself only takes minor units. */
	money: {
		currency: string;
		/** Major units to minor units, rounded half away from zero ("1500.5" -> 150050 for USD). */
		toMinor: (major: number | string) => number;
		toDecimal: (minor: number) => string;
	};
	workers: {
		/** Start all plugin background workers */
		start: () => Promise<void>;
		/** Stop all plugin background workers, waiting for running handlers */
		stop: () => Promise<void>;
	};
	/** Resolves once the context is built (adapter, plugins, init hooks). */
	readonly $context: Promise<FiscusContext>;
	$options: FiscusOptions;
}

// =============================================================================
// FACTORY
// =============================================================================

/**
 * @example
 * ```ts
 * import { createFiscus } from "fiscus";
 * import { memoryAdapter } from "@fiscus/memory-adapter";
 *
 * const fiscus = createFiscus({ database: memoryAdapter(), currency: "USD" });
 * const account = await fiscus.accounts.open({
 *   customerId: "cust-1",
 *   branchId: "branch-1",
 *   accountTypeCode: "SAVINGS",
 * });
 * await fiscus.transactions.deposit({ accountId: account.id, amount: 150_000 });
 * ```
 */
export function createFiscus(options: FiscusOptions): Fiscus {
	validateConfig(options);

	const currency = options.currency ?? DEFAULT_CURRENCY;
	let workerRunner: FiscusWorkerRunner | null = null;
	let ctxPromise: Promise<FiscusContext> | null = null;

	const getCtx = (): Promise<FiscusContext> => {
		ctxPromise ??= buildContext(options);
		return ctxPromise;
	};

	return {
		accounts: {
			open: async (params) => accounts.openAccount(await getCtx(), params),
			get: async (accountId) => accounts.getAccount(await getCtx(), accountId),
			getByNumber: async (accountNumber) =>
				accounts.getAccountByNumber(await getCtx(), accountNumber),
			freeze: async (params) => accounts.freezeAccount(await getCtx(), params),
			unfreeze: async (params) => accounts.unfreezeAccount(await getCtx(), params),
			close: async (params) => accounts.closeAccount(await getCtx(), params),
		},
		transactions: {
			deposit: async (params) => engine.deposit(await getCtx(), params),
			withdraw: async (params) => engine.withdraw(await getCtx(), params),
			transfer: async (params) => engine.transfer(await getCtx(), params),
			postFee: async (params) => engine.postFee(await getCtx(), params),
			get: async (transactionId) => ledger.getTransaction(await getCtx(), transactionId),
			list: async (params) => ledger.listTransactions(await getCtx(), params),
		},
		interest: {
			postBatch: async (params) => postInterestBatch(await getCtx(), params),
		},
		loans: {
			createAndDisburse: async (params) => loans.createAndDisburse(await getCtx(), params),
			recordPayment: async (params) => loans.recordPayment(await getCtx(), params),
			markDefaulted: async (params) => loans.markDefaulted(await getCtx(), params),
			get: async (loanId) => loans.getLoan(await getCtx(), loanId),
			listPayments: async (loanId) => loans.listPayments(await getCtx(), loanId),
		},
		audit: {
			list: async (params) => listAudit(await getCtx(), params),
		},
		money: {
			currency,
			toMinor: (major) => toMinorUnits(major, currency),
			toDecimal: (minor) => minorToDecimal(minor, currency),
		},
		workers: {
			start: async () => {
				const ctx = await getCtx();
				if (workerRunner) return;
				workerRunner = createWorkerRunner(ctx);
				workerRunner.start();
			},
			stop: async () => {
				if (workerRunner) {
					await workerRunner.stop();
					workerRunner = null;
				}
			},
		},
		get $context() {
			return getCtx();
		},
		$options: options,
	};
}
