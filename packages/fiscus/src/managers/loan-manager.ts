// =============================================================================
// LOAN MANAGER -- Disbursement, repayment and default
// =============================================================================
// State machine: PENDING -> ACTIVE -> CLOSED, or ACTIVE -> DEFAULTED.
// Every cash movement goes through the Transaction Engine inside the same
// transaction as the loan update, so a loan and its ledger records commit
// together or not at all.

import type {
	FiscusContext,
	FiscusTransactionAdapter,
	Loan,
	LoanPayment,
	LoanPaymentResult,
	PaymentMethod,
} from "@fiscus/core";
import { FiscusError } from "@fiscus/core";
import { runOperation } from "../infrastructure/atomic.js";
import { appendAudit } from "./audit-log.js";
import {
	MODELS,
	type RawLoanPaymentRow,
	type RawLoanRow,
	rawToLoan,
	rawToLoanPayment,
} from "./rows.js";
import { DEFAULT_ACTOR, depositInTx, validateAmount, withdrawInTx } from "./transaction-engine.js";

const PAYMENT_METHODS: ReadonlySet<string> = new Set<PaymentMethod>([
	"CASH",
	"TRANSFER",
	"CARD",
	"UPI",
	"CHEQUE",
]);

// =============================================================================
// HELPERS
// =============================================================================

async function getLoanForUpdate(tx: FiscusTransactionAdapter, loanId: string): Promise<Loan> {
	const row = await tx.findOne<RawLoanRow>({
		model: MODELS.loan,
		where: [{ field: "id", operator: "eq", value: loanId }],
		forUpdate: true,
	});
	if (!row) {
		throw FiscusError.notFound(`Loan ${loanId} not found`);
	}
	return rawToLoan(row);
}

async function updateLoan(
	tx: FiscusTransactionAdapter,
	loanId: string,
	update: Record<string, unknown>,
): Promise<Loan> {
	const row = await tx.update<RawLoanRow>({
		model: MODELS.loan,
		where: [{ field: "id", operator: "eq", value: loanId }],
		update,
	});
	if (!row) {
		throw FiscusError.internal(`Loan ${loanId} disappeared during update`);
	}
	return rawToLoan(row);
}

function requireActiveLoan(loan: Loan): void {
	if (loan.status !== "ACTIVE") {
		throw FiscusError.loanNotActive(`Loan ${loan.id} is ${loan.status}`, {
			details: { loanId: loan.id, status: loan.status },
		});
	}
}

// =============================================================================
// DISBURSE
// =============================================================================

export async function createAndDisburse(
	ctx: FiscusContext,
	params: {
		customerId: string;
		branchId: string;
		productCode: string;
		/** Minor units */
		principal: number;
		targetAccountId: string;
		actor?: string;
	},
): Promise<Loan> {
	const { customerId, branchId, productCode, principal, targetAccountId } = params;
	const actor = params.actor ?? DEFAULT_ACTOR;
	validateAmount(ctx, principal, "Principal");

	return runOperation(
		ctx,
		{
			type: "loan.disburse",
			params: { customerId, branchId, productCode, principal, targetAccountId },
		},
		async (tx) => {
			const productId = await ctx.catalog.resolveProductId(productCode);
			if (productId === null) {
				throw FiscusError.notFound(`Loan product "${productCode}" not found`);
			}

			const loanId = ctx.identity.nextId("loan");
			await tx.create<RawLoanRow>({
				model: MODELS.loan,
				data: {
					id: loanId,
					customerId,
					branchId,
					productId,
					principal,
					disbursed: 0,
					outstanding: principal,
					status: "PENDING",
					openedAt: ctx.clock(),
					closedAt: null,
				},
			});

			const disbursement = await depositInTx(ctx, tx, {
				accountId: targetAccountId,
				amount: principal,
				reference: `Loan Disbursement ${loanId}`,
				actor,
			});

			const loan = await updateLoan(tx, loanId, { disbursed: principal, status: "ACTIVE" });

			await appendAudit(ctx, tx, {
				actor,
				action: "DISBURSE",
				entityType: "LOAN",
				entityId: loanId,
				details: { principal, toAccountId: targetAccountId, transactionId: disbursement.id },
			});

			return loan;
		},
	);
}

// =============================================================================
// REPAY
// =============================================================================

/**
 * Withdraw `amount` from the funding account and apply it to the loan.
 * Outstanding is reduced by min(outstanding, amount) and the loan closes at
 * zero. Lock order: loan row, then funding account.
 */
export async function recordPayment(
	ctx: FiscusContext,
	params: {
		loanId: string;
		fundingAccountId: string;
		/** Minor units */
		amount: number;
		actor?: string;
		method?: PaymentMethod;
		reference?: string;
	},
): Promise<LoanPaymentResult> {
	const { loanId, fundingAccountId, amount } = params;
	const method = params.method ?? "TRANSFER";
	const actor = params.actor ?? DEFAULT_ACTOR;

	validateAmount(ctx, amount, "Payment amount");
	if (!PAYMENT_METHODS.has(method)) {
		throw FiscusError.invalidArgument(`Unknown payment method "${method}"`);
	}

	return runOperation(
		ctx,
		{ type: "loan.payment", params: { loanId, fundingAccountId, amount, method } },
		async (tx) => {
			const loan = await getLoanForUpdate(tx, loanId);
			requireActiveLoan(loan);

			const transaction = await withdrawInTx(ctx, tx, {
				accountId: fundingAccountId,
				amount,
				reference: `Loan Payment ${loanId}`,
				actor,
			});

			const paymentRow = await tx.create<RawLoanPaymentRow>({
				model: MODELS.loanPayment,
				data: {
					id: ctx.identity.nextId("loanPayment"),
					loanId,
					amount,
					method,
					reference: params.reference ?? `From AC ${fundingAccountId}`,
					createdAt: ctx.clock(),
				},
			});

			const applied = Math.min(loan.outstanding, amount);
			const outstanding = loan.outstanding - applied;
			const closing = outstanding === 0;
			const updated = await updateLoan(tx, loanId, {
				outstanding,
				status: closing ? "CLOSED" : "ACTIVE",
				closedAt: closing ? ctx.clock() : null,
			});

			await appendAudit(ctx, tx, {
				actor,
				action: "PAYMENT",
				entityType: "LOAN",
				entityId: loanId,
				details: {
					paymentId: paymentRow.id,
					amount,
					applied,
					outstanding,
					fundingAccountId,
					transactionId: transaction.id,
				},
			});

			return { loan: updated, payment: rawToLoanPayment(paymentRow), transaction };
		},
	);
}

// =============================================================================
// DEFAULT
// =============================================================================

/** Administrative transition ACTIVE -> DEFAULTED. Moves no money. */
export async function markDefaulted(
	ctx: FiscusContext,
	params: { loanId: string; actor?: string; reason?: string },
): Promise<Loan> {
	const { loanId, reason } = params;

	return runOperation(ctx, { type: "loan.default", params: { loanId, reason } }, async (tx) => {
		const loan = await getLoanForUpdate(tx, loanId);
		requireActiveLoan(loan);

		const defaulted = await updateLoan(tx, loanId, { status: "DEFAULTED" });
		await appendAudit(ctx, tx, {
			actor: params.actor ?? DEFAULT_ACTOR,
			action: "DEFAULT",
			entityType: "LOAN",
			entityId: loanId,
			details: { reason: reason ?? null, outstanding: loan.outstanding },
		});
		return defaulted;
	});
}

// =============================================================================
// READS
// =============================================================================

export async function getLoan(ctx: FiscusContext, loanId: string): Promise<Loan> {
	const row = await ctx.adapter.findOne<RawLoanRow>({
		model: MODELS.loan,
		where: [{ field: "id", operator: "eq", value: loanId }],
	});
	if (!row) {
		throw FiscusError.notFound(`Loan ${loanId} not found`);
	}
	return rawToLoan(row);
}

/** Oldest first. */
export async function listPayments(ctx: FiscusContext, loanId: string): Promise<LoanPayment[]> {
	await getLoan(ctx, loanId);
	const rows = await ctx.adapter.findMany<RawLoanPaymentRow>({
		model: MODELS.loanPayment,
		where: [{ field: "loanId", operator: "eq", value: loanId }],
		sortBy: { field: "createdAt", direction: "asc" },
	});
	return rows.map(rawToLoanPayment);
}
