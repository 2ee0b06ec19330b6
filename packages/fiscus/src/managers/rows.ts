// =============================================================================
// STORED ROW SHAPES
// =============================================================================
// What adapters hand back. PostgreSQL returns BIGINT as a string and
// NUMERIC as a string; the in-memory store returns what was written. The
// mappers below normalise both into the public types.

import type {
	Account,
	AccountStatus,
	AuditAction,
	AuditEntityType,
	AuditRecord,
	Loan,
	LoanPayment,
	LoanStatus,
	PaymentMethod,
	TransactionRecord,
	TransactionType,
} from "@fiscus/core";

export const MODELS = {
	account: "account",
	transaction: "account_transaction",
	audit: "audit_log",
	loan: "loan",
	loanPayment: "loan_payment",
	accountType: "account_type",
	loanProduct: "loan_product",
	interestBatch: "interest_batch",
} as const;

type DbInt = number | string;
type DbDate = Date | string;

export interface RawAccountRow {
	id: string;
	accountNumber: string;
	customerId: string;
	branchId: string;
	accountTypeId: string;
	balance: DbInt;
	status: AccountStatus;
	openedAt: DbDate;
	closedAt: DbDate | null;
}

export interface RawTransactionRow {
	id: string;
	accountId: string;
	type: TransactionType;
	amount: DbInt;
	counterpartyAccountId: string | null;
	reference: string | null;
	actor: string;
	batchId: string | null;
	createdAt: DbDate;
}

export interface RawAuditRow {
	id: string;
	actor: string;
	action: AuditAction;
	entityType: AuditEntityType;
	entityId: string;
	details: Record<string, unknown> | null;
	entryHash: string;
	createdAt: DbDate;
}

export interface RawLoanRow {
	id: string;
	customerId: string;
	branchId: string;
	productId: string;
	principal: DbInt;
	disbursed: DbInt;
	outstanding: DbInt;
	status: LoanStatus;
	openedAt: DbDate;
	closedAt: DbDate | null;
}

export interface RawLoanPaymentRow {
	id: string;
	loanId: string;
	amount: DbInt;
	method: PaymentMethod;
	reference: string | null;
	createdAt: DbDate;
}

export interface RawInterestBatchRow {
	id: string;
	accountTypeId: string;
	annualRatePercent: string;
	postedCount: DbInt;
	totalInterest: DbInt;
	actor: string;
	createdAt: DbDate;
}

export function toDate(value: DbDate): Date {
	return value instanceof Date ? value : new Date(value);
}

function toDateOrNull(value: DbDate | null): Date | null {
	return value === null ? null : toDate(value);
}

export function rawToAccount(row: RawAccountRow): Account {
	return {
		id: row.id,
		accountNumber: row.accountNumber,
		customerId: row.customerId,
		branchId: row.branchId,
		accountTypeId: row.accountTypeId,
		balance: Number(row.balance),
		status: row.status,
		openedAt: toDate(row.openedAt),
		closedAt: toDateOrNull(row.closedAt),
	};
}

export function rawToTransaction(row: RawTransactionRow): TransactionRecord {
	return {
		id: row.id,
		accountId: row.accountId,
		type: row.type,
		amount: Number(row.amount),
		counterpartyAccountId: row.counterpartyAccountId,
		reference: row.reference,
		actor: row.actor,
		batchId: row.batchId,
		createdAt: toDate(row.createdAt),
	};
}

export function rawToAudit(row: RawAuditRow): AuditRecord {
	return {
		id: row.id,
		actor: row.actor,
		action: row.action,
		entityType: row.entityType,
		entityId: row.entityId,
		details: row.details ?? {},
		entryHash: row.entryHash,
		createdAt: toDate(row.createdAt),
	};
}

export function rawToLoan(row: RawLoanRow): Loan {
	return {
		id: row.id,
		customerId: row.customerId,
		branchId: row.branchId,
		productId: row.productId,
		principal: Number(row.principal),
		disbursed: Number(row.disbursed),
		outstanding: Number(row.outstanding),
		status: row.status,
		openedAt: toDate(row.openedAt),
		closedAt: toDateOrNull(row.closedAt),
	};
}

export function rawToLoanPayment(row: RawLoanPaymentRow): LoanPayment {
	return {
		id: row.id,
		loanId: row.loanId,
		amount: Number(row.amount),
		method: row.method,
		reference: row.reference,
		createdAt: toDate(row.createdAt),
	};
}
