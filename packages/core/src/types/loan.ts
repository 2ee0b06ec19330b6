import type { TransactionRecord } from "./transaction.js";

export type LoanStatus = "PENDING" | "ACTIVE" | "CLOSED" | "DEFAULTED";

export type PaymentMethod = "CASH" | "TRANSFER" | "CARD" | "UPI" | "CHEQUE";

export interface Loan {
	id: string;
	customerId: string;
	branchId: string;
	productId: string;
	principal: number;
	disbursed: number;
	/** Remaining balance owed. 0 <= outstanding <= principal. */
	outstanding: number;
	status: LoanStatus;
	openedAt: Date;
	closedAt: Date | null;
}

export interface LoanPayment {
	id: string;
	loanId: string;
	amount: number;
	method: PaymentMethod;
	reference: string | null;
	createdAt: Date;
}

export interface LoanPaymentResult {
	loan: Loan;
	payment: LoanPayment;
	/** WITHDRAWAL record taken from the funding account */
	transaction: TransactionRecord;
}
