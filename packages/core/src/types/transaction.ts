export type TransactionType =
	| "DEPOSIT"
	| "WITHDRAWAL"
	| "TRANSFER_IN"
	| "TRANSFER_OUT"
	| "INTEREST"
	| "FEE";

/** Immutable ledger record. Direction is carried by `type`; `amount` is always positive. */
export interface TransactionRecord {
	id: string;
	accountId: string;
	type: TransactionType;
	/** Amount in minor units, always > 0 */
	amount: number;
	/** The other side of a transfer. Null for every other type. */
	counterpartyAccountId: string | null;
	reference: string | null;
	actor: string;
	/** Interest batch that posted this record, if any */
	batchId: string | null;
	createdAt: Date;
}

export interface TransferResult {
	outgoing: TransactionRecord;
	incoming: TransactionRecord;
}

export interface FeePosting {
	/** FEE record, carrying the nominal fee */
	transaction: TransactionRecord;
	/** Amount actually taken from the balance: min(balance, fee) */
	debited: number;
}
