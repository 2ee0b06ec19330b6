export type AuditAction =
	| "CREATE"
	| "FREEZE"
	| "UNFREEZE"
	| "CLOSE"
	| "TXN"
	| "DISBURSE"
	| "PAYMENT"
	| "DEFAULT"
	| "INTEREST_BATCH";

export type AuditEntityType = "ACCOUNT" | "LOAN" | "ACCOUNT_TYPE";

export interface AuditRecord {
	id: string;
	actor: string;
	action: AuditAction;
	entityType: AuditEntityType;
	entityId: string;
	details: Record<string, unknown>;
	/** SHA-256 (or HMAC-SHA-256) of the canonical entry content */
	entryHash: string;
	createdAt: Date;
}
