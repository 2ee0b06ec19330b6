// =============================================================================
// EXTERNAL COLLABORATORS
// =============================================================================
// Read-only master data and identifier allocation live outside the engine.
// The engine only talks to them through these interfaces.

/** Resolves catalog codes to ids. Returns null for unknown codes. */
export interface CatalogLookup {
	resolveAccountTypeId(code: string): Promise<string | null>;
	resolveProductId(code: string): Promise<string | null>;
}

export type EntityKind =
	| "account"
	| "transaction"
	| "audit"
	| "loan"
	| "loanPayment"
	| "interestBatch";

/** Allocates identifiers. Results must be unique and are treated as opaque. */
export interface IdentityService {
	nextId(kind: EntityKind): string;
	nextAccountNumber(): string;
}

export type Clock = () => Date;
