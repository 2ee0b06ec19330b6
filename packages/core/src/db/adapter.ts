// =============================================================================
// FISCUS ADAPTER INTERFACE
// =============================================================================
// Persistence boundary for the ledger. Any store that offers atomic multi-row
// commit and exclusive row holds can back the engine: the bundled adapters are
// an in-process store and PostgreSQL through drizzle-orm.
//
// Managers only use the CRUD surface below. Every balance-changing path runs
// inside `transaction()` and takes its row holds through `findOne({ forUpdate })`.

export interface Where {
	field: string;
	operator: WhereOperator;
	value: unknown;
}

export type WhereOperator = "eq" | "ne" | "gt" | "gte" | "lt" | "lte" | "in";

export interface SortBy {
	field: string;
	direction: "asc" | "desc";
}

export interface TransactionOptions {
	/** Give up waiting for a row or advisory lock after this long (CONTENTION). */
	lockTimeoutMs?: number;
}

export interface FiscusAdapter {
	id: string;

	create<T extends object>(data: { model: string; data: T }): Promise<T>;

	/**
	 * With `forUpdate`, the matched row is held exclusively until the enclosing
	 * transaction commits or aborts. Outside a transaction the hold ends with the call.
	 */
	findOne<T>(data: { model: string; where: Where[]; forUpdate?: boolean }): Promise<T | null>;

	findMany<T>(data: {
		model: string;
		where?: Where[];
		limit?: number;
		offset?: number;
		sortBy?: SortBy;
	}): Promise<T[]>;

	update<T>(data: {
		model: string;
		where: Where[];
		update: Record<string, unknown>;
	}): Promise<T | null>;

	count(data: { model: string; where?: Where[] }): Promise<number>;

	/** Run `fn` atomically: all of its writes become visible together, or none do. */
	transaction<T>(
		fn: (tx: FiscusTransactionAdapter) => Promise<T>,
		options?: TransactionOptions,
	): Promise<T>;

	/** Transaction-scoped lock on an arbitrary integer key. */
	advisoryLock(key: number): Promise<void>;
}

export type FiscusTransactionAdapter = Omit<FiscusAdapter, "transaction">;
