// =============================================================================
// MEMORY ADAPTER -- FiscusAdapter implementation backed by in-memory Maps
// =============================================================================
// Data is stored in nested Maps: model name -> record id -> record data.
//
// Each transaction writes into its own overlay, which is merged into the
// committed store only when the transaction function resolves. Row holds taken
// with `findOne({ forUpdate: true })` last until commit or abort, so two
// transactions touching the same row are serialised exactly as with
// SELECT ... FOR UPDATE.

import { randomUUID } from "node:crypto";
import { FiscusError } from "@fiscus/core";
import type {
	FiscusAdapter,
	FiscusTransactionAdapter,
	SortBy,
	TransactionOptions,
	Where,
} from "@fiscus/core/db";
import { type LockOwner, RowLockManager } from "./row-locks.js";

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

type Row = Record<string, unknown>;
type Store = Map<string, Map<string, Row>>;

interface StoreView {
	rows(model: string): Row[];
	get(model: string, id: string): Row | undefined;
	has(model: string, id: string): boolean;
	insert(model: string, row: Row): void;
	replace(model: string, row: Row): void;
}

function getModelStore(store: Store, model: string): Map<string, Row> {
	let modelStore = store.get(model);
	if (!modelStore) {
		modelStore = new Map();
		store.set(model, modelStore);
	}
	return modelStore;
}

function rowId(row: Row): string {
	return String(row.id);
}

function copy(row: Row): Row {
	return structuredClone(row);
}

function compareValues(a: unknown, b: unknown): number {
	if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime();
	if (typeof a === "number" && typeof b === "number") return a - b;
	if (typeof a === "bigint" && typeof b === "bigint") return a < b ? -1 : a > b ? 1 : 0;
	const left = String(a);
	const right = String(b);
	return left < right ? -1 : left > right ? 1 : 0;
}

function isEqual(a: unknown, b: unknown): boolean {
	if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
	return a === b;
}

/**
 * Evaluate a single Where condition against a record.
 */
function matchesCondition(record: Row, condition: Where): boolean {
	const value = record[condition.field];

	switch (condition.operator) {
		case "eq":
			return isEqual(value, condition.value);
		case "ne":
			return !isEqual(value, condition.value);
		case "gt":
			return value != null && compareValues(value, condition.value) > 0;
		case "gte":
			return value != null && compareValues(value, condition.value) >= 0;
		case "lt":
			return value != null && compareValues(value, condition.value) < 0;
		case "lte":
			return value != null && compareValues(value, condition.value) <= 0;
		case "in":
			return Array.isArray(condition.value) && condition.value.some((v) => isEqual(value, v));
		default:
			return false;
	}
}

function filterRecords(records: Row[], where: Where[]): Row[] {
	return records.filter((record) => where.every((w) => matchesCondition(record, w)));
}

function sortRecords(records: Row[], sortBy: SortBy): Row[] {
	return [...records].sort((a, b) => {
		const aVal = a[sortBy.field];
		const bVal = b[sortBy.field];

		if (aVal === bVal) return 0;
		if (aVal === null || aVal === undefined) return 1;
		if (bVal === null || bVal === undefined) return -1;

		const comparison = compareValues(aVal, bVal);
		return sortBy.direction === "desc" ? -comparison : comparison;
	});
}

// =============================================================================
// STORE VIEWS
// =============================================================================

/** Reads and writes straight against committed data (autocommit). */
function committedView(store: Store): StoreView {
	return {
		rows: (model) => [...(store.get(model)?.values() ?? [])],
		get: (model, id) => store.get(model)?.get(id),
		has: (model, id) => store.get(model)?.has(id) ?? false,
		insert: (model, row) => {
			getModelStore(store, model).set(rowId(row), row);
		},
		replace: (model, row) => {
			getModelStore(store, model).set(rowId(row), row);
		},
	};
}

interface PendingWrites {
	overlay: Store;
	/** `${model}:${id}` of rows created in this transaction */
	inserts: Set<string>;
}

/** Committed data seen through a transaction's own uncommitted writes. */
function transactionView(store: Store, pending: PendingWrites): StoreView {
	const { overlay, inserts } = pending;
	return {
		rows: (model) => {
			const own = overlay.get(model);
			const committed = [...(store.get(model)?.values() ?? [])];
			if (!own) return committed;
			const merged = committed.map((row) => own.get(rowId(row)) ?? row);
			for (const [id, row] of own) {
				if (!store.get(model)?.has(id)) merged.push(row);
			}
			return merged;
		},
		get: (model, id) => overlay.get(model)?.get(id) ?? store.get(model)?.get(id),
		has: (model, id) =>
			(overlay.get(model)?.has(id) ?? false) || (store.get(model)?.has(id) ?? false),
		insert: (model, row) => {
			getModelStore(overlay, model).set(rowId(row), row);
			inserts.add(`${model}:${rowId(row)}`);
		},
		replace: (model, row) => {
			getModelStore(overlay, model).set(rowId(row), row);
		},
	};
}

// =============================================================================
// ADAPTER METHODS BUILDER
// =============================================================================

/**
 * Build the CRUD methods over a view. `lock` is present inside a transaction
 * and takes a hold that lasts until the transaction ends.
 */
function buildAdapterMethods(
	view: StoreView,
	lock: ((key: string) => Promise<void>) | null,
): Omit<FiscusTransactionAdapter, "id"> {
	return {
		create: async <T extends object>({ model, data }: { model: string; data: T }): Promise<T> => {
			const record: Row = copy(Object.fromEntries(Object.entries(data)));
			if (record.id === undefined || record.id === null) {
				record.id = randomUUID();
			}
			if (view.has(model, rowId(record))) {
				throw FiscusError.duplicate(`Duplicate id "${rowId(record)}" in ${model}`);
			}

			view.insert(model, record);
			return copy(record) as T;
		},

		findOne: async <T>({
			model,
			where,
			forUpdate,
		}: {
			model: string;
			where: Where[];
			forUpdate?: boolean;
		}): Promise<T | null> => {
			const first = filterRecords(view.rows(model), where)[0];
			if (!first) return null;
			if (!forUpdate || !lock) return copy(first) as T;

			const id = rowId(first);
			await lock(`${model}:${id}`);

			// Re-read under the hold: the previous holder may have committed a change.
			const current = view.get(model, id);
			if (!current || !where.every((w) => matchesCondition(current, w))) return null;
			return copy(current) as T;
		},

		findMany: async <T>({
			model,
			where,
			limit,
			offset,
			sortBy,
		}: {
			model: string;
			where?: Where[];
			limit?: number;
			offset?: number;
			sortBy?: SortBy;
		}): Promise<T[]> => {
			let results = filterRecords(view.rows(model), where ?? []);

			if (sortBy) {
				results = sortRecords(results, sortBy);
			}

			if (offset !== undefined) {
				results = results.slice(offset);
			}

			if (limit !== undefined) {
				results = results.slice(0, limit);
			}

			return results.map((r) => copy(r) as T);
		},

		update: async <T>({
			model,
			where,
			update: updateData,
		}: {
			model: string;
			where: Where[];
			update: Record<string, unknown>;
		}): Promise<T | null> => {
			const first = filterRecords(view.rows(model), where)[0];
			if (!first) return null;

			const updated = copy({ ...first, ...updateData, id: first.id });
			view.replace(model, updated);
			return copy(updated) as T;
		},

		count: async ({ model, where }: { model: string; where?: Where[] }): Promise<number> => {
			return filterRecords(view.rows(model), where ?? []).length;
		},

		advisoryLock: async (key: number): Promise<void> => {
			if (lock) {
				await lock(`advisory:${key}`);
			}
		},
	};
}

// =============================================================================
// PUBLIC API
// =============================================================================

export interface MemoryAdapterOptions {
	/** Lock wait used when a transaction does not pass its own. Default: 3000 */
	lockTimeoutMs?: number;
}

/**
 * Create a FiscusAdapter backed by an in-memory store.
 *
 * Transactions are isolated (uncommitted writes are invisible to everyone
 * else) and atomic (an exception discards every write). Holds taken with
 * `forUpdate` or `advisoryLock` serialise concurrent transactions within this
 * process.
 *
 * @example
 * ```ts
 * import { memoryAdapter } from "@fiscus/memory-adapter";
 *
 * const adapter = memoryAdapter({ lockTimeoutMs: 500 });
 * ```
 */
export function memoryAdapter(options: MemoryAdapterOptions = {}): FiscusAdapter {
	const defaultLockTimeoutMs = options.lockTimeoutMs ?? 3000;
	const store: Store = new Map();
	const locks = new RowLockManager();
	let nextOwner: LockOwner = 0;

	function commit({ overlay, inserts }: PendingWrites): void {
		for (const key of inserts) {
			const separator = key.indexOf(":");
			const model = key.slice(0, separator);
			const id = key.slice(separator + 1);
			if (store.get(model)?.has(id)) {
				throw FiscusError.duplicate(`Duplicate id "${id}" in ${model}`);
			}
		}
		for (const [model, rows] of overlay) {
			const modelStore = getModelStore(store, model);
			for (const [id, row] of rows) {
				modelStore.set(id, row);
			}
		}
	}

	return {
		id: "memory",
		...buildAdapterMethods(committedView(store), null),

		transaction: async <T>(
			fn: (tx: FiscusTransactionAdapter) => Promise<T>,
			txOptions?: TransactionOptions,
		): Promise<T> => {
			nextOwner += 1;
			const owner = nextOwner;
			const timeoutMs = txOptions?.lockTimeoutMs ?? defaultLockTimeoutMs;
			const pending: PendingWrites = { overlay: new Map(), inserts: new Set() };

			const tx: FiscusTransactionAdapter = {
				id: "memory",
				...buildAdapterMethods(transactionView(store, pending), (key) =>
					locks.acquire(key, owner, timeoutMs),
				),
			};

			try {
				const result = await fn(tx);
				commit(pending);
				return result;
			} finally {
				locks.releaseAll(owner);
			}
		},
	};
}
