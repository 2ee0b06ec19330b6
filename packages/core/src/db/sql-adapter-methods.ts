// =============================================================================
// SQL ADAPTER METHODS -- Shared CRUD logic for SQL-based adapters
// =============================================================================
// The CRUD surface is plain SQL built here; an adapter only has to say how a
// statement is executed and how an advisory lock is taken.

import type { FiscusTransactionAdapter, SortBy, Where } from "./adapter.js";
import { buildWhereClause, keysToCamel, keysToSnake, toSnakeCase } from "./adapter-utils.js";
import { createTableResolver } from "./schema-prefix.js";

// =============================================================================
// SQL EXECUTOR INTERFACE
// =============================================================================

export interface SqlExecutor {
	/** Execute a statement and return its rows. */
	query(sql: string, params: unknown[]): Promise<Record<string, unknown>[]>;
	/** Acquire a transaction-scoped advisory lock. */
	advisoryLock(key: number): Promise<void>;
}

// =============================================================================
// SHARED CRUD BUILDER
// =============================================================================

/**
 * Build the standard adapter methods from a SqlExecutor.
 * Returns everything a FiscusTransactionAdapter needs except `id`.
 */
export function buildSqlAdapterMethods(
	executor: SqlExecutor,
	getSchema: () => string,
): Omit<FiscusTransactionAdapter, "id"> {
	return {
		create: async <T extends object>({ model, data }: { model: string; data: T }): Promise<T> => {
			const t = createTableResolver(getSchema());
			const snakeData = keysToSnake(data);
			const columns = Object.keys(snakeData);
			const values = Object.values(snakeData);

			if (columns.length === 0) {
				throw new Error(`Cannot insert empty data into ${model}`);
			}

			const columnList = columns.map((c) => `"${c}"`).join(", ");
			const placeholders = columns.map((_, i) => `$${i + 1}`).join(", ");
			const query = `INSERT INTO ${t(model)} (${columnList}) VALUES (${placeholders}) RETURNING *`;

			const rows = await executor.query(query, values);
			const row = rows[0];
			if (!row) {
				throw new Error(`Insert into ${model} returned no rows`);
			}
			return keysToCamel(row) as T;
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
			const t = createTableResolver(getSchema());
			const { clause, params } = buildWhereClause(where);
			let query = `SELECT * FROM ${t(model)} WHERE ${clause} LIMIT 1`;
			if (forUpdate) {
				query += " FOR UPDATE";
			}

			const rows = await executor.query(query, params);
			const row = rows[0];
			if (!row) return null;
			return keysToCamel(row) as T;
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
			const t = createTableResolver(getSchema());
			const { clause, params } = buildWhereClause(where ?? []);
			let query = `SELECT * FROM ${t(model)} WHERE ${clause}`;
			let paramIdx = params.length + 1;

			if (sortBy) {
				const col = toSnakeCase(sortBy.field);
				const dir = sortBy.direction === "desc" ? "DESC" : "ASC";
				query += ` ORDER BY "${col}" ${dir}`;
			}

			if (limit !== undefined) {
				query += ` LIMIT $${paramIdx}`;
				params.push(limit);
				paramIdx++;
			}

			if (offset !== undefined) {
				query += ` OFFSET $${paramIdx}`;
				params.push(offset);
			}

			const rows = await executor.query(query, params);
			return rows.map((r) => keysToCamel(r) as T);
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
			const snakeData = keysToSnake(updateData);
			const setCols = Object.keys(snakeData);
			const setValues = Object.values(snakeData);

			if (setCols.length === 0) {
				throw new Error(`Cannot update ${model} with empty data`);
			}

			const setClause = setCols.map((c, i) => `"${c}" = $${i + 1}`).join(", ");
			const { clause: whereClause, params: whereParams } = buildWhereClause(
				where,
				setCols.length + 1,
			);

			const t = createTableResolver(getSchema());
			const query = `UPDATE ${t(model)} SET ${setClause} WHERE ${whereClause} RETURNING *`;

			const rows = await executor.query(query, [...setValues, ...whereParams]);
			const row = rows[0];
			if (!row) return null;
			return keysToCamel(row) as T;
		},

		count: async ({ model, where }: { model: string; where?: Where[] }): Promise<number> => {
			const t = createTableResolver(getSchema());
			const { clause, params } = buildWhereClause(where ?? []);
			const query = `SELECT COUNT(*)::int AS count FROM ${t(model)} WHERE ${clause}`;

			const rows = await executor.query(query, params);
			return Number(rows[0]?.count ?? 0);
		},

		advisoryLock: (key: number) => executor.advisoryLock(key),
	};
}
