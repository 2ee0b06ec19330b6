// =============================================================================
// DRIZZLE ADAPTER -- FiscusAdapter implementation backed by Drizzle ORM
// =============================================================================
// Uses raw SQL via drizzle-orm's `sql` template for all operations. The CRUD
// statements come from @fiscus/core's SQL builder; this file only decides how
// they are executed, how transactions are opened and how PostgreSQL errors are
// reported.

import { FiscusError } from "@fiscus/core";
import {
	buildSqlAdapterMethods,
	type FiscusAdapter,
	type FiscusTransactionAdapter,
	type SqlExecutor,
	type TransactionOptions,
} from "@fiscus/core/db";
import { type SQL, sql } from "drizzle-orm";

export interface DrizzleAdapterOptions {
	/** PostgreSQL schema holding the fiscus tables (default: "fiscus") */
	schema?: string;
}

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

/**
 * Build a drizzle `sql` object from a `$1, $2, ...` placeholder string.
 * Placeholders become bound parameters; everything else is raw SQL.
 */
export function buildDrizzleSql(query: string, params: unknown[]): SQL {
	const chunks: SQL[] = [];
	let lastIdx = 0;
	const regex = /\$(\d+)/g;
	let match: RegExpExecArray | null = regex.exec(query);

	while (match !== null) {
		if (match.index > lastIdx) {
			chunks.push(sql.raw(query.slice(lastIdx, match.index)));
		}
		const paramIndex = Number.parseInt(match[1] ?? "0", 10) - 1;
		chunks.push(sql`${params[paramIndex]}`);
		lastIdx = match.index + match[0].length;
		match = regex.exec(query);
	}

	if (lastIdx < query.length) {
		chunks.push(sql.raw(query.slice(lastIdx)));
	}

	return sql.join(chunks);
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** node-postgres returns `{ rows }`, postgres.js returns the row array itself. */
function extractRows(result: unknown): Record<string, unknown>[] {
	const rows: unknown[] = Array.isArray(result)
		? result
		: isRecord(result) && Array.isArray(result.rows)
			? result.rows
			: [];
	return rows.filter(isRecord);
}

function pgErrorCode(error: unknown): string | undefined {
	if (!isRecord(error)) return undefined;
	if (typeof error.code === "string") return error.code;
	// drizzle wraps driver errors in newer releases
	return error.cause !== undefined ? pgErrorCode(error.cause) : undefined;
}

/**
 * Map a PostgreSQL error onto the fiscus error taxonomy. Anything that is not
 * a recognised SQLSTATE is returned unchanged.
 */
export function translatePgError(error: unknown): unknown {
	if (error instanceof FiscusError) return error;
	const message = error instanceof Error ? error.message : String(error);

	switch (pgErrorCode(error)) {
		case "55P03": // lock_not_available (lock_timeout)
		case "40P01": // deadlock_detected
		case "40001": // serialization_failure
			return FiscusError.contention(message, { cause: error });
		case "23505": // unique_violation
			return FiscusError.duplicate(message, { cause: error });
		case "23514": // check_violation
			return FiscusError.invariantViolation(message, { cause: error });
		default:
			return error;
	}
}

function lockTimeoutStatement(ms: number): SQL {
	// PostgreSQL reads a lock_timeout of 0 as "wait forever".
	if (!Number.isSafeInteger(ms) || ms <= 0) {
		throw FiscusError.invalidArgument(`lockTimeoutMs must be a positive integer, got ${ms}`);
	}
	return sql.raw(`SET LOCAL lock_timeout = '${ms}ms'`);
}

// biome-ignore lint/suspicious/noExplicitAny: Drizzle db/tx type varies by driver
function createExecutor(db: any): SqlExecutor {
	return {
		query: async (query, params) => {
			try {
				return extractRows(await db.execute(buildDrizzleSql(query, params)));
			} catch (error) {
				throw translatePgError(error);
			}
		},
		advisoryLock: async (key) => {
			try {
				await db.execute(sql`SELECT pg_advisory_xact_lock(${key})`);
			} catch (error) {
				throw translatePgError(error);
			}
		},
	};
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Create a FiscusAdapter backed by a Drizzle ORM database instance.
 *
 * @param db - A Drizzle database instance (e.g., from `drizzle(pool)`)
 *
 * @example
 * ```ts
 * import { drizzle } from "drizzle-orm/node-postgres";
 * import { Pool } from "pg";
 * import { drizzleAdapter } from "@fiscus/drizzle-adapter";
 *
 * const pool = new Pool({ connectionString: process.env.DATABASE_URL });
 * const adapter = drizzleAdapter(drizzle(pool), { schema: "fiscus" });
 * ```
 */
// biome-ignore lint/suspicious/noExplicitAny: Drizzle db type varies by driver
export function drizzleAdapter(db: any, options: DrizzleAdapterOptions = {}): FiscusAdapter {
	const schema = options.schema ?? "fiscus";
	const getSchema = () => schema;

	return {
		id: "drizzle",
		...buildSqlAdapterMethods(createExecutor(db), getSchema),

		transaction: async <T>(
			fn: (tx: FiscusTransactionAdapter) => Promise<T>,
			txOptions?: TransactionOptions,
		): Promise<T> => {
			try {
				// biome-ignore lint/suspicious/noExplicitAny: Drizzle transaction type varies by driver
				return await db.transaction(async (tx: any) => {
					if (txOptions?.lockTimeoutMs !== undefined) {
						await tx.execute(lockTimeoutStatement(txOptions.lockTimeoutMs));
					}
					const txAdapter: FiscusTransactionAdapter = {
						id: "drizzle",
						...buildSqlAdapterMethods(createExecutor(tx), getSchema),
					};
					return fn(txAdapter);
				});
			} catch (error) {
				// commit itself can fail with a serialization error
				throw translatePgError(error);
			}
		},
	};
}
