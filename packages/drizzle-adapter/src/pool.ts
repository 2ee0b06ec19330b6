// =============================================================================
// CONNECTION POOL CONFIGURATION
// =============================================================================
// Wraps an existing pg pool and its drizzle instance into an adapter with
// monitoring and graceful shutdown.
//
// Usage:
//   import { createPooledAdapter, RECOMMENDED_POOL_CONFIG } from "@fiscus/drizzle-adapter";
//   const pool = new Pool({ ...RECOMMENDED_POOL_CONFIG, connectionString: "..." });
//   const { adapter, close, stats } = createPooledAdapter({ pool, drizzle: drizzle(pool) });

import {
	createPooledAdapterResult,
	type PooledAdapterResult,
	type PoolLike,
} from "@fiscus/core/db";
import { type DrizzleAdapterOptions, drizzleAdapter } from "./adapter.js";

export interface DrizzlePooledAdapterConfig extends DrizzleAdapterOptions {
	/** A pg.Pool instance (or compatible pool) */
	pool: PoolLike;

	/**
	 * A Drizzle database instance created from the same pool.
	 * e.g. `drizzle(pool)` from `drizzle-orm/node-postgres`
	 */
	// biome-ignore lint/suspicious/noExplicitAny: Drizzle db type varies by driver
	drizzle: any;
}

/**
 * @example
 * ```ts
 * const { adapter, close, stats } = createPooledAdapter({ pool, drizzle: db });
 * const fiscus = createFiscus({ database: adapter });
 *
 * // On shutdown:
 * await fiscus.workers.stop();
 * await close();
 * ```
 */
export function createPooledAdapter(config: DrizzlePooledAdapterConfig): PooledAdapterResult {
	const { pool, drizzle: db, ...options } = config;
	return createPooledAdapterResult(drizzleAdapter(db, options), pool);
}
