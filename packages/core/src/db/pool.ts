// =============================================================================
// POOL TYPES & CONSTANTS
// =============================================================================

import type { FiscusAdapter } from "./adapter.js";

/**
 * Minimal interface for a pg-compatible connection pool.
 * Matches the `pg.Pool` API surface we need without importing `pg` types.
 */
export interface PoolLike {
	end(): Promise<void>;
	totalCount: number;
	idleCount: number;
	waitingCount: number;
}

export interface PoolStats {
	totalCount: number;
	idleCount: number;
	/** Clients checked out (in use) */
	activeCount: number;
	/** Callers waiting for a client */
	waitingCount: number;
}

export interface PooledAdapterResult {
	adapter: FiscusAdapter;
	/** Shut down the pool. Call this during application shutdown. */
	close: () => Promise<void>;
	stats: () => PoolStats;
}

/**
 * Recommended pool settings. Spread into `new Pool()` and override as needed.
 * `lock_timeout` is set per transaction by the adapter, so it is not listed here.
 */
export const RECOMMENDED_POOL_CONFIG = {
	max: 20,
	min: 2,
	idleTimeoutMillis: 30_000,
	connectionTimeoutMillis: 10_000,
	statement_timeout: 30_000,
} as const;

export function getPoolStats(pool: PoolLike): PoolStats {
	return {
		totalCount: pool.totalCount,
		idleCount: pool.idleCount,
		activeCount: pool.totalCount - pool.idleCount,
		waitingCount: pool.waitingCount,
	};
}

export function createPooledAdapterResult(adapter: FiscusAdapter, pool: PoolLike): PooledAdapterResult {
	return {
		adapter,
		close: () => pool.end(),
		stats: () => getPoolStats(pool),
	};
}
