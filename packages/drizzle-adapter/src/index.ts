export {
	buildDrizzleSql,
	type DrizzleAdapterOptions,
	drizzleAdapter,
	translatePgError,
} from "./adapter.js";
export { createPooledAdapter, type DrizzlePooledAdapterConfig } from "./pool.js";
export * from "./schema.js";
export {
	type PooledAdapterResult,
	type PoolLike,
	type PoolStats,
	RECOMMENDED_POOL_CONFIG,
} from "@fiscus/core/db";
