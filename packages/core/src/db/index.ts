export type {
	FiscusAdapter,
	FiscusTransactionAdapter,
	SortBy,
	TransactionOptions,
	Where,
	WhereOperator,
} from "./adapter.js";
export {
	buildWhereClause,
	keysToCamel,
	keysToSnake,
	toCamelCase,
	toSnakeCase,
} from "./adapter-utils.js";
export {
	createPooledAdapterResult,
	getPoolStats,
	type PooledAdapterResult,
	type PoolLike,
	type PoolStats,
	RECOMMENDED_POOL_CONFIG,
} from "./pool.js";
export { createTableResolver } from "./schema-prefix.js";
export { buildSqlAdapterMethods, type SqlExecutor } from "./sql-adapter-methods.js";
