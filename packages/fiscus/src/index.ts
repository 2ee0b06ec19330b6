// Main entry
export { createFiscus, type Fiscus } from "./fiscus/base.js";

// Configuration
export { collectConfigProblems, defineFiscusConfig, validateConfig } from "./config/index.js";

// Context & hooks (for plugin authors)
export { buildContext, sortPlugins } from "./context/context.js";
export { matchOperation } from "./context/hooks.js";
export { runOperation, withTransaction } from "./infrastructure/atomic.js";
export {
	createWorkerRunner,
	FiscusWorkerRunner,
	parseInterval,
} from "./infrastructure/worker-runner.js";

// Catalogs
export {
	createAdapterCatalog,
	createStaticCatalog,
	type StaticCatalogConfig,
} from "./managers/catalog.js";

// In-transaction operations, for plugins composing their own atomic units
export {
	depositInTx,
	type MovementParams,
	postFeeInTx,
	type TransferParams,
	transferInTx,
	withdrawInTx,
} from "./managers/transaction-engine.js";
export type { AuditListResult } from "./managers/audit-log.js";
export type { TransactionListResult } from "./managers/ledger.js";
export {
	computeMonthlyInterest,
	type InterestBatchParams,
	parseAnnualRate,
} from "./managers/interest-batch.js";

// Plugins
export * from "./plugins/index.js";

// Re-export core types and utilities
export * from "@fiscus/core";
