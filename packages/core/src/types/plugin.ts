import type { FiscusContext } from "./context.js";

// =============================================================================
// OPERATION TYPES (for matcher-based hooks)
// =============================================================================

export type FiscusOperationType =
	| "account.open"
	| "account.freeze"
	| "account.unfreeze"
	| "account.close"
	| "transaction.deposit"
	| "transaction.withdraw"
	| "transaction.transfer"
	| "transaction.fee"
	| "interest.batch"
	| "loan.disburse"
	| "loan.payment"
	| "loan.default";

export interface FiscusOperation {
	type: FiscusOperationType;
	params: Record<string, unknown>;
}

export interface FiscusHookContext {
	operation: FiscusOperation;
	context: FiscusContext;
}

// =============================================================================
// PLUGIN INTERFACE
// =============================================================================

export interface FiscusPlugin {
	id: string;

	/** Plugin IDs that must be registered before this plugin. Used for load ordering and validation. */
	dependencies?: string[];

	/** Called once while the context is built */
	init?: (ctx: FiscusContext) => Promise<void> | void;

	/**
	 * Matcher-based hooks. `before` runs ahead of the transaction and may cancel
	 * the operation; `after` runs once the transaction has committed.
	 */
	operationHooks?: {
		before?: Array<{
			matcher: (op: FiscusOperation) => boolean;
			handler: (params: FiscusHookContext) => Promise<undefined | { cancel: true; reason: string }>;
		}>;
		after?: Array<{
			matcher: (op: FiscusOperation) => boolean;
			handler: (params: FiscusHookContext) => Promise<void>;
		}>;
	};

	/** Background workers that run on intervals */
	workers?: FiscusWorkerDefinition[];
}

// =============================================================================
// WORKER DEFINITION
// =============================================================================

export interface FiscusWorkerDefinition {
	/** Unique worker ID (e.g., "interest-accrual:SAVINGS") */
	id: string;

	/** Human-readable description */
	description?: string;

	/** Polling interval: "5s", "1m", "1h", "1d" */
	interval: string;

	handler: (ctx: FiscusContext) => Promise<void>;
}
