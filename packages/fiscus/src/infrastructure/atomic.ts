// =============================================================================
// ATOMIC UNITS
// =============================================================================
// Every public mutation runs as: before-hooks -> one adapter transaction ->
// after-hooks. Nothing here retries; a CONTENTION error reaches the caller,
// who may retry the whole operation.

import type { FiscusContext, FiscusOperation, FiscusTransactionAdapter } from "@fiscus/core";
import { FiscusError } from "@fiscus/core";
import { runAfterOperationHooks, runBeforeOperationHooks } from "../context/hooks.js";

/**
 * Run `fn` inside one adapter transaction with the configured lock timeout.
 * Failures are logged by severity and rethrown unchanged.
 */
export async function withTransaction<T>(
	ctx: FiscusContext,
	label: string,
	fn: (tx: FiscusTransactionAdapter) => Promise<T>,
): Promise<T> {
	try {
		return await ctx.adapter.transaction(fn, {
			lockTimeoutMs: ctx.options.advanced.lockTimeoutMs,
		});
	} catch (error) {
		if (FiscusError.isCode(error, "INVARIANT_VIOLATION")) {
			ctx.logger.error("Ledger invariant violated; transaction rolled back", {
				operation: label,
				error: error.message,
			});
		} else if (FiscusError.isCode(error, "CONTENTION")) {
			ctx.logger.warn("Lock contention; transaction rolled back", {
				operation: label,
				error: error.message,
			});
		} else if (!(error instanceof FiscusError)) {
			ctx.logger.error("Transaction failed", {
				operation: label,
				error: error instanceof Error ? error.message : String(error),
			});
		}
		throw error;
	}
}

/** Hooks around one atomic unit. A cancelling before-hook aborts with CONFLICT. */
export async function runOperation<T>(
	ctx: FiscusContext,
	operation: FiscusOperation,
	fn: (tx: FiscusTransactionAdapter) => Promise<T>,
): Promise<T> {
	const before = await runBeforeOperationHooks(ctx, operation);
	if (before.cancelled) {
		throw FiscusError.conflict(
			`Operation ${operation.type} cancelled: ${before.reason ?? "no reason given"}`,
			{ details: { operation: operation.type } },
		);
	}

	const result = await withTransaction(ctx, operation.type, fn);

	await runAfterOperationHooks(ctx, operation);
	return result;
}
