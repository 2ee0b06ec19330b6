// =============================================================================
// PLUGIN HOOKS RUNNER
// =============================================================================
// Iterates registered plugins and invokes matching operation hooks.
// Before-hooks run ahead of the transaction and may cancel the operation.
// After-hooks run once it has committed; their errors are logged and never
// undo the operation.
//
// Hook presence is pre-computed via buildHookCache() at context creation
// time, so the runners only iterate plugins that define the relevant hook.

import type { FiscusContext, FiscusOperation, FiscusPlugin } from "@fiscus/core";

// =============================================================================
// HOOK CACHE: Pre-computed at context creation
// =============================================================================

export interface HookCache {
	beforeOperation: FiscusPlugin[];
	afterOperation: FiscusPlugin[];
}

/** Build a hook cache from the plugin list. Call once at context creation. */
export function buildHookCache(plugins: FiscusPlugin[]): HookCache {
	return {
		beforeOperation: plugins.filter((p) => p.operationHooks?.before?.length),
		afterOperation: plugins.filter((p) => p.operationHooks?.after?.length),
	};
}

// =============================================================================
// BEFORE HOOKS: Sequential, first cancel wins
// =============================================================================

/**
 * Run before-operation hooks. Returns `{ cancelled: true, reason }` if any
 * plugin cancels the operation, otherwise `{ cancelled: false }`.
 * A hook that throws aborts the operation with that error.
 */
export async function runBeforeOperationHooks(
	ctx: FiscusContext,
	operation: FiscusOperation,
): Promise<{ cancelled: boolean; reason?: string }> {
	const plugins = ctx._hookCache?.beforeOperation ?? ctx.plugins;
	for (const plugin of plugins) {
		if (!plugin.operationHooks?.before) continue;
		for (const hook of plugin.operationHooks.before) {
			if (!hook.matcher(operation)) continue;
			const result = await hook.handler({ operation, context: ctx });
			if (result?.cancel) {
				return { cancelled: true, reason: result.reason };
			}
		}
	}
	return { cancelled: false };
}

// =============================================================================
// AFTER HOOKS: Parallel, errors caught and logged (never rollback)
// =============================================================================

export async function runAfterOperationHooks(
	ctx: FiscusContext,
	operation: FiscusOperation,
): Promise<void> {
	const plugins = ctx._hookCache?.afterOperation ?? ctx.plugins;
	if (plugins.length === 0) return;

	const promises: Promise<void>[] = [];
	for (const plugin of plugins) {
		if (!plugin.operationHooks?.after) continue;
		for (const hook of plugin.operationHooks.after) {
			if (!hook.matcher(operation)) continue;
			promises.push(
				hook.handler({ operation, context: ctx }).catch((err: unknown) => {
					ctx.logger.error(`Plugin "${plugin.id}" operationHooks.after failed`, {
						error: err instanceof Error ? err.message : String(err),
						operation: operation.type,
					});
				}),
			);
		}
	}
	if (promises.length > 0) await Promise.all(promises);
}

// =============================================================================
// MATCHERS
// =============================================================================

/** Matcher for one operation type, or every operation with "*". */
export function matchOperation(
	type: FiscusOperation["type"] | "*",
): (op: FiscusOperation) => boolean {
	return (op) => type === "*" || op.type === type;
}
