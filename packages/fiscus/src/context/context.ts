// =============================================================================
// CONTEXT BUILDER
// =============================================================================
// Builds FiscusContext from FiscusOptions. Resolves adapter, logger and
// collaborators, merges config defaults and initialises plugins.

import type {
	FiscusAdapter,
	FiscusContext,
	FiscusOptions,
	FiscusPlugin,
	ResolvedAdvancedOptions,
	ResolvedFiscusOptions,
} from "@fiscus/core";
import { createRandomIdentity, DEFAULT_CURRENCY, FiscusError } from "@fiscus/core";
import { createConsoleLogger } from "@fiscus/core/logger";
import { validateConfig } from "../config/index.js";
import { createAdapterCatalog } from "../managers/catalog.js";
import { buildHookCache } from "./hooks.js";

// =============================================================================
// DEFAULT CONFIG VALUES
// =============================================================================

const DEFAULT_ADVANCED: ResolvedAdvancedOptions = {
	lockTimeoutMs: 3000,
	maxTransactionAmount: 1_000_000_000_000,
	hmacSecret: null,
};

// =============================================================================
// BUILD CONTEXT
// =============================================================================

export async function buildContext(options: FiscusOptions): Promise<FiscusContext> {
	validateConfig(options);

	const adapter: FiscusAdapter =
		typeof options.database === "function" ? options.database() : options.database;

	const logger = options.logger ?? createConsoleLogger();

	const advanced: ResolvedAdvancedOptions = {
		lockTimeoutMs: options.advanced?.lockTimeoutMs ?? DEFAULT_ADVANCED.lockTimeoutMs,
		maxTransactionAmount:
			options.advanced?.maxTransactionAmount ?? DEFAULT_ADVANCED.maxTransactionAmount,
		hmacSecret: options.advanced?.hmacSecret ?? DEFAULT_ADVANCED.hmacSecret,
	};

	const resolvedOptions: ResolvedFiscusOptions = {
		currency: options.currency ?? DEFAULT_CURRENCY,
		advanced,
	};

	const plugins = sortPlugins(options.plugins ?? []);

	if (!advanced.hmacSecret) {
		logger.warn(
			"hmacSecret is not configured. Audit entry hashes use plain SHA-256, so anyone with write access to the store can recompute them. Set advanced.hmacSecret for tamper-evident audit records.",
		);
	}

	const ctx: FiscusContext = {
		adapter,
		options: resolvedOptions,
		logger,
		plugins,
		catalog: options.catalog ?? createAdapterCatalog(adapter),
		identity: options.identity ?? createRandomIdentity(),
		clock: options.clock ?? (() => new Date()),
		_hookCache: buildHookCache(plugins),
	};

	for (const plugin of plugins) {
		if (plugin.init) await plugin.init(ctx);
	}

	return ctx;
}

// =============================================================================
// PLUGIN DEPENDENCY VALIDATION & TOPOLOGICAL SORT
// =============================================================================

export function sortPlugins(plugins: FiscusPlugin[]): FiscusPlugin[] {
	if (plugins.length <= 1) return plugins;

	const pluginMap = new Map<string, FiscusPlugin>();
	for (const plugin of plugins) {
		if (pluginMap.has(plugin.id)) {
			throw FiscusError.invalidArgument(`Duplicate plugin ID: "${plugin.id}"`);
		}
		pluginMap.set(plugin.id, plugin);
	}

	for (const plugin of plugins) {
		for (const dep of plugin.dependencies ?? []) {
			if (!pluginMap.has(dep)) {
				throw FiscusError.invalidArgument(
					`Plugin "${plugin.id}" requires plugin "${dep}" which is not registered`,
				);
			}
		}
	}

	// Kahn's algorithm, seeded in registration order
	const inDegree = new Map<string, number>();
	const adj = new Map<string, string[]>();

	for (const plugin of plugins) {
		inDegree.set(plugin.id, 0);
		adj.set(plugin.id, []);
	}

	for (const plugin of plugins) {
		for (const dep of plugin.dependencies ?? []) {
			adj.get(dep)?.push(plugin.id);
			inDegree.set(plugin.id, (inDegree.get(plugin.id) ?? 0) + 1);
		}
	}

	const queue: string[] = [];
	for (const [id, deg] of inDegree) {
		if (deg === 0) queue.push(id);
	}

	const sorted: FiscusPlugin[] = [];
	for (let id = queue.shift(); id !== undefined; id = queue.shift()) {
		const plugin = pluginMap.get(id);
		if (plugin) sorted.push(plugin);
		for (const neighbor of adj.get(id) ?? []) {
			const newDeg = (inDegree.get(neighbor) ?? 1) - 1;
			inDegree.set(neighbor, newDeg);
			if (newDeg === 0) queue.push(neighbor);
		}
	}

	if (sorted.length !== plugins.length) {
		const unsorted = plugins.filter((p) => !sorted.includes(p)).map((p) => p.id);
		throw FiscusError.invalidArgument(
			`Circular plugin dependency detected among: ${unsorted.join(", ")}`,
		);
	}

	return sorted;
}
