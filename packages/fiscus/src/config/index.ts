import type { FiscusOptions } from "@fiscus/core";
import { FiscusError } from "@fiscus/core";

const CURRENCY_CODE = /^[A-Z]{3}$/;

function isPositiveInteger(value: number): boolean {
	return Number.isSafeInteger(value) && value > 0;
}

/** Every problem with the options, in a stable order. Empty when valid. */
export function collectConfigProblems(options: FiscusOptions): string[] {
	const problems: string[] = [];

	if (!options.database) {
		problems.push("'database' adapter is required");
	}

	if (options.currency !== undefined && !CURRENCY_CODE.test(options.currency)) {
		problems.push(
			`unknown currency "${options.currency}". Use a three-letter ISO 4217 code such as "USD".`,
		);
	}

	const adv = options.advanced;
	if (adv) {
		if (adv.lockTimeoutMs !== undefined && !isPositiveInteger(adv.lockTimeoutMs)) {
			problems.push("'advanced.lockTimeoutMs' must be a positive integer of milliseconds");
		}
		if (adv.maxTransactionAmount !== undefined && !isPositiveInteger(adv.maxTransactionAmount)) {
			problems.push("'advanced.maxTransactionAmount' must be a positive safe integer");
		}
		if (adv.hmacSecret !== undefined && adv.hmacSecret.length === 0) {
			problems.push("'advanced.hmacSecret' must not be empty when set");
		}
	}

	const seen = new Set<string>();
	for (const plugin of options.plugins ?? []) {
		if (seen.has(plugin.id)) {
			problems.push(`duplicate plugin ID "${plugin.id}"`);
		}
		seen.add(plugin.id);
	}

	return problems;
}

/**
 * Validate fiscus configuration options at runtime.
 * Throws one INVALID_ARGUMENT error listing every problem found.
 */
export function validateConfig(options: FiscusOptions): void {
	const problems = collectConfigProblems(options);
	if (problems.length === 0) return;

	throw FiscusError.invalidArgument(
		`Invalid fiscus config:\n${problems.map((p) => `  - ${p}`).join("\n")}`,
		{ details: { problems } },
	);
}

/**
 * Identity function for defining fiscus configuration with autocomplete support.
 * Validates configuration at runtime before returning.
 *
 * @example
 * ```ts
 * import { defineFiscusConfig } from "fiscus/config";
 *
 * export default defineFiscusConfig({
 *   database: drizzleAdapter(db),
 *   currency: "USD",
 *   plugins: [],
 * });
 * ```
 */
export function defineFiscusConfig(options: FiscusOptions): FiscusOptions {
	validateConfig(options);
	return options;
}
