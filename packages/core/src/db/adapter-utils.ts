// =============================================================================
// SHARED ADAPTER UTILITIES
// =============================================================================
// camelCase <-> snake_case conversion and WHERE clause building for SQL adapters.

import type { Where } from "./adapter.js";

export function toSnakeCase(str: string): string {
	return str.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

export function toCamelCase(str: string): string {
	return str.replace(/_([a-z])/g, (_, letter: string) => letter.toUpperCase());
}

export function keysToSnake(obj: object): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[toSnakeCase(key)] = value;
	}
	return result;
}

export function keysToCamel(obj: Record<string, unknown>): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[toCamelCase(key)] = value;
	}
	return result;
}

const COMPARISON_OPERATORS = {
	eq: "=",
	ne: "!=",
	gt: ">",
	gte: ">=",
	lt: "<",
	lte: "<=",
} as const;

/**
 * Build a SQL WHERE clause from an array of Where conditions.
 * Returns the clause string (without the WHERE keyword) and parameter values,
 * numbered `$startIndex`, `$startIndex + 1`, ...
 */
export function buildWhereClause(
	where: Where[],
	startIndex: number = 1,
): { clause: string; params: unknown[] } {
	if (where.length === 0) {
		return { clause: "TRUE", params: [] };
	}

	const conditions: string[] = [];
	const params: unknown[] = [];
	let paramIdx = startIndex;

	for (const w of where) {
		const col = toSnakeCase(w.field);

		if (w.operator === "in") {
			if (!Array.isArray(w.value)) {
				throw new TypeError(`"in" condition on ${w.field} needs an array value`);
			}
			if (w.value.length === 0) {
				conditions.push("FALSE");
				continue;
			}
			const placeholders = w.value.map((_, i) => `$${paramIdx + i}`).join(", ");
			conditions.push(`"${col}" IN (${placeholders})`);
			params.push(...w.value);
			paramIdx += w.value.length;
			continue;
		}

		conditions.push(`"${col}" ${COMPARISON_OPERATORS[w.operator]} $${paramIdx}`);
		params.push(w.value);
		paramIdx++;
	}

	return { clause: conditions.join(" AND "), params };
}
