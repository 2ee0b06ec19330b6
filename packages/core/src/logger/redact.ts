// =============================================================================
// REDACTION -- Shared helper for log data redaction
// =============================================================================

const DEFAULT_REDACT_KEYS = new Set([
	"password",
	"secret",
	"token",
	"hmacSecret",
	"connectionString",
	"ssn",
]);

const REDACTED = "[REDACTED]";

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Redact keys from a log data object, descending into nested objects and arrays.
 * Matching values are replaced with "[REDACTED]". The input is never mutated.
 */
export function redactData(
	data: Record<string, unknown> | undefined,
	keys: Set<string>,
): Record<string, unknown> | undefined {
	if (!data || keys.size === 0) return data;
	return redactObject(data, keys);
}

function redactObject(data: Record<string, unknown>, keys: Set<string>): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(data)) {
		result[key] = keys.has(key) ? REDACTED : redactValue(value, keys);
	}
	return result;
}

function redactValue(value: unknown, keys: Set<string>): unknown {
	if (Array.isArray(value)) return value.map((item) => redactValue(item, keys));
	if (isPlainObject(value)) return redactObject(value, keys);
	return value;
}

/**
 * Build the redaction key set from user-provided keys (or defaults).
 */
export function buildRedactKeys(userKeys?: string[]): Set<string> {
	if (userKeys) return new Set(userKeys);
	return new Set(DEFAULT_REDACT_KEYS);
}
