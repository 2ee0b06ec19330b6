// =============================================================================
// JSON LOGGER -- Structured JSON logging for production environments
// =============================================================================

import type { FiscusLogger } from "../types/config.js";
import { consoleMethod, LEVEL_PRIORITY, type LogLevel } from "./levels.js";
import { buildRedactKeys, redactData } from "./redact.js";

export interface JsonLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Service name for structured output. Default: `"fiscus"` */
	service?: string;
	/** Keys to redact from log data. Values replaced with "[REDACTED]". */
	redactKeys?: string[];
	/** Clock for the `timestamp` field. Default: `() => new Date()` */
	now?: () => Date;
}

/**
 * Create a structured JSON logger.
 *
 * Each entry is written as a single-line JSON object suitable for log
 * aggregation systems.
 *
 * @example
 * ```ts
 * import { createJsonLogger } from "@fiscus/core/logger";
 *
 * const logger = createJsonLogger({ level: "debug", service: "ledger" });
 * ```
 */
export function createJsonLogger(options: JsonLoggerOptions = {}): FiscusLogger {
	const { level = "info", service = "fiscus", now = () => new Date() } = options;
	const minPriority = LEVEL_PRIORITY[level];
	const redactKeys = buildRedactKeys(options.redactKeys);

	function emit(lvl: LogLevel, message: string, data?: Record<string, unknown>) {
		if (LEVEL_PRIORITY[lvl] < minPriority) return;

		const safeData = redactData(data, redactKeys);
		const entry: Record<string, unknown> = {
			timestamp: now().toISOString(),
			level: lvl,
			service,
			message,
			...safeData,
		};

		console[consoleMethod(lvl)](JSON.stringify(entry));
	}

	return {
		debug: (message, data) => emit("debug", message, data),
		info: (message, data) => emit("info", message, data),
		warn: (message, data) => emit("warn", message, data),
		error: (message, data) => emit("error", message, data),
	};
}
