// =============================================================================
// CONSOLE LOGGER -- Built-in FiscusLogger backed by console.*
// =============================================================================

import type { FiscusLogger } from "../types/config.js";
import { createPalette, type Paint } from "./colors.js";
import { consoleMethod, LEVEL_PRIORITY, type LogLevel } from "./levels.js";
import { buildRedactKeys, redactData } from "./redact.js";

export interface ConsoleLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Prefix shown before each message. Default: `"fiscus"` */
	prefix?: string;
	/** Whether to include ISO timestamps. Default: `true` */
	timestamps?: boolean;
	/** Force colors on or off. Default: detected from the environment */
	colors?: boolean;
	/** Keys to redact from log data. Values replaced with "[REDACTED]". */
	redactKeys?: string[];
}

/**
 * Create a console-based logger.
 *
 * @example
 * ```ts
 * import { createConsoleLogger } from "@fiscus/core/logger";
 *
 * const logger = createConsoleLogger({ level: "debug" });
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): FiscusLogger {
	const { level = "info", prefix = "fiscus", timestamps = true } = options;
	const minPriority = LEVEL_PRIORITY[level];
	const redactKeys = buildRedactKeys(options.redactKeys);
	const palette = createPalette(options.colors);

	const levelColor: Record<LogLevel, Paint> = {
		debug: palette.magenta,
		info: palette.blue,
		warn: palette.yellow,
		error: palette.red,
	};

	function emit(lvl: LogLevel, message: string, data?: Record<string, unknown>) {
		if (LEVEL_PRIORITY[lvl] < minPriority) return;

		const parts: string[] = [];
		if (timestamps) {
			parts.push(palette.dim(new Date().toISOString()));
		}
		parts.push(levelColor[lvl](palette.bold(lvl.toUpperCase().padEnd(5))));
		parts.push(`[${prefix}]:`);
		parts.push(message);

		const line = parts.join(" ");
		const method = consoleMethod(lvl);

		const safeData = redactData(data, redactKeys);
		if (safeData && Object.keys(safeData).length > 0) {
			console[method](line, safeData);
		} else {
			console[method](line);
		}
	}

	return {
		debug: (message, data) => emit("debug", message, data),
		info: (message, data) => emit("info", message, data),
		warn: (message, data) => emit("warn", message, data),
		error: (message, data) => emit("error", message, data),
	};
}

/** Logger that drops everything. Handy in tests. */
export function createSilentLogger(): FiscusLogger {
	const noop = () => {};
	return { debug: noop, info: noop, warn: noop, error: noop };
}
