export type LogLevel = "debug" | "info" | "warn" | "error";

export const LEVEL_PRIORITY: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

export function consoleMethod(level: LogLevel): "error" | "warn" | "log" {
	return level === "error" ? "error" : level === "warn" ? "warn" : "log";
}
