/**
 * Level-toggled console logger.
 *
 * Errors and warnings are always on, info is on when NODE_ENV is
 * 'development', debug is off until enabled:
 *
 *   Logger.setLevel("debug", true);
 *   Logger.disableAll(); // everything but errors
 */

export type LogLevel = "error" | "warn" | "info" | "debug";

export interface LoggerInterface {
	readonly levels: Record<LogLevel, boolean>;
	setLevel(level: LogLevel, enabled?: boolean): void;
	enableAll(): void;
	disableAll(): void;
	error(...args: unknown[]): void;
	warn(...args: unknown[]): void;
	info(...args: unknown[]): void;
	debug(...args: unknown[]): void;
}

const PREFIX = "[schemap]";

const isDevelopment = typeof process !== "undefined" && process.env.NODE_ENV === "development";

const levels: Record<LogLevel, boolean> = {
	error: true,
	warn: true,
	info: isDevelopment,
	debug: false,
};

const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

export const Logger: LoggerInterface = {
	levels,

	setLevel(level: LogLevel, enabled = true) {
		levels[level] = enabled;
	},

	enableAll() {
		for (const level of LOG_LEVELS) {
			levels[level] = true;
		}
	},

	disableAll() {
		for (const level of LOG_LEVELS) {
			levels[level] = level === "error";
		}
	},

	error(...args: unknown[]) {
		if (levels.error) console.error(PREFIX, ...args);
	},

	warn(...args: unknown[]) {
		if (levels.warn) console.warn(PREFIX, ...args);
	},

	info(...args: unknown[]) {
		if (levels.info) console.info(PREFIX, ...args);
	},

	debug(...args: unknown[]) {
		if (levels.debug) console.debug(PREFIX, ...args);
	},
};
