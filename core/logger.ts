/**
 * Console-backed logging with a scope prefix and a level threshold.
 */

import { LogLevelSchema, type LogLevel } from "./config.ts";

export interface Logger {
	debug(message: string, ...args: unknown[]): void;
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
};

/**
 * Read the log level from ALIAS_REGISTRY_LOG_LEVEL.
 * Unknown values fall back to "info".
 */
export function resolveLogLevel(
	env: Record<string, string | undefined> = process.env,
): LogLevel {
	const parsed = LogLevelSchema.safeParse(env.ALIAS_REGISTRY_LOG_LEVEL?.toLowerCase());
	return parsed.success ? parsed.data : "info";
}

export function createLogger(scope: string, level: LogLevel = resolveLogLevel()): Logger {
	const prefix = `[${scope}]`;
	const enabled = (at: LogLevel) => LEVEL_ORDER[at] >= LEVEL_ORDER[level];

	return {
		debug: (msg, ...args) => {
			if (enabled("debug")) console.debug(prefix, msg, ...args);
		},
		info: (msg, ...args) => {
			if (enabled("info")) console.info(prefix, msg, ...args);
		},
		warn: (msg, ...args) => {
			if (enabled("warn")) console.warn(prefix, msg, ...args);
		},
		error: (msg, ...args) => {
			if (enabled("error")) console.error(prefix, msg, ...args);
		},
	};
}
