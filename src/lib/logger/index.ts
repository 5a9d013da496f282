/**
 * Logger wrapper — domain-agnostic structured logging backed by pino.
 *
 * Stages log through a child bound with `{ stage }`. Supports configurable
 * path-based redaction and a custom destination for capturing output.
 */

import { type LoggerOptions, type Logger as PinoLogger, pino } from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe; `silent` disables output. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
}

/** Structured logger interface. */
export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

type LogMethod = "info" | "warn" | "error" | "debug";

// ── Factory ─────────────────────────────────────────────────────────

function write(
	pinoLogger: PinoLogger,
	method: LogMethod,
	msgOrObj: string | Record<string, unknown>,
	msg?: string,
): void {
	if (typeof msgOrObj === "string") {
		pinoLogger[method](msgOrObj);
	} else {
		pinoLogger[method](msgOrObj, msg ?? "");
	}
}

function wrapPino(pinoLogger: PinoLogger): Logger {
	return {
		info(msgOrObj: string | Record<string, unknown>, msg?: string): void {
			write(pinoLogger, "info", msgOrObj, msg);
		},
		warn(msgOrObj: string | Record<string, unknown>, msg?: string): void {
			write(pinoLogger, "warn", msgOrObj, msg);
		},
		error(msgOrObj: string | Record<string, unknown>, msg?: string): void {
			write(pinoLogger, "error", msgOrObj, msg);
		},
		debug(msgOrObj: string | Record<string, unknown>, msg?: string): void {
			write(pinoLogger, "debug", msgOrObj, msg);
		},
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(bindings));
		},
	};
}

/**
 * Creates a Logger backed by pino with an optional custom destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info" });
 * logger.info({ instrumentId: "B10y" }, "position updated");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: LoggerOptions = {
		level: config.level,
	};

	if (config.redactPaths && config.redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...config.redactPaths],
			censor: "[REDACTED]",
		};
	}

	const pinoLogger = config.destination
		? pino(pinoOptions, config.destination)
		: pino(pinoOptions);

	return wrapPino(pinoLogger);
}

/** Logger that drops everything. Default for stages built without one. */
export function silentLogger(): Logger {
	return createLogger({ level: "silent" });
}
