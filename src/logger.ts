import pino, { type Logger } from "pino";

export type { Logger };

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

/** Used by the core when the caller passes no logger. */
export const silentLogger: Logger = pino({ level: "silent" });

/**
 * Logger for command-line runs. Writes JSON lines to stderr so stdout stays
 * free for command output.
 */
export function createLogger(level: LogLevel = "info"): Logger {
	return pino({ name: "ellie-transfer", level }, pino.destination(2));
}
