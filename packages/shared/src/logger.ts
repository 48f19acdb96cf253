/**
 * Structured logging with pino.
 *
 * Each module takes a scoped child logger, e.g. `createLogger("scraper:list")`.
 */

import pino, { type Logger } from "pino";

function resolveLevel(): string {
	if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
	return process.env.NODE_ENV === "test" ? "silent" : "info";
}

function createRootLogger(): Logger {
	return pino({
		level: resolveLevel(),
		base: { service: "policy-pulse" },
		formatters: {
			level: (label) => ({ level: label }),
		},
		timestamp: pino.stdTimeFunctions.isoTime,
		...(process.env.LOG_PRETTY === "true" && {
			transport: {
				target: "pino-pretty",
				options: {
					colorize: true,
					translateTime: "SYS:standard",
					ignore: "pid,hostname",
				},
			},
		}),
	});
}

export const logger = createRootLogger();

export type { Logger };

/**
 * Create a child logger bound to a module scope.
 */
export function createLogger(scope: string): Logger {
	return logger.child({ scope });
}

/**
 * Truncate untrusted text before it goes into a log line.
 */
export function truncateForLog(text: string, max = 500): string {
	return text.length > max ? `${text.slice(0, max)}...` : text;
}
