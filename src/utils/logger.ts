// src/utils/logger.ts
import pino, { type Logger } from "pino";

export interface LoggerOptions {
	level?: string;
	name?: string;
}

export function createLogger(opts: LoggerOptions = {}): Logger {
	return pino({
		name: opts.name ?? "vector-index",
		level: opts.level ?? "info",
	});
}
