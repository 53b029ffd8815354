/**
 * Log API Types
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LoggerConfig {
	level: LogLevel;
	/** Human-readable lines via pino-pretty instead of JSON */
	pretty?: boolean;
	/** `stdout`, `stderr` or a file path */
	destination?: string;
}

export interface Logger {
	info(message: string, data?: unknown): void;
	warn(message: string, data?: unknown): void;
	debug(message: string, data?: unknown): void;
	child(bindings: Record<string, unknown>): Logger;
}
