import pino from 'pino';
import { prettyFactory } from 'pino-pretty';
import type { LoggerConfig, Logger } from './types.js';

export type { LogLevel, LoggerConfig, Logger } from './types.js';

type WriteLevel = 'info' | 'warn' | 'debug';

let logger: pino.Logger | null = null;

function openDestination(destination?: string): pino.DestinationStream {
	if (destination === 'stderr') {
		return pino.destination(2);
	}
	if (destination && destination !== 'stdout') {
		return pino.destination({ dest: destination, mkdir: true, sync: true });
	}
	return pino.destination(1);
}

function prettyStream(target: pino.DestinationStream, colorize: boolean): pino.DestinationStream {
	const prettify = prettyFactory({
		colorize,
		translateTime: 'SYS:standard',
		ignore: 'pid,hostname',
	});
	return {
		write: (line: string) => {
			target.write(prettify(line));
		},
	};
}

function createLogger(config?: LoggerConfig): pino.Logger {
	const options: pino.LoggerOptions = {
		level: config?.level ?? 'info',
		timestamp: pino.stdTimeFunctions.isoTime,
		formatters: {
			level: (label) => {
				return { level: label };
			},
		},
	};

	if (config?.pretty) {
		const { destination } = config;
		const toFile = destination !== undefined && destination !== 'stdout' && destination !== 'stderr';
		return pino(options, prettyStream(openDestination(destination), !toFile));
	}
	if (config?.destination) {
		return pino(options, openDestination(config.destination));
	}
	return pino(options);
}

/**
 * Initializes the logger with configuration
 */
export function initializeLogger(config?: LoggerConfig): void {
	logger = createLogger(config);
}

/**
 * Gets or initializes the logger
 */
function getLogger(): pino.Logger {
	if (!logger) {
		logger = createLogger({ level: 'info', pretty: false });
	}
	return logger;
}

function write(target: pino.Logger, level: WriteLevel, message: string, data?: unknown): void {
	if (data) {
		target[level](data, message);
	} else {
		target[level](message);
	}
}

function bind(resolve: () => pino.Logger): Logger {
	return {
		info: (message, data) => write(resolve(), 'info', message, data),
		warn: (message, data) => write(resolve(), 'warn', message, data),
		debug: (message, data) => write(resolve(), 'debug', message, data),
		child: (bindings) => {
			const childLogger = resolve().child(bindings);
			return bind(() => childLogger);
		},
	};
}

/**
 * Module-level logger; resolves the current pino instance on every call so
 * initializeLogger() takes effect for existing references
 */
export const log: Logger = bind(getLogger);

/**
 * Shuts down the logger (for cleanup in tests)
 */
export function shutdownLogger(): void {
	logger = null;
}
