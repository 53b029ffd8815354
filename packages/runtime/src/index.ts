export * from './metadata/index.js';

export { log, initializeLogger, shutdownLogger } from './log/index.js';
export type { LogLevel, LoggerConfig, Logger } from './log/index.js';
