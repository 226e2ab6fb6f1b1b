export * from './tasks/index.js';
export * from './sync/index.js';
export * from './github/index.js';
export * from './config/index.js';

export { createLogger, noopLogger } from './utils/logger.js';
export type { Logger, LoggerOptions, LogLevel, LogFormat } from './utils/logger.js';

export { runSync } from './cli/run.js';
export type { RunDependencies } from './cli/run.js';
export { createProgram, CliOptionsSchema } from './cli/program.js';
export type { CliOptions } from './cli/program.js';
