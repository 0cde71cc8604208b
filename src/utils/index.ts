/**
 * Utilities barrel export
 */

export * from './config-schemas.js';
export * from './env-parser.js';
export * from './timeouts.js';
export { Logger, configureLogger, logger, prettyTransportOptions, type LogContext, type LoggerConfig } from './logger.js';
