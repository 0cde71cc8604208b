/**
 * Structured Logger using Pino
 *
 * Provides structured JSON logging with:
 * - Multiple log levels (debug, info, warn, error)
 * - Component-based child loggers
 * - Structured metadata for each log entry
 * - Level-based routing: debug/info to stdout, warn/error to stderr
 */

import pino, {
  type Logger as PinoLogger,
  type LoggerOptions,
  type DestinationStream,
  type TransportMultiOptions,
} from 'pino';
import { logLevelSchema, type LogLevel } from './config-schemas.js';

export type { LogLevel };

/**
 * Log context metadata
 */
export interface LogContext {
  component?: string;
  url?: string;
  operation?: string;
  cutoff?: string;
  cycle?: number;
  durationMs?: number;
  [key: string]: unknown;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;
  prettyPrint: boolean;
  /** Override for both streams (tests capture output through this) */
  destination?: DestinationStream;
}

function resolveLevel(value: string | undefined): LogLevel {
  const parsed = logLevelSchema.safeParse(value);
  return parsed.success ? parsed.data : 'info';
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: resolveLevel(process.env.LOG_LEVEL),
  prettyPrint: process.env.LOG_PRETTY === 'true',
};

/**
 * Paths to redact from logs to prevent secrets from leaking.
 * Uses Pino's path syntax (wildcards with *)
 *
 * See: https://getpino.io/#/docs/redaction
 */
const REDACT_PATHS = [
  'password',
  'pass',
  '*.password',
  '*.pass',
  '*.auth',
  '*.authorization',
  '*.Authorization',
  '*.cookie',
  '*.Cookie',
  'headers.authorization',
  'headers.cookie',
];

const LABEL_FORMATTERS: LoggerOptions['formatters'] = {
  level: (label) => ({ level: label }),
};

/**
 * pino-pretty targets for development output. Each line goes to one target:
 * debug/info to stdout (fd 1), warn/error to stderr (fd 2).
 */
export function prettyTransportOptions(): TransportMultiOptions {
  const prettyOptions = {
    colorize: true,
    translateTime: 'SYS:standard',
    ignore: 'pid,hostname,service',
  };
  return {
    targets: [
      { target: 'pino-pretty', level: 'debug', options: { ...prettyOptions, destination: 1 } },
      { target: 'pino-pretty', level: 'warn', options: { ...prettyOptions, destination: 2 } },
    ],
    dedupe: true,
  };
}

/**
 * Create the base Pino logger instance
 */
function createBaseLogger(config: LoggerConfig = DEFAULT_CONFIG): PinoLogger {
  const options: LoggerOptions = {
    level: config.level,
    base: {
      pid: process.pid,
      service: 'slot-watch',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
  };

  if (config.destination) {
    return pino({ ...options, formatters: LABEL_FORMATTERS }, config.destination);
  }

  // Pretty print for development. Multi-target transports route on numeric
  // levels, so the label formatter is left out here.
  if (config.prettyPrint) {
    return pino(options, pino.transport(prettyTransportOptions()));
  }

  // With dedupe each line goes only to the stream with the highest matching level
  const streams = pino.multistream(
    [
      { level: 'debug', stream: process.stdout },
      { level: 'warn', stream: process.stderr },
    ],
    { dedupe: true }
  );

  return pino({ ...options, formatters: LABEL_FORMATTERS }, streams);
}

// Base logger instance
let baseLogger = createBaseLogger();

/**
 * Reconfigure the logger (useful for testing or runtime changes)
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  baseLogger = createBaseLogger({ ...DEFAULT_CONFIG, ...config });
}

/**
 * Component-specific logger wrapper
 *
 * Uses a getter to always access the current baseLogger, allowing
 * reconfiguration at runtime via configureLogger().
 */
export class Logger {
  private _logger: PinoLogger | null = null;
  private component: string;

  constructor(component: string, parentLogger?: PinoLogger) {
    this.component = component;
    if (parentLogger) {
      this._logger = parentLogger.child({ component });
    }
  }

  private get logger(): PinoLogger {
    if (this._logger) {
      return this._logger;
    }
    // Fresh child each time so configureLogger() changes take effect
    return baseLogger.child({ component: this.component });
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): Logger {
    const childLogger = new Logger(this.component, this.logger);
    childLogger._logger = this.logger.child(context);
    return childLogger;
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(context || {}, message);
  }

  info(message: string, context?: LogContext): void {
    this.logger.info(context || {}, message);
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(context || {}, message);
  }

  /**
   * Error level. Error instances go through pino's `err` serializer; any
   * other thrown value is logged as its string form under `error`.
   */
  error(message: string, context?: LogContext & { error?: unknown }): void {
    if (!context || context.error === undefined) {
      this.logger.error(context || {}, message);
      return;
    }

    const { error, ...rest } = context;
    if (error instanceof Error) {
      this.logger.error({ ...rest, err: error }, message);
    } else {
      this.logger.error({ ...rest, error: String(error) }, message);
    }
  }
}

/**
 * Pre-configured loggers for each component
 */
export const logger = {
  fetcher: new Logger('PageFetcher'),
  parser: new Logger('AvailabilityParser'),
  notifier: new Logger('EmailNotifier'),
  monitor: new Logger('AppointmentMonitor'),
  cli: new Logger('Cli'),
};

export default logger;
