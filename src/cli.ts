/**
 * Command line entry for slot-watch
 *
 * Usage:
 *   slot-watch --url <time_selection_url> [--until YYYY-MM-DD] [--interval SECONDS]
 */

import { addDays, localDate, type AppointmentDate } from './core/appointment-date.js';
import { AppointmentMonitor, type AppointmentMonitorOptions, type MonitorStats } from './core/appointment-monitor.js';
import {
  ConfigValidationError,
  DEFAULT_CUTOFF_DAYS,
  DEFAULT_INTERVAL_SECONDS,
  monitorOptionsSchema,
} from './utils/config-schemas.js';
import { getLogConfig } from './utils/env-parser.js';
import { configureLogger, logger } from './utils/logger.js';

const log = logger.cli;

export const USAGE = `Usage: slot-watch --url <url> [--until YYYY-MM-DD] [--interval SECONDS]

Monitor a FrontDesk time-selection page for open appointment slots.

Options:
  --url <url>           Full time-selection URL to monitor (required). Copy it
                        from the date and time selection page in your browser.
  --until <date>        Latest date (inclusive) to consider, YYYY-MM-DD.
                        Defaults to ${DEFAULT_CUTOFF_DAYS} days from today.
  --interval <seconds>  Polling interval in seconds (default: ${DEFAULT_INTERVAL_SECONDS}).
  -h, --help            Show this help.

Email notifications are sent when APPT_MAIL_SENDER, APPT_MAIL_RECIPIENT,
APPT_MAIL_SMTP_SERVER and APPT_MAIL_SMTP_PASSWORD are set
(optional: APPT_MAIL_SMTP_PORT, default 587; APPT_MAIL_SMTP_USER, default sender).`;

/**
 * Malformed command-line input. Fatal: the monitor is never started.
 */
export class ArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArgumentError';
  }
}

export interface CliOptions {
  url: string;
  cutoff: AppointmentDate;
  intervalSeconds: number;
}

export type ParsedArgs = { help: true } | { help: false; options: CliOptions };

const VALUE_OPTIONS = ['url', 'until', 'interval'] as const;
type ValueOption = (typeof VALUE_OPTIONS)[number];

function isValueOption(name: string): name is ValueOption {
  return VALUE_OPTIONS.some((option) => option === name);
}

/**
 * Parse and validate command-line arguments (without the node/script prefix).
 *
 * @throws ArgumentError on unknown options, missing values or invalid values
 */
export function parseCliArgs(argv: string[], now: Date = new Date()): ParsedArgs {
  const values: Partial<Record<ValueOption, string>> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '-h' || arg === '--help') {
      return { help: true };
    }
    if (!arg.startsWith('--')) {
      throw new ArgumentError(`Unexpected argument: ${arg}`);
    }

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    if (!isValueOption(name)) {
      throw new ArgumentError(`Unknown option: --${name}`);
    }

    if (eq !== -1) {
      values[name] = arg.slice(eq + 1);
      continue;
    }

    const next = argv[i + 1];
    if (next === undefined || next.startsWith('--')) {
      throw new ArgumentError(`Option --${name} expects a value`);
    }
    values[name] = next;
    i++;
  }

  if (values.url === undefined) {
    throw new ArgumentError('Missing required option: --url');
  }

  const parsed = monitorOptionsSchema.safeParse({
    url: values.url,
    until: values.until ?? addDays(localDate(now), DEFAULT_CUTOFF_DAYS),
    interval: values.interval ?? String(DEFAULT_INTERVAL_SECONDS),
  });

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `--${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ArgumentError(`Invalid arguments: ${details}`);
  }

  return {
    help: false,
    options: {
      url: parsed.data.url,
      cutoff: parsed.data.until,
      intervalSeconds: parsed.data.interval,
    },
  };
}

export interface Runnable {
  start(): Promise<MonitorStats>;
  stop(): void;
}

export interface SignalSource {
  once(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface MainDependencies {
  createMonitor?: (options: AppointmentMonitorOptions) => Runnable;
  /** Process whose signals stop the monitor */
  signals?: SignalSource;
}

function applyLogConfig(): void {
  try {
    configureLogger(getLogConfig());
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      log.warn('Ignoring invalid logging configuration', { details: error.message });
      return;
    }
    throw error;
  }
}

/**
 * Run the monitor until SIGINT/SIGTERM. Returns the process exit code:
 * 0 after a normal stop or --help, 2 on argument errors.
 */
export async function main(argv: string[] = process.argv.slice(2), deps: MainDependencies = {}): Promise<number> {
  let parsed: ParsedArgs;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof ArgumentError) {
      console.error(`${error.message}\n\n${USAGE}`);
      return 2;
    }
    throw error;
  }

  if (parsed.help) {
    console.log(USAGE);
    return 0;
  }

  applyLogConfig();

  const { options } = parsed;
  const createMonitor = deps.createMonitor ?? ((monitorOptions: AppointmentMonitorOptions) => new AppointmentMonitor(monitorOptions));
  const monitor = createMonitor({
    url: options.url,
    cutoff: options.cutoff,
    intervalMs: options.intervalSeconds * 1000,
  });

  const signals = deps.signals ?? process;
  const onSignal = (signal: NodeJS.Signals) => {
    log.info('Received signal, stopping', { signal });
    monitor.stop();
  };
  signals.once('SIGINT', onSignal);
  signals.once('SIGTERM', onSignal);

  try {
    await monitor.start();
  } finally {
    signals.off('SIGINT', onSignal);
    signals.off('SIGTERM', onSignal);
  }
  return 0;
}
