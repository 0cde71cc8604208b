/**
 * Appointment Monitor
 *
 * The poll loop: fetch the page, parse it, notify when dates are open, log
 * the outcome, sleep for the fixed interval, repeat. A failed cycle is
 * logged and the next one runs on schedule; the loop only ends through
 * stop() or an explicit cycle bound.
 */

import { logger } from '../utils/logger.js';
import { getTimeout } from '../utils/timeouts.js';
import type { AppointmentDate } from './appointment-date.js';
import { parseAvailableDates, type AvailabilityRecord } from './availability-parser.js';
import { EmailNotifier, formatRecordLine, type NotificationResult, type Notifier } from './notifier.js';
import { fetchPage } from './page-fetcher.js';

const log = logger.monitor;

// ============================================
// TYPES
// ============================================

/**
 * Records found by one fetch-parse pass. Never stored.
 */
export interface PollCycleResult {
  checkedAt: Date;
  records: AvailabilityRecord[];
}

export type CycleOutcome =
  | { status: 'available'; result: PollCycleResult; notification: NotificationResult }
  | { status: 'none'; result: PollCycleResult }
  | { status: 'error'; checkedAt: Date; error: Error };

export interface MonitorStats {
  cycles: number;
  errors: number;
  notificationsSent: number;
  lastCheckedAt?: Date;
}

export type PageSource = (url: string) => Promise<string>;

export interface AppointmentMonitorOptions {
  /** Absolute URL of the time-selection page */
  url: string;
  /** Inclusive last date of interest */
  cutoff: AppointmentDate;
  /** Sleep between cycles in ms (default: TIMEOUTS.POLL_INTERVAL) */
  intervalMs?: number;
  /** Stop after this many cycles (default: run until stop()) */
  maxCycles?: number;
  fetcher?: PageSource;
  notifier?: Notifier;
  /** Clock used for cycle timestamps */
  now?: () => Date;
}

export const BOOKING_HINT = 'Act quickly to book your preferred slot via the web interface.';

/**
 * Local wall-clock timestamp for log lines: "2025-08-20 09:30:00"
 */
export function formatTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

// ============================================
// MONITOR
// ============================================

export class AppointmentMonitor {
  private readonly url: string;
  private readonly cutoff: AppointmentDate;
  private readonly intervalMs: number;
  private readonly maxCycles?: number;
  private readonly fetcher: PageSource;
  private readonly notifier: Notifier;
  private readonly now: () => Date;

  private running = false;
  private timer: NodeJS.Timeout | null = null;
  private wake: (() => void) | null = null;
  private stats: MonitorStats = { cycles: 0, errors: 0, notificationsSent: 0 };

  constructor(options: AppointmentMonitorOptions) {
    if (options.intervalMs !== undefined && !(options.intervalMs > 0)) {
      throw new Error(`Invalid poll interval: ${options.intervalMs}ms`);
    }
    if (options.maxCycles !== undefined && !(Number.isInteger(options.maxCycles) && options.maxCycles > 0)) {
      throw new Error(`Invalid cycle bound: ${options.maxCycles}`);
    }

    this.url = options.url;
    this.cutoff = options.cutoff;
    this.intervalMs = getTimeout('POLL_INTERVAL', options.intervalMs);
    this.maxCycles = options.maxCycles;
    this.fetcher = options.fetcher ?? ((url) => fetchPage(url));
    this.notifier = options.notifier ?? new EmailNotifier();
    this.now = options.now ?? (() => new Date());
  }

  isRunning(): boolean {
    return this.running;
  }

  getStats(): MonitorStats {
    return { ...this.stats };
  }

  /**
   * One Fetch → Parse → (Notify) → Log pass. Fetch and parse failures are
   * logged and returned, never thrown.
   */
  async runCycle(): Promise<CycleOutcome> {
    const cycle = this.stats.cycles + 1;
    this.stats.cycles = cycle;

    let records: AvailabilityRecord[];
    try {
      const html = await this.fetcher(this.url);
      records = parseAvailableDates(html, this.cutoff);
    } catch (error) {
      const checkedAt = this.now();
      const failure = error instanceof Error ? error : new Error(String(error));
      this.stats.errors++;
      this.stats.lastCheckedAt = checkedAt;
      log.error(`[${formatTimestamp(checkedAt)}] Error while checking appointments: ${failure.message}`, {
        cycle,
        url: this.url,
        error: failure,
      });
      return { status: 'error', checkedAt, error: failure };
    }

    const checkedAt = this.now();
    this.stats.lastCheckedAt = checkedAt;
    const result: PollCycleResult = { checkedAt, records };
    const timestamp = formatTimestamp(checkedAt);

    if (records.length === 0) {
      log.info(`[${timestamp}] No appointments available up to ${this.cutoff}.`, { cycle });
      return { status: 'none', result };
    }

    const lines = records.map((record) => formatRecordLine(record, '  *'));
    log.info(`[${timestamp}] Found available appointments:\n${lines.join('\n')}\n${BOOKING_HINT}`, {
      cycle,
      dates: records.map((record) => record.date),
    });

    let notification: NotificationResult;
    try {
      notification = await this.notifier.notify(records, this.url, this.cutoff);
    } catch (error) {
      const description = error instanceof Error ? error.message : String(error);
      log.error(`[${timestamp}] Notification failed: ${description}`, { cycle, error });
      notification = { sent: false, reason: 'dispatch_failed', error: description };
    }
    if (notification.sent) {
      this.stats.notificationsSent++;
    }

    return { status: 'available', result, notification };
  }

  /**
   * Run cycles until stop() is called or maxCycles is reached. Cycles never
   * overlap: the sleep starts after the previous cycle has finished.
   */
  async start(): Promise<MonitorStats> {
    if (this.running) {
      throw new Error('Monitor is already running');
    }
    this.running = true;

    log.info(`Monitoring appointments until ${this.cutoff} ...`, {
      url: this.url,
      cutoff: this.cutoff,
      intervalMs: this.intervalMs,
    });

    let completed = 0;
    while (this.running) {
      await this.runCycle();
      completed++;

      if (this.maxCycles !== undefined && completed >= this.maxCycles) {
        break;
      }
      if (!this.running) {
        break;
      }
      await this.sleep(this.intervalMs);
    }

    this.running = false;
    log.info('Monitoring stopped', { cycles: completed });
    return this.getStats();
  }

  /**
   * Cancellation hook: clears the pending sleep and ends start() after the
   * cycle in progress, if any.
   */
  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      this.wake = resolve;
      this.timer = setTimeout(() => {
        this.timer = null;
        this.wake = null;
        resolve();
      }, ms);
    });
  }
}
