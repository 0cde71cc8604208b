/**
 * slot-watch
 *
 * Watches a FrontDesk appointment page for open time slots up to a cutoff
 * date and sends an email when any appear.
 *
 * Usage:
 * ```typescript
 * import { AppointmentMonitor } from 'slot-watch';
 *
 * const monitor = new AppointmentMonitor({
 *   url: 'https://booking.example.com/time-selection',
 *   cutoff: '2025-08-28',
 *   intervalMs: 600_000,
 * });
 * await monitor.start();
 * ```
 */

export * from './core/appointment-date.js';
export * from './core/availability-parser.js';
export * from './core/page-fetcher.js';
export * from './core/notifier.js';
export * from './core/appointment-monitor.js';
export { main, parseCliArgs, ArgumentError, USAGE, type CliOptions, type ParsedArgs } from './cli.js';
export * from './utils/index.js';
