/**
 * Tests for the poll loop
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  AppointmentMonitor,
  BOOKING_HINT,
  formatTimestamp,
  type PageSource,
} from '../../src/core/appointment-monitor.js';
import type { Notifier } from '../../src/core/notifier.js';
import { TransportError } from '../../src/core/page-fetcher.js';
import { captureLogs, type LogCapture } from '../helpers/log-capture.js';

const PAGE_URL = 'https://booking.example.com/time-selection';
const CUTOFF = '2025-08-28';
const CHECKED_AT = new Date(2025, 7, 20, 9, 30, 0);

const OPEN_PAGE = '<h3>Wednesday August 27, 2025</h3><p>10:00–12:00</p>';
const BOOKED_PAGE = '<h3>Wednesday August 27, 2025</h3><p>No more available time slots</p>';

function createNotifier() {
  const notify = vi.fn<Notifier['notify']>().mockResolvedValue({ sent: true, recipient: 'me@example.com' });
  return { notify };
}

function createMonitor(fetcher: PageSource, overrides: { intervalMs?: number; maxCycles?: number } = {}) {
  const notifier = createNotifier();
  const monitor = new AppointmentMonitor({
    url: PAGE_URL,
    cutoff: CUTOFF,
    fetcher,
    notifier,
    now: () => CHECKED_AT,
    ...overrides,
  });
  return { monitor, notifier };
}

describe('AppointmentMonitor', () => {
  let logs: LogCapture;

  beforeEach(() => {
    logs = captureLogs();
  });

  afterEach(() => {
    logs.restore();
    vi.useRealTimers();
  });

  // ============================================
  // SINGLE CYCLE
  // ============================================

  describe('runCycle', () => {
    it('should notify and log the open dates', async () => {
      const fetcher = vi.fn<PageSource>().mockResolvedValue(OPEN_PAGE);
      const { monitor, notifier } = createMonitor(fetcher);

      const outcome = await monitor.runCycle();

      expect(fetcher).toHaveBeenCalledWith(PAGE_URL);
      expect(outcome).toEqual({
        status: 'available',
        result: { checkedAt: CHECKED_AT, records: [{ date: '2025-08-27', status: '10:00–12:00' }] },
        notification: { sent: true, recipient: 'me@example.com' },
      });
      expect(notifier.notify).toHaveBeenCalledWith(
        [{ date: '2025-08-27', status: '10:00–12:00' }],
        PAGE_URL,
        CUTOFF
      );
      expect(logs.byLevel('info').map((line) => line.msg)).toEqual([
        '[2025-08-20 09:30:00] Found available appointments:\n' +
          '  * Wednesday August 27, 2025: 10:00–12:00\n' +
          BOOKING_HINT,
      ]);
      expect(monitor.getStats()).toEqual({
        cycles: 1,
        errors: 0,
        notificationsSent: 1,
        lastCheckedAt: CHECKED_AT,
      });
    });

    it('should log a quiet cycle without notifying', async () => {
      const { monitor, notifier } = createMonitor(vi.fn<PageSource>().mockResolvedValue(BOOKED_PAGE));

      const outcome = await monitor.runCycle();

      expect(outcome).toEqual({ status: 'none', result: { checkedAt: CHECKED_AT, records: [] } });
      expect(notifier.notify).not.toHaveBeenCalled();
      expect(logs.byLevel('info').map((line) => line.msg)).toEqual([
        '[2025-08-20 09:30:00] No appointments available up to 2025-08-28.',
      ]);
    });

    it('should log a failed fetch and keep going', async () => {
      const failure = new TransportError(`HTTP 503: Service Unavailable for ${PAGE_URL}`, {
        url: PAGE_URL,
        status: 503,
        statusText: 'Service Unavailable',
      });
      const { monitor, notifier } = createMonitor(vi.fn<PageSource>().mockRejectedValue(failure));

      const outcome = await monitor.runCycle();

      expect(outcome).toEqual({ status: 'error', checkedAt: CHECKED_AT, error: failure });
      expect(notifier.notify).not.toHaveBeenCalled();
      expect(logs.byLevel('error').map((line) => line.msg)).toEqual([
        `[2025-08-20 09:30:00] Error while checking appointments: HTTP 503: Service Unavailable for ${PAGE_URL}`,
      ]);
      expect(monitor.getStats().errors).toBe(1);
    });

    it('should wrap non-Error rejections', async () => {
      const { monitor } = createMonitor(vi.fn<PageSource>().mockRejectedValue('socket hang up'));

      const outcome = await monitor.runCycle();

      expect(outcome.status).toBe('error');
      expect(logs.byLevel('error')[0].msg).toBe(
        '[2025-08-20 09:30:00] Error while checking appointments: socket hang up'
      );
    });

    it('should contain a notifier that throws', async () => {
      const { monitor, notifier } = createMonitor(vi.fn<PageSource>().mockResolvedValue(OPEN_PAGE));
      notifier.notify.mockRejectedValue(new Error('relay unreachable'));

      const outcome = await monitor.runCycle();

      expect(outcome).toMatchObject({
        status: 'available',
        notification: { sent: false, reason: 'dispatch_failed', error: 'relay unreachable' },
      });
      expect(logs.byLevel('error').map((line) => line.msg)).toEqual([
        '[2025-08-20 09:30:00] Notification failed: relay unreachable',
      ]);
      expect(monitor.getStats().notificationsSent).toBe(0);
    });

    it('should not count an unsent notification', async () => {
      const { monitor, notifier } = createMonitor(vi.fn<PageSource>().mockResolvedValue(OPEN_PAGE));
      notifier.notify.mockResolvedValue({ sent: false, reason: 'not_configured', missing: ['password'] });

      await monitor.runCycle();

      expect(monitor.getStats().notificationsSent).toBe(0);
    });
  });

  // ============================================
  // LOOP
  // ============================================

  describe('start', () => {
    it('should sleep the full interval between cycles', async () => {
      vi.useFakeTimers();
      const fetcher = vi.fn<PageSource>().mockResolvedValue(BOOKED_PAGE);
      const { monitor } = createMonitor(fetcher, { intervalMs: 1000 });

      const running = monitor.start();
      await vi.advanceTimersByTimeAsync(0);
      expect(fetcher).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(999);
      expect(fetcher).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1);
      expect(fetcher).toHaveBeenCalledTimes(2);

      monitor.stop();
      const stats = await running;
      expect(stats.cycles).toBe(2);
      expect(monitor.isRunning()).toBe(false);
    });

    it('should keep polling after a failed cycle', async () => {
      vi.useFakeTimers();
      const fetcher = vi
        .fn<PageSource>()
        .mockRejectedValueOnce(new TransportError('Request failed', { url: PAGE_URL }))
        .mockResolvedValue(OPEN_PAGE);
      const { monitor, notifier } = createMonitor(fetcher, { intervalMs: 1000, maxCycles: 3 });

      const running = monitor.start();
      await vi.runAllTimersAsync();
      const stats = await running;

      expect(fetcher).toHaveBeenCalledTimes(3);
      expect(notifier.notify).toHaveBeenCalledTimes(2);
      expect(stats).toEqual({ cycles: 3, errors: 1, notificationsSent: 2, lastCheckedAt: CHECKED_AT });
    });

    it('should keep polling when notifying fails', async () => {
      vi.useFakeTimers();
      const fetcher = vi.fn<PageSource>().mockResolvedValue(OPEN_PAGE);
      const { monitor, notifier } = createMonitor(fetcher, { intervalMs: 1000, maxCycles: 2 });
      notifier.notify.mockRejectedValue(new Error('relay unreachable'));

      const running = monitor.start();
      await vi.runAllTimersAsync();

      await expect(running).resolves.toMatchObject({ cycles: 2, notificationsSent: 0 });
      expect(fetcher).toHaveBeenCalledTimes(2);
    });

    it('should end after the cycle in progress when stopped', async () => {
      let monitor: AppointmentMonitor | undefined;
      const fetcher = vi.fn<PageSource>(async () => {
        monitor?.stop();
        return BOOKED_PAGE;
      });
      monitor = createMonitor(fetcher, { intervalMs: 60_000 }).monitor;

      const stats = await monitor.start();

      expect(fetcher).toHaveBeenCalledTimes(1);
      expect(stats.cycles).toBe(1);
      expect(logs.lines.at(-1)?.msg).toBe('Monitoring stopped');
    });

    it('should log the cutoff when monitoring starts', async () => {
      const { monitor } = createMonitor(vi.fn<PageSource>().mockResolvedValue(BOOKED_PAGE), { maxCycles: 1 });

      await monitor.start();

      expect(logs.byLevel('info')[0].msg).toBe('Monitoring appointments until 2025-08-28 ...');
    });

    it('should refuse to start twice', async () => {
      vi.useFakeTimers();
      const { monitor } = createMonitor(vi.fn<PageSource>().mockResolvedValue(BOOKED_PAGE), { intervalMs: 1000 });

      const running = monitor.start();
      await expect(monitor.start()).rejects.toThrow('Monitor is already running');

      monitor.stop();
      await running;
    });
  });

  describe('options', () => {
    it('should reject a non-positive interval', () => {
      const fetcher = vi.fn<PageSource>();
      expect(() => createMonitor(fetcher, { intervalMs: 0 })).toThrow('Invalid poll interval: 0ms');
      expect(() => createMonitor(fetcher, { intervalMs: -5 })).toThrow('Invalid poll interval: -5ms');
    });

    it('should reject a fractional cycle bound', () => {
      expect(() => createMonitor(vi.fn<PageSource>(), { maxCycles: 1.5 })).toThrow('Invalid cycle bound: 1.5');
    });
  });
});

describe('formatTimestamp', () => {
  it('should render local wall-clock time with zero padding', () => {
    expect(formatTimestamp(new Date(2025, 0, 2, 3, 4, 5))).toBe('2025-01-02 03:04:05');
  });
});
