/**
 * Email Notifier
 *
 * Sends the availability summary of a cycle through an SMTP relay
 * (STARTTLS, login, one recipient). Missing configuration and relay
 * failures are logged and reported in the result; notify() never throws.
 */

import nodemailer from 'nodemailer';
import type { MailConfig, MailConfigKey, MailConfigResult } from '../utils/config-schemas.js';
import { getMailConfig, MAIL_ENV_VARS } from '../utils/env-parser.js';
import { logger } from '../utils/logger.js';
import { formatLongDate, type AppointmentDate } from './appointment-date.js';
import type { AvailabilityRecord } from './availability-parser.js';

const log = logger.notifier;

// ============================================
// TYPES
// ============================================

export interface NotificationMessage {
  subject: string;
  text: string;
}

export interface MailMessage extends NotificationMessage {
  from: string;
  to: string;
}

/**
 * The part of a nodemailer transporter the notifier relies on
 */
export interface MailTransport {
  sendMail(message: MailMessage): Promise<unknown>;
  close(): void;
}

export type TransportFactory = (config: MailConfig) => MailTransport;

export type NotificationResult =
  | { sent: true; recipient: string }
  | { sent: false; reason: 'nothing_to_send' }
  | { sent: false; reason: 'not_configured'; missing: MailConfigKey[] }
  | { sent: false; reason: 'dispatch_failed'; error: string };

export interface Notifier {
  notify(records: AvailabilityRecord[], url: string, cutoff: AppointmentDate): Promise<NotificationResult>;
}

export interface EmailNotifierOptions {
  /** Mail configuration source (default: environment, resolved once) */
  resolveConfig?: () => MailConfigResult;
  /** Transport factory (default: nodemailer SMTP) */
  createTransport?: TransportFactory;
}

// ============================================
// FORMATTING
// ============================================

export const NOTIFICATION_SUBJECT = 'Appointment Slot Found!';

/**
 * One summary line per record: "- Wednesday August 27, 2025: 10:00-12:00"
 */
export function formatRecordLine(record: AvailabilityRecord, bullet = '-'): string {
  return `${bullet} ${formatLongDate(record.date)}: ${record.status || 'Available'}`;
}

export function formatNotification(
  records: AvailabilityRecord[],
  url: string,
  cutoff: AppointmentDate
): NotificationMessage {
  const lines = [`Available appointments up to ${cutoff} were found at ${url}:`, ''];
  for (const record of records) {
    lines.push(formatRecordLine(record));
  }
  return {
    subject: NOTIFICATION_SUBJECT,
    text: `${lines.join('\n')}\n`,
  };
}

// ============================================
// TRANSPORT
// ============================================

/**
 * Plain SMTP connection upgraded with STARTTLS, authenticated with the relay user
 */
export const createSmtpTransport: TransportFactory = (config) =>
  nodemailer.createTransport({
    host: config.host,
    port: config.port,
    secure: false,
    requireTLS: true,
    auth: {
      user: config.user,
      pass: config.password,
    },
  });

// ============================================
// NOTIFIER
// ============================================

export class EmailNotifier implements Notifier {
  private readonly resolveConfig: () => MailConfigResult;
  private readonly createTransport: TransportFactory;

  constructor(options: EmailNotifierOptions = {}) {
    this.resolveConfig = options.resolveConfig ?? getMailConfig;
    this.createTransport = options.createTransport ?? createSmtpTransport;
  }

  /**
   * Check if the mail relay is fully configured
   */
  isConfigured(): boolean {
    return this.resolveConfig().ok;
  }

  async notify(
    records: AvailabilityRecord[],
    url: string,
    cutoff: AppointmentDate
  ): Promise<NotificationResult> {
    if (records.length === 0) {
      return { sent: false, reason: 'nothing_to_send' };
    }

    const resolved = this.resolveConfig();
    if (!resolved.ok) {
      log.warn(`Email not sent: missing configuration: ${resolved.missing.join(', ')}`, {
        missing: resolved.missing,
        envVars: resolved.missing.map((key) => MAIL_ENV_VARS[key]),
      });
      return { sent: false, reason: 'not_configured', missing: resolved.missing };
    }

    const { config } = resolved;
    const message = formatNotification(records, url, cutoff);

    let transport: MailTransport | null = null;
    try {
      transport = this.createTransport(config);
      await transport.sendMail({
        from: config.sender,
        to: config.recipient,
        subject: message.subject,
        text: message.text,
      });
      log.info(`Notification email sent to ${config.recipient}.`, { records: records.length });
      return { sent: true, recipient: config.recipient };
    } catch (error) {
      const description = error instanceof Error ? error.message : String(error);
      log.error(`Failed to send email: ${description}`, { host: config.host, port: config.port, error });
      return { sent: false, reason: 'dispatch_failed', error: description };
    } finally {
      transport?.close();
    }
  }
}
