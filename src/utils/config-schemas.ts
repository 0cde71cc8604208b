/**
 * Configuration Schemas
 *
 * Centralized Zod schemas for type-safe runtime configuration validation.
 * Environment variables and command-line options both go through these
 * schemas for consistent validation and clear error messages.
 */

import { z } from 'zod';
import { parseIsoDate } from '../core/appointment-date.js';

// ============================================
// HELPER SCHEMAS
// ============================================

/**
 * Schema for parsing a string as a boolean.
 * Recognizes 'true', '1', 'yes' as true; everything else as false.
 */
export const booleanStringSchema = z
  .string()
  .optional()
  .transform((val) => {
    if (!val) return false;
    return ['true', '1', 'yes'].includes(val.toLowerCase());
  });

/**
 * Schema for parsing a string as an integer with bounds.
 * Rejects anything that is not made of digits ("10.5", "1e3", "0x10").
 */
export function integerStringSchema(options?: { min?: number; max?: number }) {
  const { min, max } = options ?? {};
  let schema = z.coerce.number().int();

  if (min !== undefined) schema = schema.min(min);
  if (max !== undefined) schema = schema.max(max);

  return z
    .string()
    .trim()
    .regex(/^[+-]?\d+$/, { message: 'Expected an integer' })
    .pipe(schema);
}

/**
 * Schema for an absolute http(s) URL.
 */
export const absoluteUrlSchema = z
  .string()
  .url()
  .refine((url) => /^https?:\/\//i.test(url), {
    message: 'Must be an absolute http:// or https:// URL',
  });

/**
 * Schema for a calendar date in YYYY-MM-DD form, normalized to zero-padded.
 */
export const isoDateSchema = z.string().transform((val, ctx) => {
  const date = parseIsoDate(val);
  if (!date) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Must be a valid date in YYYY-MM-DD format',
    });
    return z.NEVER;
  }
  return date;
});

/**
 * Schema for a non-empty string; blank values count as absent.
 */
const presentStringSchema = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() ? val.trim() : undefined));

/**
 * Like presentStringSchema, but a non-blank value is kept exactly as given.
 * Credentials may legitimately start or end with spaces.
 */
const verbatimStringSchema = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() ? val : undefined));

// ============================================
// LOG LEVEL SCHEMA
// ============================================

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);
export type LogLevel = z.infer<typeof logLevelSchema>;

export const logConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  prettyPrint: booleanStringSchema,
});

export type LogConfig = z.infer<typeof logConfigSchema>;

// ============================================
// MAIL CONFIGURATION
// ============================================

/**
 * Raw mail settings as read from the environment. Every field is optional
 * here; completeness is checked by parseMailConfig().
 */
export const mailEnvSchema = z.object({
  sender: presentStringSchema,
  recipient: presentStringSchema,
  host: presentStringSchema,
  port: presentStringSchema,
  user: verbatimStringSchema,
  password: verbatimStringSchema,
});

export type MailEnv = z.infer<typeof mailEnvSchema>;

export const smtpPortSchema = integerStringSchema({ min: 1, max: 65535 });

export const DEFAULT_SMTP_PORT = 587;

/**
 * Complete, usable mail configuration
 */
export interface MailConfig {
  sender: string;
  recipient: string;
  host: string;
  port: number;
  user: string;
  password: string;
}

/**
 * Keys that can be reported as missing or invalid
 */
export type MailConfigKey = 'sender' | 'recipient' | 'host' | 'port' | 'password';

export type MailConfigResult =
  | { ok: true; config: MailConfig }
  | { ok: false; missing: MailConfigKey[] };

// ============================================
// MONITOR OPTIONS (command line)
// ============================================

export const DEFAULT_INTERVAL_SECONDS = 600;
export const DEFAULT_CUTOFF_DAYS = 30;

export const monitorOptionsSchema = z.object({
  url: absoluteUrlSchema,
  until: isoDateSchema,
  interval: integerStringSchema({ min: 1 }),
});

export type MonitorOptions = z.infer<typeof monitorOptionsSchema>;

// ============================================
// ERROR FORMATTING
// ============================================

/**
 * Format Zod validation errors into readable messages.
 */
export function formatConfigErrors(error: z.ZodError<unknown>): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return `  - ${path}: ${issue.message}`;
    })
    .join('\n');
}

/**
 * Create a configuration validation error with helpful messages.
 */
export class ConfigValidationError extends Error {
  constructor(
    public readonly section: string,
    public readonly zodError: z.ZodError
  ) {
    const formatted = formatConfigErrors(zodError);
    super(
      `Configuration validation failed for ${section}:\n${formatted}\n\n` +
      `Please check your environment variables.`
    );
    this.name = 'ConfigValidationError';
  }
}
