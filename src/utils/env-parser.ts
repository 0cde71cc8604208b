/**
 * Environment Variable Parser
 *
 * Type-safe environment variable parsing with validation.
 * Centralizes all env var access so the rest of the code works with
 * named, validated configuration objects.
 */

import {
  logConfigSchema,
  mailEnvSchema,
  smtpPortSchema,
  ConfigValidationError,
  DEFAULT_SMTP_PORT,
  type LogConfig,
  type MailConfigKey,
  type MailConfigResult,
} from './config-schemas.js';

export type Env = Record<string, string | undefined>;

/**
 * Environment variable behind each mail setting
 */
export const MAIL_ENV_VARS = {
  sender: 'APPT_MAIL_SENDER',
  recipient: 'APPT_MAIL_RECIPIENT',
  host: 'APPT_MAIL_SMTP_SERVER',
  port: 'APPT_MAIL_SMTP_PORT',
  user: 'APPT_MAIL_SMTP_USER',
  password: 'APPT_MAIL_SMTP_PASSWORD',
} as const;

// ============================================
// ENVIRONMENT VARIABLE MAPPING
// ============================================

function mapEnvToLogConfig(env: Env) {
  return {
    level: env.LOG_LEVEL,
    prettyPrint: env.LOG_PRETTY,
  };
}

function mapEnvToMailConfig(env: Env) {
  return {
    sender: env[MAIL_ENV_VARS.sender],
    recipient: env[MAIL_ENV_VARS.recipient],
    host: env[MAIL_ENV_VARS.host],
    port: env[MAIL_ENV_VARS.port],
    user: env[MAIL_ENV_VARS.user],
    password: env[MAIL_ENV_VARS.password],
  };
}

// ============================================
// PARSERS
// ============================================

/**
 * Parse and validate logging configuration from environment.
 */
export function parseLogConfig(env: Env = process.env): LogConfig {
  const result = logConfigSchema.safeParse(mapEnvToLogConfig(env));
  if (!result.success) {
    throw new ConfigValidationError('logging', result.error);
  }
  return result.data;
}

/**
 * Resolve the mail relay configuration.
 *
 * Never throws: an incomplete environment is reported as the list of
 * missing keys, in a fixed order (sender, recipient, host, port, password).
 * The port defaults to 587 and the user to the sender address.
 */
export function parseMailConfig(env: Env = process.env): MailConfigResult {
  const raw = mailEnvSchema.parse(mapEnvToMailConfig(env));
  const missing: MailConfigKey[] = [];

  if (!raw.sender) missing.push('sender');
  if (!raw.recipient) missing.push('recipient');
  if (!raw.host) missing.push('host');

  let port = DEFAULT_SMTP_PORT;
  if (raw.port !== undefined) {
    const parsedPort = smtpPortSchema.safeParse(raw.port);
    if (parsedPort.success) {
      port = parsedPort.data;
    } else {
      missing.push('port');
    }
  }

  if (!raw.password) missing.push('password');

  if (missing.length > 0 || !raw.sender || !raw.recipient || !raw.host || !raw.password) {
    return { ok: false, missing };
  }

  return {
    ok: true,
    config: {
      sender: raw.sender,
      recipient: raw.recipient,
      host: raw.host,
      port,
      user: raw.user ?? raw.sender,
      password: raw.password,
    },
  };
}

// ============================================
// CONFIG CACHING
// ============================================

let cachedLogConfig: LogConfig | null = null;
let cachedMailConfig: MailConfigResult | null = null;

/**
 * Get cached log configuration (parses once on first call).
 */
export function getLogConfig(): LogConfig {
  if (!cachedLogConfig) {
    cachedLogConfig = parseLogConfig();
  }
  return cachedLogConfig;
}

/**
 * Get cached mail configuration (resolved once on first call).
 */
export function getMailConfig(): MailConfigResult {
  if (!cachedMailConfig) {
    cachedMailConfig = parseMailConfig();
  }
  return cachedMailConfig;
}

/**
 * Clear all cached configurations.
 * Useful for testing when environment variables change.
 */
export function clearConfigCache(): void {
  cachedLogConfig = null;
  cachedMailConfig = null;
}
