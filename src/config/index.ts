// src/config/index.ts
// Environment-driven configuration for both notifiers

import type { EmailConfig, EnvRecord, TelegramConfig } from '../types/index.js';
import { isNonBlank, parsePort, parseRecipientList } from '../utils/validation.js';

export const DEFAULT_TIMEZONE = 'Asia/Jakarta';
export const DEFAULT_SMTP_PORT = 587;

/**
 * Raised for missing or invalid configuration, before any network attempt.
 * Commands exit with `exitCode` when they catch it.
 */
export class ConfigError extends Error {
  readonly exitCode = 2;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface EmailOverrides {
  /** Comma-separated recipients from `--to`, replacing EMAIL_TO */
  to?: string;
}

/**
 * Build the email notifier config from env.
 * SMTP_HOST, EMAIL_FROM and at least one recipient are required.
 */
export function loadEmailConfig(env: EnvRecord, overrides: EmailOverrides = {}): Readonly<EmailConfig> {
  const host = env.SMTP_HOST;
  const sender = env.EMAIL_FROM;
  const envTo = env.EMAIL_TO ?? '';

  if (!host || !sender || (!envTo && !overrides.to)) {
    throw new ConfigError('Missing SMTP_HOST/EMAIL_FROM/EMAIL_TO. Set via env or GitHub Secrets.');
  }

  const recipients = parseRecipientList(overrides.to ? overrides.to : envTo);
  if (recipients.length === 0) {
    throw new ConfigError('No recipients resolved.');
  }

  const rawPort = env.SMTP_PORT ?? String(DEFAULT_SMTP_PORT);
  const port = parsePort(rawPort);
  if (port === null) {
    throw new ConfigError(`Invalid SMTP_PORT: ${rawPort}`);
  }

  return Object.freeze({
    host,
    port,
    user: env.SMTP_USER ?? '',
    password: env.SMTP_PASS ?? '',
    sender,
    recipients,
    timezone: env.TZ || DEFAULT_TIMEZONE,
  });
}

function requireEnv(env: EnvRecord, name: string): string {
  const value = env[name];
  if (!isNonBlank(value)) {
    throw new ConfigError(`Missing required env: ${name}`);
  }
  return value;
}

/**
 * Build the Telegram notifier config from env.
 * TELEGRAM_BOT_TOKEN is checked before TELEGRAM_CHAT_ID.
 */
export function loadTelegramConfig(env: EnvRecord): Readonly<TelegramConfig> {
  const botToken = requireEnv(env, 'TELEGRAM_BOT_TOKEN');
  const chatId = requireEnv(env, 'TELEGRAM_CHAT_ID');

  return Object.freeze({
    botToken,
    chatId,
    timezone: env.TZ || DEFAULT_TIMEZONE,
  });
}
