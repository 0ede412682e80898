// src/index.ts
// Public API of the PageSpeed Insight notifiers

export * from './types/index.js';
export { ConfigError, loadEmailConfig, loadTelegramConfig, DEFAULT_TIMEZONE, DEFAULT_SMTP_PORT } from './config/index.js';
export * from './notifications/index.js';
export { createLogger, Logger } from './utils/logger.js';
export { formatClock, resolveTimeZone, type ClockParts } from './utils/timezone.js';
export { runNotifyEmail } from './tools/notify-email.js';
export { runNotifyTelegram } from './tools/notify-telegram.js';
