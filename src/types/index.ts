/**
 * @fileoverview Type definitions for the PageSpeed Insight notifiers
 * @module types
 */

/**
 * Statuses accepted by the email notifier's `--status` flag
 * @description 'Failed' is normalized to 'Fail' before it reaches the message
 */
export const EMAIL_STATUSES = ['Success', 'Fail', 'Failed', 'Success/Fail'] as const;

export type EmailStatusInput = (typeof EMAIL_STATUSES)[number];

export type EmailStatus = Exclude<EmailStatusInput, 'Failed'>;

/**
 * Outcome of a PageSpeed Insight run, as passed on the command line
 * @interface NotificationContext
 */
export interface NotificationContext {
  /** Site URL under test */
  site: string;
  /** Free-form status text (validated per notifier) */
  status: string;
  /** Run duration in seconds, kept as given */
  duration?: string;
  /** Path to the HTML report to attach (email only) */
  reportPath?: string;
  /** IANA zone identifier used for timestamps */
  timezone: string;
}

/**
 * Telegram report input: the run outcome plus optional dashboard link and note
 * @interface TelegramReportContext
 */
export interface TelegramReportContext extends NotificationContext {
  dashboard?: string;
  extra?: string;
}

export interface EmailAttachment {
  filename: string;
  content: Buffer;
  contentType: string;
}

/**
 * Email built once from a NotificationContext and handed to the SMTP transport
 * @interface OutboundEmail
 */
export interface OutboundEmail {
  sender: string;
  /** Kept in the order given; duplicates are not filtered */
  recipients: string[];
  subject: string;
  bodyText: string;
  attachment?: EmailAttachment;
}

export interface OutboundTelegramMessage {
  chatId: string;
  /** HTML subset: <b> and <code> only */
  text: string;
  parseMode: 'HTML';
  disableWebPagePreview: true;
}

/**
 * SMTP security mode
 * @description 'implicit-tls' - TLS from the first byte (port 465), 'starttls' - plaintext upgraded when offered
 */
export type TransportMode = 'implicit-tls' | 'starttls';

/**
 * Configuration for the email notifier, assembled from env once at startup
 * @interface EmailConfig
 */
export interface EmailConfig {
  host: string;
  /** SMTP port (default: 587) */
  port: number;
  /** Empty string when unset; auth is skipped unless both user and password are set */
  user: string;
  password: string;
  sender: string;
  recipients: string[];
  /** Configured zone (default: Asia/Jakarta) */
  timezone: string;
}

/**
 * Configuration for the Telegram notifier
 * @interface TelegramConfig
 */
export interface TelegramConfig {
  botToken: string;
  chatId: string;
  /** Configured zone (default: Asia/Jakarta) */
  timezone: string;
}

/** Environment record the config loaders read from */
export type EnvRecord = Record<string, string | undefined>;
