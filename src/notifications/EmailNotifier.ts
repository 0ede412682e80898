// src/notifications/EmailNotifier.ts
// SMTP delivery of the PageSpeed Insight summary with the optional HTML report

import { existsSync, readFileSync } from 'fs';
import { basename } from 'path';
import { lookup } from 'mime-types';
import nodemailer, { type Transporter } from 'nodemailer';
import type SMTPTransport from 'nodemailer/lib/smtp-transport/index.js';
import { DEFAULT_TIMEZONE } from '../config/index.js';
import type { EmailConfig, NotificationContext, OutboundEmail, TransportMode } from '../types/index.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { formatClock, resolveTimeZone } from '../utils/timezone.js';

export const IMPLICIT_TLS_PORT = 465;
export const DEFAULT_CONTENT_TYPE = 'application/octet-stream';
export const SUBJECT_PREFIX = 'PageSpeed Insight Report';
export const REPORT_FOOTER = 'This report is auto-generated by psi-notify';

export type SmtpTransporter = Pick<Transporter<SMTPTransport.SentMessageInfo>, 'sendMail'>;
export type TransportFactory = (options: SMTPTransport.Options) => SmtpTransporter;

export interface EmailNotifierOptions {
  createTransport?: TransportFactory;
  logger?: Logger;
}

const defaultTransportFactory: TransportFactory = (options) => nodemailer.createTransport(options);

/**
 * Port 465 speaks TLS from the first byte; everything else starts in plaintext
 */
export function selectTransportMode(port: number): TransportMode {
  return port === IMPLICIT_TLS_PORT ? 'implicit-tls' : 'starttls';
}

/**
 * nodemailer options for a transport mode.
 * STARTTLS is opportunistic: attempted when the server offers it, and a rejected
 * upgrade continues in plaintext.
 */
export function buildTransportOptions(config: EmailConfig): SMTPTransport.Options {
  const mode = selectTransportMode(config.port);
  const tlsPolicy = mode === 'starttls' ? { requireTLS: false, ignoreTLS: false, opportunisticTLS: true } : {};
  const options: SMTPTransport.Options = {
    host: config.host,
    port: config.port,
    secure: mode === 'implicit-tls',
    ...tlsPolicy,
  };

  if (config.user && config.password) {
    options.auth = { user: config.user, pass: config.password };
  }

  return options;
}

export class EmailNotifier {
  private readonly config: EmailConfig;
  private readonly createTransport: TransportFactory;
  private readonly logger: Logger;

  constructor(config: EmailConfig, options: EmailNotifierOptions = {}) {
    this.config = config;
    this.createTransport = options.createTransport ?? defaultTransportFactory;
    this.logger = options.logger ?? createLogger('notify_email');
  }

  /**
   * Build subject and body for a run.
   * The subject always carries the "WIB" label, whichever zone the clock is read in.
   */
  composeMessage(context: NotificationContext, now: Date = new Date()): OutboundEmail {
    const zone = resolveTimeZone([context.timezone, DEFAULT_TIMEZONE]);
    const clock = formatClock(now, zone);
    const subject = `${SUBJECT_PREFIX} - ${clock.day} ${clock.month} ${clock.year} | ${clock.time} WIB`;

    const bodyText =
      `Site     : ${context.site}\n` +
      'Summary:\n' +
      `• Status   : ${context.status}\n` +
      `• Duration : ${context.duration ?? ''} seconds\n\n` +
      'Check the attached HTML report for the full test results\n' +
      REPORT_FOOTER;

    return {
      sender: this.config.sender,
      recipients: [...this.config.recipients],
      subject,
      bodyText,
    };
  }

  /**
   * Attach the report if the file exists. A missing file is only a warning.
   */
  attachReport(email: OutboundEmail, path?: string): OutboundEmail {
    if (!path) return email;

    if (!existsSync(path)) {
      this.logger.warn(`attachment not found: ${path}`);
      return email;
    }

    const contentType = lookup(path) || DEFAULT_CONTENT_TYPE;
    return {
      ...email,
      attachment: {
        filename: basename(path),
        content: readFileSync(path),
        contentType,
      },
    };
  }

  /**
   * Send exactly one message. Transport errors propagate to the caller.
   */
  async send(email: OutboundEmail): Promise<SMTPTransport.SentMessageInfo> {
    const options = buildTransportOptions(this.config);
    this.logger.debug(
      `Connecting to ${this.config.host}:${this.config.port} (${selectTransportMode(this.config.port)}, ${options.auth ? 'auth' : 'no auth'})`
    );

    const transporter = this.createTransport(options);
    return transporter.sendMail({
      from: email.sender,
      to: email.recipients.join(', '),
      subject: email.subject,
      text: email.bodyText,
      attachments: email.attachment ? [{ ...email.attachment }] : [],
    });
  }
}
