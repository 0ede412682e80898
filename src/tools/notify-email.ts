#!/usr/bin/env node
// src/tools/notify-email.ts
// Send the PageSpeed Insight summary and HTML report by email

import { Command, CommanderError, Option } from 'commander';
import dotenv from 'dotenv';
import { ConfigError, loadEmailConfig } from '../config/index.js';
import { EmailNotifier, type TransportFactory } from '../notifications/EmailNotifier.js';
import { EMAIL_STATUSES, type EmailConfig, type EnvRecord, type NotificationContext } from '../types/index.js';
import { errorMessage, isEntryPoint, runMain, usageExitCode } from '../utils/entry.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { isEmailStatus, normalizeEmailStatus } from '../utils/validation.js';

export type EmailCliOptions = {
  site: string;
  status: string;
  duration: string;
  report?: string;
  to?: string;
};

export interface NotifyEmailDeps {
  env?: EnvRecord;
  createTransport?: TransportFactory;
  logger?: Logger;
  now?: Date;
}

export function buildEmailProgram(): Command {
  return new Command()
    .name('notify-email')
    .description('Send email with PageSpeed Insight summary and HTML report attachment.')
    .requiredOption('--site <url>', 'Site URL under test')
    .addOption(new Option('--status <status>', 'Run outcome').choices(EMAIL_STATUSES).makeOptionMandatory())
    .requiredOption('--duration <seconds>', 'Duration in seconds (string/float)')
    .option('--report <path>', 'Path to HTML report to attach (optional)')
    .option('--to <list>', 'Comma-separated recipients (override EMAIL_TO from env)')
    .exitOverride();
}

/**
 * Parse arguments, validate env, send one email.
 * Resolves to the process exit code: 0 sent, 1 transport failure, 2 usage or config error.
 */
export async function runNotifyEmail(argv: string[], deps: NotifyEmailDeps = {}): Promise<number> {
  const logger = deps.logger ?? createLogger('notify_email');
  const program = buildEmailProgram();

  try {
    program.parse(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) return usageExitCode(error);
    throw error;
  }

  const opts = program.opts<EmailCliOptions>();
  if (!isEmailStatus(opts.status)) {
    logger.error(`Invalid status: ${opts.status}`);
    return 2;
  }

  let config: Readonly<EmailConfig>;
  try {
    config = loadEmailConfig(deps.env ?? process.env, { to: opts.to });
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
      return error.exitCode;
    }
    throw error;
  }

  const context: Readonly<NotificationContext> = Object.freeze({
    site: opts.site,
    status: normalizeEmailStatus(opts.status),
    duration: opts.duration,
    reportPath: opts.report,
    timezone: config.timezone,
  });

  const notifier = new EmailNotifier(config, { createTransport: deps.createTransport, logger });
  const email = notifier.attachReport(notifier.composeMessage(context, deps.now), context.reportPath);

  try {
    await notifier.send(email);
  } catch (error) {
    logger.error(`Failed to send email: ${errorMessage(error)}`);
    return 1;
  }

  logger.info(`Email sent to: ${email.recipients.join(', ')}`);
  return 0;
}

// Run if executed directly
if (isEntryPoint(import.meta.url)) {
  dotenv.config();
  void runMain('notify_email', () => runNotifyEmail(process.argv.slice(2)));
}
