#!/usr/bin/env node
// src/tools/notify-telegram.ts
// Post the PageSpeed Insight run status to a Telegram chat

import { Command, CommanderError } from 'commander';
import dotenv from 'dotenv';
import { ConfigError, loadTelegramConfig } from '../config/index.js';
import { TelegramNotifier, type TelegramSendResult } from '../notifications/TelegramNotifier.js';
import type { EnvRecord, TelegramConfig, TelegramReportContext } from '../types/index.js';
import { errorMessage, isEntryPoint, runMain, usageExitCode } from '../utils/entry.js';
import { createLogger, type Logger } from '../utils/logger.js';

export const DEFAULT_SITE = 'https://www.example.com';

export type TelegramCliOptions = {
  status: string;
  site: string;
  duration?: string;
  dashboard?: string;
  extra?: string;
};

export interface NotifyTelegramDeps {
  env?: EnvRecord;
  logger?: Logger;
  now?: Date;
}

export function buildTelegramProgram(): Command {
  return new Command()
    .name('notify-telegram')
    .description('Send a Telegram notification for PSI workflow.')
    .requiredOption('--status <status>', 'SUCCESS or FAILED')
    .option('--site <url>', 'Site URL under test', DEFAULT_SITE)
    .option('--duration <seconds>', 'Run duration in seconds')
    .option('--dashboard <url>', 'Dashboard URL to include')
    .option('--extra <note>', 'Extra note to append')
    .exitOverride();
}

/**
 * Parse arguments, validate env, post one message.
 * Resolves to the process exit code: 0 sent, 1 API or transport failure, 2 usage or config error.
 */
export async function runNotifyTelegram(argv: string[], deps: NotifyTelegramDeps = {}): Promise<number> {
  const logger = deps.logger ?? createLogger('notify_telegram');
  const program = buildTelegramProgram();

  try {
    program.parse(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) return usageExitCode(error);
    throw error;
  }

  const opts = program.opts<TelegramCliOptions>();

  let config: Readonly<TelegramConfig>;
  try {
    config = loadTelegramConfig(deps.env ?? process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
      return error.exitCode;
    }
    throw error;
  }

  const context: Readonly<TelegramReportContext> = Object.freeze({
    site: opts.site,
    status: opts.status,
    duration: opts.duration,
    dashboard: opts.dashboard,
    extra: opts.extra,
    timezone: config.timezone,
  });

  const notifier = new TelegramNotifier(config);
  const message = notifier.buildMessage(notifier.composeMessage(context, deps.now));

  let result: TelegramSendResult;
  try {
    result = await notifier.send(message);
  } catch (error) {
    logger.error(`Telegram request failed: ${errorMessage(error)}`);
    return 1;
  }

  if (!result.ok) {
    logger.error(`Telegram API error: ${result.raw}`);
    return 1;
  }

  logger.info('Sent.');
  return 0;
}

// Run if executed directly
if (isEntryPoint(import.meta.url)) {
  dotenv.config();
  void runMain('notify_telegram', () => runNotifyTelegram(process.argv.slice(2)));
}
