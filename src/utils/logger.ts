// src/utils/logger.ts
// Tagged console logger for the notifier commands

import chalk from 'chalk';

export class Logger {
  private readonly tag: string;

  constructor(tag: string) {
    this.tag = tag;
  }

  private format(message: string): string {
    return `[${this.tag}] ${message}`;
  }

  /**
   * Confirmation lines go to stdout
   */
  info(message: string): void {
    console.log(this.format(message));
  }

  /**
   * Non-fatal problems go to stderr so CI logs keep them apart from results
   */
  warn(message: string): void {
    console.error(chalk.yellow(this.format(`WARNING: ${message}`)));
  }

  error(message: string): void {
    console.error(chalk.red(this.format(message)));
  }

  debug(message: string): void {
    if (process.env.DEBUG) {
      console.error(chalk.dim(this.format(`[DEBUG] ${message}`)));
    }
  }
}

export function createLogger(tag: string): Logger {
  return new Logger(tag);
}
