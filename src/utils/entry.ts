// src/utils/entry.ts
// Helpers shared by the command entry points

import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import { CommanderError } from 'commander';
import { createLogger } from './logger.js';

/**
 * True when the module at `moduleUrl` is the script node was started with.
 * Resolves symlinks so npm's bin links count as direct execution.
 */
export function isEntryPoint(moduleUrl: string): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return moduleUrl === pathToFileURL(realpathSync(script)).href;
  } catch {
    return moduleUrl === pathToFileURL(script).href;
  }
}

/**
 * Usage errors exit 2; --help and --version exit 0
 */
export function usageExitCode(error: CommanderError): number {
  return error.exitCode === 0 ? 0 : 2;
}

/**
 * Run a command's main function and report its exit code to the process
 */
export function runMain(tag: string, main: () => Promise<number>): Promise<void> {
  return main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      createLogger(tag).error(errorMessage(error));
      process.exitCode = 1;
    }
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
