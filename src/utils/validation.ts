/**
 * Validation utilities for command-line and environment input
 */

import { EMAIL_STATUSES, type EmailStatus, type EmailStatusInput } from '../types/index.js';

/**
 * True when the value is present and not just whitespace
 */
export function isNonBlank(value: string | undefined | null): value is string {
  return typeof value === 'string' && value.trim() !== '';
}

/**
 * Splits a comma-separated address list, trimming entries and dropping empty ones.
 * Order is kept and duplicates are left in place.
 */
export function parseRecipientList(value: string): string[] {
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry !== '');
}

/**
 * Parses a TCP port, rejecting anything outside 1-65535
 */
export function parsePort(value: string): number | null {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const port = Number(trimmed);
  return port >= 1 && port <= 65535 ? port : null;
}

export function isEmailStatus(value: string): value is EmailStatusInput {
  return EMAIL_STATUSES.some((status) => status === value);
}

/**
 * 'Failed' is reported as 'Fail'; every other accepted status is kept
 */
export function normalizeEmailStatus(status: EmailStatusInput): EmailStatus {
  return status === 'Failed' ? 'Fail' : status;
}

/**
 * Telegram status text counts as a failure when it reads FAIL or FAILED in any case
 */
export function isFailureStatus(status: string): boolean {
  const normalized = status.trim().toUpperCase();
  return normalized === 'FAIL' || normalized === 'FAILED';
}
