// src/utils/timezone.ts
// Zone resolution and clock formatting for message timestamps

import moment from 'moment-timezone';

export const FALLBACK_TIMEZONE = 'UTC';

export interface ClockParts {
  /** Two-digit day of month */
  day: string;
  /** English three-letter month, e.g. "Mar" */
  month: string;
  year: string;
  /** 24-hour HH:MM */
  time: string;
  /** tz database abbreviation, e.g. "WIB", "EST" or "UTC" */
  zoneName: string;
}

export function isValidTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone });
    return true;
  } catch (error) {
    if (error instanceof RangeError) return false;
    throw error;
  }
}

/**
 * Try each candidate zone in order and return the first one Intl accepts.
 * Blank candidates are skipped; UTC when nothing matches.
 */
export function resolveTimeZone(candidates: ReadonlyArray<string | undefined>): string {
  for (const candidate of candidates) {
    if (candidate && candidate.trim() !== '' && isValidTimeZone(candidate)) {
      return candidate;
    }
  }
  return FALLBACK_TIMEZONE;
}

export function formatClock(now: Date, zone: string): ClockParts {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone: zone,
    day: '2-digit',
    month: 'short',
    year: 'numeric',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(now);

  const pick = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((part) => part.type === type)?.value ?? '';

  return {
    day: pick('day'),
    month: pick('month'),
    year: pick('year'),
    time: `${pick('hour')}:${pick('minute')}`,
    zoneName: moment.tz(now, zone).format('z'),
  };
}
