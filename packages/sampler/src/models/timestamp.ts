/**
 * Timestamp codec
 *
 * Measurement timestamps are wall-clock instants. They travel in Date values
 * whose UTC fields hold the wall-clock reading, so a timestamp written without
 * an offset is never shifted into the host's local zone.
 */

import { ValidationError } from '@vitalgrid/core';

const WALL_CLOCK_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?$/;
const ZONED_PATTERN =
  /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d{1,9})?)?(?:Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Parse `YYYY-MM-DDTHH:MM[:SS[.fff]]`, optionally followed by `Z` or an
 * offset. Returns null when the text is not a valid timestamp.
 */
export function tryParseTimestamp(text: string): Date | null {
  const trimmed = text.trim();

  const match = WALL_CLOCK_PATTERN.exec(trimmed);
  if (match) {
    const [, year, month, day, hour, minute, second = '0', fraction = '0'] = match;
    const ms = Number(fraction.padEnd(3, '0').slice(0, 3));
    const date = new Date(Date.UTC(
      Number(year),
      Number(month) - 1,
      Number(day),
      Number(hour),
      Number(minute),
      Number(second),
      ms
    ));

    // Date.UTC rolls over out-of-range fields (e.g. month 13); reject those
    if (
      date.getUTCFullYear() !== Number(year) ||
      date.getUTCMonth() !== Number(month) - 1 ||
      date.getUTCDate() !== Number(day) ||
      date.getUTCHours() !== Number(hour) ||
      date.getUTCMinutes() !== Number(minute) ||
      date.getUTCSeconds() !== Number(second)
    ) {
      return null;
    }
    return date;
  }

  if (ZONED_PATTERN.test(trimmed)) {
    const date = new Date(trimmed.replace(' ', 'T'));
    return Number.isNaN(date.getTime()) ? null : date;
  }

  return null;
}

/**
 * Parse a timestamp, throwing ValidationError when it is malformed
 */
export function parseTimestamp(text: string): Date {
  const date = tryParseTimestamp(text);
  if (!date) {
    throw new ValidationError(`Invalid timestamp: ${text}`, {
      fieldErrors: { timestamp: 'Expected YYYY-MM-DDTHH:MM:SS' },
    });
  }
  return date;
}

/**
 * Render a timestamp as `YYYY-MM-DDTHH:MM:SS`
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19);
}

/**
 * Drop sub-second precision
 */
export function truncateToSecond(date: Date): Date {
  return new Date(Math.floor(date.getTime() / 1000) * 1000);
}

/**
 * The host's local wall-clock reading of an instant, carried on the UTC clock
 */
export function wallClockNow(now: Date = new Date()): Date {
  return new Date(Date.UTC(
    now.getFullYear(),
    now.getMonth(),
    now.getDate(),
    now.getHours(),
    now.getMinutes(),
    now.getSeconds(),
    now.getMilliseconds()
  ));
}
