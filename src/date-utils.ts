/**
 * @fileoverview Human-readable durations for retry and timeout messages.
 */

import { formatDuration, intervalToDuration } from 'date-fns';

/**
 * Formats a number of seconds, e.g. `1 hour 2 minutes 3 seconds`.
 * Durations under one second read `0 seconds`.
 *
 * @param seconds - Duration in seconds
 * @returns Human-readable duration
 */
export function formatSeconds(seconds: number): string {
  const wholeSeconds = Math.max(0, Math.floor(seconds));
  if (wholeSeconds === 0) {
    return '0 seconds';
  }

  return formatDuration(intervalToDuration({ start: 0, end: wholeSeconds * 1000 }), {
    format: ['hours', 'minutes', 'seconds'],
    zero: false,
    delimiter: ' ',
  });
}

/**
 * Formats the time between two millisecond timestamps.
 *
 * @param startTimestampMs - Start timestamp in milliseconds
 * @param endTimestampMs - End timestamp in milliseconds
 * @returns Human-readable duration
 */
export function formatTimeBetween(startTimestampMs: number, endTimestampMs: number): string {
  return formatSeconds((endTimestampMs - startTimestampMs) / 1000);
}
