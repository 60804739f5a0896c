import { addMilliseconds, isValid, parseISO } from 'date-fns';

/**
 * Calendar formatting for the canonical export
 *
 * Timestamps are written in UTC as `YYYY-MM-DD HH:mm:ss`, with `.SSS`
 * appended only when the milliseconds are non-zero (close times usually
 * end in .999).
 *
 * @example
 * formatTimestamp(new Date(1704067200000)) // '2024-01-01 00:00:00'
 * formatTimestamp(new Date(1704081599999)) // '2024-01-01 03:59:59.999'
 */
export function formatTimestamp(date: Date): string {
  const iso = date.toISOString();
  const seconds = iso.slice(0, 19).replace('T', ' ');
  return date.getUTCMilliseconds() === 0 ? seconds : `${seconds}.${iso.slice(20, 23)}`;
}

// Seconds fraction, kept out of parseISO so milliseconds stay exact
const FRACTION = /(:\d{2})[.,](\d+)/;

function hasZone(text: string): boolean {
  const [, time] = text.split(/[T ]/);
  return time !== undefined && /[Z+-]/.test(time);
}

/**
 * Parse a calendar timestamp as written by formatTimestamp, or ISO-8601
 *
 * Values without a zone designator are read as UTC. Fractions beyond
 * milliseconds are truncated.
 *
 * @returns Date, or null if the text is not a valid timestamp
 */
export function parseTimestamp(text: string): Date | null {
  const trimmed = text.trim();
  const fraction = FRACTION.exec(trimmed);
  const whole = fraction ? trimmed.replace(FRACTION, '$1') : trimmed;

  const date = parseISO(hasZone(whole) ? whole : `${whole}Z`);
  if (!isValid(date)) {
    return null;
  }

  const ms = fraction ? Number(fraction[2].slice(0, 3).padEnd(3, '0')) : 0;
  return addMilliseconds(date, ms);
}
