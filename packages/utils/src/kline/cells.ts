/**
 * Cell coercion for kline fields
 *
 * Every parser returns null instead of throwing: whether a null cell is fatal
 * is decided by the normalization mode, not here.
 */

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse a decimal magnitude from a number or numeric text
 *
 * @returns Finite number, or null for blanks, non-numeric text, NaN and Infinity
 */
export function parseDecimal(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') {
    return null;
  }

  const trimmed = value.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return null;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Parse a nullable integer count (e.g. number of trades)
 */
export function parseCount(value: unknown): number | null {
  const parsed = parseDecimal(value);
  return parsed !== null && Number.isInteger(parsed) ? parsed : null;
}

/**
 * Parse a millisecond Unix epoch into a Date
 */
export function parseEpochMs(value: unknown): Date | null {
  const ms = parseDecimal(value);
  if (ms === null) {
    return null;
  }
  const date = new Date(ms);
  return Number.isNaN(date.getTime()) ? null : date;
}
