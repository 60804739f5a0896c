import { formatTimestamp } from '@klinecheck/utils';
import type { CellValue, ReconciliationResult } from './types';

export interface RenderOptions {
  /** Whether the trailing row was dropped before comparing */
  dropLast: boolean;
}

function formatValue(value: CellValue): string {
  if (value === null) return 'null';
  if (value instanceof Date) return formatTimestamp(value);
  return String(value);
}

/**
 * Render a reconciliation result as human-readable lines
 *
 * @example
 * Differences found in 1 rows.
 *
 * Row 1 (timestamp 1970-01-01 00:00:00, canonical line 2):
 *   close: reference=1.5 canonical=1.6
 */
export function renderReport(result: ReconciliationResult, options: RenderOptions): string[] {
  if (result.outcome === 'no-common-timestamps') {
    return ['No common timestamps to compare.'];
  }

  const lines: string[] = [];
  const { sizes } = result;

  if (result.sizeMismatch) {
    lines.push(
      `Warning: different sizes (reference=${sizes.reference}, canonical=${sizes.canonical}). ` +
        `Comparing ${sizes.common} common timestamps.`
    );
  }

  if (result.outcome === 'match') {
    lines.push(options.dropLast ? 'OK: data matches (last row excluded).' : 'OK: data matches.');
    return lines;
  }

  lines.push(`Differences found in ${result.rows.length} rows.`);
  for (const row of result.rows) {
    lines.push('');
    lines.push(
      `Row ${row.position} (timestamp ${formatTimestamp(row.openTime)}, canonical line ${row.line ?? 'n/a'}):`
    );
    for (const diff of row.differences) {
      lines.push(
        `  ${diff.column}: reference=${formatValue(diff.reference)} canonical=${formatValue(diff.canonical)}`
      );
    }
  }
  return lines;
}
