import { promises as fs } from 'fs';
import Papa from 'papaparse';
import { CANONICAL_COLUMNS, CANONICAL_SCHEMA, type KlineTable } from '@klinecheck/schemas';
import { formatTimestamp } from '../time/timestamp';

function formatCell(value: Date | number | null): string {
  if (value === null) return '';
  if (value instanceof Date) return formatTimestamp(value);
  return String(value);
}

/**
 * Render a table in the canonical tabular form: header row, the 11
 * canonical columns in schema order, no index column.
 */
export function toCanonicalCsv(table: KlineTable): string {
  const data = table.rows.map((row) =>
    CANONICAL_SCHEMA.columns.map((spec) => formatCell(row[spec.field]))
  );
  const csv = Papa.unparse({ fields: [...CANONICAL_COLUMNS], data }, { newline: '\n' });
  // unparse already terminates a header-only document
  return csv.endsWith('\n') ? csv : `${csv}\n`;
}

/**
 * Write the canonical export to disk, replacing any existing file
 */
export async function writeKlineCsv(table: KlineTable, filePath: string): Promise<void> {
  await fs.writeFile(filePath, toCanonicalCsv(table), 'utf8');
}
