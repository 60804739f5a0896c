import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { CANONICAL_COLUMNS } from '@klinecheck/schemas';
import { formatTimestamp } from '@klinecheck/utils';

export const MINUTE = 60_000;

export const CANONICAL_HEADER = CANONICAL_COLUMNS.join(',');

/**
 * One wire row as found in a reference dump
 */
export function referenceRow(openTime: number, close = '1.5'): unknown[] {
  return [openTime, '1', '2', '0.5', close, '100', openTime + MINUTE, '150', '10', '50', '75', '0'];
}

/**
 * The canonical CSV line carrying the same values as referenceRow
 */
export function canonicalLine(openTime: number, close = '1.5'): string {
  return [
    formatTimestamp(new Date(openTime)),
    '1',
    '2',
    '0.5',
    close,
    '100',
    formatTimestamp(new Date(openTime + MINUTE)),
    '150',
    '10',
    '50',
    '75',
  ].join(',');
}

/**
 * Scratch directory for artifact files, removed by cleanup()
 */
export function createWorkspace(): {
  writeReference: (name: string, rows: unknown) => string;
  writeCanonical: (name: string, lines: string[]) => string;
  path: (name: string) => string;
  cleanup: () => void;
} {
  const dir = mkdtempSync(join(tmpdir(), 'reconcile-'));
  return {
    writeReference: (name, rows) => {
      const filePath = join(dir, name);
      writeFileSync(filePath, JSON.stringify(rows), 'utf8');
      return filePath;
    },
    writeCanonical: (name, lines) => {
      const filePath = join(dir, name);
      writeFileSync(filePath, lines.join('\n') + '\n', 'utf8');
      return filePath;
    },
    path: (name) => join(dir, name),
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}
