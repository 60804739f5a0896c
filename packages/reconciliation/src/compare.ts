import { CANONICAL_SCHEMA, type IndexedKlineRecord, type KlineTable } from '@klinecheck/schemas';
import { createNoOpLogger, type Logger } from '@klinecheck/utils';
import { buildLineMap, loadCanonicalArtifact, loadReferenceArtifact } from './loaders';
import type {
  CellDifference,
  CellValue,
  ComparisonSizes,
  DivergentRow,
  LineMap,
  ReconciliationResult,
} from './types';

/** Every column except the alignment key */
const COMPARED_COLUMNS = CANONICAL_SCHEMA.columns.filter((c) => c.field !== 'openTime');

export interface CompareOptions {
  logger?: Logger;
}

function sameValue(a: CellValue, b: CellValue): boolean {
  if (a === null || b === null) return a === b;
  if (a instanceof Date || b instanceof Date) {
    return a instanceof Date && b instanceof Date && a.getTime() === b.getTime();
  }
  return a === b;
}

function keyByOpenTime(table: KlineTable): Map<number, IndexedKlineRecord> {
  const byKey = new Map<number, IndexedKlineRecord>();
  for (const row of table.rows) {
    if (row.openTime !== null) {
      byKey.set(row.openTime.getTime(), row);
    }
  }
  return byKey;
}

function diffRow(reference: IndexedKlineRecord, canonical: IndexedKlineRecord): CellDifference[] {
  const differences: CellDifference[] = [];
  for (const spec of COMPARED_COLUMNS) {
    const referenceValue = reference[spec.field];
    const canonicalValue = canonical[spec.field];
    if (!sameValue(referenceValue, canonicalValue)) {
      differences.push({ column: spec.column, reference: referenceValue, canonical: canonicalValue });
    }
  }
  return differences;
}

/**
 * Align two tables on open time and compare every shared column
 *
 * Only open times present in both tables are compared; positions are
 * 1-based within that intersection, in ascending open-time order.
 *
 * @param lineMap - Open time (epoch ms) → line in the canonical file
 */
export function compareTables(
  reference: KlineTable,
  canonical: KlineTable,
  lineMap: LineMap = new Map()
): ReconciliationResult {
  const referenceByKey = keyByOpenTime(reference);

  const pairs: Array<{ openTime: Date; reference: IndexedKlineRecord; canonical: IndexedKlineRecord }> = [];
  for (const canonicalRow of canonical.rows) {
    if (canonicalRow.openTime === null) continue;
    const referenceRow = referenceByKey.get(canonicalRow.openTime.getTime());
    if (referenceRow) {
      pairs.push({ openTime: canonicalRow.openTime, reference: referenceRow, canonical: canonicalRow });
    }
  }

  const sizes: ComparisonSizes = {
    reference: reference.rows.length,
    canonical: canonical.rows.length,
    common: pairs.length,
  };

  if (pairs.length === 0) {
    return { outcome: 'no-common-timestamps', sizes };
  }

  const sizeMismatch = sizes.common !== sizes.reference || sizes.common !== sizes.canonical;

  const rows: DivergentRow[] = [];
  pairs.forEach((pair, i) => {
    const differences = diffRow(pair.reference, pair.canonical);
    if (differences.length > 0) {
      rows.push({
        openTime: pair.openTime,
        position: i + 1,
        line: lineMap.get(pair.openTime.getTime()) ?? null,
        differences,
      });
    }
  });

  if (rows.length === 0) {
    return { outcome: 'match', sizes, sizeMismatch };
  }
  return { outcome: 'divergent', sizes, sizeMismatch, rows };
}

/**
 * Reconcile a reference dump (JSON wire rows) against a canonical export (CSV)
 *
 * Both artifacts are read in full before anything is compared; any load
 * failure aborts the run. An empty intersection or a size mismatch is
 * reported, not thrown.
 *
 * @param dropLast - Discard the latest row of each artifact before comparing
 * @throws InputError / SchemaError from the loaders
 */
export async function compareArtifacts(
  referencePath: string,
  canonicalPath: string,
  dropLast: boolean,
  options: CompareOptions = {}
): Promise<ReconciliationResult> {
  const log = (options.logger ?? createNoOpLogger()).child({ name: 'reconcile' });

  const lineMap = await buildLineMap(canonicalPath);
  const reference = await loadReferenceArtifact(referencePath, dropLast, { logger: log });
  const canonical = await loadCanonicalArtifact(canonicalPath, dropLast, { logger: log });

  const result = compareTables(reference, canonical, lineMap);

  if (result.outcome === 'no-common-timestamps') {
    log.info({ ...result.sizes, referencePath, canonicalPath }, 'No common timestamps to compare');
    return result;
  }

  if (result.sizeMismatch) {
    log.warn({ ...result.sizes }, 'Artifacts differ in size, comparing common timestamps only');
  }

  if (result.outcome === 'match') {
    log.info({ compared: result.sizes.common, dropLast }, 'Artifacts match');
  } else {
    log.warn(
      { compared: result.sizes.common, divergent: result.rows.length },
      'Artifacts diverge'
    );
  }
  return result;
}
