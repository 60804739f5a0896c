import {
  CANONICAL_SCHEMA,
  RawKlinePayloadSchema,
  WIRE_ARITY,
  wireIndex,
  type IndexedKlineRecord,
  type KlineRecord,
  type KlineTable,
  type RawKlineRow,
  type WireField,
} from '@klinecheck/schemas';
import type { ZodIssue } from 'zod';
import { DataIntegrityError, InvalidArgumentError, type DefectCounts } from '../errors/kline-errors';
import { createNoOpLogger, type Logger } from '../logger/logger';
import { parseCount, parseDecimal, parseEpochMs } from './cells';

/**
 * - strict: any unparseable magnitude or trade count rejects the batch,
 *   and so does a repeated open time
 * - lenient: unparseable cells stay null, repeated open times keep the last row
 */
export type NormalizationMode = 'strict' | 'lenient';

export interface NormalizeOptions {
  mode: NormalizationMode;
  logger?: Logger;
  /** Label for log lines and errors (e.g., 'BTCUSDT/4h') */
  context?: string;
}

/** Columns checked by the strict gate: every non-timestamp column */
const GATED_COLUMNS = CANONICAL_SCHEMA.columns.filter((c) => c.kind !== 'timestamp');

/**
 * Convert one wire row into a record. The trailing `ignore` field is dropped.
 */
export function parseWireRow(row: RawKlineRow): KlineRecord {
  const cell = (field: WireField): unknown => row[wireIndex(field)];

  return {
    openTime: parseEpochMs(cell('openTime')),
    open: parseDecimal(cell('open')),
    high: parseDecimal(cell('high')),
    low: parseDecimal(cell('low')),
    close: parseDecimal(cell('close')),
    volume: parseDecimal(cell('volume')),
    closeTime: parseEpochMs(cell('closeTime')),
    quoteVolume: parseDecimal(cell('quoteVolume')),
    trades: parseCount(cell('trades')),
    takerBuyVolume: parseDecimal(cell('takerBuyVolume')),
    takerBuyQuoteVolume: parseDecimal(cell('takerBuyQuoteVolume')),
  };
}

/**
 * Per-column count of null cells among the gated columns
 */
export function countDefects(records: KlineRecord[]): DefectCounts {
  const defects: DefectCounts = {};
  for (const spec of GATED_COLUMNS) {
    const count = records.filter((record) => record[spec.field] === null).length;
    if (count > 0) {
      defects[spec.column] = count;
    }
  }
  return defects;
}

/**
 * Ascending by openTime; records without an open time sort last
 */
export function compareOpenTime(a: KlineRecord, b: KlineRecord): number {
  if (a.openTime === null) return b.openTime === null ? 0 : 1;
  if (b.openTime === null) return -1;
  return a.openTime.getTime() - b.openTime.getTime();
}

/**
 * Build a table from records: stable sort by openTime, dense 0-based index
 */
export function toKlineTable(records: KlineRecord[]): KlineTable {
  const rows: IndexedKlineRecord[] = [...records]
    .sort(compareOpenTime)
    .map((record, index) => ({ ...record, index }));
  return { rows };
}

function describeIssue(issue: ZodIssue): string {
  const where = issue.path.length > 0 ? `row ${issue.path.join('.')}: ` : '';
  return `${where}${issue.message}`;
}

/**
 * Normalize a raw klines payload into a sorted, typed table
 *
 * The same routine serves the fetcher (strict) and the reference-artifact
 * loader (lenient); the mode is the only difference between them.
 *
 * @param raw - Decoded payload, expected to be a list of 12-field rows
 * @throws InvalidArgumentError if the payload is not a list of 12-field rows
 * @throws DataIntegrityError in strict mode on null cells or repeated open times
 */
export function normalizeKlines(raw: unknown, options: NormalizeOptions): KlineTable {
  const log = options.logger ?? createNoOpLogger();

  const parsed = RawKlinePayloadSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidArgumentError(
      `klines payload must be a list of ${WIRE_ARITY}-field rows (${describeIssue(parsed.error.issues[0])})`
    );
  }

  if (parsed.data.length === 0) {
    return { rows: [] };
  }

  const records = parsed.data.map(parseWireRow);

  if (options.mode === 'strict') {
    const defects = countDefects(records);
    if (Object.keys(defects).length > 0) {
      log.error({ context: options.context, defects }, 'Malformed numeric data received');
      throw new DataIntegrityError(defects, options.context);
    }
  }

  const unique = dropDuplicateOpenTimes(records, options.mode, log, options.context);
  const table = toKlineTable(unique);

  log.debug(
    { context: options.context, mode: options.mode, rows: table.rows.length },
    'Normalized klines'
  );
  return table;
}

function dropDuplicateOpenTimes(
  records: KlineRecord[],
  mode: NormalizationMode,
  log: Logger,
  context: string | undefined
): KlineRecord[] {
  const unkeyed: KlineRecord[] = [];
  const byOpenTime = new Map<number, KlineRecord>();

  for (const record of records) {
    if (record.openTime === null) {
      unkeyed.push(record);
    } else {
      byOpenTime.set(record.openTime.getTime(), record);
    }
  }

  const duplicates = records.length - unkeyed.length - byOpenTime.size;
  if (duplicates === 0) {
    return records;
  }

  if (mode === 'strict') {
    log.error({ context, duplicates }, 'Repeated open_time values in klines payload');
    throw new DataIntegrityError({ open_time: duplicates }, context);
  }

  log.warn({ context, duplicates }, 'Repeated open_time values, keeping the last row for each');
  return [...byOpenTime.values(), ...unkeyed];
}
