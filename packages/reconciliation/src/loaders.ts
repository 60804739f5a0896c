import { promises as fs } from 'fs';
import Papa from 'papaparse';
import {
  CANONICAL_COLUMNS,
  type CanonicalColumn,
  type KlineRecord,
  type KlineTable,
} from '@klinecheck/schemas';
import {
  InputError,
  InvalidArgumentError,
  SchemaError,
  createNoOpLogger,
  normalizeKlines,
  parseCount,
  parseDecimal,
  parseTimestamp,
  toKlineTable,
  type Logger,
} from '@klinecheck/utils';
import type { LineMap } from './types';

export interface LoaderOptions {
  logger?: Logger;
}

/** A data row of the canonical file with its 1-based line number */
interface CanonicalLine {
  line: number;
  cells: string[];
}

async function readArtifact(path: string): Promise<string> {
  try {
    return await fs.readFile(path, 'utf8');
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new InputError(path, detail, err);
  }
}

/**
 * Drop the final row (the reference source is known to end with a partial candle)
 */
function dropLastRow(table: KlineTable): KlineTable {
  return table.rows.length > 0 ? { rows: table.rows.slice(0, -1) } : table;
}

// ============================================
// REFERENCE ARTIFACT (JSON wire rows)
// ============================================

/**
 * Load a reference dump: a JSON array of 12-field kline rows.
 *
 * Normalization is lenient: unparseable magnitudes stay null rather than
 * failing the load. Every row must still carry a parseable open time.
 *
 * @param dropLast - Discard the latest row after sorting
 * @throws InputError if the file cannot be read or is not JSON
 * @throws SchemaError if the rows do not match the wire layout
 */
export async function loadReferenceArtifact(
  path: string,
  dropLast: boolean,
  options: LoaderOptions = {}
): Promise<KlineTable> {
  const log = options.logger ?? createNoOpLogger();
  const text = await readArtifact(path);

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new InputError(path, 'malformed JSON', err);
  }

  let table: KlineTable;
  try {
    table = normalizeKlines(raw, { mode: 'lenient', logger: log, context: path });
  } catch (err) {
    if (err instanceof InvalidArgumentError) {
      throw new SchemaError(path, err.message);
    }
    throw err;
  }

  const unkeyed = table.rows.filter((row) => row.openTime === null).length;
  if (unkeyed > 0) {
    throw new SchemaError(path, `${unkeyed} row(s) with an unparseable open_time`);
  }

  log.debug({ path, rows: table.rows.length, dropLast }, 'Loaded reference artifact');
  return dropLast ? dropLastRow(table) : table;
}

// ============================================
// CANONICAL ARTIFACT (CSV with header)
// ============================================

function isBlank(cells: string[]): boolean {
  return cells.every((cell) => cell.trim() === '');
}

/**
 * Parse the canonical file into its header and data lines.
 * Blank lines are skipped but still counted for line numbers.
 */
async function readCanonicalLines(
  path: string
): Promise<{ columnIndex: Map<CanonicalColumn, number>; lines: CanonicalLine[] }> {
  const text = await readArtifact(path);
  const parsed = Papa.parse<string[]>(text, {
    delimiter: ',',
    header: false,
    skipEmptyLines: false,
  });

  if (parsed.errors.length > 0) {
    const [first] = parsed.errors;
    throw new SchemaError(path, first.message, first.row !== undefined ? first.row + 1 : undefined);
  }

  const numbered = parsed.data
    .map((cells, i) => ({ line: i + 1, cells }))
    .filter(({ cells }) => !isBlank(cells));

  const [headerLine, ...lines] = numbered;
  if (!headerLine) {
    throw new SchemaError(path, 'missing header row');
  }

  const header = headerLine.cells.map((cell) => cell.trim());
  const columnIndex = new Map<CanonicalColumn, number>();
  const missing: string[] = [];
  for (const column of CANONICAL_COLUMNS) {
    const index = header.indexOf(column);
    if (index === -1) {
      missing.push(column);
    } else {
      columnIndex.set(column, index);
    }
  }
  if (missing.length > 0) {
    throw new SchemaError(path, `missing columns: ${missing.join(', ')}`, headerLine.line);
  }

  for (const { line, cells } of lines) {
    if (cells.length !== header.length) {
      throw new SchemaError(
        path,
        `expected ${header.length} fields, found ${cells.length}`,
        line
      );
    }
  }

  return { columnIndex, lines };
}

function parseCanonicalLine(
  { cells }: CanonicalLine,
  columnIndex: Map<CanonicalColumn, number>
): KlineRecord {
  const text = (column: CanonicalColumn): string => {
    const index = columnIndex.get(column);
    return index === undefined ? '' : cells[index];
  };

  return {
    openTime: parseTimestamp(text('open_time')),
    open: parseDecimal(text('open')),
    high: parseDecimal(text('high')),
    low: parseDecimal(text('low')),
    close: parseDecimal(text('close')),
    volume: parseDecimal(text('volume')),
    closeTime: parseTimestamp(text('close_time')),
    quoteVolume: parseDecimal(text('quote_volume')),
    trades: parseCount(text('trades')),
    takerBuyVolume: parseDecimal(text('taker_buy_volume')),
    takerBuyQuoteVolume: parseDecimal(text('taker_buy_quote_volume')),
  };
}

/**
 * Load a canonical export: CSV with a header naming the 11 canonical
 * columns (extra columns are ignored) and calendar-formatted timestamps.
 *
 * @param dropLast - Discard the latest row after sorting
 * @throws InputError if the file cannot be read
 * @throws SchemaError on a missing column, a ragged row, or a bad or repeated open_time
 */
export async function loadCanonicalArtifact(
  path: string,
  dropLast: boolean,
  options: LoaderOptions = {}
): Promise<KlineTable> {
  const log = options.logger ?? createNoOpLogger();
  const { columnIndex, lines } = await readCanonicalLines(path);

  const seen = new Set<number>();
  const records = lines.map((line) => {
    const record = parseCanonicalLine(line, columnIndex);
    if (record.openTime === null) {
      throw new SchemaError(path, 'unparseable open_time', line.line);
    }
    const key = record.openTime.getTime();
    if (seen.has(key)) {
      throw new SchemaError(path, 'repeated open_time', line.line);
    }
    seen.add(key);
    return record;
  });

  const table = toKlineTable(records);
  log.debug({ path, rows: table.rows.length, dropLast }, 'Loaded canonical artifact');
  return dropLast ? dropLastRow(table) : table;
}

/**
 * Map each data row's open time to its line in the canonical file
 * (header is line 1, so the first data row is line 2).
 *
 * Reads the file on its own, independent of loadCanonicalArtifact, so line
 * numbers always refer to the file as written.
 */
export async function buildLineMap(path: string): Promise<LineMap> {
  const { columnIndex, lines } = await readCanonicalLines(path);
  const openTimeIndex = columnIndex.get('open_time');

  const map: LineMap = new Map();
  for (const { line, cells } of lines) {
    const openTime = openTimeIndex === undefined ? null : parseTimestamp(cells[openTimeIndex]);
    if (openTime !== null) {
      map.set(openTime.getTime(), line);
    }
  }
  return map;
}
