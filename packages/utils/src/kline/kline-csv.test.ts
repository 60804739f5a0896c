import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { toCanonicalCsv, writeKlineCsv } from './kline-csv';
import { normalizeKlines } from './normalize-klines';

const HEADER =
  'open_time,open,high,low,close,volume,close_time,quote_volume,trades,taker_buy_volume,taker_buy_quote_volume';

describe('toCanonicalCsv', () => {
  it('writes the header and one line per row', () => {
    const table = normalizeKlines(
      [[0, '1', '2', '0.5', '1.5', '100', 60000, '150', '10', '50', '75', '0']],
      { mode: 'strict' }
    );

    expect(toCanonicalCsv(table)).toBe(
      `${HEADER}\n1970-01-01 00:00:00,1,2,0.5,1.5,100,1970-01-01 00:01:00,150,10,50,75\n`
    );
  });

  it('writes null cells as empty fields', () => {
    const table = normalizeKlines(
      [[0, '1', '2', '0.5', 'n/a', '100', 59999, '150', '10', '50', '75', '0']],
      { mode: 'lenient' }
    );

    expect(toCanonicalCsv(table).split('\n')[1]).toBe(
      '1970-01-01 00:00:00,1,2,0.5,,100,1970-01-01 00:00:59.999,150,10,50,75'
    );
  });

  it('writes only the header for an empty table', () => {
    expect(toCanonicalCsv({ rows: [] })).toBe(`${HEADER}\n`);
  });
});

describe('writeKlineCsv', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'kline-csv-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('replaces an existing file', async () => {
    const filePath = join(dir, 'out.csv');
    await writeKlineCsv({ rows: [] }, filePath);
    await writeKlineCsv({ rows: [] }, filePath);
    expect(readFileSync(filePath, 'utf8')).toBe(`${HEADER}\n`);
  });
});
