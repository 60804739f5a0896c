import { z } from 'zod';

/**
 * Kline intervals accepted by the /api/v3/klines endpoint.
 *
 * Note: '1M' (one month) and '1m' (one minute) differ only by case.
 */
export const SUPPORTED_INTERVALS = [
  '1m', '3m', '5m', '15m', '30m',
  '1h', '2h', '4h', '6h', '8h', '12h',
  '1d', '3d',
  '1w',
  '1M',
] as const;

export const IntervalSchema = z.enum(SUPPORTED_INTERVALS, {
  errorMap: () => ({
    message: `interval must be one of: ${SUPPORTED_INTERVALS.join(', ')}`,
  }),
});
export type Interval = z.infer<typeof IntervalSchema>;

/** Largest `limit` the klines endpoint honours in a single request */
export const MAX_KLINE_LIMIT = 1000;

/**
 * Request parameters for a single klines fetch.
 * Clamping to MAX_KLINE_LIMIT is left to the caller so it can be logged.
 */
export const KlineFetchParamsSchema = z.object({
  symbol: z
    .string({ invalid_type_error: 'symbol must be a non-empty string' })
    .trim()
    .min(1, 'symbol must be a non-empty string')
    .transform((s) => s.toUpperCase()),
  interval: IntervalSchema,
  limit: z
    .number({ invalid_type_error: 'limit must be an integer between 1 and 1000' })
    .int('limit must be an integer between 1 and 1000')
    .min(1, 'limit must be at least 1'),
});
export type KlineFetchParams = z.infer<typeof KlineFetchParamsSchema>;

// ============================================
// FIELD MAPS
// ============================================

/**
 * Positional layout of one kline row as the exchange sends it.
 * Bump `version` whenever the order changes.
 */
export const WIRE_SCHEMA = {
  version: 1,
  fields: [
    'openTime',
    'open',
    'high',
    'low',
    'close',
    'volume',
    'closeTime',
    'quoteVolume',
    'trades',
    'takerBuyVolume',
    'takerBuyQuoteVolume',
    'ignore',
  ],
} as const;
export type WireField = (typeof WIRE_SCHEMA.fields)[number];

export const WIRE_ARITY = WIRE_SCHEMA.fields.length;

/**
 * Column layout of the canonical tabular export (header order).
 * `kind` drives parsing on the way in and formatting on the way out.
 */
export const CANONICAL_SCHEMA = {
  version: 1,
  columns: [
    { column: 'open_time', field: 'openTime', kind: 'timestamp' },
    { column: 'open', field: 'open', kind: 'decimal' },
    { column: 'high', field: 'high', kind: 'decimal' },
    { column: 'low', field: 'low', kind: 'decimal' },
    { column: 'close', field: 'close', kind: 'decimal' },
    { column: 'volume', field: 'volume', kind: 'decimal' },
    { column: 'close_time', field: 'closeTime', kind: 'timestamp' },
    { column: 'quote_volume', field: 'quoteVolume', kind: 'decimal' },
    { column: 'trades', field: 'trades', kind: 'count' },
    { column: 'taker_buy_volume', field: 'takerBuyVolume', kind: 'decimal' },
    { column: 'taker_buy_quote_volume', field: 'takerBuyQuoteVolume', kind: 'decimal' },
  ],
} as const;
export type CanonicalColumnSpec = (typeof CANONICAL_SCHEMA.columns)[number];
export type CanonicalColumn = CanonicalColumnSpec['column'];
export type KlineField = CanonicalColumnSpec['field'];

export const CANONICAL_COLUMNS: readonly CanonicalColumn[] = CANONICAL_SCHEMA.columns.map(
  (c) => c.column
);

/** Position of a named field inside a wire row */
export function wireIndex(field: WireField): number {
  return WIRE_SCHEMA.fields.indexOf(field);
}

// ============================================
// RECORDS
// ============================================

/**
 * Raw klines payload: a list of fixed-arity rows.
 * Cell contents are left untyped; coercion happens during normalization.
 */
export const RawKlinePayloadSchema = z.array(
  z.array(z.unknown()).length(WIRE_ARITY, `each kline row must have exactly ${WIRE_ARITY} fields`)
);
export type RawKlineRow = z.infer<typeof RawKlinePayloadSchema>[number];

/**
 * One normalized kline.
 *
 * Every cell is nullable because lenient normalization keeps unparseable
 * cells instead of rejecting the batch. Strict normalization guarantees the
 * magnitudes and `trades` are non-null.
 */
export interface KlineRecord {
  openTime: Date | null;
  open: number | null;
  high: number | null;
  low: number | null;
  close: number | null;
  volume: number | null;
  closeTime: Date | null;
  quoteVolume: number | null;
  /** Integer trade count */
  trades: number | null;
  takerBuyVolume: number | null;
  takerBuyQuoteVolume: number | null;
}

/** A record plus its dense 0-based position after sorting */
export type IndexedKlineRecord = KlineRecord & { index: number };

/** Ordered, de-duplicated klines sorted ascending by openTime */
export interface KlineTable {
  rows: IndexedKlineRecord[];
}

/** The eight decimal magnitude fields */
export const NUMERIC_FIELDS = [
  'open',
  'high',
  'low',
  'close',
  'volume',
  'quoteVolume',
  'takerBuyVolume',
  'takerBuyQuoteVolume',
] as const satisfies readonly KlineField[];
export type NumericField = (typeof NUMERIC_FIELDS)[number];

// Schema drift between the field maps and the record type fails the build here.
type SameKeys<A, B> = [A] extends [B] ? ([B] extends [A] ? true : false) : false;
type AssertTrue<T extends true> = T;
type FieldMapsConsistent = [
  AssertTrue<SameKeys<KlineField, keyof KlineRecord>>,
  AssertTrue<SameKeys<Exclude<WireField, 'ignore'>, KlineField>>,
];
