import {
  KlineFetchParamsSchema,
  MAX_KLINE_LIMIT,
  type Interval,
  type KlineTable,
} from '@klinecheck/schemas';
import { InvalidArgumentError, normalizeKlines, type Logger } from '@klinecheck/utils';
import { BinanceRestClient } from '../rest/client';

export interface KlineFetcherOptions {
  logger: Logger;
  /** REST client to use (default: a new BinanceRestClient with default timeouts) */
  client?: BinanceRestClient;
}

/**
 * KlineFetcher: one-shot fetch of a symbol's klines, normalized into a table.
 *
 * Parameters are validated in the constructor, before any I/O:
 * - symbol is trimmed and upper-cased; blank is rejected
 * - interval must be one of SUPPORTED_INTERVALS
 * - limit must be an integer >= 1; values above 1000 are clamped (with a warning)
 *
 * Normalization is strict: one unparseable cell rejects the whole batch.
 */
export class KlineFetcher {
  readonly symbol: string;
  readonly interval: Interval;
  readonly limit: number;

  private readonly client: BinanceRestClient;
  private readonly ownsClient: boolean;
  private readonly log: Logger;

  constructor(symbol: string, interval: string, limit: number, options: KlineFetcherOptions) {
    const parsed = KlineFetchParamsSchema.safeParse({ symbol, interval, limit });
    if (!parsed.success) {
      throw new InvalidArgumentError(parsed.error.issues.map((issue) => issue.message).join('; '));
    }

    this.log = options.logger.child({ name: 'fetcher' });

    let effectiveLimit = parsed.data.limit;
    if (effectiveLimit > MAX_KLINE_LIMIT) {
      this.log.warn(
        { requested: effectiveLimit, max: MAX_KLINE_LIMIT },
        `Limit is set to ${effectiveLimit}, but the maximum supported by Binance is ${MAX_KLINE_LIMIT}. Adjusting to ${MAX_KLINE_LIMIT}.`
      );
      effectiveLimit = MAX_KLINE_LIMIT;
    }

    this.symbol = parsed.data.symbol;
    this.interval = parsed.data.interval;
    this.limit = effectiveLimit;
    this.client = options.client ?? new BinanceRestClient({ logger: options.logger });
    this.ownsClient = options.client === undefined;

    this.log.info(
      { symbol: this.symbol, interval: this.interval, limit: this.limit },
      'Initialized kline fetcher'
    );
  }

  private get context(): string {
    return `${this.symbol}/${this.interval}`;
  }

  /**
   * Issue the single klines request and return the decoded payload
   *
   * @throws RemoteError on a non-2xx status or non-JSON body
   * @throws TransportError on network failure or timeout
   */
  async fetchRaw(): Promise<unknown> {
    this.log.debug(
      { symbol: this.symbol, interval: this.interval, limit: this.limit },
      'Fetching klines'
    );

    const raw = await this.client.getKlines({
      symbol: this.symbol,
      interval: this.interval,
      limit: this.limit,
    });

    this.log.info({ symbol: this.symbol, interval: this.interval }, 'Klines fetched');
    return raw;
  }

  /**
   * Convert a raw payload into a table (strict mode)
   *
   * @throws InvalidArgumentError if the payload is not a list of 12-field rows
   * @throws DataIntegrityError if any magnitude or trade count is unparseable
   */
  normalize(raw: unknown): KlineTable {
    const table = normalizeKlines(raw, { mode: 'strict', logger: this.log, context: this.context });

    if (table.rows.length === 0) {
      this.log.warn({ symbol: this.symbol, interval: this.interval }, 'No klines returned');
    } else {
      this.log.info({ symbol: this.symbol, rows: table.rows.length }, 'Klines normalized');
    }
    return table;
  }

  /**
   * fetchRaw then normalize; errors from either stage propagate unchanged
   */
  async fetchAndNormalize(): Promise<KlineTable> {
    const raw = await this.fetchRaw();
    return this.normalize(raw);
  }

  /**
   * Release the REST client if this fetcher created it
   */
  async close(): Promise<void> {
    if (this.ownsClient) {
      await this.client.close();
    }
  }
}
