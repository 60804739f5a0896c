import { Agent, request, type Dispatcher } from 'undici';
import type { KlineFetchParams } from '@klinecheck/schemas';
import { RemoteError, TransportError, createNoOpLogger, type Logger } from '@klinecheck/utils';

export const DEFAULT_BASE_URL = 'https://data-api.binance.vision';
export const DEFAULT_CONNECT_TIMEOUT_MS = 3_000;
export const DEFAULT_READ_TIMEOUT_MS = 10_000;

const KLINES_PATH = '/api/v3/klines';

export interface BinanceRestClientOptions {
  /** API root (default: public market-data host) */
  baseUrl?: string;
  /** TCP connect timeout in ms (default: 3000); applies to the client's own Agent */
  connectTimeoutMs?: number;
  /** Header and body timeout in ms, applied to every request (default: 10000) */
  readTimeoutMs?: number;
  /** Custom undici dispatcher; the caller keeps ownership and closes it */
  dispatcher?: Dispatcher;
  logger?: Logger;
}

/**
 * Binance REST API client for public market data
 *
 * One request per call: no retry, no backoff, no rate-limit bookkeeping.
 * Failures surface immediately as TransportError (network) or RemoteError
 * (the endpoint answered with something unusable).
 *
 * Reference: https://developers.binance.com/docs/binance-spot-api-docs/rest-api
 */
export class BinanceRestClient {
  private readonly baseUrl: string;
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private readonly readTimeoutMs: number;
  private readonly log: Logger;

  constructor(options: BinanceRestClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.readTimeoutMs = options.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS;
    this.ownsDispatcher = options.dispatcher === undefined;
    this.dispatcher =
      options.dispatcher ??
      new Agent({
        connectTimeout: options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
        headersTimeout: this.readTimeoutMs,
        bodyTimeout: this.readTimeoutMs,
      });
    this.log = (options.logger ?? createNoOpLogger()).child({ name: 'http' });
  }

  /**
   * Fetch raw klines for a symbol
   *
   * Binance /api/v3/klines is a public endpoint, no auth required.
   * The payload is returned as decoded JSON, unvalidated: each row is
   * [openTime, open, high, low, close, volume, closeTime, quoteVolume,
   *  trades, takerBuyVolume, takerBuyQuoteVolume, ignore]
   */
  async getKlines(params: KlineFetchParams): Promise<unknown> {
    const query = new URLSearchParams({
      symbol: params.symbol,
      interval: params.interval,
      limit: params.limit.toString(),
    });
    return this.request(`${KLINES_PATH}?${query.toString()}`);
  }

  /**
   * GET a JSON document
   *
   * @param path - API path with query string (e.g., "/api/v3/klines?symbol=BTCUSDT&interval=1h")
   */
  private async request(path: string): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    const [endpoint] = path.split('?');

    this.log.debug({ method: 'GET', path: endpoint }, 'Making Binance API request');

    let status: number;
    let body: string;
    try {
      const response = await request(url, {
        method: 'GET',
        headers: { accept: 'application/json' },
        dispatcher: this.dispatcher,
        headersTimeout: this.readTimeoutMs,
        bodyTimeout: this.readTimeoutMs,
      });
      status = response.statusCode;
      body = await response.body.text();
    } catch (err) {
      const error = new TransportError(url, err);
      this.log.error({ path: endpoint, err: error.message }, 'Binance API request failed');
      throw error;
    }

    if (status < 200 || status >= 300) {
      const error = new RemoteError(status, body);
      this.log.error(
        { path: endpoint, status, body: error.bodyPreview },
        'Binance API returned an error status'
      );
      throw error;
    }

    try {
      return JSON.parse(body);
    } catch {
      const error = new RemoteError(status, body, `HTTP ${status} with a non-JSON body`);
      this.log.error({ path: endpoint, status, body: error.bodyPreview }, 'Binance API returned malformed JSON');
      throw error;
    }
  }

  /**
   * Release pooled connections held by the client's own Agent
   *
   * An injected dispatcher is left open for its owner.
   */
  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }
}
