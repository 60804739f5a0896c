/**
 * @klinecheck/binance-client
 *
 * Binance public klines endpoint: REST transport and the normalizing fetcher
 */

export {
  BinanceRestClient,
  DEFAULT_BASE_URL,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_READ_TIMEOUT_MS,
  type BinanceRestClientOptions,
} from './rest/client';
export { KlineFetcher, type KlineFetcherOptions } from './klines/kline-fetcher';
