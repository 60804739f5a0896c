import { MockAgent } from 'undici';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
  DataIntegrityError,
  InvalidArgumentError,
  RemoteError,
  TransportError,
  type Logger,
} from '@klinecheck/utils';
import { createMockLogger } from '@klinecheck/utils/testing';
import { KlineFetcher } from '../klines/kline-fetcher';
import { BinanceRestClient, DEFAULT_BASE_URL } from '../rest/client';

const HOUR = 3_600_000;
// Mon Jan 01 2024 00:00:00 UTC
const BASE_TS = 1704067200000;

function wireRow(openTime: number, close = '42000.5'): unknown[] {
  return [openTime, '42000', '42100', '41900', close, '12.5', openTime + HOUR - 1, '525000', 310, '6', '252000', '0'];
}

describe('KlineFetcher', () => {
  let mockAgent: MockAgent;
  let logger: Logger;
  let client: BinanceRestClient;

  beforeEach(() => {
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
    logger = createMockLogger();
    client = new BinanceRestClient({ dispatcher: mockAgent, logger });
  });

  afterEach(async () => {
    await mockAgent.close();
  });

  function interceptKlines(symbol: string, interval: string, limit: number) {
    return mockAgent.get(DEFAULT_BASE_URL).intercept({
      path: '/api/v3/klines',
      method: 'GET',
      query: { symbol, interval, limit: String(limit) },
    });
  }

  describe('constructor', () => {
    it('normalizes the symbol', () => {
      const fetcher = new KlineFetcher(' btcusdt ', '1h', 2, { logger, client });
      expect(fetcher.symbol).toBe('BTCUSDT');
      expect(fetcher.interval).toBe('1h');
      expect(fetcher.limit).toBe(2);
    });

    it('rejects invalid parameters before any request', () => {
      expect(() => new KlineFetcher('', '1h', 2, { logger, client })).toThrow(
        new InvalidArgumentError('symbol must be a non-empty string')
      );
      expect(() => new KlineFetcher('BTCUSDT', '2m', 2, { logger, client })).toThrow(
        /^interval must be one of: 1m, 3m/
      );
      expect(() => new KlineFetcher('BTCUSDT', '1h', 0, { logger, client })).toThrow(
        'limit must be at least 1'
      );
      expect(() => new KlineFetcher('BTCUSDT', '1h', 2.5, { logger, client })).toThrow(
        'limit must be an integer between 1 and 1000'
      );
      expect(() => new KlineFetcher('BTCUSDT', '1h', Number.NaN, { logger, client })).toThrow(
        InvalidArgumentError
      );
    });

    it('clamps limits above 1000 and warns', () => {
      const fetcher = new KlineFetcher('BTCUSDT', '1h', 1500, { logger, client });

      expect(fetcher.limit).toBe(1000);
      expect(logger.warn).toHaveBeenCalledWith(
        { requested: 1500, max: 1000 },
        'Limit is set to 1500, but the maximum supported by Binance is 1000. Adjusting to 1000.'
      );
    });

    it('keeps 1000 without warning', () => {
      const fetcher = new KlineFetcher('BTCUSDT', '1h', 1000, { logger, client });
      expect(fetcher.limit).toBe(1000);
      expect(logger.warn).not.toHaveBeenCalled();
    });
  });

  describe('fetchRaw', () => {
    it('returns the decoded payload untouched', async () => {
      const payload = [wireRow(BASE_TS + HOUR), wireRow(BASE_TS)];
      interceptKlines('BTCUSDT', '1h', 2).reply(200, payload);

      const fetcher = new KlineFetcher('btcusdt', '1h', 2, { logger, client });
      expect(await fetcher.fetchRaw()).toEqual(payload);
    });

    it('sends the clamped limit', async () => {
      interceptKlines('BTCUSDT', '1d', 1000).reply(200, []);

      const fetcher = new KlineFetcher('BTCUSDT', '1d', 5000, { logger, client });
      expect(await fetcher.fetchRaw()).toEqual([]);
    });

    it('raises RemoteError on a non-2xx status', async () => {
      interceptKlines('BTCUSDT', '1h', 2).reply(400, '{"code":-1121,"msg":"Invalid symbol."}');

      const fetcher = new KlineFetcher('BTCUSDT', '1h', 2, { logger, client });
      const error = await fetcher.fetchRaw().catch((err: unknown) => err);

      expect(error).toBeInstanceOf(RemoteError);
      if (error instanceof RemoteError) {
        expect(error.status).toBe(400);
        expect(error.message).toBe('Remote error (HTTP 400): {"code":-1121,"msg":"Invalid symbol."}');
      }
    });

    it('raises RemoteError on a non-JSON body', async () => {
      interceptKlines('BTCUSDT', '1h', 2).reply(200, '<html>maintenance</html>');

      const fetcher = new KlineFetcher('BTCUSDT', '1h', 2, { logger, client });
      await expect(fetcher.fetchRaw()).rejects.toThrow(
        'Remote error (HTTP 200 with a non-JSON body): <html>maintenance</html>'
      );
    });

    it('raises TransportError when the connection fails', async () => {
      interceptKlines('BTCUSDT', '1h', 2).replyWithError(new Error('socket hang up'));

      const fetcher = new KlineFetcher('BTCUSDT', '1h', 2, { logger, client });
      const error = await fetcher.fetchRaw().catch((err: unknown) => err);

      expect(error).toBeInstanceOf(TransportError);
      if (error instanceof TransportError) {
        expect(error.url).toBe(`${DEFAULT_BASE_URL}/api/v3/klines?symbol=BTCUSDT&interval=1h&limit=2`);
      }
    });
  });

  describe('normalize', () => {
    it('sorts rows and converts cells', () => {
      const fetcher = new KlineFetcher('BTCUSDT', '1h', 2, { logger, client });
      const table = fetcher.normalize([wireRow(BASE_TS + HOUR, '42050'), wireRow(BASE_TS)]);

      expect(table.rows).toHaveLength(2);
      expect(table.rows[0]).toEqual({
        index: 0,
        openTime: new Date(BASE_TS),
        open: 42000,
        high: 42100,
        low: 41900,
        close: 42000.5,
        volume: 12.5,
        closeTime: new Date(BASE_TS + HOUR - 1),
        quoteVolume: 525000,
        trades: 310,
        takerBuyVolume: 6,
        takerBuyQuoteVolume: 252000,
      });
      expect(table.rows[1].close).toBe(42050);
    });

    it('warns and returns an empty table when nothing came back', () => {
      const fetcher = new KlineFetcher('BTCUSDT', '1h', 2, { logger, client });

      expect(fetcher.normalize([])).toEqual({ rows: [] });
      expect(logger.warn).toHaveBeenCalledWith({ symbol: 'BTCUSDT', interval: '1h' }, 'No klines returned');
    });

    it('rejects the batch on one malformed cell', () => {
      const fetcher = new KlineFetcher('BTCUSDT', '1h', 2, { logger, client });

      expect(() => fetcher.normalize([wireRow(BASE_TS), wireRow(BASE_TS + HOUR, 'oops')])).toThrow(
        new DataIntegrityError({ close: 1 }, 'BTCUSDT/1h')
      );
    });
  });

  describe('fetchAndNormalize', () => {
    it('fetches then normalizes', async () => {
      interceptKlines('ETHUSDT', '4h', 3).reply(200, [wireRow(BASE_TS + 8 * HOUR), wireRow(BASE_TS), wireRow(BASE_TS + 4 * HOUR)]);

      const fetcher = new KlineFetcher('ETHUSDT', '4h', 3, { logger, client });
      const table = await fetcher.fetchAndNormalize();

      expect(table.rows.map((row) => row.openTime?.getTime())).toEqual([
        BASE_TS,
        BASE_TS + 4 * HOUR,
        BASE_TS + 8 * HOUR,
      ]);
    });

    it('propagates remote errors unchanged', async () => {
      interceptKlines('ETHUSDT', '4h', 3).reply(503, 'Service Unavailable');

      const fetcher = new KlineFetcher('ETHUSDT', '4h', 3, { logger, client });
      await expect(fetcher.fetchAndNormalize()).rejects.toBeInstanceOf(RemoteError);
    });
  });

  describe('close', () => {
    it('leaves an injected client open', async () => {
      const first = new KlineFetcher('BTCUSDT', '1h', 2, { logger, client });
      await first.close();

      interceptKlines('BTCUSDT', '1h', 2).reply(200, []);
      const second = new KlineFetcher('BTCUSDT', '1h', 2, { logger, client });
      expect(await second.fetchRaw()).toEqual([]);
    });
  });
});
