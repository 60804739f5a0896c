import { BinanceRestClient, KlineFetcher } from '@klinecheck/binance-client';
import { compareArtifacts, renderReport, type ReconciliationResult } from '@klinecheck/reconciliation';
import type { EnvConfig, KlineTable } from '@klinecheck/schemas';
import { writeKlineCsv, type Logger } from '@klinecheck/utils';
import type { CliCommand } from './args';

export interface CommandContext {
  logger: Logger;
  config: EnvConfig;
  /** Sink for report output (stdout in the CLI) */
  print: (line: string) => void;
  /** REST client override; built from config when omitted */
  client?: BinanceRestClient;
}

type FetchCommand = Extract<CliCommand, { command: 'fetch' }>;
type CompareCommand = Extract<CliCommand, { command: 'compare' }>;

/**
 * Fetch one batch of klines and optionally export it as canonical CSV
 */
export async function runFetch(args: FetchCommand, ctx: CommandContext): Promise<KlineTable> {
  const client =
    ctx.client ??
    new BinanceRestClient({
      baseUrl: ctx.config.BINANCE_BASE_URL,
      connectTimeoutMs: ctx.config.BINANCE_CONNECT_TIMEOUT_MS,
      readTimeoutMs: ctx.config.BINANCE_READ_TIMEOUT_MS,
      logger: ctx.logger,
    });

  try {
    const fetcher = new KlineFetcher(args.symbol, args.interval, args.limit, {
      logger: ctx.logger,
      client,
    });
    const table = await fetcher.fetchAndNormalize();

    if (args.out) {
      await writeKlineCsv(table, args.out);
      ctx.logger.info({ path: args.out, rows: table.rows.length }, 'Klines exported');
    }
    ctx.print(`Fetched ${table.rows.length} klines for ${fetcher.symbol} ${fetcher.interval}.`);
    return table;
  } finally {
    if (!ctx.client) {
      await client.close();
    }
  }
}

/**
 * Reconcile two artifacts and print the report
 */
export async function runCompare(
  args: CompareCommand,
  ctx: CommandContext
): Promise<ReconciliationResult> {
  const result = await compareArtifacts(args.referencePath, args.canonicalPath, args.dropLast, {
    logger: ctx.logger,
  });
  for (const line of renderReport(result, { dropLast: args.dropLast })) {
    ctx.print(line);
  }
  return result;
}
