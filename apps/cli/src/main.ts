/**
 * klinecheck entry point
 *
 * Usage:
 *   npx tsx apps/cli/src/main.ts fetch BNBUSDT 4h --out candles.csv
 *   npx tsx apps/cli/src/main.ts compare reference.json candles.csv --drop-last
 */
import type { EnvConfig } from '@klinecheck/schemas';
import { createLogger, describeError, loadConfig, type Logger } from '@klinecheck/utils';
import { USAGE, parseArgs, type CliCommand } from './args';
import { runCompare, runFetch } from './commands';

const EXIT_FAILURE = 1;
const EXIT_USAGE = 2;

async function run(command: CliCommand, config: EnvConfig, logger: Logger): Promise<void> {
  const print = (line: string): void => console.log(line);

  switch (command.command) {
    case 'help':
      print(USAGE);
      return;
    case 'fetch':
      await runFetch(command, { logger, config, print });
      return;
    case 'compare':
      await runCompare(command, { logger, config, print });
      return;
  }
}

async function main(): Promise<number> {
  let command: CliCommand;
  try {
    command = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    return EXIT_USAGE;
  }

  let config: EnvConfig;
  try {
    config = loadConfig();
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    return EXIT_FAILURE;
  }

  const logger = createLogger({
    name: 'klinecheck',
    environment: config.NODE_ENV,
    enableFileLogging: config.LOG_FILE_ENABLED,
    logDir: config.LOG_DIR,
  });

  logger.debug({ command: command.command }, 'Start');
  try {
    await run(command, config, logger);
    logger.debug('Finish');
    return 0;
  } catch (error) {
    logger.error(describeError(error), 'Unhandled execution error');
    return EXIT_FAILURE;
  } finally {
    await logger.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error('Fatal error:', error);
    process.exitCode = EXIT_FAILURE;
  });
