import { MAX_KLINE_LIMIT } from '@klinecheck/schemas';
import { InvalidArgumentError } from '@klinecheck/utils';

export const USAGE = `Usage:
  klinecheck fetch <SYMBOL> <INTERVAL> [--limit N] [--out file.csv]
  klinecheck compare <reference.json> <canonical.csv> [--drop-last]

Options:
  --limit N      Klines to request (default ${MAX_KLINE_LIMIT}, values above ${MAX_KLINE_LIMIT} are clamped)
  --out FILE     Write the normalized klines as canonical CSV
  --drop-last    Ignore the latest row of both artifacts (for sources that end
                 with a still-open candle)`;

export type CliCommand =
  | { command: 'help' }
  | { command: 'fetch'; symbol: string; interval: string; limit: number; out?: string }
  | { command: 'compare'; referencePath: string; canonicalPath: string; dropLast: boolean };

/**
 * Split argv into positionals and --flags. Flags listed in `valued` take the next argument.
 */
function splitArgs(
  args: string[],
  valued: readonly string[],
  switches: readonly string[]
): { positionals: string[]; values: Map<string, string>; enabled: Set<string> } {
  const positionals: string[] = [];
  const values = new Map<string, string>();
  const enabled = new Set<string>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith('--')) {
      positionals.push(arg);
    } else if (valued.includes(arg)) {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new InvalidArgumentError(`${arg} requires a value`);
      }
      values.set(arg, value);
      i++;
    } else if (switches.includes(arg)) {
      enabled.add(arg);
    } else {
      throw new InvalidArgumentError(`Unknown option: ${arg}`);
    }
  }

  return { positionals, values, enabled };
}

/**
 * Parse command-line arguments (without the node and script entries)
 *
 * @throws InvalidArgumentError on an unknown command, option or arity
 */
export function parseArgs(argv: string[]): CliCommand {
  const [command, ...rest] = argv;

  if (command === undefined || command === 'help' || command === '--help' || command === '-h') {
    return { command: 'help' };
  }

  if (command === 'fetch') {
    const { positionals, values } = splitArgs(rest, ['--limit', '--out'], []);
    if (positionals.length !== 2) {
      throw new InvalidArgumentError('fetch expects <SYMBOL> <INTERVAL>');
    }
    const [symbol, interval] = positionals;
    const limitText = values.get('--limit');
    return {
      command: 'fetch',
      symbol,
      interval,
      limit: limitText === undefined ? MAX_KLINE_LIMIT : Number(limitText),
      out: values.get('--out'),
    };
  }

  if (command === 'compare') {
    const { positionals, enabled } = splitArgs(rest, [], ['--drop-last']);
    if (positionals.length !== 2) {
      throw new InvalidArgumentError('compare expects <reference.json> <canonical.csv>');
    }
    const [referencePath, canonicalPath] = positionals;
    return { command: 'compare', referencePath, canonicalPath, dropLast: enabled.has('--drop-last') };
  }

  throw new InvalidArgumentError(`Unknown command: ${command}`);
}
