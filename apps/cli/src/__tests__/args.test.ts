import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from '@klinecheck/utils';
import { parseArgs } from '../args';

describe('parseArgs', () => {
  it('defaults to help', () => {
    expect(parseArgs([])).toEqual({ command: 'help' });
    expect(parseArgs(['--help'])).toEqual({ command: 'help' });
  });

  it('parses fetch with defaults', () => {
    expect(parseArgs(['fetch', 'BNBUSDT', '4h'])).toEqual({
      command: 'fetch',
      symbol: 'BNBUSDT',
      interval: '4h',
      limit: 1000,
      out: undefined,
    });
  });

  it('parses fetch options in any position', () => {
    expect(parseArgs(['fetch', '--limit', '250', 'ethusdt', '--out', 'eth.csv', '1d'])).toEqual({
      command: 'fetch',
      symbol: 'ethusdt',
      interval: '1d',
      limit: 250,
      out: 'eth.csv',
    });
  });

  it('leaves limit validation to the fetcher', () => {
    const command = parseArgs(['fetch', 'BNBUSDT', '4h', '--limit', 'lots']);
    expect(command.command === 'fetch' && Number.isNaN(command.limit)).toBe(true);
  });

  it('parses compare', () => {
    expect(parseArgs(['compare', 'ref.json', 'out.csv'])).toEqual({
      command: 'compare',
      referencePath: 'ref.json',
      canonicalPath: 'out.csv',
      dropLast: false,
    });
    expect(parseArgs(['compare', '--drop-last', 'ref.json', 'out.csv'])).toMatchObject({ dropLast: true });
  });

  it('rejects bad usage', () => {
    expect(() => parseArgs(['sync'])).toThrow(new InvalidArgumentError('Unknown command: sync'));
    expect(() => parseArgs(['fetch', 'BNBUSDT'])).toThrow('fetch expects <SYMBOL> <INTERVAL>');
    expect(() => parseArgs(['fetch', 'BNBUSDT', '4h', '--limit'])).toThrow('--limit requires a value');
    expect(() => parseArgs(['compare', 'a.json', 'b.csv', '--limit', '5'])).toThrow('Unknown option: --limit');
    expect(() => parseArgs(['compare', 'a.json'])).toThrow(
      'compare expects <reference.json> <canonical.csv>'
    );
  });
});
