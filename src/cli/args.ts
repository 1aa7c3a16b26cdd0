/**
 * Argument parsing for scripts/dcf_analyze.ts
 *
 * --tickers NVDA AAPL | --tickers=NVDA,AAPL   (required)
 * --source=alphavantage|file                  (default: MARKET_DATA_PROVIDER or alphavantage)
 * --data-dir=path                             (file source only)
 * --no-cache                                  (ignore cached payloads)
 * --json                                      (machine-readable output)
 */

import type { ProviderType } from '@/providers/types';

export interface CliArgs {
  tickers: string[];
  source: ProviderType | null;
  dataDir: string | null;
  useCache: boolean;
  json: boolean;
  help: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export const USAGE = `Usage: npm run dcf -- --tickers NVDA AAPL [--source=alphavantage|file] [--data-dir=path] [--no-cache] [--json]`;

const SOURCES: readonly ProviderType[] = ['alphavantage', 'file'];

function parseSource(value: string | undefined): ProviderType {
  const source = SOURCES.find((candidate) => candidate === value?.trim().toLowerCase());
  if (!source) {
    throw new CliUsageError(`Unknown --source "${value ?? ''}" (expected ${SOURCES.join(' | ')})`);
  }
  return source;
}

function splitTickers(value: string): string[] {
  return value
    .split(',')
    .map((t) => t.trim().toUpperCase())
    .filter(Boolean);
}

export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = {
    tickers: [],
    source: null,
    dataDir: null,
    useCache: true,
    json: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const [flag, inlineValue] = arg.includes('=')
      ? [arg.slice(0, arg.indexOf('=')), arg.slice(arg.indexOf('=') + 1)]
      : [arg, undefined];

    const takeValue = (): string => {
      if (inlineValue !== undefined) return inlineValue;
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new CliUsageError(`${flag} requires a value`);
      }
      i++;
      return next;
    };

    switch (flag) {
      case '--tickers':
        if (inlineValue !== undefined) {
          args.tickers.push(...splitTickers(inlineValue));
        } else {
          while (argv[i + 1] !== undefined && !argv[i + 1].startsWith('--')) {
            args.tickers.push(...splitTickers(argv[++i]));
          }
        }
        break;
      case '--source':
        args.source = parseSource(takeValue());
        break;
      case '--data-dir':
        args.dataDir = takeValue();
        break;
      case '--no-cache':
        args.useCache = false;
        break;
      case '--json':
        args.json = true;
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
      default:
        throw new CliUsageError(`Unknown argument: ${arg}`);
    }
  }

  args.tickers = [...new Set(args.tickers)];
  if (!args.help && args.tickers.length === 0) {
    throw new CliUsageError('At least one ticker is required (--tickers)');
  }
  return args;
}
