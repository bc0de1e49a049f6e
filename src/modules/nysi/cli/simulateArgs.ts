/**
 * Argument parsing for scripts/simulate.ts
 */

import { isIsoDate } from '../data/seriesUtils';
import type { DateAlignment } from '../engine/simulateTrades';
import { MonitorError } from '../errors';
import type { DateRange, PriceType, Signal, Ticker } from '../types';

export interface SimulateArgs {
  help: boolean;
  indicator: Ticker;
  stock: Ticker;
  buySignal: Signal;
  months: number;
  priceType: PriceType;
  output?: string;
  alignment: DateAlignment;
  blacklist?: DateRange;
  warnings: string[];
}

export const SIMULATE_USAGE = `Usage: tsx scripts/simulate.ts [options]

Replay buy/sell decisions driven by an indicator's direction against a stock's prices.

Options:
  -i, --indicator <T>        Indicator symbol (default: $NYSI)
  -s, --stock <T>            Stock symbol (default: GGUS.AX)
  -b, --buy-signal <color>   Black (rising) or Red (declining) (default: Black)
  -m, --months <n>           Months of history (default: 12)
  -p, --price-type <type>    Open, High, Low or Close (default: Close)
  -o, --output <file>        JSON report path (default: generated name)
  --align <mode>             same-day or next-trading-day (default: next-trading-day)
  --blacklist-start <date>   First day (YYYY-MM-DD) on which no position is opened
  --blacklist-end <date>     Last blacklisted day; both ends are required
  -h, --help                 Show this message
`;

const BUY_SIGNALS: Record<string, Signal> = {
  black: 'Rising',
  rising: 'Rising',
  red: 'Declining',
  declining: 'Declining',
};

const PRICE_TYPES: readonly PriceType[] = ['Open', 'High', 'Low', 'Close'];

function requireValue(args: string[], i: number, flag: string): string {
  const value = args[i + 1];
  if (value === undefined || (value.startsWith('-') && value.length > 1 && !/^-\d/.test(value))) {
    throw new MonitorError(`Missing value for ${flag}`, 'INVALID_CONFIG');
  }
  return value;
}

function parseBuySignal(raw: string): Signal {
  const signal = BUY_SIGNALS[raw.toLowerCase()];
  if (!signal) {
    throw new MonitorError(`Invalid buy signal: ${raw}. Use Black or Red`, 'INVALID_CONFIG');
  }
  return signal;
}

function parsePriceType(raw: string): PriceType {
  const match = PRICE_TYPES.find((t) => t.toLowerCase() === raw.toLowerCase());
  if (!match) {
    throw new MonitorError(`Invalid price type: ${raw}. Use ${PRICE_TYPES.join(', ')}`, 'INVALID_CONFIG');
  }
  return match;
}

function parseDate(raw: string, flag: string): string {
  if (!isIsoDate(raw)) {
    throw new MonitorError(`Invalid date for ${flag}: ${raw}. Use YYYY-MM-DD`, 'INVALID_CONFIG');
  }
  return raw;
}

export function parseSimulateArgs(argv: string[]): SimulateArgs {
  const args: SimulateArgs = {
    help: false,
    indicator: '$NYSI',
    stock: 'GGUS.AX',
    buySignal: 'Rising',
    months: 12,
    priceType: 'Close',
    alignment: 'next-trading-day',
    warnings: [],
  };
  let blacklistStart: string | undefined;
  let blacklistEnd: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '-h':
      case '--help':
        args.help = true;
        break;
      case '-i':
      case '--indicator':
        args.indicator = requireValue(argv, i++, arg);
        break;
      case '-s':
      case '--stock':
        args.stock = requireValue(argv, i++, arg);
        break;
      case '-b':
      case '--buy-signal':
        args.buySignal = parseBuySignal(requireValue(argv, i++, arg));
        break;
      case '-m':
      case '--months': {
        const raw = requireValue(argv, i++, arg);
        const months = Number(raw);
        if (!Number.isInteger(months) || months <= 0) {
          throw new MonitorError(`Invalid months: ${raw}. Use a positive whole number`, 'INVALID_CONFIG');
        }
        args.months = months;
        break;
      }
      case '-p':
      case '--price-type':
        args.priceType = parsePriceType(requireValue(argv, i++, arg));
        break;
      case '-o':
      case '--output':
        args.output = requireValue(argv, i++, arg);
        break;
      case '--align': {
        const raw = requireValue(argv, i++, arg);
        if (raw !== 'same-day' && raw !== 'next-trading-day') {
          throw new MonitorError(`Invalid alignment: ${raw}. Use same-day or next-trading-day`, 'INVALID_CONFIG');
        }
        args.alignment = raw;
        break;
      }
      case '--blacklist-start':
        blacklistStart = parseDate(requireValue(argv, i++, arg), arg);
        break;
      case '--blacklist-end':
        blacklistEnd = parseDate(requireValue(argv, i++, arg), arg);
        break;
      default:
        throw new MonitorError(`Unknown option: ${arg}`, 'INVALID_CONFIG');
    }
  }

  if ((blacklistStart === undefined) !== (blacklistEnd === undefined)) {
    throw new MonitorError(
      '--blacklist-start and --blacklist-end must be given together',
      'INVALID_CONFIG'
    );
  }
  if (blacklistStart !== undefined && blacklistEnd !== undefined) {
    if (blacklistStart > blacklistEnd) {
      args.warnings.push(
        `Blacklist start ${blacklistStart} is after end ${blacklistEnd}; blacklist disabled`
      );
    } else {
      args.blacklist = { start: blacklistStart, end: blacklistEnd };
    }
  }

  return args;
}
