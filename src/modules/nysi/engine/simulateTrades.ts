/**
 * Trade simulation engine
 *
 * Merges an indicator series with a price series by date and replays a
 * single-position strategy: buy when the indicator turns to the buy signal,
 * sell when it turns away. Pure function - no network, no filesystem.
 */

import { addDays } from '../data/seriesUtils';
import type { DateRange, IsoDate, PricePoint, Series, Signal, SimulatedTrade } from '../types';
import { DEFAULT_SIGNAL_RULE, signalSeries } from './classifySignal';
import type { SignalRule } from './classifySignal';

/**
 * same-day: inner join on date
 * next-trading-day: price on the first date 1..maxDaysAhead calendar days after
 *   the indicator date (the indicator is published after the US close)
 */
export type DateAlignment = 'same-day' | 'next-trading-day';

export interface SimulationOptions {
  buySignal: Signal;
  rule?: SignalRule;
  alignment?: DateAlignment;
  maxDaysAhead?: number;
  blacklist?: DateRange; // inclusive, compared to the price date; suppresses entries only
}

export interface MergedRow {
  indicatorDate: IsoDate;
  value: number;
  signal?: Signal;
  priceDate: IsoDate;
  price: number;
  blacklisted: boolean;
}

export interface SimulationResult {
  rows: MergedRow[];
  unmatchedDates: number;
  trades: Iterable<SimulatedTrade>;
}

const DEFAULT_MAX_DAYS_AHEAD = 7;

function isBlacklisted(date: IsoDate, blacklist?: DateRange): boolean {
  return blacklist !== undefined && date >= blacklist.start && date <= blacklist.end;
}

function round2(x: number): number {
  return Math.round(x * 100) / 100;
}

/**
 * Join the classified indicator with prices. Dates present on only one side
 * are dropped and counted.
 *
 * @param indicator Indicator series, classified point by point
 * @param prices Daily prices of the traded stock
 * @param options Alignment, rule and next-trading-day reach
 * @returns Merged rows in date order and the number of unmatched dates
 */
export function mergeSeries(
  indicator: Series,
  prices: PricePoint[],
  options: SimulationOptions
): { rows: MergedRow[]; unmatchedDates: number } {
  const alignment = options.alignment ?? 'same-day';
  const maxDaysAhead = options.maxDaysAhead ?? DEFAULT_MAX_DAYS_AHEAD;
  const signals = signalSeries(indicator, options.rule ?? DEFAULT_SIGNAL_RULE);

  const priceByDate = new Map<IsoDate, number>();
  for (const p of prices) {
    priceByDate.set(p.date, p.price);
  }

  const usedPriceDates = new Set<IsoDate>();
  const rows: MergedRow[] = [];
  let unmatchedIndicator = 0;

  indicator.points.forEach((point, i) => {
    let priceDate: IsoDate | undefined;
    if (alignment === 'same-day') {
      priceDate = priceByDate.has(point.date) ? point.date : undefined;
    } else {
      for (let ahead = 1; ahead <= maxDaysAhead; ahead++) {
        const candidate = addDays(point.date, ahead);
        if (priceByDate.has(candidate)) {
          priceDate = candidate;
          break;
        }
      }
    }

    const price = priceDate === undefined ? undefined : priceByDate.get(priceDate);
    if (priceDate === undefined || price === undefined) {
      unmatchedIndicator++;
      return;
    }

    usedPriceDates.add(priceDate);
    const row: MergedRow = {
      indicatorDate: point.date,
      value: point.value,
      priceDate,
      price,
      blacklisted: isBlacklisted(priceDate, options.blacklist),
    };
    const signal = signals[i];
    if (signal) {
      row.signal = signal;
    }
    rows.push(row);
  });

  const unmatchedPrices = [...priceByDate.keys()].filter((d) => !usedPriceDates.has(d)).length;

  return { rows, unmatchedDates: unmatchedIndicator + unmatchedPrices };
}

function closeTrade(
  entry: MergedRow,
  buySignal: Signal,
  exit: MergedRow,
  open: boolean
): SimulatedTrade {
  return {
    entryDate: entry.priceDate,
    entrySignal: buySignal,
    entryPrice: entry.price,
    exitDate: exit.priceDate,
    exitPrice: exit.price,
    returnPct: round2(((exit.price - entry.price) / entry.price) * 100),
    open,
  };
}

/**
 * Walk the merged rows once, emitting a trade per completed position.
 * A position still held after the last row is closed at that row's price.
 */
export function* walkTrades(rows: MergedRow[], buySignal: Signal): Generator<SimulatedTrade> {
  let entry: MergedRow | undefined;
  let previous: Signal | undefined;

  for (const row of rows) {
    const current = row.signal;

    if (entry) {
      if (current !== undefined && current !== buySignal) {
        yield closeTrade(entry, buySignal, row, false);
        entry = undefined;
      }
    } else if (
      previous !== undefined &&
      previous !== buySignal &&
      current === buySignal &&
      !row.blacklisted
    ) {
      entry = row;
    }

    previous = current;
  }

  const last = rows[rows.length - 1];
  if (entry && last) {
    yield closeTrade(entry, buySignal, last, true);
  }
}

/**
 * Run the buy/sell rule over an indicator and a stock's prices
 *
 * @param indicator Indicator series
 * @param prices Daily prices of the traded stock
 * @param options Buy signal, alignment and optional blacklist
 * @returns Merged rows plus every trade, the last one possibly still open
 */
export function simulateTrades(
  indicator: Series,
  prices: PricePoint[],
  options: SimulationOptions
): SimulationResult {
  const { rows, unmatchedDates } = mergeSeries(indicator, prices, options);
  return {
    rows,
    unmatchedDates,
    trades: {
      [Symbol.iterator]: () => walkTrades(rows, options.buySignal),
    },
  };
}
