/**
 * StockCharts series provider
 *
 * Reads the chart service's text rendering (img=text&inspector=yes), whose
 * <pricedata> section holds one "|"-separated row per bar:
 *   "83 202509180930 202509181600 631.29 0|218 202509190930 202509191600 620.74 0"
 * Column 1 is the bar start (YYYYMMDDhhmm), column 3 the value.
 */

import { MonitorError } from '../../errors';
import type { Lookback, ObservationPoint, Series, Ticker } from '../../types';
import { isIsoDate, mergeByDate } from '../seriesUtils';
import { fetchText, summarizeResponse } from './http';
import type { FetchLike } from './http';

const STOCKCHARTS_BASE = 'https://stockcharts.com/c-sc/sc';
const TEXT_CHART_ID = 't3757734781c';

export interface SeriesSource {
  fetch(ticker: Ticker, lookback: Lookback): Promise<Series>;
}

export function buildTextChartUrl(ticker: Ticker, lookback: Lookback): string {
  const params = new URLSearchParams({
    s: ticker,
    p: 'D',
    yr: String(lookback.years ?? 0),
    mn: String(lookback.months ?? 0),
    dy: String(lookback.days ?? 0),
    i: TEXT_CHART_ID,
    img: 'text',
    inspector: 'yes',
  });
  return `${STOCKCHARTS_BASE}?${params.toString()}`;
}

/**
 * Split a month count the way the chart service expects (yr + mn)
 */
export function monthsToLookback(months: number): Lookback {
  return { years: Math.floor(months / 12), months: months % 12 };
}

function parseRow(row: string): ObservationPoint | null {
  const cols = row.trim().split(/\s+/);
  if (cols.length < 4) return null;

  const stamp = cols[1] ?? '';
  if (!/^\d{8}/.test(stamp)) return null;
  const date = `${stamp.slice(0, 4)}-${stamp.slice(4, 6)}-${stamp.slice(6, 8)}`;
  if (!isIsoDate(date)) return null;

  const value = parseFloat(cols[3] ?? '');
  if (!Number.isFinite(value)) return null;

  return { date, value };
}

/**
 * Parse the <pricedata> section; returns null when the section is missing.
 * A missing closing tag takes everything to the end of the text.
 */
export function parsePriceData(text: string): ObservationPoint[] | null {
  const open = text.indexOf('<pricedata>');
  if (open < 0) return null;

  const start = open + '<pricedata>'.length;
  const end = text.indexOf('</pricedata>', start);
  const section = end < 0 ? text.slice(start) : text.slice(start, end);

  const points: ObservationPoint[] = [];
  for (const row of section.split('|')) {
    const point = parseRow(row);
    if (point) points.push(point);
  }
  return mergeByDate((p: ObservationPoint) => p.date, points);
}

export class StockChartsSeriesSource implements SeriesSource {
  constructor(private readonly fetchImpl: FetchLike = fetch) {}

  async fetch(ticker: Ticker, lookback: Lookback): Promise<Series> {
    const url = buildTextChartUrl(ticker, lookback);
    const { res, body: text } = await fetchText(url, ticker, this.fetchImpl);

    const points = parsePriceData(text);
    if (points === null) {
      throw new MonitorError(
        `No <pricedata> section for ${ticker}. ${summarizeResponse(res, text)} URL: ${url}`,
        'SOURCE_UNAVAILABLE',
        ticker
      );
    }
    if (points.length === 0) {
      throw new MonitorError(`StockCharts returned 0 points for ${ticker}`, 'EMPTY_SERIES', ticker);
    }

    return { ticker, points };
  }
}
