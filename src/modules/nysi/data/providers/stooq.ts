/**
 * Stooq daily price provider
 *
 * Fetches daily OHLC bars from the Stooq CSV API for the trade simulator.
 *
 * Symbol mapping: plain US tickers get the .us suffix (GDX -> gdx.us),
 * underscores become dots (BRK_B -> brk.b.us), tickers that already carry an
 * exchange suffix are lower-cased as they are (GGUS.AX -> ggus.ax).
 *
 * Env vars:
 * - STOOQ_SYMBOL_OVERRIDES: TICKER=symbol or TICKER=s1|s2|s3 (tried in order)
 */

import { MonitorError, isMonitorError, toError } from '../../errors';
import type { IsoDate, PricePoint, PriceType, Ticker } from '../../types';
import { mergeByDate } from '../seriesUtils';
import { fetchText, isHtmlResponse, summarizeResponse } from './http';
import type { FetchLike } from './http';

const STOOQ_BASE = 'https://stooq.com/q/d/l/';

export function getDefaultStooqSymbol(ticker: Ticker): string {
  const base = ticker.toLowerCase().replace(/_/g, '.');
  return ticker.includes('.') ? base : `${base}.us`;
}

export function parseSymbolOverrides(raw: string): Map<string, string[]> {
  const map = new Map<string, string[]>();
  for (const pair of raw.split(',')) {
    const eq = pair.indexOf('=');
    if (eq < 0) continue;
    const ticker = pair.slice(0, eq).trim().toUpperCase();
    const candidates = pair
      .slice(eq + 1)
      .split('|')
      .map((s) => s.trim())
      .filter(Boolean);
    if (ticker && candidates.length > 0) map.set(ticker, candidates);
  }
  return map;
}

function toYyyyMmDd(date: IsoDate): string {
  return date.replace(/-/g, '');
}

/**
 * Parse a Stooq CSV body into price points for one column
 *
 * @param text CSV body with a header row
 * @param priceType Column to read
 * @returns Points sorted by date, or null when the header lacks Date or the column
 */
export function parseStooqCsv(text: string, priceType: PriceType): PricePoint[] | null {
  const lines = text
    .trim()
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter(Boolean);
  const header = lines[0];
  if (!header) return null;

  const cols = header.toLowerCase().split(',').map((c) => c.trim());
  const dateIdx = cols.indexOf('date');
  const priceIdx = cols.indexOf(priceType.toLowerCase());
  if (dateIdx < 0 || priceIdx < 0) return null;

  const points: PricePoint[] = [];
  for (const line of lines.slice(1)) {
    const parts = line.split(',');
    const date = parts[dateIdx]?.trim();
    const price = parseFloat(parts[priceIdx]?.trim() ?? '');
    if (!date || !Number.isFinite(price)) continue;
    points.push({ date, price });
  }
  return mergeByDate((p: PricePoint) => p.date, points);
}

export interface PriceSource {
  fetchPrices(ticker: Ticker, startDate: IsoDate, endDate: IsoDate, priceType: PriceType): Promise<PricePoint[]>;
}

export class StooqPriceSource implements PriceSource {
  private readonly overrides: Map<string, string[]>;

  constructor(
    overrides: string = process.env.STOOQ_SYMBOL_OVERRIDES ?? '',
    private readonly fetchImpl: FetchLike = fetch
  ) {
    this.overrides = parseSymbolOverrides(overrides);
  }

  symbolCandidates(ticker: Ticker): string[] {
    return this.overrides.get(ticker.toUpperCase()) ?? [getDefaultStooqSymbol(ticker)];
  }

  private async fetchSymbol(
    ticker: Ticker,
    symbol: string,
    startDate: IsoDate,
    endDate: IsoDate,
    priceType: PriceType
  ): Promise<PricePoint[]> {
    const url = `${STOOQ_BASE}?s=${encodeURIComponent(symbol)}&d1=${toYyyyMmDd(startDate)}&d2=${toYyyyMmDd(endDate)}&i=d`;
    const { res, body: text } = await fetchText(url, ticker, this.fetchImpl);

    if (isHtmlResponse(text)) {
      throw new MonitorError(
        `Stooq returned HTML for ${ticker} (${symbol}). ${summarizeResponse(res, text)}`,
        'SOURCE_UNAVAILABLE',
        ticker
      );
    }
    if (!text.trim() || text.toLowerCase().includes('no data')) {
      throw new MonitorError(`Stooq returned no data for ${ticker} (${symbol})`, 'EMPTY_SERIES', ticker);
    }

    const points = parseStooqCsv(text, priceType);
    if (points === null) {
      throw new MonitorError(
        `Stooq CSV for ${ticker} (${symbol}) lacks Date or ${priceType}. ${summarizeResponse(res, text)}`,
        'SOURCE_UNAVAILABLE',
        ticker
      );
    }
    if (points.length === 0) {
      throw new MonitorError(`Stooq parsed 0 bars for ${ticker} (${symbol})`, 'EMPTY_SERIES', ticker);
    }
    return points;
  }

  /**
   * Try each symbol candidate in order; first success wins.
   */
  async fetchPrices(
    ticker: Ticker,
    startDate: IsoDate,
    endDate: IsoDate,
    priceType: PriceType
  ): Promise<PricePoint[]> {
    let lastError: unknown = null;
    for (const symbol of this.symbolCandidates(ticker)) {
      try {
        return await this.fetchSymbol(ticker, symbol, startDate, endDate, priceType);
      } catch (err) {
        lastError = err;
      }
    }
    if (isMonitorError(lastError)) throw lastError;
    throw new MonitorError(
      `All Stooq candidates failed for ${ticker}`,
      'SOURCE_UNAVAILABLE',
      ticker,
      lastError === null ? undefined : toError(lastError)
    );
  }
}
