/**
 * Signal source abstraction
 *
 * Both variants produce the same SignalReading:
 * - series: StockCharts text series + classifier rule
 * - chart-image: rendered chart + pixel analysis (legacy)
 */

import { DEFAULT_CHART_REGION, analyzeChart, chartSignal } from '../../engine/chartPixels';
import type { ChartRegion } from '../../engine/chartPixels';
import { DEFAULT_SIGNAL_RULE, classifySignal, signalSeries } from '../../engine/classifySignal';
import type { SignalRule } from '../../engine/classifySignal';
import type { Lookback, SignalHistoryEntry, SignalReading, Ticker } from '../../types';
import { keepLatest } from '../seriesUtils';
import { StockChartsSeriesSource } from './stockcharts';
import type { SeriesSource } from './stockcharts';
import { StockChartsImageFetcher } from './stockchartsImage';
import type { ChartImageFetcher } from './stockchartsImage';

export type SignalSourceVariant = 'series' | 'image';

export interface SignalSource {
  read(ticker: Ticker): Promise<SignalReading>;
}

export class SeriesSignalSource implements SignalSource {
  constructor(
    private readonly series: SeriesSource,
    private readonly lookback: Lookback,
    private readonly rule: SignalRule = DEFAULT_SIGNAL_RULE
  ) {}

  async read(ticker: Ticker): Promise<SignalReading> {
    const series = await this.series.fetch(ticker, this.lookback);
    const signal = classifySignal(series, this.rule);
    const latest = series.points[series.points.length - 1];
    return {
      ticker,
      signal,
      source: 'series',
      asOfDate: latest?.date,
      value: latest?.value,
      series,
    };
  }
}

export class ChartImageSignalSource implements SignalSource {
  constructor(
    private readonly fetcher: ChartImageFetcher,
    private readonly region: ChartRegion = DEFAULT_CHART_REGION
  ) {}

  async read(ticker: Ticker): Promise<SignalReading> {
    const raster = await this.fetcher.fetchChart(ticker);
    const analysis = analyzeChart(raster, this.region);
    return {
      ticker,
      signal: chartSignal(analysis, ticker),
      source: 'chart-image',
      crossing: analysis.crossing,
    };
  }
}

/**
 * Classified history of a reading's series, newest last, for seeding state on cold start
 */
export function readingBackfill(
  reading: SignalReading,
  limit: number,
  rule: SignalRule = DEFAULT_SIGNAL_RULE
): SignalHistoryEntry[] {
  if (!reading.series) return [];
  const signals = signalSeries(reading.series, rule);
  const entries: SignalHistoryEntry[] = [];
  reading.series.points.forEach((point, i) => {
    const signal = signals[i];
    if (signal) entries.push({ date: point.date, signal, value: point.value });
  });
  return keepLatest(entries, limit);
}

export interface SignalSourceConfig {
  variant: SignalSourceVariant;
  lookbackDays: number;
  rule: SignalRule;
  chartRegion: ChartRegion;
}

export function createSignalSource(config: SignalSourceConfig): SignalSource {
  if (config.variant === 'image') {
    return new ChartImageSignalSource(new StockChartsImageFetcher(), config.chartRegion);
  }
  return new SeriesSignalSource(
    new StockChartsSeriesSource(),
    { days: config.lookbackDays },
    config.rule
  );
}

export { StockChartsSeriesSource, parsePriceData, buildTextChartUrl, monthsToLookback } from './stockcharts';
export type { SeriesSource } from './stockcharts';
export { StockChartsImageFetcher, decodePng } from './stockchartsImage';
export type { ChartImageFetcher } from './stockchartsImage';
export { StooqPriceSource, parseStooqCsv, getDefaultStooqSymbol } from './stooq';
export type { PriceSource } from './stooq';
