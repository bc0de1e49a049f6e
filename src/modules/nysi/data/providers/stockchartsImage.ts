/**
 * StockCharts chart-image provider (legacy)
 *
 * Downloads the rendered PNG chart and hands the decoded pixels to the
 * chart pixel analysis. Each request carries a fresh random chart id and
 * timestamp so the service never serves a cached image.
 */

import { PNG } from 'pngjs';
import { MonitorError, toError } from '../../errors';
import type { Ticker } from '../../types';
import type { RgbaRaster } from '../../engine/chartPixels';
import { fetchBytes } from './http';
import type { FetchLike } from './http';

const STOCKCHARTS_BASE = 'https://stockcharts.com/c-sc/sc';

export interface ChartImageFetcher {
  fetchChart(ticker: Ticker): Promise<RgbaRaster>;
}

export function buildImageChartUrl(ticker: Ticker, now: Date = new Date()): string {
  const randomId = Math.floor(1_000_000_000 + Math.random() * 9_000_000_000);
  const params = new URLSearchParams({
    s: ticker,
    p: 'D',
    yr: '1',
    mn: '0',
    dy: '0',
    i: `t${randomId}c`,
    r: String(now.getTime()),
  });
  return `${STOCKCHARTS_BASE}?${params.toString()}`;
}

export function decodePng(buffer: Buffer, ticker: Ticker): RgbaRaster {
  try {
    const png = PNG.sync.read(buffer);
    return { width: png.width, height: png.height, data: png.data };
  } catch (error) {
    throw new MonitorError(
      `Chart for ${ticker} is not a readable PNG`,
      'SOURCE_UNAVAILABLE',
      ticker,
      toError(error)
    );
  }
}

export class StockChartsImageFetcher implements ChartImageFetcher {
  constructor(private readonly fetchImpl: FetchLike = fetch) {}

  async fetchChart(ticker: Ticker): Promise<RgbaRaster> {
    const url = buildImageChartUrl(ticker);
    const { res, body: buffer } = await fetchBytes(url, ticker, this.fetchImpl);

    const contentType = res.headers.get('content-type') ?? '';
    if (!contentType.startsWith('image/')) {
      throw new MonitorError(
        `Expected an image for ${ticker}, got content-type "${contentType}" URL: ${url}`,
        'SOURCE_UNAVAILABLE',
        ticker
      );
    }

    if (buffer.length === 0) {
      throw new MonitorError(`Empty chart image for ${ticker}`, 'EMPTY_SERIES', ticker);
    }
    return decodePng(buffer, ticker);
  }
}
