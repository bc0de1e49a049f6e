/**
 * Chart pixel analysis
 *
 * Legacy signal derivation straight from a rendered chart: every column of the
 * analysis region is labelled red, black or unknown by counting pixels in
 * HSV space, and the rightmost labelled column gives the current Signal.
 * Pure function over a decoded RGBA raster.
 */

import { MonitorError } from '../errors';
import type { LineCrossing, Signal } from '../types';

export interface RgbaRaster {
  width: number;
  height: number;
  data: Uint8Array; // RGBA, row-major, 4 bytes per pixel
}

export interface ChartRegion {
  startX: number;
  endX: number;
  startY: number;
  endY: number;
}

export type ColumnColor = 'red' | 'black' | 'unknown';

export interface ChartAnalysis {
  columns: ColumnColor[];
  crossing: LineCrossing;
  rightmost: ColumnColor;
  transitions: { redToBlack: number[]; blackToRed: number[] };
}

export const DEFAULT_CHART_REGION: ChartRegion = {
  startX: 620,
  endX: 650,
  startY: 125,
  endY: 403,
};

// OpenCV-style HSV: H 0-180, S and V 0-255
interface Hsv {
  h: number;
  s: number;
  v: number;
}

export function rgbToHsv(r: number, g: number, b: number): Hsv {
  const v = Math.max(r, g, b);
  const min = Math.min(r, g, b);
  const diff = v - min;
  const s = v === 0 ? 0 : (255 * diff) / v;

  let h = 0;
  if (diff !== 0) {
    if (v === r) {
      h = (60 * (g - b)) / diff;
    } else if (v === g) {
      h = 120 + (60 * (b - r)) / diff;
    } else {
      h = 240 + (60 * (r - g)) / diff;
    }
    if (h < 0) h += 360;
  }

  return { h: h / 2, s, v };
}

function isRed({ h, s, v }: Hsv): boolean {
  return (h <= 15 || h >= 165) && s >= 30 && v >= 30;
}

function isBlack({ s, v }: Hsv): boolean {
  return s <= 150 && v <= 100;
}

/**
 * Clamp the region to the raster; every side keeps at least one pixel.
 */
export function clampRegion(raster: RgbaRaster, region: ChartRegion): ChartRegion {
  const startX = Math.max(0, Math.min(region.startX, raster.width - 1));
  const endX = Math.max(startX + 1, Math.min(region.endX, raster.width));
  const startY = Math.max(0, Math.min(region.startY, raster.height - 1));
  const endY = Math.max(startY + 1, Math.min(region.endY, raster.height));
  return { startX, endX, startY, endY };
}

/**
 * Label each column of the region and summarise the colour transitions.
 *
 * Only the middle half of the region's rows is sampled. One red pixel per
 * column is discounted: the chart draws a fixed red reference line through
 * every column.
 */
export function analyzeChart(
  raster: RgbaRaster,
  region: ChartRegion = DEFAULT_CHART_REGION
): ChartAnalysis {
  const { startX, endX, startY, endY } = clampRegion(raster, region);
  const height = endY - startY;
  const top = startY + Math.floor(height / 4);
  const bottom = startY + Math.floor((3 * height) / 4);

  const columns: ColumnColor[] = [];
  for (let x = startX; x < endX; x++) {
    let red = 0;
    let black = 0;
    for (let y = top; y < bottom; y++) {
      const offset = (y * raster.width + x) * 4;
      const hsv = rgbToHsv(
        raster.data[offset] ?? 0,
        raster.data[offset + 1] ?? 0,
        raster.data[offset + 2] ?? 0
      );
      if (isRed(hsv)) red++;
      if (isBlack(hsv)) black++;
    }

    const adjustedRed = Math.max(0, red - 1);
    if (adjustedRed > 0 && adjustedRed >= black) {
      columns.push('red');
    } else if (black > 0 && black >= adjustedRed) {
      columns.push('black');
    } else {
      columns.push('unknown');
    }
  }

  const redToBlack: number[] = [];
  const blackToRed: number[] = [];
  for (let i = 1; i < columns.length; i++) {
    if (columns[i - 1] === 'red' && columns[i] === 'black') redToBlack.push(i);
    if (columns[i - 1] === 'black' && columns[i] === 'red') blackToRed.push(i);
  }

  let crossing: LineCrossing = 'no_crossing';
  if (redToBlack.length > blackToRed.length) {
    crossing = 'red_to_black';
  } else if (blackToRed.length > redToBlack.length) {
    crossing = 'black_to_red';
  }

  const rightmost = [...columns].reverse().find((c) => c !== 'unknown') ?? 'unknown';

  return { columns, crossing, rightmost, transitions: { redToBlack, blackToRed } };
}

/**
 * Signal drawn at the right edge of an analysed chart.
 *
 * @param analysis Result of {@link analyzeChart}
 * @param ticker Symbol named in the error
 * @returns Rising for a black edge, Declining for a red one
 * @throws MonitorError INSUFFICIENT_DATA when no column is red or black
 */
export function chartSignal(analysis: ChartAnalysis, ticker?: string): Signal {
  if (analysis.rightmost === 'black') return 'Rising';
  if (analysis.rightmost === 'red') return 'Declining';
  throw new MonitorError(
    'No red or black line found in the chart region',
    'INSUFFICIENT_DATA',
    ticker
  );
}

export function classifyChart(
  raster: RgbaRaster,
  region: ChartRegion = DEFAULT_CHART_REGION,
  ticker?: string
): Signal {
  return chartSignal(analyzeChart(raster, region), ticker);
}

/**
 * Parse "startX,endX,startY,endY"
 */
export function parseChartRegion(raw: string): ChartRegion {
  const parts = raw.split(',').map((p) => parseInt(p.trim(), 10));
  const [startX, endX, startY, endY] = parts;
  if (
    parts.length !== 4 ||
    startX === undefined ||
    endX === undefined ||
    startY === undefined ||
    endY === undefined ||
    parts.some((p) => !Number.isFinite(p) || p < 0) ||
    endX <= startX ||
    endY <= startY
  ) {
    throw new MonitorError(
      `Invalid chart region "${raw}". Use startX,endX,startY,endY`,
      'INVALID_CONFIG'
    );
  }
  return { startX, endX, startY, endY };
}
