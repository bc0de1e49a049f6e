/**
 * Time series helpers
 *
 * Merging and trimming of date-keyed points, shared by the providers and the
 * state history.
 */

import type { IsoDate } from '../types';

/**
 * Merge points by date key, deduplicating and keeping the latest
 *
 * @param dateKey Function to extract the date from a point
 * @param groups Point arrays; later groups win on conflict
 * @returns Merged array sorted by date ascending
 */
export function mergeByDate<T>(dateKey: (point: T) => IsoDate, ...groups: T[][]): T[] {
  const byDate = new Map<IsoDate, T>();
  for (const group of groups) {
    for (const point of group) {
      byDate.set(dateKey(point), point);
    }
  }
  return Array.from(byDate.values()).sort((a, b) => dateKey(a).localeCompare(dateKey(b)));
}

/**
 * Keep the most recent points of an ascending series
 *
 * @param points Points sorted by date ascending
 * @param count Number of points to keep (0 or less keeps none)
 * @returns The trailing `count` points
 */
export function keepLatest<T>(points: T[], count: number): T[] {
  if (count <= 0) return [];
  return points.length > count ? points.slice(points.length - count) : points;
}

/**
 * Shift an ISO date by whole calendar days
 */
export function addDays(date: IsoDate, days: number): IsoDate {
  const d = new Date(`${date}T00:00:00Z`);
  d.setUTCDate(d.getUTCDate() + days);
  return d.toISOString().split('T')[0] ?? date;
}

export function isIsoDate(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return false;
  const d = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(d.getTime()) && d.toISOString().startsWith(value);
}

export function maxDate(a: IsoDate, b: IsoDate): IsoDate {
  return a >= b ? a : b;
}
