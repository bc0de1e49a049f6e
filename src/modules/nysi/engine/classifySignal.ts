/**
 * Signal classification engine
 *
 * Pure functions that turn a numeric series into a trend Signal.
 * No network, no filesystem - pure logic.
 */

import { MonitorError } from '../errors';
import type { Series, Signal } from '../types';

/**
 * Classification rules:
 * - last-change: latest value vs the previous one; on a tie, walk back to the
 *   most recent pair of adjacent values that differ
 * - lookback: latest value vs the value `points` back; a tie falls back to last-change
 */
export type SignalRule = { kind: 'last-change' } | { kind: 'lookback'; points: number };

export const DEFAULT_SIGNAL_RULE: SignalRule = { kind: 'last-change' };

export function minimumPoints(rule: SignalRule): number {
  return rule.kind === 'lookback' ? rule.points + 1 : 2;
}

export function formatRule(rule: SignalRule): string {
  return rule.kind === 'lookback' ? `lookback:${rule.points}` : 'last-change';
}

/**
 * Parse a rule from its textual form ("last-change", "lookback:3")
 */
export function parseSignalRule(raw: string): SignalRule {
  const value = raw.trim().toLowerCase();
  if (value === 'last-change') {
    return { kind: 'last-change' };
  }
  const match = /^lookback:(\d+)$/.exec(value);
  if (match) {
    const points = parseInt(match[1] ?? '', 10);
    if (points >= 1) {
      return { kind: 'lookback', points };
    }
  }
  throw new MonitorError(
    `Invalid signal rule "${raw}". Use "last-change" or "lookback:N" (N >= 1)`,
    'INVALID_CONFIG'
  );
}

function direction(current: number, previous: number): Signal | undefined {
  if (current > previous) return 'Rising';
  if (current < previous) return 'Declining';
  return undefined;
}

function lastChangeAt(values: number[], index: number): Signal | undefined {
  for (let i = index; i >= 1; i--) {
    const signal = direction(values[i] ?? NaN, values[i - 1] ?? NaN);
    if (signal) return signal;
  }
  return undefined;
}

/**
 * Signal at `index` using only values[0..index]; undefined when the prefix
 * is too short or carries no direction.
 */
function classifyAt(values: number[], index: number, rule: SignalRule): Signal | undefined {
  if (index + 1 < minimumPoints(rule)) {
    return undefined;
  }
  if (rule.kind === 'lookback') {
    const signal = direction(values[index] ?? NaN, values[index - rule.points] ?? NaN);
    return signal ?? lastChangeAt(values, index);
  }
  return lastChangeAt(values, index);
}

/**
 * Classify the series at its most recent point.
 *
 * @throws MonitorError INSUFFICIENT_DATA when the series is shorter than the
 *   rule requires or is flat
 */
export function classifySignal(series: Series, rule: SignalRule = DEFAULT_SIGNAL_RULE): Signal {
  const values = series.points.map((p) => p.value);
  const required = minimumPoints(rule);

  if (values.length < required) {
    throw new MonitorError(
      `Need at least ${required} points for ${formatRule(rule)}, got ${values.length}`,
      'INSUFFICIENT_DATA',
      series.ticker
    );
  }

  const signal = classifyAt(values, values.length - 1, rule);
  if (!signal) {
    throw new MonitorError(
      `Series for ${series.ticker} is flat; no direction to classify`,
      'INSUFFICIENT_DATA',
      series.ticker
    );
  }
  return signal;
}

/**
 * Signal at every point of the series, each computed from the prefix ending
 * there with the same rule classifySignal uses.
 */
export function signalSeries(
  series: Series,
  rule: SignalRule = DEFAULT_SIGNAL_RULE
): (Signal | undefined)[] {
  const values = series.points.map((p) => p.value);
  return values.map((_, i) => classifyAt(values, i, rule));
}
