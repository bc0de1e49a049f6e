/**
 * Check cycle
 *
 * One fetch -> classify -> detect -> persist -> notify pass for one ticker.
 * The detector saves state before the notifier runs; a delivery failure is
 * logged for follow-up and never rolls the state back, so a restart does not
 * report the same transition twice.
 */

import type { StateStore } from '../data/stateStore';
import type { SignalSource } from '../data/providers';
import { readingBackfill } from '../data/providers';
import type { SignalRule } from '../engine/classifySignal';
import { HISTORY_LIMIT } from '../engine/detectTransition';
import type { DetectKind, TransitionDetector } from '../engine/detectTransition';
import { isMonitorError } from '../errors';
import type { Logger, Notifier } from '../notify/email';
import { SIGNAL_COLOR } from '../types';
import type { IsoDate, MonitorState, SignalReading, Ticker, TransitionEvent } from '../types';

export interface CheckDeps {
  source: SignalSource;
  store: StateStore;
  detector: TransitionDetector;
  notifier: Notifier;
  rule?: SignalRule;
  awaitFreshData?: boolean;
  logger?: Logger;
}

export type CheckKind = DetectKind | 'stale';

export interface CheckOutcome {
  ticker: Ticker;
  kind: CheckKind;
  reading: SignalReading;
  state?: MonitorState;
  event?: TransitionEvent;
  delivered?: boolean;
}

function describeReading(reading: SignalReading): string {
  const color = SIGNAL_COLOR[reading.signal];
  const value = reading.value === undefined ? '' : `${reading.value} `;
  const asOf = reading.asOfDate === undefined ? '' : `(${reading.asOfDate}) `;
  const crossing = reading.crossing === undefined ? '' : ` (crossing: ${reading.crossing})`;
  return `${reading.ticker}: ${value}${asOf}= ${color}${crossing}`;
}

/**
 * Whether the reading carries data newer than what the state already recorded
 */
export function isFreshReading(reading: SignalReading, prior: MonitorState | null): boolean {
  if (!prior || !prior.lastObservationDate || !reading.asOfDate) {
    return true;
  }
  return reading.asOfDate > prior.lastObservationDate;
}

/**
 * @throws MonitorError from the source (SOURCE_UNAVAILABLE, EMPTY_SERIES,
 *   INSUFFICIENT_DATA) or the store (STATE_IO); never DELIVERY_FAILURE
 */
export async function runCheck(deps: CheckDeps, ticker: Ticker, today: IsoDate): Promise<CheckOutcome> {
  const logger = deps.logger ?? console;

  const reading = await deps.source.read(ticker);
  logger.log(`📈 ${describeReading(reading)}`);

  if (deps.awaitFreshData) {
    const prior = await deps.store.load(ticker);
    if (!isFreshReading(reading, prior)) {
      logger.log(
        `⏳ No new data for ${ticker} yet (latest ${reading.asOfDate}, recorded ${prior?.lastObservationDate})`
      );
      return { ticker, kind: 'stale', reading };
    }
  }

  const result = await deps.detector.detect(ticker, reading.signal, today, {
    asOfDate: reading.asOfDate,
    value: reading.value,
    backfill: readingBackfill(reading, HISTORY_LIMIT, deps.rule),
  });

  switch (result.kind) {
    case 'cold-start':
      logger.log(`🆕 No previous state for ${ticker} - initial state saved (${SIGNAL_COLOR[reading.signal]})`);
      return { ticker, kind: result.kind, reading, state: result.state };

    case 'unchanged':
      logger.log(`✓ No color change for ${ticker} (${SIGNAL_COLOR[reading.signal]})`);
      return { ticker, kind: result.kind, reading, state: result.state };

    case 'suppressed':
      logger.warn(
        `⚠️  ${ticker} flipped to ${SIGNAL_COLOR[result.attempted]} but a transition was already reported on ${today}; ` +
          `keeping ${SIGNAL_COLOR[result.state.lastSignal]} until the next day`
      );
      return { ticker, kind: result.kind, reading, state: result.state };

    case 'transition': {
      const { event } = result;
      logger.log(
        `🔔 Color change detected for ${ticker}: ${SIGNAL_COLOR[event.fromSignal]} -> ${SIGNAL_COLOR[event.toSignal]} (${event.date})`
      );

      let delivered = deps.notifier.enabled;
      try {
        await deps.notifier.notify(event);
      } catch (error) {
        if (!isMonitorError(error) || error.code !== 'DELIVERY_FAILURE') {
          throw error;
        }
        delivered = false;
        logger.error(
          `❌ Missed notification for ${ticker} ${SIGNAL_COLOR[event.fromSignal]} -> ${SIGNAL_COLOR[event.toSignal]} ` +
            `on ${event.date}: ${error.message}. State is saved; follow up manually.`
        );
      }
      return { ticker, kind: result.kind, reading, state: result.state, event, delivered };
    }
  }
}
