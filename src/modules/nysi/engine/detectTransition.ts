/**
 * Transition detection
 *
 * Compares a freshly classified signal to the stored MonitorState and decides
 * whether a transition should be reported. The detector is the only writer of
 * MonitorState: the new state is saved before detect() resolves, so a
 * notification is never sent for a state that is not on disk.
 */

import type { StateStore } from '../data/stateStore';
import { keepLatest, maxDate, mergeByDate } from '../data/seriesUtils';
import type {
  IsoDate,
  MonitorState,
  Signal,
  SignalHistoryEntry,
  Ticker,
  TransitionEvent,
} from '../types';

export const HISTORY_LIMIT = 10;

export interface Observation {
  asOfDate?: IsoDate; // date of the latest data point
  value?: number;
  backfill?: SignalHistoryEntry[]; // seeds history on cold start
}

export type DetectResult =
  | { kind: 'cold-start'; state: MonitorState }
  | { kind: 'unchanged'; state: MonitorState }
  | { kind: 'transition'; state: MonitorState; event: TransitionEvent }
  | { kind: 'suppressed'; state: MonitorState; attempted: Signal };

export type DetectKind = DetectResult['kind'];

function appendHistory(
  history: SignalHistoryEntry[] | undefined,
  entries: SignalHistoryEntry[]
): SignalHistoryEntry[] {
  const merged = mergeByDate((e: SignalHistoryEntry) => e.date, history ?? [], entries);
  return keepLatest(merged, HISTORY_LIMIT);
}

function historyEntry(signal: Signal, today: IsoDate, observation: Observation): SignalHistoryEntry {
  const entry: SignalHistoryEntry = { date: observation.asOfDate ?? today, signal };
  if (observation.value !== undefined) {
    entry.value = observation.value;
  }
  return entry;
}

function withObservation(state: MonitorState, observation: Observation): MonitorState {
  const next = { ...state };
  if (observation.asOfDate !== undefined) next.lastObservationDate = observation.asOfDate;
  if (observation.value !== undefined) next.lastValue = observation.value;
  return next;
}

/**
 * Pure decision: prior state + new signal -> result carrying the state to save.
 *
 * - no prior state: cold start, never reported
 * - same signal: unchanged, lastCheckedDate advances
 * - flip on a day that already reported a transition: suppressed, lastSignal kept
 * - otherwise: transition from prior.lastSignal to the new signal dated `today`
 */
export function evaluateTransition(
  prior: MonitorState | null,
  ticker: Ticker,
  signal: Signal,
  today: IsoDate,
  observation: Observation = {},
  now: Date = new Date()
): DetectResult {
  const updatedAt = now.toISOString();
  const entry = historyEntry(signal, today, observation);

  if (!prior) {
    const state = withObservation(
      {
        ticker,
        lastSignal: signal,
        lastCheckedDate: today,
        history: appendHistory(observation.backfill, [entry]),
        updatedAt,
      },
      observation
    );
    return { kind: 'cold-start', state };
  }

  const lastCheckedDate = maxDate(prior.lastCheckedDate, today);

  if (prior.lastSignal === signal) {
    const state = withObservation(
      {
        ...prior,
        lastCheckedDate,
        history: appendHistory(prior.history, [entry]),
        updatedAt,
      },
      observation
    );
    return { kind: 'unchanged', state };
  }

  if (prior.lastTransitionDate === today) {
    // Already reported a transition today; keep lastSignal so a lasting flip is reported tomorrow
    return {
      kind: 'suppressed',
      attempted: signal,
      state: { ...prior, lastCheckedDate, updatedAt },
    };
  }

  const event: TransitionEvent = {
    ticker,
    fromSignal: prior.lastSignal,
    toSignal: signal,
    date: today,
  };
  if (observation.value !== undefined) {
    event.value = observation.value;
  }

  const state = withObservation(
    {
      ...prior,
      lastSignal: signal,
      lastCheckedDate,
      lastTransitionDate: today,
      history: appendHistory(prior.history, [entry]),
      updatedAt,
    },
    observation
  );
  return { kind: 'transition', state, event };
}

export class TransitionDetector {
  constructor(
    private readonly store: StateStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Load prior state, decide, save, then report.
   *
   * @throws MonitorError STATE_IO when the state cannot be loaded or saved;
   *   no result (and so no event) is returned in that case
   */
  async detect(
    ticker: Ticker,
    signal: Signal,
    today: IsoDate,
    observation: Observation = {}
  ): Promise<DetectResult> {
    const prior = await this.store.load(ticker);
    const result = evaluateTransition(prior, ticker, signal, today, observation, this.now());
    await this.store.save(result.state);
    return result;
  }
}
