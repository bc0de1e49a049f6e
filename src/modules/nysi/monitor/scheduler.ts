/**
 * Scheduler loop
 *
 * Drives check cycles over a list of tickers. In watch mode with a window the
 * loop sleeps outside the window without fetching, polls at the interval
 * inside it, and stops polling for the day once every ticker has been checked.
 */

import type { StateStore } from '../data/stateStore';
import {
  formatDuration,
  formatWindow,
  isWithinWindow,
  msUntilNextWindowStart,
  zonedDate,
} from '../engine/monitoringWindow';
import type { MonitoringWindow } from '../engine/monitoringWindow';
import { isFetchError, isMonitorError, isRecoverable, toError } from '../errors';
import type { Logger } from '../notify/email';
import type { IsoDate, Ticker } from '../types';
import type { CheckOutcome } from './checkCycle';
import { systemClock } from './clock';
import type { Clock } from './clock';

export type LoopState = 'Idle' | 'Checking' | 'Waiting' | 'OutsideWindow' | 'Done';

export type SchedulerMode = 'check' | 'watch';

export type CheckFn = (ticker: Ticker, today: IsoDate) => Promise<CheckOutcome>;

export interface SchedulerOptions {
  tickers: Ticker[];
  mode: SchedulerMode;
  intervalMs: number;
  window: MonitoringWindow | null;
  timeZone: string;
  continuous: boolean; // ignore the window and poll around the clock
  everyDay: boolean; // false: stop after the first day every ticker is checked
  failFast: boolean; // end the loop on a fetch error
}

export interface SchedulerDeps {
  check: CheckFn;
  store: StateStore;
  clock?: Clock;
  logger?: Logger;
  onStateChange?: (state: LoopState, previous: LoopState) => void;
}

export interface CycleFailure {
  ticker: Ticker;
  error: Error;
}

export interface RunSummary {
  exitCode: 0 | 1;
  cycles: number;
  outcomes: CheckOutcome[];
  failures: CycleFailure[];
}

interface CycleResult {
  outcomes: CheckOutcome[];
  failures: CycleFailure[];
  fatal: boolean;
}

export class SchedulerLoop {
  private current: LoopState = 'Idle';
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(
    private readonly options: SchedulerOptions,
    private readonly deps: SchedulerDeps
  ) {
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? console;
  }

  get state(): LoopState {
    return this.current;
  }

  private setState(next: LoopState): void {
    if (next === this.current) return;
    const previous = this.current;
    this.current = next;
    this.deps.onStateChange?.(next, previous);
  }

  private today(): IsoDate {
    return zonedDate(this.clock.now(), this.options.timeZone);
  }

  private activeWindow(): MonitoringWindow | null {
    return this.options.continuous ? null : this.options.window;
  }

  async run(signal?: AbortSignal): Promise<RunSummary> {
    const summary: RunSummary = { exitCode: 0, cycles: 0, outcomes: [], failures: [] };

    if (this.options.mode === 'check') {
      this.setState('Checking');
      const cycle = await this.runCycle(this.today(), signal);
      this.record(summary, cycle);
      summary.exitCode = cycle.failures.length > 0 ? 1 : 0;
      this.setState('Done');
      return summary;
    }

    const window = this.activeWindow();
    this.logger.log(
      window
        ? `👀 Watching ${this.options.tickers.join(', ')} during ${formatWindow(window)}`
        : `👀 Watching ${this.options.tickers.join(', ')} every ${formatDuration(this.options.intervalMs)}`
    );

    while (!signal?.aborted) {
      const now = this.clock.now();
      const today = zonedDate(now, this.options.timeZone);

      if (window) {
        if (!isWithinWindow(now, window)) {
          await this.sleepUntilWindow(now, window, signal);
          continue;
        }

        if (await this.allCheckedOn(today)) {
          if (!this.options.everyDay) {
            this.logger.log(`✅ All symbols checked for ${today}. Done.`);
            break;
          }
          this.logger.log(`✅ All symbols checked for ${today}`);
          await this.sleepUntilWindow(now, window, signal);
          continue;
        }
      }

      this.setState('Checking');
      const cycle = await this.runCycle(today, signal);
      this.record(summary, cycle);
      if (cycle.fatal) {
        summary.exitCode = 1;
        break;
      }
      if (signal?.aborted) break;

      this.setState('Waiting');
      await this.clock.sleep(this.options.intervalMs, signal);
    }

    this.setState('Done');
    return summary;
  }

  private record(summary: RunSummary, cycle: CycleResult): void {
    summary.cycles++;
    summary.outcomes.push(...cycle.outcomes);
    summary.failures.push(...cycle.failures);
  }

  private async sleepUntilWindow(
    now: Date,
    window: MonitoringWindow,
    signal?: AbortSignal
  ): Promise<void> {
    this.setState('OutsideWindow');
    const ms = msUntilNextWindowStart(now, window);
    this.logger.log(`💤 Sleeping for ${formatDuration(ms)} until next monitoring window`);
    await this.clock.sleep(ms, signal);
  }

  /**
   * Whether every ticker's state was already checked on `today`
   */
  private async allCheckedOn(today: IsoDate): Promise<boolean> {
    for (const ticker of this.options.tickers) {
      try {
        const state = await this.deps.store.load(ticker);
        if (!state || state.lastCheckedDate !== today) return false;
      } catch (error) {
        this.logger.error(`❌ Could not read state for ${ticker}: ${toError(error).message}`);
        return false;
      }
    }
    return true;
  }

  private async runCycle(today: IsoDate, signal?: AbortSignal): Promise<CycleResult> {
    const result: CycleResult = { outcomes: [], failures: [], fatal: false };

    for (const ticker of this.options.tickers) {
      if (signal?.aborted) break;
      try {
        result.outcomes.push(await this.deps.check(ticker, today));
      } catch (error) {
        const err = toError(error);
        result.failures.push({ ticker, error: err });

        if (isMonitorError(error)) {
          this.logger.error(`❌ ${ticker}: [${error.code}] ${error.message}`);
          if (!isRecoverable(error.code)) {
            this.logger.error(`   ${ticker} was not updated; no notification was sent for this check`);
          }
          if (this.options.failFast && isFetchError(error)) {
            this.logger.error('⛔ Stopping: fetch failed and --fail-fast is set');
            result.fatal = true;
            break;
          }
        } else {
          this.logger.error(`❌ ${ticker}: unexpected error: ${err.message}`);
        }
      }
    }

    return result;
  }
}
