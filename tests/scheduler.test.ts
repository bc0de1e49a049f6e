import { describe, expect, it, vi } from 'vitest';
import { SeriesSignalSource } from '../src/modules/nysi/data/providers';
import type { FetchLike } from '../src/modules/nysi/data/providers/http';
import { StockChartsSeriesSource } from '../src/modules/nysi/data/providers/stockcharts';
import { TransitionDetector } from '../src/modules/nysi/engine/detectTransition';
import { parseWindow } from '../src/modules/nysi/engine/monitoringWindow';
import { MonitorError } from '../src/modules/nysi/errors';
import { runCheck } from '../src/modules/nysi/monitor/checkCycle';
import type { CheckOutcome } from '../src/modules/nysi/monitor/checkCycle';
import { SchedulerLoop } from '../src/modules/nysi/monitor/scheduler';
import type { LoopState, SchedulerOptions } from '../src/modules/nysi/monitor/scheduler';
import type { IsoDate, Ticker } from '../src/modules/nysi/types';
import { FakeClock, MemoryStateStore, RecordingNotifier, captureLogger } from './fakes';

function outcome(ticker: Ticker): CheckOutcome {
  return { ticker, kind: 'unchanged', reading: { ticker, signal: 'Rising', source: 'series' } };
}

function options(overrides: Partial<SchedulerOptions> = {}): SchedulerOptions {
  return {
    tickers: ['$NYSI'],
    mode: 'watch',
    intervalMs: 30_000,
    window: parseWindow('09:30-10:00', 'UTC'),
    timeZone: 'UTC',
    continuous: false,
    everyDay: true,
    failFast: false,
    ...overrides,
  };
}

function abortAfterSleeps(clock: FakeClock, controller: AbortController, count: number): void {
  clock.onSleep = () => {
    if (clock.sleeps.length >= count) controller.abort();
  };
}

describe('SchedulerLoop', () => {
  it('sleeps until the window opens without fetching', async () => {
    const clock = new FakeClock(new Date('2024-01-10T08:00:00Z'));
    const controller = new AbortController();
    abortAfterSleeps(clock, controller, 1);
    const check = vi.fn(async (ticker: Ticker) => outcome(ticker));
    const logger = captureLogger();
    const states: LoopState[] = [];

    const loop = new SchedulerLoop(options(), {
      check,
      store: new MemoryStateStore(),
      clock,
      logger,
      onStateChange: (state) => states.push(state),
    });
    const summary = await loop.run(controller.signal);

    expect(clock.sleeps).toEqual([5_400_000]);
    expect(check).not.toHaveBeenCalled();
    expect(states).toEqual(['OutsideWindow', 'Done']);
    expect(logger.lines).toContain('💤 Sleeping for 1h 30m until next monitoring window');
    expect(summary).toEqual({ exitCode: 0, cycles: 0, outcomes: [], failures: [] });
  });

  it('stops for the day once every ticker is checked when running once', async () => {
    const clock = new FakeClock(new Date('2024-01-10T09:31:00Z'));
    const store = new MemoryStateStore();
    const check = vi.fn(async (ticker: Ticker, today: IsoDate) => {
      store.states.set(ticker, { ticker, lastSignal: 'Rising', lastCheckedDate: today });
      return outcome(ticker);
    });

    const loop = new SchedulerLoop(options({ everyDay: false }), { check, store, clock, logger: captureLogger() });
    const summary = await loop.run();

    expect(check).toHaveBeenCalledTimes(1);
    expect(check).toHaveBeenCalledWith('$NYSI', '2024-01-10');
    expect(clock.sleeps).toEqual([30_000]);
    expect(summary.exitCode).toBe(0);
    expect(loop.state).toBe('Done');
  });

  it('skips to the next day\'s window once every ticker is checked', async () => {
    const clock = new FakeClock(new Date('2024-01-10T09:31:00Z'));
    const controller = new AbortController();
    abortAfterSleeps(clock, controller, 2);
    const store = new MemoryStateStore();
    const check = vi.fn(async (ticker: Ticker, today: IsoDate) => {
      store.states.set(ticker, { ticker, lastSignal: 'Rising', lastCheckedDate: today });
      return outcome(ticker);
    });

    const loop = new SchedulerLoop(options(), { check, store, clock, logger: captureLogger() });
    await loop.run(controller.signal);

    // 09:31:30 to 09:30 tomorrow
    expect(clock.sleeps).toEqual([30_000, 86_310_000]);
    expect(check).toHaveBeenCalledTimes(1);
  });

  it('keeps polling inside the window while checks have not recorded today', async () => {
    const clock = new FakeClock(new Date('2024-01-10T09:31:00Z'));
    const controller = new AbortController();
    abortAfterSleeps(clock, controller, 3);
    const check = vi.fn(async (ticker: Ticker) => outcome(ticker));

    const loop = new SchedulerLoop(options(), {
      check,
      store: new MemoryStateStore(),
      clock,
      logger: captureLogger(),
    });
    const summary = await loop.run(controller.signal);

    expect(check).toHaveBeenCalledTimes(3);
    expect(clock.sleeps).toEqual([30_000, 30_000, 30_000]);
    expect(summary.cycles).toBe(3);
  });

  it('runs one cycle over every ticker in check mode and fails on any error', async () => {
    const clock = new FakeClock(new Date('2024-01-10T03:00:00Z'));
    const check = vi.fn(async (ticker: Ticker) => {
      if (ticker === '$NYMO') throw new MonitorError('timeout', 'SOURCE_UNAVAILABLE', ticker);
      return outcome(ticker);
    });
    const logger = captureLogger();

    const loop = new SchedulerLoop(options({ mode: 'check', tickers: ['$NYMO', '$NYSI'] }), {
      check,
      store: new MemoryStateStore(),
      clock,
      logger,
    });
    const summary = await loop.run();

    expect(check).toHaveBeenCalledTimes(2);
    expect(clock.sleeps).toEqual([]);
    expect(summary.exitCode).toBe(1);
    expect(summary.outcomes.map((o) => o.ticker)).toEqual(['$NYSI']);
    expect(summary.failures.map((f) => f.ticker)).toEqual(['$NYMO']);
    expect(logger.lines).toContain('❌ $NYMO: [SOURCE_UNAVAILABLE] timeout');
  });

  it('exits 0 in check mode when every ticker completes', async () => {
    const loop = new SchedulerLoop(options({ mode: 'check' }), {
      check: async (ticker) => outcome(ticker),
      store: new MemoryStateStore(),
      clock: new FakeClock(new Date('2024-01-10T03:00:00Z')),
      logger: captureLogger(),
    });
    expect((await loop.run()).exitCode).toBe(0);
  });

  it('ends with exit code 1 on a fetch error when failing fast', async () => {
    const check = vi.fn(async (ticker: Ticker): Promise<CheckOutcome> => {
      throw new MonitorError('no data', 'EMPTY_SERIES', ticker);
    });

    const loop = new SchedulerLoop(
      options({ continuous: true, failFast: true, tickers: ['$NYSI', '$NYMO'] }),
      { check, store: new MemoryStateStore(), clock: new FakeClock(new Date('2024-01-10T03:00:00Z')), logger: captureLogger() }
    );
    const summary = await loop.run();

    expect(summary.exitCode).toBe(1);
    expect(check).toHaveBeenCalledTimes(1);
    expect(loop.state).toBe('Done');
  });

  it('stops with fail-fast when a download breaks off mid-body', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => {
      const body = new ReadableStream<Uint8Array>({
        pull(controller) {
          controller.error(new Error('socket hang up'));
        },
      });
      return new Response(body, { status: 200 });
    });
    const store = new MemoryStateStore();
    const source = new SeriesSignalSource(new StockChartsSeriesSource(fetchImpl), { days: 11 });
    const detector = new TransitionDetector(store);
    const notifier = new RecordingNotifier();
    const logger = captureLogger();

    const loop = new SchedulerLoop(options({ continuous: true, failFast: true }), {
      check: (ticker, today) => runCheck({ source, store, detector, notifier, logger }, ticker, today),
      store,
      clock: new FakeClock(new Date('2024-01-10T03:00:00Z')),
      logger,
    });
    const summary = await loop.run();

    expect(summary.exitCode).toBe(1);
    expect(summary.cycles).toBe(1);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(logger.lines).toContain('⛔ Stopping: fetch failed and --fail-fast is set');
    expect(notifier.events).toEqual([]);
  });

  it('logs a recoverable error and carries on without fail-fast', async () => {
    const clock = new FakeClock(new Date('2024-01-10T03:00:00Z'));
    const controller = new AbortController();
    abortAfterSleeps(clock, controller, 1);
    const check = vi.fn(async (ticker: Ticker): Promise<CheckOutcome> => {
      throw new MonitorError('no data', 'EMPTY_SERIES', ticker);
    });

    const loop = new SchedulerLoop(options({ continuous: true }), {
      check,
      store: new MemoryStateStore(),
      clock,
      logger: captureLogger(),
    });
    const summary = await loop.run(controller.signal);

    expect(summary.exitCode).toBe(0);
    expect(summary.failures).toHaveLength(1);
    expect(clock.sleeps).toEqual([30_000]);
  });

  it('finishes immediately when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const check = vi.fn(async (ticker: Ticker) => outcome(ticker));

    const loop = new SchedulerLoop(options({ continuous: true }), {
      check,
      store: new MemoryStateStore(),
      clock: new FakeClock(new Date('2024-01-10T03:00:00Z')),
      logger: captureLogger(),
    });
    const summary = await loop.run(controller.signal);

    expect(check).not.toHaveBeenCalled();
    expect(summary.cycles).toBe(0);
    expect(loop.state).toBe('Done');
  });
});
