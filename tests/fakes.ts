import { MonitorError } from '../src/modules/nysi/errors';
import type { StateStore } from '../src/modules/nysi/data/stateStore';
import type { Clock } from '../src/modules/nysi/monitor/clock';
import type { Logger, Notifier } from '../src/modules/nysi/notify/email';
import type { MonitorState, Ticker, TransitionEvent } from '../src/modules/nysi/types';

export class MemoryStateStore implements StateStore {
  readonly states = new Map<Ticker, MonitorState>();
  saves = 0;
  failSaves = false;

  constructor(initial: MonitorState[] = []) {
    for (const state of initial) this.states.set(state.ticker, state);
  }

  async load(ticker: Ticker): Promise<MonitorState | null> {
    const state = this.states.get(ticker);
    return state ? structuredClone(state) : null;
  }

  async save(state: MonitorState): Promise<void> {
    if (this.failSaves) {
      throw new MonitorError('disk full', 'STATE_IO', state.ticker);
    }
    this.saves++;
    this.states.set(state.ticker, structuredClone(state));
  }
}

export class RecordingNotifier implements Notifier {
  readonly enabled = true;
  readonly events: TransitionEvent[] = [];
  failWith: Error | null = null;

  async notify(event: TransitionEvent): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.events.push(event);
  }

  async verify(): Promise<boolean> {
    return true;
  }
}

/**
 * Clock whose sleep advances time instantly and records each duration
 */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];
  onSleep: ((ms: number) => void) | null = null;

  constructor(private current: Date) {}

  now(): Date {
    return new Date(this.current.getTime());
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return;
    this.sleeps.push(ms);
    this.current = new Date(this.current.getTime() + ms);
    this.onSleep?.(ms);
  }
}

export interface CapturedLogs extends Logger {
  lines: string[];
}

export function captureLogger(): CapturedLogs {
  const lines: string[] = [];
  const push = (...args: unknown[]) => {
    lines.push(args.map(String).join(' '));
  };
  return { lines, log: push, warn: push, error: push };
}
