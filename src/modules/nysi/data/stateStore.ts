/**
 * Monitor state persistence
 *
 * One JSON file per ticker under the state directory. Saves write a temp file
 * beside the target and rename it into place, so a crash leaves either the old
 * record or the new one on disk, never a partial file.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { MonitorError, toError } from '../errors';
import type { MonitorState, Ticker } from '../types';

export interface StateStore {
  load(ticker: Ticker): Promise<MonitorState | null>;
  save(state: MonitorState): Promise<void>;
}

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);
const signal = z.enum(['Rising', 'Declining']);

// passthrough: fields written by newer versions survive a load/save round trip
const monitorStateSchema = z
  .object({
    ticker: z.string().min(1),
    lastSignal: signal,
    lastCheckedDate: isoDate,
    lastTransitionDate: isoDate.optional(),
    lastObservationDate: isoDate.optional(),
    lastValue: z.number().finite().optional(),
    history: z
      .array(
        z
          .object({
            date: isoDate,
            signal,
            value: z.number().finite().optional(),
          })
          .passthrough()
      )
      .optional(),
    updatedAt: z.string().optional(),
  })
  .passthrough();

/**
 * Get safe filename for a ticker ("$NYSI" -> "NYSI.json", "GGUS.AX" -> "GGUS_AX.json")
 */
export function getStateFileName(ticker: Ticker): string {
  const base = ticker.replace(/^\$/, '').replace(/\./g, '_').replace(/[^a-zA-Z0-9_-]/g, '_');
  return `${base || '_'}.json`;
}

export function parseMonitorState(raw: unknown): MonitorState {
  return monitorStateSchema.parse(raw);
}

export class JsonFileStateStore implements StateStore {
  private tempCounter = 0;

  constructor(private readonly directory: string) {}

  filePath(ticker: Ticker): string {
    return join(this.directory, getStateFileName(ticker));
  }

  async load(ticker: Ticker): Promise<MonitorState | null> {
    const path = this.filePath(ticker);
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw new MonitorError(`Failed to read state ${path}`, 'STATE_IO', ticker, toError(error));
    }

    let state: MonitorState;
    try {
      state = parseMonitorState(JSON.parse(content));
    } catch (error) {
      throw new MonitorError(`Unreadable state file ${path}`, 'STATE_IO', ticker, toError(error));
    }

    // "$NYSI" and "NYSI" share a file name
    if (state.ticker !== ticker) {
      throw new MonitorError(
        `State file ${path} belongs to ${state.ticker}, not ${ticker}`,
        'STATE_IO',
        ticker
      );
    }
    return state;
  }

  async save(state: MonitorState): Promise<void> {
    const path = this.filePath(state.ticker);
    const tempPath = `${path}.${process.pid}.${++this.tempCounter}.tmp`;

    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(tempPath, JSON.stringify(state, null, 2) + '\n', 'utf-8');
      await rename(tempPath, path);
    } catch (error) {
      await rm(tempPath, { force: true }).catch(() => undefined);
      throw new MonitorError(`Failed to save state ${path}`, 'STATE_IO', state.ticker, toError(error));
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
