/**
 * Monitoring window calculations
 *
 * Daily time-of-day windows in a fixed IANA timezone. Windows whose end is
 * earlier than their start cross midnight (e.g. 23:00-06:00).
 */

import { MonitorError } from '../errors';
import type { IsoDate } from '../types';

export interface MonitoringWindow {
  startMinute: number; // minutes after local midnight
  endMinute: number;
  timeZone: string;
}

export interface ZonedTime {
  date: IsoDate;
  secondOfDay: number;
}

const SECONDS_PER_DAY = 24 * 60 * 60;

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-CA', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hourCycle: 'h23',
    });
    formatterCache.set(timeZone, formatter);
  }
  return formatter;
}

export function assertTimeZone(timeZone: string): string {
  try {
    getFormatter(timeZone);
  } catch {
    throw new MonitorError(`Unknown timezone "${timeZone}"`, 'INVALID_CONFIG');
  }
  return timeZone;
}

/**
 * Wall-clock date and second-of-day of an instant in a timezone
 */
export function toZonedTime(instant: Date, timeZone: string): ZonedTime {
  const parts: Record<string, string> = {};
  for (const part of getFormatter(timeZone).formatToParts(instant)) {
    parts[part.type] = part.value;
  }
  const hour = parseInt(parts.hour ?? '0', 10) % 24;
  const minute = parseInt(parts.minute ?? '0', 10);
  const second = parseInt(parts.second ?? '0', 10);
  return {
    date: `${parts.year}-${parts.month}-${parts.day}`,
    secondOfDay: hour * 3600 + minute * 60 + second,
  };
}

export function zonedDate(instant: Date, timeZone: string): IsoDate {
  return toZonedTime(instant, timeZone).date;
}

function parseClockTime(raw: string): number {
  const match = /^(\d{1,2}):(\d{2})$/.exec(raw.trim());
  const hour = match ? parseInt(match[1] ?? '', 10) : NaN;
  const minute = match ? parseInt(match[2] ?? '', 10) : NaN;
  if (!(hour >= 0 && hour <= 23 && minute >= 0 && minute <= 59)) {
    throw new MonitorError(
      `Invalid time format: ${raw}. Use HH:MM format (e.g., 09:30)`,
      'INVALID_CONFIG'
    );
  }
  return hour * 60 + minute;
}

/**
 * Parse "HH:MM-HH:MM"
 */
export function parseWindow(raw: string, timeZone: string): MonitoringWindow {
  const pieces = raw.split('-');
  if (pieces.length !== 2) {
    throw new MonitorError(
      `Invalid window format "${raw}". Use HH:MM-HH:MM (e.g., 09:30-16:00)`,
      'INVALID_CONFIG'
    );
  }
  return {
    startMinute: parseClockTime(pieces[0] ?? ''),
    endMinute: parseClockTime(pieces[1] ?? ''),
    timeZone: assertTimeZone(timeZone),
  };
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

export function formatWindow(window: MonitoringWindow): string {
  const fmt = (m: number) => `${pad2(Math.floor(m / 60))}:${pad2(m % 60)}`;
  return `${fmt(window.startMinute)}-${fmt(window.endMinute)} ${window.timeZone}`;
}

/**
 * Whether the instant falls inside the window (both ends inclusive, to the minute)
 */
export function isWithinWindow(instant: Date, window: MonitoringWindow): boolean {
  const { secondOfDay } = toZonedTime(instant, window.timeZone);
  const start = window.startMinute * 60;
  const end = window.endMinute * 60;

  if (start <= end) {
    return secondOfDay >= start && secondOfDay <= end;
  }
  // Crosses midnight
  return secondOfDay >= start || secondOfDay <= end;
}

/**
 * Milliseconds until the next window start strictly after `instant`,
 * rolling to tomorrow when today's start has already passed.
 *
 * @param instant Current time
 * @param window Window whose start minute is read in its own timezone
 * @returns Sleep duration in milliseconds, always positive
 */
export function msUntilNextWindowStart(instant: Date, window: MonitoringWindow): number {
  const { secondOfDay } = toZonedTime(instant, window.timeZone);
  let seconds = window.startMinute * 60 - secondOfDay;
  if (seconds <= 0) {
    seconds += SECONDS_PER_DAY;
  }
  return seconds * 1000 - instant.getUTCMilliseconds();
}

/**
 * "1h 30m" style duration for log lines
 */
export function formatDuration(ms: number): string {
  const totalMinutes = Math.floor(ms / 60000);
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  if (hours === 0 && minutes === 0) {
    return `${Math.max(0, Math.round(ms / 1000))}s`;
  }
  return `${hours}h ${minutes}m`;
}
