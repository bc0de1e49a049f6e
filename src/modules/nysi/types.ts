/**
 * NYSI module types
 *
 * Core type definitions for the NYSI trend-change monitor and trade simulator.
 */

// Ticker symbol type (e.g. "$NYSI", "GGUS.AX")
export type Ticker = string;

// Calendar date, ISO YYYY-MM-DD
export type IsoDate = string;

// Trend direction of the indicator line
export type Signal = 'Rising' | 'Declining';

// Colour the charting service draws each direction in
export type SignalColor = 'Black' | 'Red';

export const SIGNAL_COLOR: Record<Signal, SignalColor> = {
  Rising: 'Black',
  Declining: 'Red',
};

// Single dated value of a series
export interface ObservationPoint {
  date: IsoDate;
  value: number;
}

// Time-ordered series for one ticker (ascending, unique dates)
export interface Series {
  ticker: Ticker;
  points: ObservationPoint[];
}

// How far back a fetch reaches
export interface Lookback {
  years?: number;
  months?: number;
  days?: number;
}

export type SignalSourceKind = 'series' | 'chart-image';

// Dominant colour change across a chart image's analysis region
export type LineCrossing = 'red_to_black' | 'black_to_red' | 'no_crossing';

// Result of reading the current signal for a ticker
export interface SignalReading {
  ticker: Ticker;
  signal: Signal;
  source: SignalSourceKind;
  asOfDate?: IsoDate; // latest observation date (absent for chart images)
  value?: number; // latest observation value
  series?: Series; // the series the signal was classified from
  crossing?: LineCrossing; // chart images only
}

export interface SignalHistoryEntry {
  date: IsoDate;
  signal: Signal;
  value?: number;
}

// Durable per-ticker monitor record
export interface MonitorState {
  ticker: Ticker;
  lastSignal: Signal;
  lastCheckedDate: IsoDate;
  lastTransitionDate?: IsoDate;
  lastObservationDate?: IsoDate;
  lastValue?: number;
  history?: SignalHistoryEntry[]; // newest last, at most HISTORY_LIMIT entries
  updatedAt?: string; // ISO timestamp of the last save
}

// Ephemeral event handed to the notifier
export interface TransitionEvent {
  ticker: Ticker;
  fromSignal: Signal;
  toSignal: Signal;
  date: IsoDate;
  value?: number;
}

// Simulator types
export interface PricePoint {
  date: IsoDate;
  price: number;
}

export type PriceType = 'Open' | 'High' | 'Low' | 'Close';

export interface DateRange {
  start: IsoDate;
  end: IsoDate;
}

export interface SimulatedTrade {
  entryDate: IsoDate;
  entrySignal: Signal;
  entryPrice: number;
  exitDate: IsoDate;
  exitPrice: number;
  returnPct: number; // (exit - entry) / entry * 100, 2 decimals
  open: boolean; // still held at the last merged row, marked to its price
}
