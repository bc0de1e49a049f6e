/**
 * NYSI engine exports
 *
 * Pure engine functions - no network, no filesystem (the detector reaches
 * storage only through the injected StateStore).
 */

export {
  classifySignal,
  signalSeries,
  parseSignalRule,
  formatRule,
  minimumPoints,
  DEFAULT_SIGNAL_RULE,
} from './classifySignal';
export type { SignalRule } from './classifySignal';
export { analyzeChart, chartSignal, classifyChart, parseChartRegion, DEFAULT_CHART_REGION } from './chartPixels';
export type { ChartAnalysis, ChartRegion, ColumnColor, RgbaRaster } from './chartPixels';
export { TransitionDetector, evaluateTransition, HISTORY_LIMIT } from './detectTransition';
export type { DetectKind, DetectResult, Observation } from './detectTransition';
export {
  parseWindow,
  formatWindow,
  isWithinWindow,
  msUntilNextWindowStart,
  zonedDate,
  formatDuration,
} from './monitoringWindow';
export type { MonitoringWindow } from './monitoringWindow';
export { simulateTrades, mergeSeries, walkTrades } from './simulateTrades';
export type { DateAlignment, MergedRow, SimulationOptions, SimulationResult } from './simulateTrades';
