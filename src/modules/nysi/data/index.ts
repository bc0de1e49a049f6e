/**
 * NYSI data layer exports
 */

export { JsonFileStateStore, getStateFileName, parseMonitorState } from './stateStore';
export type { StateStore } from './stateStore';
export { mergeByDate, keepLatest, addDays, isIsoDate } from './seriesUtils';
export * from './providers';
