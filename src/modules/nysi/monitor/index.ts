/**
 * Monitor loop exports
 */

export { runCheck, isFreshReading } from './checkCycle';
export type { CheckDeps, CheckKind, CheckOutcome } from './checkCycle';
export { SchedulerLoop } from './scheduler';
export type {
  CheckFn,
  CycleFailure,
  LoopState,
  RunSummary,
  SchedulerDeps,
  SchedulerMode,
  SchedulerOptions,
} from './scheduler';
export { systemClock, sleep } from './clock';
export type { Clock } from './clock';
