/**
 * Monitor error taxonomy
 */

export type MonitorErrorCode =
  | 'SOURCE_UNAVAILABLE'
  | 'EMPTY_SERIES'
  | 'INSUFFICIENT_DATA'
  | 'STATE_IO'
  | 'DELIVERY_FAILURE'
  | 'INVALID_CONFIG';

const RECOVERABLE_CODES: ReadonlySet<MonitorErrorCode> = new Set([
  'SOURCE_UNAVAILABLE',
  'EMPTY_SERIES',
  'INSUFFICIENT_DATA',
  'DELIVERY_FAILURE',
]);

const FETCH_CODES: ReadonlySet<MonitorErrorCode> = new Set(['SOURCE_UNAVAILABLE', 'EMPTY_SERIES']);

export class MonitorError extends Error {
  constructor(
    message: string,
    public readonly code: MonitorErrorCode,
    public readonly ticker?: string,
    public override readonly cause?: Error
  ) {
    super(message);
    this.name = 'MonitorError';
  }
}

export function isMonitorError(error: unknown): error is MonitorError {
  return error instanceof MonitorError;
}

/**
 * Recoverable errors skip the cycle; the loop carries on.
 * STATE_IO is not recoverable: the cycle must not notify with unsaved state.
 */
export function isRecoverable(code: MonitorErrorCode): boolean {
  return RECOVERABLE_CODES.has(code);
}

export function isFetchError(error: unknown): boolean {
  return isMonitorError(error) && FETCH_CODES.has(error.code);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
