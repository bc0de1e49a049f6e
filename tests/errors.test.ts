import { describe, expect, it } from 'vitest';
import { MonitorError, isFetchError, isMonitorError, isRecoverable, toError } from '../src/modules/nysi/errors';

describe('MonitorError', () => {
  it('carries a code, ticker and cause', () => {
    const cause = new Error('ECONNRESET');
    const error = new MonitorError('Request failed', 'SOURCE_UNAVAILABLE', '$NYSI', cause);

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('MonitorError');
    expect(error.code).toBe('SOURCE_UNAVAILABLE');
    expect(error.ticker).toBe('$NYSI');
    expect(error.cause).toBe(cause);
    expect(isMonitorError(error)).toBe(true);
    expect(isMonitorError(cause)).toBe(false);
  });

  it('classifies codes', () => {
    expect(isRecoverable('SOURCE_UNAVAILABLE')).toBe(true);
    expect(isRecoverable('EMPTY_SERIES')).toBe(true);
    expect(isRecoverable('INSUFFICIENT_DATA')).toBe(true);
    expect(isRecoverable('DELIVERY_FAILURE')).toBe(true);
    expect(isRecoverable('STATE_IO')).toBe(false);
    expect(isRecoverable('INVALID_CONFIG')).toBe(false);

    expect(isFetchError(new MonitorError('x', 'EMPTY_SERIES'))).toBe(true);
    expect(isFetchError(new MonitorError('x', 'INSUFFICIENT_DATA'))).toBe(false);
    expect(isFetchError(new Error('x'))).toBe(false);
  });

  it('wraps non-errors', () => {
    expect(toError('boom').message).toBe('boom');
  });
});
