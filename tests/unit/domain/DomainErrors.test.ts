import { describe, it, expect } from 'vitest';
import {
  FocusTrackError,
  SinkRejectionError,
  SinkTransportError,
  SourceUnavailableError,
  ValidationError,
  errorMessage,
  isRetryable,
} from '../../../src/domain/errors/DomainErrors.js';

describe('DomainErrors', () => {
  it('should classify each error type', () => {
    expect(new SourceUnavailableError('no bus').classification).toBe('transient');
    expect(new SinkTransportError('503', 503).classification).toBe('retryable');
    expect(new ValidationError('bad', 'duration').classification).toBe('terminal');
    expect(new SinkRejectionError('401', 401).classification).toBe('terminal');
  });

  it('should expose codes and names', () => {
    const err = new SinkTransportError('timeout');
    expect(err).toBeInstanceOf(FocusTrackError);
    expect(err).toBeInstanceOf(Error);
    expect(err.code).toBe('SINK_TRANSPORT');
    expect(err.name).toBe('SinkTransportError');
    expect(err.status).toBeUndefined();
  });

  it('should keep the cause', () => {
    const cause = new Error('ECONNRESET');
    expect(new SinkTransportError('failed', undefined, { cause }).cause).toBe(cause);
  });

  it('should only retry transport errors', () => {
    expect(isRetryable(new SinkTransportError('503', 503))).toBe(true);
    expect(isRetryable(new SinkRejectionError('400', 400))).toBe(false);
    expect(isRetryable(new ValidationError('bad', 'x'))).toBe(false);
    expect(isRetryable(new Error('unknown'))).toBe(false);
    expect(isRetryable('string')).toBe(false);
  });

  it('should render messages of thrown values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });
});
