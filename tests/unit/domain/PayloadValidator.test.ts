import { describe, it, expect } from 'vitest';
import {
  isLegacyTimestamp,
  isRfc3339Utc,
  validateEventPayload,
  validateLegacyPayload,
  validateSession,
  validateSummary,
} from '../../../src/domain/services/PayloadValidator.js';
import { ValidationError } from '../../../src/domain/errors/DomainErrors.js';
import type { ClientEventPayload, LegacyTimePayload } from '../../../src/domain/entities/OutboundPayload.js';

const MAX_MS = 240 * 60_000;

function legacy(overrides: Partial<LegacyTimePayload> = {}): LegacyTimePayload {
  return {
    start_time: '2024-03-05 09:30:00',
    duration: 45,
    activity_name: 'code',
    activity_details: 'main.ts',
    ...overrides,
  };
}

function event(overrides: Partial<ClientEventPayload['user_client_event']> = {}): ClientEventPayload {
  return {
    user_client_event: {
      event_description: 'code',
      start_time: '2024-03-05T09:30:00Z',
      end_time: '2024-03-05T10:15:00Z',
      window_title: 'main.ts',
      application: 'code',
      ...overrides,
    },
  };
}

function captureError(fn: () => void): ValidationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError) return err;
    throw err;
  }
  throw new Error('expected a ValidationError');
}

describe('PayloadValidator', () => {
  describe('timestamps', () => {
    it('should accept real calendar times only', () => {
      expect(isLegacyTimestamp('2024-02-29 23:59:59')).toBe(true);
      expect(isLegacyTimestamp('2023-02-29 10:00:00')).toBe(false);
      expect(isLegacyTimestamp('2024-03-05T09:30:00')).toBe(false);
      expect(isRfc3339Utc('2024-03-05T09:30:00Z')).toBe(true);
      expect(isRfc3339Utc('2024-03-05T09:30:00.250Z')).toBe(true);
      expect(isRfc3339Utc('2024-03-05T25:00:00Z')).toBe(false);
    });
  });

  describe('validateLegacyPayload', () => {
    it('should accept a well-formed payload', () => {
      expect(() => validateLegacyPayload(legacy(), 240)).not.toThrow();
    });

    it('should accept a duration equal to the limit', () => {
      expect(() => validateLegacyPayload(legacy({ duration: 240 }), 240)).not.toThrow();
    });

    it('should reject a duration over the limit', () => {
      const err = captureError(() => validateLegacyPayload(legacy({ duration: 300 }), 240));
      expect(err.message).toBe('duration exceeds the limit of 240 minutes');
      expect(err.field).toBe('duration');
      expect(err.classification).toBe('terminal');
    });

    it('should reject an empty activity name', () => {
      const err = captureError(() => validateLegacyPayload(legacy({ activity_name: '' }), 240));
      expect(err.message).toBe('activity_name is required');
    });

    it('should reject zero and fractional durations', () => {
      expect(captureError(() => validateLegacyPayload(legacy({ duration: 0 }), 240)).message)
        .toBe('duration must be positive');
      expect(captureError(() => validateLegacyPayload(legacy({ duration: 1.5 }), 240)).message)
        .toBe('duration must be a whole number of minutes');
    });

    it('should reject a malformed start time', () => {
      const err = captureError(() => validateLegacyPayload(legacy({ start_time: '05/03/2024 09:30' }), 240));
      expect(err.message).toBe('invalid start_time format (expected YYYY-MM-DD HH:MM:SS)');
      expect(err.field).toBe('start_time');
    });
  });

  describe('validateEventPayload', () => {
    it('should accept an event with an end time', () => {
      expect(() => validateEventPayload(event(), MAX_MS)).not.toThrow();
    });

    it('should accept an event with a duration instead of an end time', () => {
      expect(() => validateEventPayload(event({ end_time: undefined, duration: 600 }), MAX_MS)).not.toThrow();
    });

    it('should reject end_time together with duration', () => {
      const err = captureError(() => validateEventPayload(event({ duration: 600 }), MAX_MS));
      expect(err.message).toBe('end_time and duration are mutually exclusive');
      expect(err.field).toBe('user_client_event.duration');
    });

    it('should require end_time or duration', () => {
      const err = captureError(() => validateEventPayload(event({ end_time: undefined }), MAX_MS));
      expect(err.message).toBe('either end_time or duration is required');
    });

    it('should reject an end time before the start time', () => {
      const err = captureError(() => validateEventPayload(event({ end_time: '2024-03-05T09:00:00Z' }), MAX_MS));
      expect(err.message).toBe('end_time must be after start_time');
    });

    it('should reject events longer than the limit', () => {
      const err = captureError(() => validateEventPayload(event({ end_time: '2024-03-05T14:00:00Z' }), MAX_MS));
      expect(err.message).toBe('duration exceeds the limit of 240 minutes');
    });

    it('should reject an empty application', () => {
      const err = captureError(() => validateEventPayload(event({ application: '' }), MAX_MS));
      expect(err.message).toBe('application is required');
    });
  });

  describe('validateSummary / validateSession', () => {
    const base = {
      applicationId: 'code',
      activityDetails: 'main.ts',
      totalDurationMs: 600_000,
      sessionCount: 2,
      firstSeen: 1_700_000_000_000,
      lastSeen: 1_700_000_600_000,
    };

    it('should accept a valid summary', () => {
      expect(() => validateSummary(base)).not.toThrow();
    });

    it('should reject a summary whose range is inverted', () => {
      const err = captureError(() => validateSummary({ ...base, lastSeen: base.firstSeen - 1 }));
      expect(err.message).toBe('last_seen must be after or equal to first_seen');
    });

    it('should reject a summary without an application id', () => {
      expect(captureError(() => validateSummary({ ...base, applicationId: '' })).message)
        .toBe('application id is required');
    });

    it('should reject a session that ends before it starts', () => {
      const err = captureError(() => validateSession({
        applicationId: 'code', windowTitle: '', startTime: 2_000, endTime: 1_000,
      }));
      expect(err.message).toBe('end_time must be after start_time');
    });
  });
});
