import { z } from 'zod';
import type { ActivitySummary } from '../entities/ActivitySummary.js';
import type { ClosedSession } from '../entities/ActivitySession.js';
import type { ClientEventPayload, LegacyTimePayload } from '../entities/OutboundPayload.js';
import { ValidationError } from '../errors/DomainErrors.js';

const LEGACY_TIMESTAMP_RE = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;
const RFC3339_UTC_RE = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.\d+)?Z$/;

/** 檢查年月日時分秒是否構成真實存在的日曆時間（拒絕 02-30、25:00 等） */
function isCalendarTime(parts: RegExpExecArray): boolean {
  const [year, month, day, hour, minute, second] = parts.slice(1, 7).map(Number);
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  return date.getUTCFullYear() === year
    && date.getUTCMonth() === month - 1
    && date.getUTCDate() === day
    && date.getUTCHours() === hour
    && date.getUTCMinutes() === minute
    && date.getUTCSeconds() === second;
}

export function isLegacyTimestamp(value: string): boolean {
  const match = LEGACY_TIMESTAMP_RE.exec(value);
  return match !== null && isCalendarTime(match);
}

export function isRfc3339Utc(value: string): boolean {
  const match = RFC3339_UTC_RE.exec(value);
  return match !== null && isCalendarTime(match);
}

/** 將第一個 zod issue 轉成 ValidationError（field 為以 . 串接的路徑） */
function parseOrThrow<T>(schema: z.ZodType<T>, value: unknown): T {
  const result = schema.safeParse(value);
  if (result.success) return result.data;
  const issue = result.error.issues[0];
  const field = issue ? issue.path.join('.') : '';
  throw new ValidationError(issue?.message ?? 'invalid payload', field);
}

function legacySchema(maxMinutes: number) {
  return z.object({
    activity_name: z.string().min(1, 'activity_name is required'),
    activity_details: z.string(),
    duration: z.number()
      .int('duration must be a whole number of minutes')
      .positive('duration must be positive')
      .max(maxMinutes, `duration exceeds the limit of ${maxMinutes} minutes`),
    start_time: z.string()
      .min(1, 'start_time is required')
      .refine(isLegacyTimestamp, 'invalid start_time format (expected YYYY-MM-DD HH:MM:SS)'),
  });
}

function eventSchema(maxDurationMs: number) {
  const event = z.object({
    event_description: z.string().min(1, 'event_description is required'),
    application: z.string().min(1, 'application is required'),
    window_title: z.string(),
    start_time: z.string()
      .refine(isRfc3339Utc, 'invalid start_time format (expected RFC 3339 UTC)'),
    end_time: z.string()
      .refine(isRfc3339Utc, 'invalid end_time format (expected RFC 3339 UTC)')
      .optional(),
    /** 秒 */
    duration: z.number().optional(),
  }).superRefine((ev, ctx) => {
    const hasEnd = ev.end_time !== undefined;
    const hasDuration = ev.duration !== undefined;

    if (hasEnd && hasDuration) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'end_time and duration are mutually exclusive',
        path: ['duration'],
      });
      return;
    }
    if (!hasEnd && !hasDuration) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'either end_time or duration is required',
        path: ['end_time'],
      });
      return;
    }

    const durationMs = ev.end_time !== undefined
      ? Date.parse(ev.end_time) - Date.parse(ev.start_time)
      : (ev.duration ?? 0) * 1000;

    if (durationMs <= 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: hasEnd ? 'end_time must be after start_time' : 'duration must be positive',
        path: [hasEnd ? 'end_time' : 'duration'],
      });
    } else if (durationMs > maxDurationMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `duration exceeds the limit of ${Math.floor(maxDurationMs / 60000)} minutes`,
        path: [hasEnd ? 'end_time' : 'duration'],
      });
    }
  });

  return z.object({ user_client_event: event });
}

/**
 * 驗證 legacy payload；上限為包含（duration === maxMinutes 合法）
 * @throws ValidationError
 */
export function validateLegacyPayload(payload: LegacyTimePayload, maxMinutes: number): void {
  parseOrThrow(legacySchema(maxMinutes), payload);
}

/**
 * 驗證 native client event payload
 * @throws ValidationError
 */
export function validateEventPayload(payload: ClientEventPayload, maxDurationMs: number): void {
  parseOrThrow(eventSchema(maxDurationMs), payload);
}

const summarySchema = z.object({
  applicationId: z.string().min(1, 'application id is required'),
  activityDetails: z.string(),
  totalDurationMs: z.number().positive('total duration must be positive'),
  sessionCount: z.number().int().positive('session count must be positive'),
  firstSeen: z.number().positive('first_seen is required'),
  lastSeen: z.number().positive('last_seen is required'),
}).refine((s) => s.lastSeen >= s.firstSeen, {
  message: 'last_seen must be after or equal to first_seen',
  path: ['lastSeen'],
});

const sessionSchema = z.object({
  applicationId: z.string().min(1, 'application id is required'),
  windowTitle: z.string(),
  startTime: z.number().positive('start_time is required'),
  endTime: z.number().positive('end_time is required'),
}).refine((s) => s.endTime >= s.startTime, {
  message: 'end_time must be after start_time',
  path: ['endTime'],
});

/** webhook / SQLite 寫入前的 summary 驗證 */
export function validateSummary(summary: ActivitySummary): void {
  parseOrThrow(summarySchema, summary);
}

export function validateSession(session: ClosedSession): void {
  parseOrThrow(sessionSchema, session);
}
