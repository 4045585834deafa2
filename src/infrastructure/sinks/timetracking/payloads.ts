import type { ActivitySummary } from '../../../domain/entities/ActivitySummary.js';
import type { ClientEventPayload, LegacyTimePayload } from '../../../domain/entities/OutboundPayload.js';

const MINUTE_MS = 60_000;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** 本地時區的 `YYYY-MM-DD HH:MM:SS` */
export function formatLocalTimestamp(epochMs: number): string {
  const d = new Date(epochMs);
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} `
    + `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

/** RFC 3339 UTC，不含毫秒 */
export function formatRfc3339(epochMs: number): string {
  return new Date(Math.floor(epochMs / 1000) * 1000).toISOString().replace('.000Z', 'Z');
}

/** summary → legacy offline time；duration 以分鐘無條件進位 */
export function toLegacyPayload(summary: ActivitySummary): LegacyTimePayload {
  return {
    start_time: formatLocalTimestamp(summary.firstSeen),
    duration: Math.ceil(summary.totalDurationMs / MINUTE_MS),
    activity_name: summary.applicationId,
    activity_details: summary.activityDetails,
  };
}

/** summary → native client event；end_time = firstSeen + 累計時長 */
export function toClientEvent(summary: ActivitySummary): ClientEventPayload {
  return {
    user_client_event: {
      event_description: summary.applicationId,
      start_time: formatRfc3339(summary.firstSeen),
      end_time: formatRfc3339(summary.firstSeen + summary.totalDurationMs),
      window_title: summary.activityDetails,
      application: summary.applicationId,
    },
  };
}
