import type { ClosedSession, OpenSession } from '../entities/ActivitySession.js';
import { sessionDuration } from '../entities/ActivitySession.js';
import type { ActivitySummary } from '../entities/ActivitySummary.js';

/**
 * 將已結束 sessions 與（可選的）open session 摺疊為每個應用程式的 summary
 *
 * - closed session：totalDuration / sessionCount 累加，firstSeen 取最小；
 *   endTime 較晚者覆寫 lastSeen 與 activityDetails（以「最近結束」而非「最近開始」決定標題）
 * - open session 最後處理，以 now 作為暫定結束時間，無條件覆寫 activityDetails / lastSeen
 *
 * 回傳的 Map 依 applicationId 排序插入，迭代順序固定。
 */
export function aggregateSessions(
  closedSessions: readonly ClosedSession[],
  openSession: OpenSession | null,
  now: number,
): Map<string, ActivitySummary> {
  const byApp = new Map<string, ActivitySummary>();

  for (const session of closedSessions) {
    const existing = byApp.get(session.applicationId);
    const duration = sessionDuration(session, now);

    if (!existing) {
      byApp.set(session.applicationId, {
        applicationId: session.applicationId,
        activityDetails: session.windowTitle,
        totalDurationMs: duration,
        sessionCount: 1,
        firstSeen: session.startTime,
        lastSeen: session.endTime,
      });
      continue;
    }

    existing.totalDurationMs += duration;
    existing.sessionCount += 1;
    if (session.startTime < existing.firstSeen) {
      existing.firstSeen = session.startTime;
    }
    if (session.endTime > existing.lastSeen) {
      existing.lastSeen = session.endTime;
      existing.activityDetails = session.windowTitle;
    }
  }

  if (openSession) {
    const duration = sessionDuration(openSession, now);
    const existing = byApp.get(openSession.applicationId);

    if (!existing) {
      byApp.set(openSession.applicationId, {
        applicationId: openSession.applicationId,
        activityDetails: openSession.windowTitle,
        totalDurationMs: duration,
        sessionCount: 1,
        firstSeen: openSession.startTime,
        lastSeen: now,
      });
    } else {
      existing.totalDurationMs += duration;
      existing.sessionCount += 1;
      if (openSession.startTime < existing.firstSeen) {
        existing.firstSeen = openSession.startTime;
      }
      existing.activityDetails = openSession.windowTitle;
      existing.lastSeen = now;
    }
  }

  const ordered = new Map<string, ActivitySummary>();
  for (const key of [...byApp.keys()].sort()) {
    const summary = byApp.get(key);
    if (summary) ordered.set(key, summary);
  }
  return ordered;
}

/** 依 applicationId 排序的 summary 陣列（chunk 順序、報表輸出用） */
export function sortedSummaries(summaries: ReadonlyMap<string, ActivitySummary>): ActivitySummary[] {
  return [...summaries.values()].sort((a, b) =>
    a.applicationId < b.applicationId ? -1 : a.applicationId > b.applicationId ? 1 : 0,
  );
}

export function totalTrackedDuration(summaries: Iterable<ActivitySummary>): number {
  let total = 0;
  for (const summary of summaries) total += summary.totalDurationMs;
  return total;
}
