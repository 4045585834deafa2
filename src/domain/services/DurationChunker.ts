import type { ActivitySummary } from '../entities/ActivitySummary.js';

/**
 * 將超過單筆上限的 summary 切成連續的子 summary
 *
 * - totalDuration <= maxChunkDurationMs：原樣回傳單一元素
 * - 否則切成 ceil(total / max) 段：前 n-1 段各為 max，最後一段為餘數
 * - 每段的 [firstSeen, lastSeen) 為原區間內連續、不重疊的子區間，最後一段的 lastSeen 等於原本的 lastSeen
 * - sessionCount / applicationId / activityDetails 原樣複製（sessionCount 描述來源 sessions，不分攤）
 */
export function chunkSummary(summary: ActivitySummary, maxChunkDurationMs: number): ActivitySummary[] {
  if (!(maxChunkDurationMs > 0)) {
    throw new RangeError(`maxChunkDurationMs must be positive, got ${maxChunkDurationMs}`);
  }
  if (summary.totalDurationMs <= maxChunkDurationMs) {
    return [summary];
  }

  const count = Math.ceil(summary.totalDurationMs / maxChunkDurationMs);
  const chunks: ActivitySummary[] = [];
  let offset = 0;

  for (let i = 0; i < count; i++) {
    const isLast = i === count - 1;
    const duration = isLast ? summary.totalDurationMs - offset : maxChunkDurationMs;
    const firstSeen = Math.min(summary.firstSeen + offset, summary.lastSeen);
    const lastSeen = isLast
      ? summary.lastSeen
      : Math.min(summary.firstSeen + offset + duration, summary.lastSeen);

    chunks.push({
      applicationId: summary.applicationId,
      activityDetails: summary.activityDetails,
      totalDurationMs: duration,
      sessionCount: summary.sessionCount,
      firstSeen,
      lastSeen,
    });
    offset += duration;
  }

  return chunks;
}

/** 對多筆 summary 逐一切段，保持輸入順序 */
export function chunkSummaries(
  summaries: readonly ActivitySummary[],
  maxChunkDurationMs: number,
): ActivitySummary[] {
  return summaries.flatMap((s) => chunkSummary(s, maxChunkDurationMs));
}

/** 硬上限扣掉安全邊界後的切段長度 */
export function safeChunkDuration(hardCapMs: number, marginMs: number): number {
  const size = hardCapMs - marginMs;
  if (size <= 0) {
    throw new RangeError(`chunk margin (${marginMs}ms) must be smaller than the cap (${hardCapMs}ms)`);
  }
  return size;
}
