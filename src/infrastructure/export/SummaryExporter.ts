import fs from 'node:fs/promises';
import path from 'node:path';
import type { ActivitySummary } from '../../domain/entities/ActivitySummary.js';
import { totalTrackedDuration } from '../../domain/services/SummaryAggregator.js';
import { formatDuration } from '../../shared/formatDuration.js';

export interface ExportedSummary {
  app_class: string;
  activity_details: string;
  total_duration: string;
  session_count: number;
  first_seen: string;
  last_seen: string;
}

export interface SummaryExport {
  timestamp: string;
  summaries: ExportedSummary[];
}

export function buildSummaryExport(summaries: readonly ActivitySummary[], now: number): SummaryExport {
  return {
    timestamp: new Date(now).toISOString(),
    summaries: summaries.map((s) => ({
      app_class: s.applicationId,
      activity_details: s.activityDetails,
      total_duration: formatDuration(s.totalDurationMs),
      session_count: s.sessionCount,
      first_seen: new Date(s.firstSeen).toISOString(),
      last_seen: new Date(s.lastSeen).toISOString(),
    })),
  };
}

/** 寫出 JSON summary 檔（暫存檔 + rename） */
export async function writeSummaryFile(
  filePath: string,
  summaries: readonly ActivitySummary[],
  now: number,
): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.tmp`;
  await fs.writeFile(tmp, JSON.stringify(buildSummaryExport(summaries, now), null, 2) + '\n', 'utf-8');
  await fs.rename(tmp, filePath);
}

/**
 * 純文字活動報表，依時長由大到小
 *
 *   firefox: 1h0m0s (75.0%) - 3 sessions
 *     └─ Docs
 */
export function formatActivityReport(summaries: readonly ActivitySummary[]): string {
  if (summaries.length === 0) return 'No activity recorded.\n';

  const total = totalTrackedDuration(summaries);
  const sorted = [...summaries].sort((a, b) => b.totalDurationMs - a.totalDurationMs
    || a.applicationId.localeCompare(b.applicationId));

  const lines = [`Total tracked: ${formatDuration(total)}`, ''];
  for (const s of sorted) {
    const pct = total > 0 ? (s.totalDurationMs / total) * 100 : 0;
    const noun = s.sessionCount === 1 ? 'session' : 'sessions';
    lines.push(`${s.applicationId}: ${formatDuration(s.totalDurationMs)} (${pct.toFixed(1)}%) - ${s.sessionCount} ${noun}`);
    if (s.activityDetails) {
      lines.push(`  └─ ${s.activityDetails}`);
    }
  }
  return lines.join('\n') + '\n';
}
