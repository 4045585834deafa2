import type { ClosedSession } from '../../domain/entities/ActivitySession.js';
import type { ActivitySummary } from '../../domain/entities/ActivitySummary.js';
import type { SubmissionReport } from '../../application/dto/SubmissionReport.js';
import type { SeenApplication } from '../../application/dto/SeenApplication.js';
import type { StoredSummary } from '../../infrastructure/sinks/sqlite/SqliteSummarySink.js';
import { buildSummaryExport, formatActivityReport } from '../../infrastructure/export/SummaryExporter.js';
import { formatDuration } from '../../shared/formatDuration.js';

export type OutputFormat = 'json' | 'text';

export function parseOutputFormat(value: string): OutputFormat {
  if (value === 'json' || value === 'text') return value;
  throw new Error(`--format must be json or text (got "${value}")`);
}

function localTime(epochMs: number): string {
  return new Date(epochMs).toLocaleString();
}

/**
 * CLI 輸出格式化：json 給程式讀，text 給人看
 */
export class SummaryFormatter {
  formatSummaries(summaries: readonly ActivitySummary[], format: OutputFormat, now: number = Date.now()): string {
    if (format === 'json') {
      return JSON.stringify(buildSummaryExport(summaries, now), null, 2);
    }
    return formatActivityReport(summaries).trimEnd();
  }

  formatStoredSummaries(rows: readonly StoredSummary[], format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(rows, null, 2);
    }
    if (rows.length === 0) return 'No stored summaries.';

    return rows.map((r) => {
      const head = `[${localTime(r.submittedAt)}] ${r.applicationId}: `
        + `${formatDuration(r.totalDurationSeconds * 1000)} - ${r.sessionCount} sessions`;
      return r.activityDetails ? `${head}\n  └─ ${r.activityDetails}` : head;
    }).join('\n');
  }

  formatSessions(sessions: readonly ClosedSession[], format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(sessions, null, 2);
    }
    if (sessions.length === 0) return 'No stored sessions.';

    return sessions.map((s) =>
      `${localTime(s.startTime)}  ${formatDuration(s.endTime - s.startTime).padStart(8)}  ${s.applicationId}`
      + (s.windowTitle ? `  ${s.windowTitle}` : ''),
    ).join('\n');
  }

  formatIgnoreList(applications: readonly string[], format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(applications, null, 2);
    }
    if (applications.length === 0) return 'No ignored applications.';
    return applications.map((a) => `- ${a}`).join('\n');
  }

  /** discover 的編號清單（1 起算） */
  formatSeenApplications(seen: readonly SeenApplication[]): string {
    return seen.map((app, i) => {
      const mark = app.alreadyIgnored ? ' (ignored)' : '';
      const title = app.windowTitle ? ` - ${app.windowTitle}` : '';
      return `${String(i + 1).padStart(3)}. ${app.applicationId}${mark}${title}`;
    }).join('\n');
  }

  formatSubmissionReport(report: SubmissionReport, format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify({
        ...report,
        results: report.results.map((r) => (r.status === 'failed'
          ? { ...r, error: { code: r.error.code, message: r.error.message } }
          : r)),
      }, null, 2);
    }

    const lines = [
      `Submitted: ${report.submitted}, skipped: ${report.skipped}, failed: ${report.failed}`,
    ];
    for (const r of report.results) {
      if (r.status === 'failed') {
        lines.push(`  ✗ [${r.sink}] ${r.applicationId}: ${r.error.message}`);
      }
    }
    return lines.join('\n');
  }
}
