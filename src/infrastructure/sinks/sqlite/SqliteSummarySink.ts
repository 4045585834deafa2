import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { ClosedSession } from '../../../domain/entities/ActivitySession.js';
import type { ActivitySummary } from '../../../domain/entities/ActivitySummary.js';
import {
  SinkRejectionError,
  SinkTransportError,
  errorMessage,
} from '../../../domain/errors/DomainErrors.js';
import type { SubmitOptions, SubmitResult } from '../../../domain/ports/SummarySinkPort.js';
import { validateSession, validateSummary } from '../../../domain/services/PayloadValidator.js';
import type { Logger } from '../../../shared/Logger.js';
import type { DatabaseManager } from '../../sqlite/DatabaseManager.js';
import type { BaseSinkOptions, DeliveryOutcome } from '../BaseSummarySink.js';
import { BaseSummarySink } from '../BaseSummarySink.js';

export interface SqliteSinkOptions extends BaseSinkOptions {
  clock?: () => number;
}

export interface StoredSummary {
  applicationId: string;
  activityDetails: string;
  totalDurationSeconds: number;
  sessionCount: number;
  firstSeen: number;
  lastSeen: number;
  submittedAt: number;
}

const summaryRowSchema = z.object({
  app_class: z.string(),
  activity_details: z.string(),
  total_duration_seconds: z.number(),
  session_count: z.number(),
  first_seen: z.number(),
  last_seen: z.number(),
  submitted_at: z.number(),
});

const sessionRowSchema = z.object({
  app_class: z.string(),
  window_title: z.string(),
  start_time: z.number(),
  end_time: z.number(),
});

function isBusyError(err: unknown): boolean {
  return typeof err === 'object'
    && err !== null
    && 'code' in err
    && typeof err.code === 'string'
    && err.code.startsWith('SQLITE_BUSY');
}

/** SQLITE_BUSY / LOCKED 可重試，其餘（constraint 等）視為拒收 */
function classifySqliteError(err: unknown): Error {
  if (isBusyError(err)) {
    return new SinkTransportError(`database is busy: ${errorMessage(err)}`, undefined, { cause: err });
  }
  return new SinkRejectionError(`database write failed: ${errorMessage(err)}`, undefined, { cause: err });
}

/**
 * 本地 SQLite sink：summaries 與 sessions 在同一個 transaction 內寫入
 */
export class SqliteSummarySink extends BaseSummarySink {
  readonly name = 'sqlite';
  private readonly db: Database.Database;
  private readonly clock: () => number;
  private readonly insertSummary: Database.Statement;
  private readonly insertSession: Database.Statement;

  constructor(private readonly manager: DatabaseManager, options: SqliteSinkOptions, logger: Logger) {
    super(options, logger);
    this.db = manager.getDb();
    this.clock = options.clock ?? Date.now;
    this.insertSummary = this.db.prepare(`
      INSERT INTO activity_summaries
        (app_class, activity_details, total_duration_seconds, session_count, first_seen, last_seen, submitted_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `);
    this.insertSession = this.db.prepare(`
      INSERT INTO activity_sessions
        (start_time, end_time, app_class, window_title, duration_seconds, created_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `);
  }

  protected async deliver(summary: ActivitySummary, options: SubmitOptions): Promise<DeliveryOutcome> {
    validateSummary(summary);
    await this.write([summary], [], options);
    return { via: 'sqlite' };
  }

  override async submitBatch(
    summaries: readonly ActivitySummary[],
    options: SubmitOptions = {},
  ): Promise<SubmitResult[]> {
    const results: SubmitResult[] = [];
    const deliverable: ActivitySummary[] = [];

    for (const summary of summaries) {
      const reason = this.skipReason(summary);
      if (reason) {
        results.push({ status: 'skipped', applicationId: summary.applicationId, sink: this.name, reason });
        continue;
      }
      try {
        validateSummary(summary);
        deliverable.push(summary);
      } catch (err) {
        results.push(this.failure(summary.applicationId, err));
      }
    }

    const sessions = (options.sessions ?? []).filter((session) => {
      try {
        validateSession(session);
        return true;
      } catch (err) {
        this.logger.warn('Dropping invalid session', {
          applicationId: session.applicationId,
          error: errorMessage(err),
        });
        return false;
      }
    });

    if (deliverable.length === 0 && sessions.length === 0) return results;

    try {
      await this.write(deliverable, sessions, options);
      for (const summary of deliverable) {
        results.push({ status: 'submitted', applicationId: summary.applicationId, sink: this.name, via: 'sqlite' });
      }
    } catch (err) {
      for (const summary of deliverable) {
        results.push(this.failure(summary.applicationId, err));
      }
    }
    return results;
  }

  /** 最近寫入的 summaries（新到舊） */
  recentSummaries(limit = 20): StoredSummary[] {
    const rows: unknown[] = this.db.prepare(`
      SELECT app_class, activity_details, total_duration_seconds, session_count, first_seen, last_seen, submitted_at
      FROM activity_summaries
      ORDER BY submitted_at DESC, summary_id DESC
      LIMIT ?
    `).all(limit);

    return rows.map((row) => {
      const r = summaryRowSchema.parse(row);
      return {
        applicationId: r.app_class,
        activityDetails: r.activity_details,
        totalDurationSeconds: r.total_duration_seconds,
        sessionCount: r.session_count,
        firstSeen: r.first_seen,
        lastSeen: r.last_seen,
        submittedAt: r.submitted_at,
      };
    });
  }

  /** 最近的 sessions（依開始時間新到舊） */
  recentSessions(limit = 50): ClosedSession[] {
    const rows: unknown[] = this.db.prepare(`
      SELECT app_class, window_title, start_time, end_time
      FROM activity_sessions
      ORDER BY start_time DESC, session_id DESC
      LIMIT ?
    `).all(limit);

    return rows.map((row) => {
      const r = sessionRowSchema.parse(row);
      return {
        applicationId: r.app_class,
        windowTitle: r.window_title,
        startTime: r.start_time,
        endTime: r.end_time,
      };
    });
  }

  close(): void {
    this.manager.close();
  }

  private write(
    summaries: readonly ActivitySummary[],
    sessions: readonly ClosedSession[],
    options: SubmitOptions,
  ): Promise<void> {
    const now = this.clock();
    const insertAll = this.db.transaction(() => {
      for (const s of summaries) {
        this.insertSummary.run(
          s.applicationId,
          s.activityDetails,
          Math.round(s.totalDurationMs / 1000),
          s.sessionCount,
          s.firstSeen,
          s.lastSeen,
          now,
        );
      }
      for (const session of sessions) {
        this.insertSession.run(
          session.startTime,
          session.endTime,
          session.applicationId,
          session.windowTitle,
          Math.round((session.endTime - session.startTime) / 1000),
          now,
        );
      }
    });

    return this.retrying(async () => {
      try {
        insertAll();
      } catch (err) {
        throw classifySqliteError(err);
      }
      this.logger.debug('Stored batch', { summaries: summaries.length, sessions: sessions.length });
    }, options, 'sqlite');
  }
}
