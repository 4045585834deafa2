import type { ClosedSession } from '../../../domain/entities/ActivitySession.js';
import type { ActivitySummary } from '../../../domain/entities/ActivitySummary.js';
import type { SubmitOptions, SubmitResult } from '../../../domain/ports/SummarySinkPort.js';
import { validateSession, validateSummary } from '../../../domain/services/PayloadValidator.js';
import { errorMessage } from '../../../domain/errors/DomainErrors.js';
import { formatDuration } from '../../../shared/formatDuration.js';
import type { Logger } from '../../../shared/Logger.js';
import type { FetchLike } from '../../http/postJson.js';
import { postJson, redactUrl } from '../../http/postJson.js';
import type { BaseSinkOptions, DeliveryOutcome } from '../BaseSummarySink.js';
import { BaseSummarySink } from '../BaseSummarySink.js';

export interface WebhookSinkOptions extends BaseSinkOptions {
  url: string;
  headers?: Record<string, string>;
  timeoutMs: number;
  source: string;
  version: string;
  includeSessions: boolean;
  fetchImpl?: FetchLike;
  clock?: () => number;
}

export interface WebhookSummary {
  app_class: string;
  activity_details: string;
  total_duration_seconds: number;
  total_duration: string;
  session_count: number;
  first_seen: string;
  last_seen: string;
}

export interface WebhookSession {
  app_class: string;
  window_title: string;
  start_time: string;
  end_time: string;
  duration_seconds: number;
}

export interface WebhookBody {
  timestamp: string;
  source: string;
  version: string;
  summaries: WebhookSummary[];
  sessions?: WebhookSession[];
  metadata: {
    summary_count: number;
    session_count: number;
    submitted: string;
  };
}

export function toWebhookSummary(summary: ActivitySummary): WebhookSummary {
  return {
    app_class: summary.applicationId,
    activity_details: summary.activityDetails,
    total_duration_seconds: Math.round(summary.totalDurationMs / 1000),
    total_duration: formatDuration(summary.totalDurationMs),
    session_count: summary.sessionCount,
    first_seen: new Date(summary.firstSeen).toISOString(),
    last_seen: new Date(summary.lastSeen).toISOString(),
  };
}

export function toWebhookSession(session: ClosedSession): WebhookSession {
  return {
    app_class: session.applicationId,
    window_title: session.windowTitle,
    start_time: new Date(session.startTime).toISOString(),
    end_time: new Date(session.endTime).toISOString(),
    duration_seconds: Math.round((session.endTime - session.startTime) / 1000),
  };
}

/**
 * 通用 webhook sink：一個批次只送一次 POST
 * 未通過驗證的 summary 個別回報失敗；其餘共用同一個 HTTP 結果
 */
export class WebhookSink extends BaseSummarySink {
  readonly name = 'webhook';
  private readonly clock: () => number;

  constructor(private readonly options: WebhookSinkOptions, logger: Logger) {
    super(options, logger);
    this.clock = options.clock ?? Date.now;
  }

  protected async deliver(summary: ActivitySummary, options: SubmitOptions): Promise<DeliveryOutcome> {
    validateSummary(summary);
    await this.post([summary], options);
    return { via: 'webhook' };
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

    if (deliverable.length === 0) return results;

    try {
      await this.post(deliverable, options);
      for (const summary of deliverable) {
        results.push({ status: 'submitted', applicationId: summary.applicationId, sink: this.name, via: 'webhook' });
      }
    } catch (err) {
      for (const summary of deliverable) {
        results.push(this.failure(summary.applicationId, err));
      }
    }
    return results;
  }

  /** 組出 webhook body；不合法的 session 會被略過 */
  buildBody(summaries: readonly ActivitySummary[], sessions: readonly ClosedSession[] = []): WebhookBody {
    const now = new Date(this.clock()).toISOString();
    const body: WebhookBody = {
      timestamp: now,
      source: this.options.source,
      version: this.options.version,
      summaries: summaries.map(toWebhookSummary),
      metadata: {
        summary_count: summaries.length,
        session_count: 0,
        submitted: now,
      },
    };

    if (this.options.includeSessions) {
      const valid = sessions.filter((session) => {
        try {
          validateSession(session);
          return true;
        } catch (err) {
          this.logger.warn('Dropping invalid session from webhook batch', {
            applicationId: session.applicationId,
            error: errorMessage(err),
          });
          return false;
        }
      });
      body.sessions = valid.map(toWebhookSession);
      body.metadata.session_count = valid.length;
    }
    return body;
  }

  private async post(summaries: readonly ActivitySummary[], options: SubmitOptions): Promise<void> {
    const body = this.buildBody(summaries, options.sessions);
    await this.retrying(
      () => postJson(this.options.url, body, {
        timeoutMs: this.options.timeoutMs,
        headers: this.options.headers,
        fetchImpl: this.options.fetchImpl,
      }),
      options,
      'webhook',
    );
    this.logger.info('Webhook batch delivered', {
      url: redactUrl(this.options.url),
      summaries: summaries.length,
      sessions: body.metadata.session_count,
    });
  }
}
