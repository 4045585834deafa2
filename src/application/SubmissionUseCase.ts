import type { SummarySinkPort, SubmitResult } from '../domain/ports/SummarySinkPort.js';
import { sortedSummaries } from '../domain/services/SummaryAggregator.js';
import { errorMessage } from '../domain/errors/DomainErrors.js';
import { Logger } from '../shared/Logger.js';
import type { SessionTracker } from './SessionTracker.js';
import type { SubmissionReport } from './dto/SubmissionReport.js';

export interface SubmitRunOptions {
  /** false = 每個 sink 只嘗試一次（shutdown） */
  retry?: boolean;
  signal?: AbortSignal;
}

/**
 * 提交用例：tracker 快照 → 每個 sink 的 submitBatch → 交還或保留 sessions
 *
 * 流程：
 * 1. beginSubmission() 封存已結束 sessions 並取得 summaries
 * 2. 逐一呼叫 sink（sink 不拋例外，結果皆為 SubmitResult）
 * 3. 沒有 retryable 失敗 → completeSubmission()（terminal 失敗不重送）
 *    否則 abandonSubmission()，資料留給下一輪
 */
export class SubmissionUseCase {
  private readonly logger: Logger;

  constructor(
    private readonly tracker: SessionTracker,
    private readonly sinks: readonly SummarySinkPort[],
    logger?: Logger,
  ) {
    this.logger = logger ?? new Logger('SubmissionUseCase');
  }

  async submit(options: SubmitRunOptions = {}): Promise<SubmissionReport> {
    const startedAt = Date.now();
    const snapshot = this.tracker.beginSubmission();
    const summaries = sortedSummaries(snapshot.summaries);
    const results: SubmitResult[] = [];

    if (summaries.length === 0 || this.sinks.length === 0) {
      this.tracker.completeSubmission(snapshot);
      return this.report(summaries.length, snapshot.sessions.length, results, false, startedAt);
    }

    for (const sink of this.sinks) {
      try {
        results.push(...await sink.submitBatch(summaries, {
          sessions: snapshot.sessions,
          retry: options.retry,
          signal: options.signal,
        }));
      } catch (err) {
        // sink 違反不拋例外的約定時，保留資料下一輪再送
        this.logger.error('Sink threw unexpectedly', { sink: sink.name, error: errorMessage(err) });
        this.tracker.abandonSubmission();
        return this.report(summaries.length, snapshot.sessions.length, results, true, startedAt);
      }
    }

    const retained = results.some((r) => r.status === 'failed' && r.error.classification === 'retryable');
    if (retained) {
      this.tracker.abandonSubmission();
      this.logger.warn('Submission incomplete, keeping sessions for the next round', {
        failed: results.filter((r) => r.status === 'failed').length,
      });
    } else {
      this.tracker.completeSubmission(snapshot);
    }

    const report = this.report(summaries.length, snapshot.sessions.length, results, retained, startedAt);
    this.logger.info('Submission finished', {
      summaries: report.summaries,
      submitted: report.submitted,
      skipped: report.skipped,
      failed: report.failed,
    });
    return report;
  }

  private report(
    summaries: number,
    sessions: number,
    results: SubmitResult[],
    retained: boolean,
    startedAt: number,
  ): SubmissionReport {
    return {
      summaries,
      sessions,
      submitted: results.filter((r) => r.status === 'submitted').length,
      skipped: results.filter((r) => r.status === 'skipped').length,
      failed: results.filter((r) => r.status === 'failed').length,
      retained,
      results,
      durationMs: Date.now() - startedAt,
    };
  }
}
