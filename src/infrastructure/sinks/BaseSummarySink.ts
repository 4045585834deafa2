import type { ActivitySummary } from '../../domain/entities/ActivitySummary.js';
import {
  FocusTrackError,
  SinkRejectionError,
  errorMessage,
  isRetryable,
} from '../../domain/errors/DomainErrors.js';
import type { SubmitOptions, SubmitResult, SummarySinkPort } from '../../domain/ports/SummarySinkPort.js';
import { formatDuration } from '../../shared/formatDuration.js';
import type { Logger } from '../../shared/Logger.js';
import { withRetry } from '../../shared/RetryPolicy.js';

export interface SinkRetrySettings {
  maxRetries: number;
  baseDelayMs: number;
}

export interface BaseSinkOptions {
  /** 低於此時長的 summary 直接略過（不算失敗） */
  minSubmitDurationMs: number;
  retry: SinkRetrySettings;
  /** 測試用：替換重試等待 */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface DeliveryOutcome {
  via?: string;
  chunks?: number;
}

/**
 * Sink 共用流程：最低時長過濾 → deliver → 將結果 / 例外轉為 SubmitResult
 *
 * 子類別只實作 deliver()；deliver 拋出的錯誤依分類記錄：
 * terminal 以 error 等級（含 applicationId 與原因），retryable（重試用盡）以 warn 等級。
 */
export abstract class BaseSummarySink implements SummarySinkPort {
  abstract readonly name: string;

  protected constructor(
    protected readonly base: BaseSinkOptions,
    protected readonly logger: Logger,
  ) {}

  async submit(summary: ActivitySummary, options: SubmitOptions = {}): Promise<SubmitResult> {
    const reason = this.skipReason(summary);
    if (reason) {
      this.logger.debug('Skipping summary', { applicationId: summary.applicationId, reason });
      return { status: 'skipped', applicationId: summary.applicationId, sink: this.name, reason };
    }

    try {
      const outcome = await this.deliver(summary, options);
      return {
        status: 'submitted',
        applicationId: summary.applicationId,
        sink: this.name,
        ...outcome,
      };
    } catch (err) {
      return this.failure(summary.applicationId, err);
    }
  }

  /** 逐筆提交；單筆失敗不影響其他筆 */
  async submitBatch(
    summaries: readonly ActivitySummary[],
    options: SubmitOptions = {},
  ): Promise<SubmitResult[]> {
    const results: SubmitResult[] = [];
    for (const summary of summaries) {
      results.push(await this.submit(summary, options));
    }
    return results;
  }

  protected abstract deliver(summary: ActivitySummary, options: SubmitOptions): Promise<DeliveryOutcome>;

  protected skipReason(summary: ActivitySummary): string | undefined {
    if (summary.totalDurationMs < this.base.minSubmitDurationMs) {
      return `duration ${formatDuration(summary.totalDurationMs)} is below the ${formatDuration(this.base.minSubmitDurationMs)} floor`;
    }
    return undefined;
  }

  /** 依 sink 的重試設定執行；options.retry === false 時只嘗試一次 */
  protected retrying<T>(operation: () => Promise<T>, options: SubmitOptions, label: string): Promise<T> {
    return withRetry(operation, {
      maxRetries: options.retry === false ? 0 : this.base.retry.maxRetries,
      baseDelayMs: this.base.retry.baseDelayMs,
      isRetryable,
      sleep: this.base.sleep,
      signal: options.signal,
      onRetry: (attempt, err, delayMs) => {
        this.logger.debug('Retrying submission', {
          label,
          attempt,
          delayMs,
          error: errorMessage(err),
        });
      },
    });
  }

  protected failure(applicationId: string, err: unknown): SubmitResult {
    const error = err instanceof FocusTrackError
      ? err
      : new SinkRejectionError(errorMessage(err), undefined, { cause: err });

    if (error.classification === 'retryable') {
      this.logger.warn('Submission failed after retries', {
        sink: this.name,
        applicationId,
        error: error.message,
      });
    } else {
      this.logger.error('Submission rejected', {
        sink: this.name,
        applicationId,
        code: error.code,
        error: error.message,
      });
    }

    return { status: 'failed', applicationId, sink: this.name, error };
  }
}
