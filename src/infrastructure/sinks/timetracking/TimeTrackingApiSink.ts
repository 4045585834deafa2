import type { ActivitySummary } from '../../../domain/entities/ActivitySummary.js';
import type { SubmitOptions } from '../../../domain/ports/SummarySinkPort.js';
import { chunkSummary, safeChunkDuration } from '../../../domain/services/DurationChunker.js';
import { errorMessage } from '../../../domain/errors/DomainErrors.js';
import type { Logger } from '../../../shared/Logger.js';
import type { BaseSinkOptions, DeliveryOutcome } from '../BaseSummarySink.js';
import { BaseSummarySink } from '../BaseSummarySink.js';
import type { StrategyHttpOptions, SubmissionStrategy, TimeTrackingCredentials } from './strategies.js';
import { LegacyOfflineStrategy, NativeEventStrategy } from './strategies.js';

export interface TimeTrackingSinkOptions extends BaseSinkOptions {
  credentials: TimeTrackingCredentials;
  /** 單筆 entry 的硬上限（分鐘） */
  maxEntryMinutes: number;
  /** 切段時保留在上限之下的邊界（分鐘） */
  chunkMarginMinutes: number;
  /** 先試 native，失敗再退回 legacy */
  preferNative: boolean;
  http: StrategyHttpOptions;
  /** 覆寫預設端點 */
  endpoints?: { legacy?: string; native?: string };
}

/** 依可用的憑證組出策略順序 */
export function buildStrategies(options: TimeTrackingSinkOptions): SubmissionStrategy[] {
  const { credentials, maxEntryMinutes, http, endpoints } = options;
  const strategies: SubmissionStrategy[] = [];

  // 只有 legacy key 時不走 client event 端點
  const hasNativeCredentials = Boolean(credentials.accountKey ?? credentials.dataKey);
  if (options.preferNative && hasNativeCredentials) {
    strategies.push(new NativeEventStrategy(credentials, maxEntryMinutes, http, endpoints?.native));
  }
  if (credentials.apiKey) {
    strategies.push(new LegacyOfflineStrategy(credentials.apiKey, maxEntryMinutes, http, endpoints?.legacy));
  }
  return strategies;
}

/**
 * Time-tracking API sink
 *
 * 每筆 summary 先依 (maxEntryMinutes - chunkMarginMinutes) 切段，每段依序走策略鏈：
 * 單一策略內依 RetryPolicy 重試 retryable 錯誤；仍失敗則退到下一個策略，全部失敗才回報失敗。
 */
export class TimeTrackingApiSink extends BaseSummarySink {
  readonly name = 'timetracking';
  private readonly strategies: SubmissionStrategy[];
  private readonly chunkSizeMs: number;

  constructor(options: TimeTrackingSinkOptions, logger: Logger) {
    super(options, logger);
    this.strategies = buildStrategies(options);
    if (this.strategies.length === 0) {
      throw new Error('time-tracking sink needs at least one API key');
    }
    this.chunkSizeMs = safeChunkDuration(
      options.maxEntryMinutes * 60_000,
      options.chunkMarginMinutes * 60_000,
    );
  }

  protected async deliver(summary: ActivitySummary, options: SubmitOptions): Promise<DeliveryOutcome> {
    const chunks = chunkSummary(summary, this.chunkSizeMs);
    const used = new Set<string>();

    for (const chunk of chunks) {
      used.add(await this.sendChunk(chunk, options));
    }

    if (chunks.length > 1) {
      this.logger.info('Submitted summary in chunks', {
        applicationId: summary.applicationId,
        chunks: chunks.length,
      });
    }
    return { via: [...used].join(','), chunks: chunks.length };
  }

  private async sendChunk(chunk: ActivitySummary, options: SubmitOptions): Promise<string> {
    let lastError: unknown;

    for (const [index, strategy] of this.strategies.entries()) {
      try {
        await this.retrying(() => strategy.send(chunk), options, strategy.name);
        return strategy.name;
      } catch (err) {
        lastError = err;
        const next = this.strategies[index + 1];
        if (next) {
          this.logger.warn('Submission strategy failed, falling back', {
            applicationId: chunk.applicationId,
            from: strategy.name,
            to: next.name,
            error: errorMessage(err),
          });
        }
      }
    }

    throw lastError;
  }
}
