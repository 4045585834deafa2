import type { ActivitySummary } from '../entities/ActivitySummary.js';
import type { ClosedSession } from '../entities/ActivitySession.js';
import type { FocusTrackError } from '../errors/DomainErrors.js';

export type SubmitResult =
  | { status: 'submitted'; applicationId: string; sink: string; via?: string; chunks?: number }
  | { status: 'skipped'; applicationId: string; sink: string; reason: string }
  | { status: 'failed'; applicationId: string; sink: string; error: FocusTrackError };

export interface SubmitOptions {
  /** 與 summaries 同一批次的已結束 sessions（webhook / SQLite 會一併寫出） */
  sessions?: readonly ClosedSession[];
  /** false = 只嘗試一次（shutdown 時的最後一次送出） */
  retry?: boolean;
  /** 中止後不再重試（shutdown 時中止進行中的定期提交） */
  signal?: AbortSignal;
}

/**
 * 外部 sink 的統一提交介面
 * 不拋出例外：每筆 summary 都回傳一個 SubmitResult，單筆失敗不影響其他筆
 */
export interface SummarySinkPort {
  readonly name: string;
  submit(summary: ActivitySummary, options?: SubmitOptions): Promise<SubmitResult>;
  submitBatch(summaries: readonly ActivitySummary[], options?: SubmitOptions): Promise<SubmitResult[]>;
  close?(): void;
}
