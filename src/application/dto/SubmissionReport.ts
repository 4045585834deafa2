import type { SubmitResult } from '../../domain/ports/SummarySinkPort.js';

/** 單次提交的統計 */
export interface SubmissionReport {
  summaries: number;
  sessions: number;
  submitted: number;
  skipped: number;
  failed: number;
  /** 有 retryable 失敗時為 true：tracker 保留資料，下一輪重送 */
  retained: boolean;
  results: SubmitResult[];
  durationMs: number;
}
