export type ErrorClassification = 'transient' | 'retryable' | 'terminal';

/** 所有 focustrack domain 錯誤的基底類別 */
export abstract class FocusTrackError extends Error {
  abstract readonly classification: ErrorClassification;
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

// --- Transient：略過本輪 poll，下一輪再試 ---

export class SourceUnavailableError extends FocusTrackError {
  readonly classification = 'transient' as const;
  readonly code = 'SOURCE_UNAVAILABLE';
}

// --- Retryable：依 sink 的重試策略重送 ---

export class SinkTransportError extends FocusTrackError {
  readonly classification = 'retryable' as const;
  readonly code = 'SINK_TRANSPORT';

  constructor(
    message: string,
    /** HTTP 狀態碼（5xx）；網路錯誤時為 undefined */
    public readonly status?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

// --- Terminal：丟棄該筆 summary，繼續處理其他 ---

export class ValidationError extends FocusTrackError {
  readonly classification = 'terminal' as const;
  readonly code = 'VALIDATION_FAILED';

  constructor(
    message: string,
    public readonly field: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

export class SinkRejectionError extends FocusTrackError {
  readonly classification = 'terminal' as const;
  readonly code = 'SINK_REJECTED';

  constructor(
    message: string,
    /** HTTP 狀態碼（4xx）；非 HTTP sink 為 undefined */
    public readonly status?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

/** 只有 retryable 分類的錯誤會被重試，未知錯誤一律視為不可重試 */
export function isRetryable(err: unknown): boolean {
  return err instanceof FocusTrackError && err.classification === 'retryable';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
