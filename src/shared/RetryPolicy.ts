/** 等待 ms；signal 中止時提早結束 */
function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  isRetryable: (err: unknown) => boolean;
  onRetry?: (attempt: number, err: unknown, delayMs: number) => void;
  /** 是否加上 [0, baseDelayMs) 的隨機抖動，預設 false（1s → 2s → 4s） */
  jitter?: boolean;
  /** 測試用：替換等待實作 */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** 中止後不再重試，直接拋出最後一次的錯誤 */
  signal?: AbortSignal;
}

/** 第 attempt 次重試（1-based）前的等待時間 */
export function backoffDelay(attempt: number, baseDelayMs: number, jitter = false): number {
  const delay = baseDelayMs * Math.pow(2, attempt - 1);
  return jitter ? delay + Math.random() * baseDelayMs : delay;
}

/**
 * 指數退避重試策略
 * 總嘗試次數 = 1（初始） + maxRetries；不可重試的錯誤立即拋出
 * signal 中止後停止重試（進行中的嘗試不受影響）
 */
export async function withRetry<T>(
  operation: () => T | Promise<T>,
  opts: RetryOptions,
): Promise<T> {
  const sleep = opts.sleep ?? defaultSleep;
  let lastError: unknown;

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    try {
      return await operation();
    } catch (err) {
      lastError = err;
      if (attempt < opts.maxRetries && opts.isRetryable(err) && !opts.signal?.aborted) {
        const delay = backoffDelay(attempt + 1, opts.baseDelayMs, opts.jitter);
        opts.onRetry?.(attempt + 1, err, delay);
        await sleep(delay, opts.signal);
        if (opts.signal?.aborted) throw err;
      } else {
        throw err;
      }
    }
  }

  throw lastError;
}
