import type { LogLevel } from '../shared/Logger.js';

/** Session 追蹤與輪詢設定 */
export interface TrackingConfig {
  mergeThresholdMs: number;
  minDurationMs: number;
  pollIntervalMs: number;
  submitIntervalMs: number;
  /** 閒置超過此值視為離開座位，結束 open session */
  idleThresholdMs: number;
  ignoreFilePath: string;
}

/** 共用的 sink 重試設定 */
export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
}

/** Time-tracking API 設定 */
export interface TimeTrackingConfig {
  enabled: boolean;
  apiKey?: string;
  accountKey?: string;
  dataKey?: string;
  /** 未設定時使用內建端點 */
  legacyUrl?: string;
  nativeUrl?: string;
  /** 有 account / data key 時先試 client event 端點 */
  preferNative: boolean;
  maxEntryMinutes: number;
  chunkMarginMinutes: number;
  minSubmitDurationMs: number;
  timeoutMs: number;
  retry: RetryConfig;
}

/** Webhook 設定 */
export interface WebhookConfig {
  url?: string;
  headers: Record<string, string>;
  includeSessions: boolean;
  minSubmitDurationMs: number;
  timeoutMs: number;
  retry: RetryConfig;
}

/** SQLite 設定 */
export interface SqliteConfig {
  /** 未設定時不啟用 SQLite sink */
  dbPath?: string;
  minSubmitDurationMs: number;
  retry: RetryConfig;
}

/** 結束時的本地輸出 */
export interface OutputConfig {
  summariesFile?: string;
}

export interface LoggingConfig {
  level: LogLevel;
}

/** 完整設定 */
export interface FocusTrackConfig {
  version: number;
  tracking: TrackingConfig;
  timeTracking: TimeTrackingConfig;
  webhook: WebhookConfig;
  sqlite: SqliteConfig;
  output: OutputConfig;
  logging: LoggingConfig;
}

/** 部分設定（用於 merge） */
export type PartialConfig = {
  [K in keyof FocusTrackConfig]?: FocusTrackConfig[K] extends object
    ? Partial<FocusTrackConfig[K]>
    : FocusTrackConfig[K];
};
