import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { isLogLevel } from '../shared/Logger.js';
import { DEFAULT_CONFIG } from './defaults.js';
import type {
  FocusTrackConfig,
  PartialConfig,
  RetryConfig,
  SqliteConfig,
  TimeTrackingConfig,
  WebhookConfig,
} from './types.js';

export type { FocusTrackConfig, PartialConfig } from './types.js';

export const CONFIG_FILE_NAME = '.focustrack.json';

const retrySchema = z.object({
  maxRetries: z.number().int(),
  baseDelayMs: z.number(),
}).partial();

/** .focustrack.json 的結構；每個欄位都可省略 */
const fileSchema = z.object({
  version: z.number().int(),
  tracking: z.object({
    mergeThresholdMs: z.number(),
    minDurationMs: z.number(),
    pollIntervalMs: z.number(),
    submitIntervalMs: z.number(),
    idleThresholdMs: z.number(),
    ignoreFilePath: z.string(),
  }).partial(),
  timeTracking: z.object({
    enabled: z.boolean(),
    apiKey: z.string(),
    accountKey: z.string(),
    dataKey: z.string(),
    legacyUrl: z.string(),
    nativeUrl: z.string(),
    preferNative: z.boolean(),
    maxEntryMinutes: z.number(),
    chunkMarginMinutes: z.number(),
    minSubmitDurationMs: z.number(),
    timeoutMs: z.number(),
    retry: retrySchema,
  }).partial(),
  webhook: z.object({
    url: z.string(),
    headers: z.record(z.string()),
    includeSessions: z.boolean(),
    minSubmitDurationMs: z.number(),
    timeoutMs: z.number(),
    retry: retrySchema,
  }).partial(),
  sqlite: z.object({
    dbPath: z.string(),
    minSubmitDurationMs: z.number(),
    retry: retrySchema,
  }).partial(),
  output: z.object({
    summariesFile: z.string(),
  }).partial(),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
  }).partial(),
}).partial();

type FileConfig = z.infer<typeof fileSchema>;
type SectionPatch = FileConfig | PartialConfig;

/** retry 可以只給部分欄位 */
type SectionWithRetry<T extends { retry: RetryConfig }> = Omit<Partial<T>, 'retry'> & {
  retry?: Partial<RetryConfig>;
};

function mergeRetry(base: RetryConfig, patch?: Partial<RetryConfig>): RetryConfig {
  return { ...base, ...patch };
}

/** 逐段合併：patch 中出現的欄位覆蓋 base */
function mergeConfig(base: FocusTrackConfig, patch: SectionPatch): FocusTrackConfig {
  const timeTracking: SectionWithRetry<TimeTrackingConfig> = patch.timeTracking ?? {};
  const webhook: SectionWithRetry<WebhookConfig> = patch.webhook ?? {};
  const sqlite: SectionWithRetry<SqliteConfig> = patch.sqlite ?? {};

  return {
    version: patch.version ?? base.version,
    tracking: { ...base.tracking, ...patch.tracking },
    timeTracking: {
      ...base.timeTracking,
      ...timeTracking,
      retry: mergeRetry(base.timeTracking.retry, timeTracking.retry),
    },
    webhook: {
      ...base.webhook,
      ...webhook,
      headers: { ...base.webhook.headers, ...webhook.headers },
      retry: mergeRetry(base.webhook.retry, webhook.retry),
    },
    sqlite: {
      ...base.sqlite,
      ...sqlite,
      retry: mergeRetry(base.sqlite.retry, sqlite.retry),
    },
    output: { ...base.output, ...patch.output },
    logging: { ...base.logging, ...patch.logging },
  };
}

/** 環境變數覆蓋 config（優先於檔案與程式覆蓋值） */
function applyEnvOverrides(config: FocusTrackConfig, env: NodeJS.ProcessEnv): FocusTrackConfig {
  const next = mergeConfig(config, {});

  if (env.RESCUE_TIME_API_KEY) next.timeTracking.apiKey = env.RESCUE_TIME_API_KEY;
  if (env.RESCUE_TIME_ACCOUNT_KEY) next.timeTracking.accountKey = env.RESCUE_TIME_ACCOUNT_KEY;
  if (env.RESCUE_TIME_DATA_KEY) next.timeTracking.dataKey = env.RESCUE_TIME_DATA_KEY;
  if (env.WEBHOOK_URL) next.webhook.url = env.WEBHOOK_URL;
  if (env.FOCUSTRACK_DB_PATH) next.sqlite.dbPath = env.FOCUSTRACK_DB_PATH;

  const level = env.FOCUSTRACK_LOG_LEVEL;
  if (level) {
    if (!isLogLevel(level)) {
      throw new Error(`FOCUSTRACK_LOG_LEVEL must be one of debug, info, warn, error (got "${level}")`);
    }
    next.logging.level = level;
  }
  return next;
}

function validateRetry(section: string, retry: RetryConfig): void {
  if (!Number.isInteger(retry.maxRetries) || retry.maxRetries < 0) {
    throw new Error(`${section}.retry.maxRetries must be a non-negative integer`);
  }
  if (retry.baseDelayMs < 0) {
    throw new Error(`${section}.retry.baseDelayMs must be >= 0`);
  }
}

/** 驗證設定值的合法性 */
function validate(config: FocusTrackConfig): void {
  const { tracking, timeTracking, webhook, sqlite } = config;

  if (tracking.pollIntervalMs < 50) {
    throw new Error('tracking.pollIntervalMs must be >= 50');
  }
  if (tracking.submitIntervalMs < 60_000) {
    throw new Error('tracking.submitIntervalMs must be >= 60000');
  }
  if (tracking.mergeThresholdMs < 0 || tracking.minDurationMs < 0) {
    throw new Error('tracking thresholds must be >= 0');
  }
  if (tracking.idleThresholdMs <= 0) {
    throw new Error('tracking.idleThresholdMs must be positive');
  }

  if (!Number.isInteger(timeTracking.maxEntryMinutes) || timeTracking.maxEntryMinutes <= 0) {
    throw new Error('timeTracking.maxEntryMinutes must be a positive integer');
  }
  if (timeTracking.chunkMarginMinutes < 0 || timeTracking.chunkMarginMinutes >= timeTracking.maxEntryMinutes) {
    throw new Error('timeTracking.chunkMarginMinutes must be >= 0 and smaller than maxEntryMinutes');
  }

  const urls: Array<[string, string | undefined]> = [
    ['timeTracking.legacyUrl', timeTracking.legacyUrl],
    ['timeTracking.nativeUrl', timeTracking.nativeUrl],
    ['webhook.url', webhook.url],
  ];
  for (const [field, url] of urls) {
    if (url !== undefined && !/^https?:\/\//.test(url)) {
      throw new Error(`${field} must start with http:// or https://`);
    }
  }

  validateRetry('timeTracking', timeTracking.retry);
  validateRetry('webhook', webhook.retry);
  validateRetry('sqlite', sqlite.retry);
}

/** 讀取並以 zod 驗證 .focustrack.json；不存在時回傳空設定 */
function readConfigFile(rootDir: string): FileConfig {
  const configPath = path.join(rootDir, CONFIG_FILE_NAME);
  if (!fs.existsSync(configPath)) return {};

  const raw: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  const result = fileSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`${CONFIG_FILE_NAME}: ${issue.path.join('.')}: ${issue.message}`);
  }
  return result.data;
}

/**
 * 載入設定：讀取 .focustrack.json（若存在）並合併到預設值上
 * @param rootDir - 設定檔所在目錄
 * @param overrides - 程式碼層級的覆蓋值（優先於檔案）
 * @param env - 環境變數來源（預設 process.env）
 */
export function loadConfig(
  rootDir: string,
  overrides?: PartialConfig,
  env: NodeJS.ProcessEnv = process.env,
): FocusTrackConfig {
  // 合併順序：defaults < file config < overrides < env
  let merged = mergeConfig(DEFAULT_CONFIG, readConfigFile(rootDir));
  if (overrides) {
    merged = mergeConfig(merged, overrides);
  }
  merged = applyEnvOverrides(merged, env);

  validate(merged);
  return merged;
}
