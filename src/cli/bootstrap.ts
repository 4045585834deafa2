import path from 'node:path';
import { SessionTracker } from '../application/SessionTracker.js';
import type { FocusTrackConfig } from '../config/types.js';
import type { SummarySinkPort } from '../domain/ports/SummarySinkPort.js';
import { FileIgnoreListStore } from '../infrastructure/ignore/FileIgnoreListStore.js';
import { PreviewSink } from '../infrastructure/sinks/preview/PreviewSink.js';
import { SqliteSummarySink } from '../infrastructure/sinks/sqlite/SqliteSummarySink.js';
import { TimeTrackingApiSink } from '../infrastructure/sinks/timetracking/TimeTrackingApiSink.js';
import { WebhookSink } from '../infrastructure/sinks/webhook/WebhookSink.js';
import { DatabaseManager } from '../infrastructure/sqlite/DatabaseManager.js';
import { Logger } from '../shared/Logger.js';

export interface SinkSelection {
  /** 送到 time-tracking API / webhook */
  submit: boolean;
  /** 只印出 payload，不送出 */
  dryRun: boolean;
  /** 不論 submit 與否，有設定 dbPath 就寫 SQLite */
  sqlite: boolean;
  version: string;
}

export function createLogger(config: FocusTrackConfig, context = 'focustrack'): Logger {
  return new Logger(context, config.logging.level);
}

export function resolvePath(rootDir: string, filePath: string): string {
  return path.isAbsolute(filePath) ? filePath : path.join(rootDir, filePath);
}

/** 載入忽略清單並建立 tracker */
export async function createTracker(
  rootDir: string,
  config: FocusTrackConfig,
  logger: Logger,
): Promise<SessionTracker> {
  const ignoreStore = new FileIgnoreListStore(resolvePath(rootDir, config.tracking.ignoreFilePath));
  const ignored = await ignoreStore.load();
  if (ignored.size > 0) {
    logger.info('Loaded ignore list', { count: ignored.size });
  }

  return new SessionTracker({
    settings: {
      mergeThresholdMs: config.tracking.mergeThresholdMs,
      minDurationMs: config.tracking.minDurationMs,
    },
    ignored,
    ignoreStore,
    logger: logger.child('SessionTracker'),
  });
}

/** 依設定與旗標組出要使用的 sinks */
export function createSinks(
  rootDir: string,
  config: FocusTrackConfig,
  selection: SinkSelection,
  logger: Logger,
): SummarySinkPort[] {
  const sinks: SummarySinkPort[] = [];
  const { timeTracking, webhook, sqlite } = config;
  const userAgent = `focustrack/${selection.version}`;

  if (selection.dryRun) {
    sinks.push(new PreviewSink({
      minSubmitDurationMs: timeTracking.minSubmitDurationMs,
      retry: timeTracking.retry,
      maxEntryMinutes: timeTracking.maxEntryMinutes,
      chunkMarginMinutes: timeTracking.chunkMarginMinutes,
    }, logger.child('PreviewSink')));
  } else if (selection.submit) {
    const { apiKey, accountKey, dataKey } = timeTracking;
    if (timeTracking.enabled && (apiKey ?? accountKey ?? dataKey)) {
      sinks.push(new TimeTrackingApiSink({
        minSubmitDurationMs: timeTracking.minSubmitDurationMs,
        retry: timeTracking.retry,
        credentials: { apiKey, accountKey, dataKey },
        maxEntryMinutes: timeTracking.maxEntryMinutes,
        chunkMarginMinutes: timeTracking.chunkMarginMinutes,
        preferNative: timeTracking.preferNative,
        http: { timeoutMs: timeTracking.timeoutMs, userAgent },
        endpoints: { legacy: timeTracking.legacyUrl, native: timeTracking.nativeUrl },
      }, logger.child('TimeTrackingApiSink')));
    }

    if (webhook.url) {
      sinks.push(new WebhookSink({
        minSubmitDurationMs: webhook.minSubmitDurationMs,
        retry: webhook.retry,
        url: webhook.url,
        headers: webhook.headers,
        timeoutMs: webhook.timeoutMs,
        source: 'focustrack',
        version: selection.version,
        includeSessions: webhook.includeSessions,
      }, logger.child('WebhookSink')));
    }

    if (sinks.length === 0) {
      throw new Error(
        'No submission target configured: set RESCUE_TIME_API_KEY (or the account/data keys) or WEBHOOK_URL',
      );
    }
  }

  if (selection.sqlite && sqlite.dbPath) {
    const manager = new DatabaseManager(resolvePath(rootDir, sqlite.dbPath), logger.child('DatabaseManager'));
    sinks.push(new SqliteSummarySink(manager, {
      minSubmitDurationMs: sqlite.minSubmitDurationMs,
      retry: sqlite.retry,
    }, logger.child('SqliteSummarySink')));
  }

  return sinks;
}
