import type { FocusTrackConfig } from './types.js';

export const DEFAULT_CONFIG: FocusTrackConfig = {
  version: 1,
  tracking: {
    mergeThresholdMs: 30_000,
    minDurationMs: 10_000,
    pollIntervalMs: 1_000,
    submitIntervalMs: 15 * 60_000,
    idleThresholdMs: 5 * 60_000,
    ignoreFilePath: '.focustrack-ignore',
  },
  timeTracking: {
    enabled: true,
    preferNative: true,
    maxEntryMinutes: 240,
    chunkMarginMinutes: 10,
    minSubmitDurationMs: 5 * 60_000,
    timeoutMs: 10_000,
    retry: { maxRetries: 2, baseDelayMs: 1_000 },
  },
  webhook: {
    headers: {},
    includeSessions: true,
    minSubmitDurationMs: 5 * 60_000,
    timeoutMs: 30_000,
    retry: { maxRetries: 2, baseDelayMs: 1_000 },
  },
  sqlite: {
    minSubmitDurationMs: 5 * 60_000,
    retry: { maxRetries: 2, baseDelayMs: 500 },
  },
  output: {},
  logging: {
    level: 'info',
  },
};
