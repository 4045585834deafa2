import type { ActivitySummary } from '../../../domain/entities/ActivitySummary.js';
import { SinkRejectionError } from '../../../domain/errors/DomainErrors.js';
import { validateEventPayload, validateLegacyPayload } from '../../../domain/services/PayloadValidator.js';
import type { FetchLike } from '../../http/postJson.js';
import { postJson } from '../../http/postJson.js';
import { toClientEvent, toLegacyPayload } from './payloads.js';

export const LEGACY_ENDPOINT = 'https://www.rescuetime.com/anapi/offline_time_post';
export const NATIVE_ENDPOINT = 'https://api.rescuetime.com/api/resource/user_client_events';

export interface TimeTrackingCredentials {
  apiKey?: string;
  accountKey?: string;
  dataKey?: string;
}

export interface StrategyHttpOptions {
  timeoutMs: number;
  userAgent: string;
  fetchImpl?: FetchLike;
}

/** 單一 wire 格式的送出方式；失敗時拋出分類過的 FocusTrackError */
export interface SubmissionStrategy {
  readonly name: string;
  send(chunk: ActivitySummary): Promise<void>;
}

function withKey(endpoint: string, key: string): string {
  return `${endpoint}?key=${encodeURIComponent(key)}`;
}

/** 分鐘制 offline time 端點，以 query key 驗證 */
export class LegacyOfflineStrategy implements SubmissionStrategy {
  readonly name = 'legacy';

  constructor(
    private readonly apiKey: string,
    private readonly maxEntryMinutes: number,
    private readonly http: StrategyHttpOptions,
    private readonly endpoint: string = LEGACY_ENDPOINT,
  ) {}

  async send(chunk: ActivitySummary): Promise<void> {
    const payload = toLegacyPayload(chunk);
    validateLegacyPayload(payload, this.maxEntryMinutes);
    await postJson(withKey(this.endpoint, this.apiKey), payload, {
      timeoutMs: this.http.timeoutMs,
      headers: { 'User-Agent': this.http.userAgent },
      fetchImpl: this.http.fetchImpl,
    });
  }
}

/**
 * Client event 端點
 * 先以 query key（account key）驗證；回 401 時改用 Bearer token（data key）再試一次
 */
export class NativeEventStrategy implements SubmissionStrategy {
  readonly name = 'native';

  constructor(
    private readonly credentials: TimeTrackingCredentials,
    private readonly maxEntryMinutes: number,
    private readonly http: StrategyHttpOptions,
    private readonly endpoint: string = NATIVE_ENDPOINT,
  ) {}

  async send(chunk: ActivitySummary): Promise<void> {
    const payload = toClientEvent(chunk);
    validateEventPayload(payload, this.maxEntryMinutes * 60_000);

    const queryKey = this.credentials.accountKey ?? this.credentials.apiKey;
    const bearer = this.credentials.dataKey ?? this.credentials.apiKey;
    const headers = { 'User-Agent': this.http.userAgent };

    if (queryKey) {
      try {
        await postJson(withKey(this.endpoint, queryKey), payload, {
          timeoutMs: this.http.timeoutMs,
          headers,
          fetchImpl: this.http.fetchImpl,
        });
        return;
      } catch (err) {
        if (!(err instanceof SinkRejectionError && err.status === 401) || !bearer) throw err;
      }
    }

    if (!bearer) {
      throw new SinkRejectionError('no credentials configured for the client event endpoint');
    }

    const url = this.credentials.accountKey ? withKey(this.endpoint, this.credentials.accountKey) : this.endpoint;
    await postJson(url, payload, {
      timeoutMs: this.http.timeoutMs,
      headers: { ...headers, Authorization: `Bearer ${bearer}` },
      fetchImpl: this.http.fetchImpl,
    });
  }
}
