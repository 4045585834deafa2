import { SinkRejectionError, SinkTransportError, errorMessage } from '../../domain/errors/DomainErrors.js';

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export interface PostJsonOptions {
  headers?: Record<string, string>;
  timeoutMs: number;
  fetchImpl?: FetchLike;
  /** log / 錯誤訊息中顯示的 URL（隱藏 query 中的 key） */
  displayUrl?: string;
}

export interface PostJsonResponse {
  status: number;
  body: string;
}

/** 去除 URL query 中的憑證，供 log 使用 */
export function redactUrl(url: string): string {
  return url.replace(/([?&]key=)[^&]*/g, '$1***');
}

/**
 * POST 一個 JSON body 並依結果分類錯誤
 *
 * - 2xx → resolve
 * - 4xx → SinkRejectionError（terminal）
 * - 5xx、網路錯誤、逾時 → SinkTransportError（retryable）
 */
export async function postJson(
  url: string,
  body: unknown,
  opts: PostJsonOptions,
): Promise<PostJsonResponse> {
  const fetchImpl = opts.fetchImpl ?? fetch;
  const shownUrl = opts.displayUrl ?? redactUrl(url);

  let response: Response;
  try {
    response = await fetchImpl(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...opts.headers,
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(opts.timeoutMs),
    });
  } catch (err) {
    throw new SinkTransportError(`request to ${shownUrl} failed: ${errorMessage(err)}`, undefined, { cause: err });
  }

  const text = await response.text().catch(() => '');

  if (response.status >= 200 && response.status < 300) {
    return { status: response.status, body: text };
  }

  const message = `${shownUrl} returned ${response.status}: ${text.slice(0, 500)}`;
  if (response.status >= 400 && response.status < 500) {
    throw new SinkRejectionError(message, response.status);
  }
  throw new SinkTransportError(message, response.status);
}
