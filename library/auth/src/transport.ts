import { DEFAULT_API_BASE_URL } from '@tmdb-auth/config';
import { silentLogger, type Logger } from '@tmdb-auth/telemetry';
import { RemoteApiError } from './error.js';
import { parseApiStatus } from './mapper.js';
import type { HttpTransport, QueryParams } from './types.js';
import { buildApiUrl } from './url.js';

export interface FetchTransportOptions {
  baseUrl?: string;
  /** api_key クエリパラメータとして送る v3 API キー */
  apiKey?: string;
  /** Authorization: Bearer で送る読み取りアクセストークン */
  accessToken?: string;
  timeoutMs?: number;
  /** fetch 関数の注入（テスト用） */
  fetch?: typeof globalThis.fetch;
  logger?: Logger;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** fetch ベースの HttpTransport。GET のみを扱う。 */
export class FetchTransport implements HttpTransport {
  private readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly accessToken?: string;
  private readonly timeoutMs?: number;
  private readonly fetchFn: typeof globalThis.fetch;
  private readonly logger: Logger;

  constructor(options: FetchTransportOptions = {}) {
    this.baseUrl = options.baseUrl ?? DEFAULT_API_BASE_URL;
    this.apiKey = options.apiKey;
    this.accessToken = options.accessToken;
    this.timeoutMs = options.timeoutMs;
    this.fetchFn = options.fetch ?? globalThis.fetch.bind(globalThis);
    this.logger = options.logger ?? silentLogger();
  }

  async get(path: string, params: QueryParams = {}): Promise<unknown> {
    const query = this.apiKey !== undefined ? { ...params, api_key: this.apiKey } : params;
    const url = buildApiUrl(this.baseUrl, path, query);
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.accessToken) {
      headers.Authorization = `Bearer ${this.accessToken}`;
    }

    let status: number;
    let ok: boolean;
    let text: string;
    try {
      const resp = await this.fetchFn(url, {
        method: 'GET',
        headers,
        signal: this.timeoutMs !== undefined ? AbortSignal.timeout(this.timeoutMs) : undefined,
      });
      status = resp.status;
      ok = resp.ok;
      text = await resp.text();
    } catch (err) {
      // URL にはパスワードや API キーが含まれうるため path のみ記録する
      this.logger.error({ method: 'GET', path, error: describeError(err) }, 'api request failed');
      throw new RemoteApiError(`GET ${path} failed: ${describeError(err)}`, undefined, undefined, err);
    }

    this.logger.debug({ method: 'GET', path, status }, 'api request');

    if (!ok) {
      const apiStatus = parseApiStatus(parseJson(text));
      throw new RemoteApiError(
        `GET ${path} failed (status ${status}): ${apiStatus?.statusMessage ?? text}`,
        status,
        apiStatus?.statusCode,
      );
    }

    try {
      return JSON.parse(text);
    } catch (err) {
      throw new RemoteApiError(`GET ${path} returned a non-JSON body`, status, undefined, err);
    }
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}
