import type { Config } from '@tmdb-auth/config';
import { createLogger, type Logger } from '@tmdb-auth/telemetry';
import { AuthenticationClient } from './client.js';
import { FetchTransport } from './transport.js';

export interface CreateAuthenticationClientOptions {
  /** fetch 関数の注入（テスト用） */
  fetch?: typeof globalThis.fetch;
  logger?: Logger;
}

/**
 * 設定から FetchTransport とロガーを組み立て、AuthenticationClient を返す。
 */
export function createAuthenticationClient(
  config: Config,
  options: CreateAuthenticationClientOptions = {},
): AuthenticationClient {
  const logger =
    options.logger ??
    createLogger({
      serviceName: config.app.name,
      version: config.app.version,
      environment: config.app.environment,
      logLevel: config.observability.log.level,
      logFormat: config.observability.log.format,
    });

  const transport = new FetchTransport({
    baseUrl: config.api.base_url,
    apiKey: config.api.api_key,
    accessToken: config.api.access_token,
    timeoutMs: config.api.timeout_ms,
    fetch: options.fetch,
    logger,
  });

  return new AuthenticationClient({ transport, logger });
}
