import type { Config } from './config.js';

/**
 * シークレットストアから取得した値で API 資格情報を上書きする。
 * 元の Config を変更せず、新しい Config を返す。
 */
export function mergeSecrets(config: Config, secrets: Record<string, string>): Config {
  const merged = structuredClone(config);

  if (secrets['api.api_key']) {
    merged.api.api_key = secrets['api.api_key'];
  }
  if (secrets['api.access_token']) {
    merged.api.access_token = secrets['api.access_token'];
  }

  return merged;
}
