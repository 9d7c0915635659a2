import type { QueryParams } from './types.js';

/**
 * ベース URL・パス・クエリパラメータから API の URL を組み立てる。
 * 値が undefined のパラメータは付与しない。
 */
export function buildApiUrl(baseUrl: string, path: string, params: QueryParams = {}): string {
  const base = baseUrl.replace(/\/+$/, '');
  const cleanPath = path.replace(/^\/+/, '');
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      search.append(key, String(value));
    }
  }

  const query = search.toString();
  return query ? `${base}/${cleanPath}?${query}` : `${base}/${cleanPath}`;
}
