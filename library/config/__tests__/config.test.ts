import { describe, it, expect } from 'vitest';
import { writeFileSync, mkdtempSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ZodError } from 'zod';
import { load, validate, DEFAULT_API_BASE_URL, DEFAULT_TIMEOUT_MS } from '../src/index.js';

const MINIMAL_CONFIG_YAML = `
app:
  name: test-client
  version: "1.0.0"
  environment: dev
api:
  api_key: test-api-key
observability:
  log:
    level: debug
    format: json
`;

function writeConfig(dir: string, filename: string, content: string): string {
  const path = join(dir, filename);
  writeFileSync(path, content);
  return path;
}

describe('load', () => {
  it('should load a valid config', () => {
    const dir = mkdtempSync(join(tmpdir(), 'tmdb-auth-'));
    const path = writeConfig(dir, 'config.yaml', MINIMAL_CONFIG_YAML);

    const cfg = load(path);
    expect(cfg.app.name).toBe('test-client');
    expect(cfg.api.api_key).toBe('test-api-key');
  });

  it('should apply api defaults', () => {
    const dir = mkdtempSync(join(tmpdir(), 'tmdb-auth-'));
    const path = writeConfig(dir, 'config.yaml', MINIMAL_CONFIG_YAML);

    const cfg = load(path);
    expect(cfg.api.base_url).toBe(DEFAULT_API_BASE_URL);
    expect(cfg.api.timeout_ms).toBe(DEFAULT_TIMEOUT_MS);
  });

  it('should throw on file not found', () => {
    expect(() => load('/nonexistent/config.yaml')).toThrow();
  });

  it('should merge env override', () => {
    const dir = mkdtempSync(join(tmpdir(), 'tmdb-auth-'));
    const basePath = writeConfig(dir, 'config.yaml', MINIMAL_CONFIG_YAML);
    const envPath = writeConfig(
      dir,
      'config.staging.yaml',
      `
app:
  environment: staging
api:
  base_url: "http://localhost:9090/3"
  timeout_ms: 2500
`,
    );

    const cfg = load(basePath, envPath);
    expect(cfg.app.environment).toBe('staging');
    expect(cfg.app.name).toBe('test-client');
    expect(cfg.api.base_url).toBe('http://localhost:9090/3');
    expect(cfg.api.timeout_ms).toBe(2500);
    expect(cfg.api.api_key).toBe('test-api-key');
  });

  it('should reject an invalid merged config', () => {
    const dir = mkdtempSync(join(tmpdir(), 'tmdb-auth-'));
    const basePath = writeConfig(dir, 'config.yaml', MINIMAL_CONFIG_YAML);
    const envPath = writeConfig(dir, 'config.prod.yaml', 'app:\n  environment: production\n');

    expect(() => load(basePath, envPath)).toThrow(ZodError);
  });
});

describe('validate', () => {
  const valid = {
    app: { name: 'test-client', version: '1.0.0', environment: 'dev' },
    api: { access_token: 'test-token' },
    observability: { log: { level: 'info', format: 'text' } },
  };

  it('should accept an access token without an api key', () => {
    const cfg = validate(valid);
    expect(cfg.api.access_token).toBe('test-token');
    expect(cfg.api.api_key).toBeUndefined();
  });

  it('should require an api key or access token', () => {
    expect(() => validate({ ...valid, api: {} })).toThrow('api_key or access_token is required');
  });

  it('should reject an invalid base url', () => {
    expect(() =>
      validate({ ...valid, api: { access_token: 'test-token', base_url: 'not a url' } }),
    ).toThrow(ZodError);
  });

  it('should reject an unknown log level', () => {
    expect(() =>
      validate({ ...valid, observability: { log: { level: 'trace', format: 'json' } } }),
    ).toThrow(ZodError);
  });

  it('should reject a non-positive timeout', () => {
    expect(() =>
      validate({ ...valid, api: { access_token: 'test-token', timeout_ms: 0 } }),
    ).toThrow(ZodError);
  });
});
