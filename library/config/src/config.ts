import { z } from 'zod';

export const DEFAULT_API_BASE_URL = 'https://api.themoviedb.org/3';
export const DEFAULT_TIMEOUT_MS = 10_000;

export const AppConfigSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  environment: z.enum(['dev', 'staging', 'prod']),
});

export const ApiConfigSchema = z
  .object({
    base_url: z.string().url().default(DEFAULT_API_BASE_URL),
    api_key: z.string().min(1).optional(),
    access_token: z.string().min(1).optional(),
    timeout_ms: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  })
  .refine((api) => api.api_key !== undefined || api.access_token !== undefined, {
    message: 'api_key or access_token is required',
    path: ['api_key'],
  });

export const ObservabilityConfigSchema = z.object({
  log: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
    format: z.enum(['json', 'text']),
  }),
});

export const ConfigSchema = z.object({
  app: AppConfigSchema,
  api: ApiConfigSchema,
  observability: ObservabilityConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;
export type ApiConfig = z.infer<typeof ApiConfigSchema>;
export type ObservabilityConfig = z.infer<typeof ObservabilityConfigSchema>;
