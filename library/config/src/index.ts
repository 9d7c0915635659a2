export { load, validate } from './merge.js';
export { mergeSecrets } from './secrets.js';
export {
  ConfigSchema,
  AppConfigSchema,
  ApiConfigSchema,
  ObservabilityConfigSchema,
  DEFAULT_API_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  type Config,
  type AppConfig,
  type ApiConfig,
  type ObservabilityConfig,
} from './config.js';
