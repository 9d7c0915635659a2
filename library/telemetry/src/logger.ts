import pino from 'pino';
import { trace } from '@opentelemetry/api';

/**
 * LoggerConfig はロガー生成時の設定を定義する。
 */
export interface LoggerConfig {
  serviceName: string;
  version: string;
  environment: string;
  logLevel: string;
  logFormat?: 'json' | 'text';
}

/** 資格情報を含みうるフィールド。ログ出力前に伏字にする。 */
export const REDACTED_PATHS = [
  'password',
  'api_key',
  'access_token',
  '*.password',
  '*.api_key',
  '*.access_token',
];

/**
 * createLogger は pino ベースの構造化ロガーを生成する。
 * サービス名・バージョン・環境を標準フィールドとして付与する。
 * アクティブな OpenTelemetry スパンがあれば trace_id / span_id を自動注入する。
 * logFormat が "text" の場合は pino-pretty で人間可読フォーマットを使用する。
 * destination を渡した場合はそこへ JSON で書き出し、logFormat は無視する。
 */
export function createLogger(
  cfg: LoggerConfig,
  destination?: pino.DestinationStream,
): pino.Logger {
  const options: pino.LoggerOptions = {
    level: cfg.logLevel,
    base: {
      service: cfg.serviceName,
      version: cfg.version,
      environment: cfg.environment,
    },
    redact: { paths: REDACTED_PATHS, censor: '[REDACTED]' },
    mixin() {
      const span = trace.getActiveSpan();
      if (span) {
        const spanContext = span.spanContext();
        return {
          trace_id: spanContext.traceId,
          span_id: spanContext.spanId,
        };
      }
      return {};
    },
  };

  if (destination) {
    return pino(options, destination);
  }

  if (cfg.logFormat === 'text') {
    options.transport = {
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'SYS:standard' },
    };
  }

  return pino(options);
}

/** 何も出力しないロガー。ロガー未指定時の既定値。 */
export function silentLogger(): pino.Logger {
  return pino({ level: 'silent' });
}
