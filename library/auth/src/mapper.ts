import { z } from 'zod';
import { RemoteApiError } from './error.js';
import type { ApiStatus, RequestToken, Session } from './types.js';

const API_TIMESTAMP = /^(\d{4}-\d{2}-\d{2}) (\d{2}:\d{2}:\d{2}) UTC$/;
const ISO_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})$/;

/**
 * "2016-08-26 17:04:39 UTC" 形式と ISO-8601 形式の日時を Date に変換する。
 * 解釈できない場合は null を返す。
 */
export function parseApiTimestamp(raw: string): Date | null {
  const match = API_TIMESTAMP.exec(raw);
  if (!match && !ISO_TIMESTAMP.test(raw)) {
    return null;
  }
  const date = match ? new Date(`${match[1]}T${match[2]}Z`) : new Date(raw);
  return Number.isNaN(date.getTime()) ? null : date;
}

const ApiTimestampSchema = z.string().transform((raw, ctx) => {
  const date = parseApiTimestamp(raw);
  if (date === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid timestamp: ${raw}` });
    return z.NEVER;
  }
  return date;
});

export const RequestTokenSchema = z
  .object({
    success: z.boolean(),
    expires_at: ApiTimestampSchema,
    request_token: z.string().min(1),
  })
  .transform(
    (body): RequestToken =>
      Object.freeze({
        success: body.success,
        expiresAt: body.expires_at,
        requestToken: body.request_token,
      }),
  );

export const SessionSchema = z
  .object({
    success: z.boolean(),
    session_id: z.string().min(1),
  })
  .transform(
    (body): Session =>
      Object.freeze({
        success: body.success,
        sessionId: body.session_id,
        guest: false,
        expiresAt: null,
      }),
  );

export const GuestSessionSchema = z
  .object({
    success: z.boolean(),
    guest_session_id: z.string().min(1),
    expires_at: ApiTimestampSchema.optional(),
  })
  .transform(
    (body): Session =>
      Object.freeze({
        success: body.success,
        sessionId: body.guest_session_id,
        guest: true,
        expiresAt: body.expires_at ?? null,
      }),
  );

export const ApiStatusSchema = z
  .object({
    success: z.boolean().optional(),
    status_code: z.number().int(),
    status_message: z.string(),
  })
  .transform(
    (body): ApiStatus => ({
      success: body.success,
      statusCode: body.status_code,
      statusMessage: body.status_message,
    }),
  );

/** エラー本文を解釈する。形式が合わなければ null。 */
export function parseApiStatus(body: unknown): ApiStatus | null {
  const result = ApiStatusSchema.safeParse(body);
  return result.success ? result.data : null;
}

/**
 * 2xx で返された success=false のステータス本文を取り出す。
 * トークンやセッションの本文であれば null。
 */
export function parseFailureStatus(body: unknown): ApiStatus | null {
  const status = parseApiStatus(body);
  return status?.success === false ? status : null;
}

function mapBody<S extends z.ZodTypeAny>(
  schema: S,
  body: unknown,
  resource: string,
): z.output<S> {
  const result = schema.safeParse(body);
  if (result.success) {
    return result.data;
  }

  const status = parseApiStatus(body);
  if (status) {
    throw new RemoteApiError(
      `${resource} request rejected: ${status.statusMessage}`,
      undefined,
      status.statusCode,
    );
  }
  throw new RemoteApiError(`unexpected ${resource} response body`, undefined, undefined, result.error);
}

export function mapRequestToken(body: unknown): RequestToken {
  return mapBody(RequestTokenSchema, body, 'request token');
}

export function mapSession(body: unknown): Session {
  return mapBody(SessionSchema, body, 'session');
}

export function mapGuestSession(body: unknown): Session {
  return mapBody(GuestSessionSchema, body, 'guest session');
}
