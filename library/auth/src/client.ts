import { silentLogger, type Logger } from '@tmdb-auth/telemetry';
import { InvalidTokenError, LoginFailedError } from './error.js';
import { mapGuestSession, mapRequestToken, mapSession, parseFailureStatus } from './mapper.js';
import type { HttpTransport, RequestToken, Session } from './types.js';

export const AUTH_METHOD = 'authentication';
export const PARAM_REQUEST_TOKEN = 'request_token';

export interface AuthenticationClientOptions {
  transport: HttpTransport;
  logger?: Logger;
}

/**
 * リモート API の認証エンドポイントを呼び出すクライアント。
 * 状態を持たないため、1 つのインスタンスを並行して使ってよい。
 */
export class AuthenticationClient {
  private readonly transport: HttpTransport;
  private readonly logger: Logger;

  constructor(options: AuthenticationClientOptions) {
    this.transport = options.transport;
    this.logger = options.logger ?? silentLogger();
  }

  /**
   * ユーザー認証用のリクエストトークンを発行する。GET authentication/token/new
   * トークンは 60 分で失効し、セッション作成に使われた時点で破棄される。
   */
  async requestToken(): Promise<RequestToken> {
    const body = await this.transport.get(`${AUTH_METHOD}/token/new`);
    const failure = parseFailureStatus(body);
    if (failure) {
      this.logger.warn({ apiStatusCode: failure.statusCode }, 'request token was not issued');
      throw new InvalidTokenError(`Request token was not issued: ${failure.statusMessage}`);
    }
    return mapRequestToken(body);
  }

  /**
   * 認証済みトークンからセッションを作成する。GET authentication/session/new
   * success=false のトークンは通信せずに InvalidTokenError で拒否する。
   */
  async createSession(token: RequestToken): Promise<Session> {
    if (!token.success) {
      this.logger.warn('request token was not successful');
      throw new InvalidTokenError('Request token was not successful');
    }

    const body = await this.transport.get(`${AUTH_METHOD}/session/new`, {
      [PARAM_REQUEST_TOKEN]: token.requestToken,
    });
    const session = mapSession(body);
    this.logger.info({ guest: false }, 'session created');
    return session;
  }

  /**
   * ユーザー名とパスワードでリクエストトークンを検証する。
   * GET authentication/token/validate_with_login
   * @returns 検証済みのトークン。成功していれば success=true。
   *   サーバーが success=false のステータス本文を返した場合は入力トークンを success=false にして返す
   */
  async validateLogin(token: RequestToken, username: string, password: string): Promise<RequestToken> {
    const body = await this.transport.get(`${AUTH_METHOD}/token/validate_with_login`, {
      [PARAM_REQUEST_TOKEN]: token.requestToken,
      username,
      password,
    });
    const failure = parseFailureStatus(body);
    if (failure) {
      this.logger.warn({ apiStatusCode: failure.statusCode }, 'login validation rejected');
      return Object.freeze({
        success: false,
        expiresAt: token.expiresAt,
        requestToken: token.requestToken,
      });
    }
    return mapRequestToken(body);
  }

  /**
   * トークン発行 → ログイン検証 → セッション作成を順に実行する。
   * いずれかの段階で失敗した時点で中断し、リトライはしない。
   */
  async loginAndCreateSession(username: string, password: string): Promise<Session> {
    const token = await this.requestToken();
    if (!token.success) {
      this.logger.warn('request token was not successful');
      throw new InvalidTokenError('Request token was not successful');
    }

    const validated = await this.validateLogin(token, username, password);
    if (!validated.success) {
      this.logger.warn('login validation failed');
      throw new LoginFailedError('User authentication failed');
    }

    return this.createSession(validated);
  }

  /**
   * ゲストセッションを作成する。GET authentication/guest_session/new
   * 24 時間以内に一度も使われないとサーバー側で自動的に破棄される。
   */
  async createGuestSession(): Promise<Session> {
    const body = await this.transport.get(`${AUTH_METHOD}/guest_session/new`);
    const session = mapGuestSession(body);
    this.logger.info({ guest: true }, 'guest session created');
    return session;
  }
}
