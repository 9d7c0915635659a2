/**
 * リモート API 呼び出しの失敗。通信エラー・HTTP エラー・想定外のレスポンス本文を表す。
 * statusCode は HTTP ステータス、apiStatusCode はレスポンス本文の status_code。
 */
export class RemoteApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly apiStatusCode?: number,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'RemoteApiError';
  }
}

/** success=false のリクエストトークンでセッションを作ろうとした。 */
export class InvalidTokenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidTokenError';
  }
}

/** ユーザー名・パスワードによるトークン検証が失敗した。 */
export class LoginFailedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LoginFailedError';
  }
}
