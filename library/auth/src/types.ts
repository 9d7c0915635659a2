/** セッション作成に使う短命のリクエストトークン。発行から 60 分で失効する。 */
export interface RequestToken {
  readonly success: boolean;
  readonly expiresAt: Date;
  readonly requestToken: string;
}

/**
 * ユーザーセッションまたはゲストセッション。
 * ゲストセッションは 24 時間使われないとサーバー側で破棄される。
 */
export interface Session {
  readonly success: boolean;
  readonly sessionId: string;
  readonly guest: boolean;
  readonly expiresAt: Date | null;
}

/** エラー時にリモート API が返す本文。 */
export interface ApiStatus {
  success?: boolean;
  statusCode: number;
  statusMessage: string;
}

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface HttpTransport {
  get(path: string, params?: QueryParams): Promise<unknown>;
}
