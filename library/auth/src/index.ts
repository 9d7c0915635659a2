export type { RequestToken, Session, ApiStatus, QueryParams, HttpTransport } from './types.js';
export { RemoteApiError, InvalidTokenError, LoginFailedError } from './error.js';
export {
  AuthenticationClient,
  AUTH_METHOD,
  PARAM_REQUEST_TOKEN,
  type AuthenticationClientOptions,
} from './client.js';
export { FetchTransport, type FetchTransportOptions } from './transport.js';
export { buildApiUrl } from './url.js';
export {
  mapRequestToken,
  mapSession,
  mapGuestSession,
  parseApiStatus,
  parseFailureStatus,
  parseApiTimestamp,
} from './mapper.js';
export { createAuthenticationClient, type CreateAuthenticationClientOptions } from './factory.js';
