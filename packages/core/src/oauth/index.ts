/**
 * 레지스트리 인증 엔트리포인트
 */

// Types
export type { Credentials, TokenResponse, FetchFn, HttpClient, AuthorizeFn } from './types.js';

// Errors
export { CredentialsExpiredError, AuthorizationError, isCredentialsExpiredError } from './errors.js';

// Store
export type { CredentialStore } from './store.js';
export { createCredentialStore, parseCredentials, CREDENTIALS_FILE_NAME } from './store.js';

// Token
export {
  isTokenValid,
  canRefresh,
  needsRefresh,
  parseTokenResponse,
  refreshCredentials,
  createRefreshManager,
  type RefreshManager,
  type RefreshFn,
} from './token.js';

// Client
export { AuthorizedClient, type AuthorizedClientOptions } from './client.js';
export { withClient, type WithClientOptions } from './with-client.js';
