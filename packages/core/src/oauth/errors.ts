import type { Credentials } from './types.js';

/**
 * 토큰이 만료되었고 자동으로 갱신할 수 없음을 알리는 신호
 *
 * 네트워크/전송 오류와 구분되어야 하므로 별도 클래스로 둔다.
 */
export class CredentialsExpiredError extends Error {
  readonly credentials: Credentials;

  constructor(credentials: Credentials, message?: string) {
    super(message ?? "The registry access token has expired and can't be refreshed.");
    this.name = 'CredentialsExpiredError';
    this.credentials = credentials;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * 자격 증명을 읽거나 발급/갱신하는 과정의 실패
 */
export class AuthorizationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'AuthorizationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function isCredentialsExpiredError(value: unknown): value is CredentialsExpiredError {
  return value instanceof CredentialsExpiredError;
}
