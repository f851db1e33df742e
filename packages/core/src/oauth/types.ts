/**
 * 레지스트리 인증 타입 정의
 */

// ============================================================================
// Credentials
// ============================================================================

/**
 * 레지스트리 업로드 권한을 나타내는 자격 증명
 */
export interface Credentials {
  /** Bearer 토큰 */
  accessToken: string;
  /** 선택: refresh_token grant에 사용 */
  refreshToken?: string;
  /** 선택: refresh 요청을 보낼 토큰 엔드포인트 */
  tokenEndpoint?: string;
  /** 선택: ISO-8601 만료 시각. 없으면 무기한 유효 */
  expiration?: string;
  scopes?: string[];
}

/**
 * 토큰 엔드포인트 응답 (RFC 6749 5.1)
 */
export interface TokenResponse {
  access_token: string;
  token_type?: string;
  expires_in?: number;
  refresh_token?: string;
  scope?: string;
}

// ============================================================================
// HTTP
// ============================================================================

export type FetchFn = (input: string | URL, init?: RequestInit) => Promise<Response>;

/**
 * 인증이 적용된 HTTP 클라이언트
 *
 * 한 번의 publish 시도 동안만 유효하다.
 */
export interface HttpClient {
  request(url: string | URL, init?: RequestInit): Promise<Response>;
}

/**
 * 자격 증명이 없을 때 새로 발급받는 함수
 */
export type AuthorizeFn = () => Promise<Credentials>;
