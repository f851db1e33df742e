/**
 * Token 관리 (유효성 판단, Refresh)
 */

import { AuthorizationError, CredentialsExpiredError } from './errors.js';
import type { Credentials, FetchFn, TokenResponse } from './types.js';

/**
 * 요청 직전 검사의 기본 minTtlSeconds
 */
const DEFAULT_MIN_TTL_SECONDS = 0;

function isObjectRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 토큰 유효성 판단
 *
 * 만료 시각이 없으면 무기한 유효하다. 해석할 수 없는 만료 시각은 만료로 본다.
 */
export function isTokenValid(
  credentials: Credentials,
  minTtlSeconds: number = DEFAULT_MIN_TTL_SECONDS,
  now: number = Date.now()
): boolean {
  const expiration = credentials.expiration;
  if (!expiration) {
    return true;
  }

  const expiresAtMs = new Date(expiration).getTime();
  if (Number.isNaN(expiresAtMs)) {
    return false;
  }

  return expiresAtMs - now > minTtlSeconds * 1000;
}

/**
 * refresh_token과 토큰 엔드포인트가 모두 있어야 갱신할 수 있다
 */
export function canRefresh(credentials: Credentials): boolean {
  return Boolean(credentials.refreshToken) && Boolean(credentials.tokenEndpoint);
}

export function needsRefresh(
  credentials: Credentials,
  minTtlSeconds: number = DEFAULT_MIN_TTL_SECONDS,
  now: number = Date.now()
): boolean {
  return canRefresh(credentials) && !isTokenValid(credentials, minTtlSeconds, now);
}

/**
 * 토큰 엔드포인트 응답을 Credentials로 변환
 *
 * 응답에 refresh_token이 없으면 기존 값을 유지한다.
 */
export function parseTokenResponse(
  value: unknown,
  previous: Credentials,
  now: number = Date.now()
): Credentials | undefined {
  if (!isObjectRecord(value)) {
    return undefined;
  }

  const accessToken = value['access_token'];
  if (typeof accessToken !== 'string' || accessToken.length === 0) {
    return undefined;
  }

  const response: TokenResponse = { access_token: accessToken };

  const tokenType = value['token_type'];
  if (tokenType !== undefined) {
    if (typeof tokenType !== 'string' || tokenType.toLowerCase() !== 'bearer') {
      return undefined;
    }
    response.token_type = tokenType;
  }

  const expiresIn = value['expires_in'];
  if (expiresIn !== undefined) {
    if (typeof expiresIn !== 'number' || !Number.isFinite(expiresIn)) {
      return undefined;
    }
    response.expires_in = expiresIn;
  }

  const refreshToken = value['refresh_token'];
  if (typeof refreshToken === 'string') {
    response.refresh_token = refreshToken;
  }

  const scope = value['scope'];
  if (typeof scope === 'string') {
    response.scope = scope;
  }

  const next: Credentials = {
    accessToken: response.access_token,
    refreshToken: response.refresh_token ?? previous.refreshToken,
    tokenEndpoint: previous.tokenEndpoint,
    scopes: response.scope ? response.scope.split(' ').filter((s) => s.length > 0) : previous.scopes,
  };

  if (response.expires_in !== undefined) {
    next.expiration = new Date(now + response.expires_in * 1000).toISOString();
  }

  return next;
}

/**
 * refresh_token grant 요청
 *
 * 엔드포인트가 invalid_grant로 거절하면 더 이상 자동 갱신이 불가능하므로
 * CredentialsExpiredError를 던진다.
 */
export async function refreshCredentials(
  credentials: Credentials,
  fetchFn: FetchFn
): Promise<Credentials> {
  const { refreshToken, tokenEndpoint } = credentials;
  if (!refreshToken || !tokenEndpoint) {
    throw new CredentialsExpiredError(credentials);
  }

  const body = new URLSearchParams({
    grant_type: 'refresh_token',
    refresh_token: refreshToken,
  });

  let response: Response;
  try {
    response = await fetchFn(tokenEndpoint, {
      method: 'POST',
      headers: {
        Accept: 'application/json',
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      body,
    });
  } catch (error) {
    throw new AuthorizationError(`Failed to reach the token endpoint: ${tokenEndpoint}`, { cause: error });
  }

  const text = await response.text();
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new AuthorizationError(`Invalid token endpoint response:\n${text}`, { cause: error });
  }

  if (!response.ok) {
    if (isObjectRecord(parsed) && parsed['error'] === 'invalid_grant') {
      throw new CredentialsExpiredError(credentials);
    }
    throw new AuthorizationError(`Token refresh failed: ${response.status} ${response.statusText}`);
  }

  const next = parseTokenResponse(parsed, credentials);
  if (!next) {
    throw new AuthorizationError(`Invalid token endpoint response:\n${text}`);
  }

  return next;
}

/**
 * RefreshManager 인터페이스
 */
export interface RefreshManager {
  refresh(credentials: Credentials): Promise<Credentials>;
}

export type RefreshFn = (credentials: Credentials) => Promise<Credentials>;

/**
 * Single-flight 패턴을 적용한 RefreshManager 생성
 *
 * 같은 refresh_token으로 동시에 들어온 갱신 요청은 하나만 실행하고 결과를 공유한다.
 */
export function createRefreshManager(refreshFn: RefreshFn): RefreshManager {
  const inflight = new Map<string, Promise<Credentials>>();

  return {
    async refresh(credentials: Credentials): Promise<Credentials> {
      const key = credentials.refreshToken ?? credentials.accessToken;
      const existing = inflight.get(key);
      if (existing) {
        return existing;
      }

      const promise = refreshFn(credentials);
      inflight.set(key, promise);

      try {
        return await promise;
      } finally {
        inflight.delete(key);
      }
    },
  };
}
