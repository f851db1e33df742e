import { CredentialsExpiredError } from './errors.js';
import { createRefreshManager, isTokenValid, needsRefresh, refreshCredentials, type RefreshManager } from './token.js';
import type { Credentials, FetchFn, HttpClient } from './types.js';

export interface AuthorizedClientOptions {
  credentials: Credentials;
  /** 토큰을 실어 보낼 서버. 다른 origin으로 가는 요청에는 토큰을 붙이지 않는다 */
  server: string | URL;
  fetch?: FetchFn;
  minTtlSeconds?: number;
}

function defaultFetch(input: string | URL, init?: RequestInit): Promise<Response> {
  return fetch(input, init);
}

/**
 * Bearer 토큰을 붙여 요청하는 HttpClient
 *
 * 요청 직전에 토큰을 검사해서, 만료되었으면 갱신하고
 * 갱신할 수 없으면 CredentialsExpiredError를 던진다.
 */
export class AuthorizedClient implements HttpClient {
  private currentCredentials: Credentials;

  private refreshedFlag = false;

  private readonly serverOrigin: string;

  private readonly fetchFn: FetchFn;

  private readonly minTtlSeconds: number;

  private readonly refreshManager: RefreshManager;

  constructor(options: AuthorizedClientOptions) {
    this.currentCredentials = options.credentials;
    this.serverOrigin = new URL(options.server).origin;
    this.fetchFn = options.fetch ?? defaultFetch;
    this.minTtlSeconds = options.minTtlSeconds ?? 0;
    this.refreshManager = createRefreshManager((credentials) => refreshCredentials(credentials, this.fetchFn));
  }

  get credentials(): Credentials {
    return this.currentCredentials;
  }

  /** 이 클라이언트가 토큰을 갱신했는지 여부 */
  get refreshed(): boolean {
    return this.refreshedFlag;
  }

  async request(url: string | URL, init: RequestInit = {}): Promise<Response> {
    const target = new URL(url);
    if (target.origin !== this.serverOrigin) {
      return this.fetchFn(target.href, init);
    }

    const credentials = await this.ensureFreshCredentials();
    const headers = new Headers(init.headers);
    headers.set('Authorization', `Bearer ${credentials.accessToken}`);

    return this.fetchFn(target.href, { ...init, headers });
  }

  private async ensureFreshCredentials(): Promise<Credentials> {
    if (isTokenValid(this.currentCredentials, this.minTtlSeconds)) {
      return this.currentCredentials;
    }

    if (!needsRefresh(this.currentCredentials, this.minTtlSeconds)) {
      throw new CredentialsExpiredError(this.currentCredentials);
    }

    const refreshed = await this.refreshManager.refresh(this.currentCredentials);
    this.currentCredentials = refreshed;
    this.refreshedFlag = true;
    return refreshed;
  }
}
