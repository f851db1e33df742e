import { AuthorizedClient } from './client.js';
import { isCredentialsExpiredError } from './errors.js';
import type { CredentialStore } from './store.js';
import type { AuthorizeFn, FetchFn, HttpClient } from './types.js';

export interface WithClientOptions {
  server: string | URL;
  /** 저장된 자격 증명이 없을 때 호출된다 */
  authorize: AuthorizeFn;
  fetch?: FetchFn;
}

/**
 * 인증된 클라이언트로 operation을 한 번 실행
 *
 * - 저장된 자격 증명이 없으면 authorize()로 발급받아 저장한다.
 * - 실행 중 토큰이 갱신되었으면 결과와 무관하게 갱신된 값을 저장한다.
 * - CredentialsExpiredError가 나면 저장된 자격 증명을 지운 뒤 다시 던진다.
 *   다음 withClient 호출은 authorize()부터 시작한다.
 */
export async function withClient<T>(
  cache: CredentialStore,
  operation: (client: HttpClient) => Promise<T>,
  options: WithClientOptions
): Promise<T> {
  let credentials = await cache.load();
  if (!credentials) {
    credentials = await options.authorize();
    await cache.save(credentials);
  }

  const client = new AuthorizedClient({
    credentials,
    server: options.server,
    fetch: options.fetch,
  });

  let result: T;
  try {
    result = await operation(client);
  } catch (error) {
    if (isCredentialsExpiredError(error)) {
      await cache.remove();
    } else if (client.refreshed) {
      await cache.save(client.credentials);
    }
    throw error;
  }

  if (client.refreshed) {
    await cache.save(client.credentials);
  }

  return result;
}
