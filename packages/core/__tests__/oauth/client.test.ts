import { describe, it, expect, vi } from 'vitest';
import { AuthorizedClient } from '../../src/oauth/client.js';
import { CredentialsExpiredError } from '../../src/oauth/errors.js';
import type { FetchFn } from '../../src/oauth/types.js';

function okResponse(): Response {
  return new Response('{}', { status: 200 });
}

function authorizationOf(init: RequestInit | undefined): string | null {
  return new Headers(init?.headers).get('authorization');
}

describe('AuthorizedClient', () => {
  it('레지스트리 origin 요청에는 Bearer 토큰을 붙인다', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => okResponse());
    const client = new AuthorizedClient({
      credentials: { accessToken: 'test-access' },
      server: 'https://registry.example.com',
      fetch: fetchFn,
    });

    await client.request('https://registry.example.com/packages/versions/new.json', {
      headers: { Accept: 'application/json' },
    });

    const [url, init] = fetchFn.mock.calls[0] ?? [];
    expect(url).toBe('https://registry.example.com/packages/versions/new.json');
    expect(authorizationOf(init)).toBe('Bearer test-access');
    expect(new Headers(init?.headers).get('accept')).toBe('application/json');
  });

  it('다른 origin 요청에는 토큰을 붙이지 않고 만료 검사도 하지 않는다', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => okResponse());
    const client = new AuthorizedClient({
      credentials: { accessToken: 'test-access', expiration: '2000-01-01T00:00:00.000Z' },
      server: 'https://registry.example.com',
      fetch: fetchFn,
    });

    await client.request(new URL('https://blob.example.com/upload'), { method: 'POST' });

    const [url, init] = fetchFn.mock.calls[0] ?? [];
    expect(url).toBe('https://blob.example.com/upload');
    expect(authorizationOf(init)).toBeNull();
  });

  it('만료되었고 갱신할 수 없으면 요청 전에 CredentialsExpiredError', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => okResponse());
    const client = new AuthorizedClient({
      credentials: { accessToken: 'test-access', expiration: '2000-01-01T00:00:00.000Z' },
      server: 'https://registry.example.com',
      fetch: fetchFn,
    });

    await expect(client.request('https://registry.example.com/x')).rejects.toBeInstanceOf(CredentialsExpiredError);
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it('만료되었지만 갱신 가능하면 갱신한 토큰으로 요청한다', async () => {
    const fetchFn = vi.fn<FetchFn>(async (input) => {
      if (String(input) === 'https://auth.example.com/token') {
        return new Response(JSON.stringify({ access_token: 'fresh-access', expires_in: 3600 }), { status: 200 });
      }
      return okResponse();
    });
    const client = new AuthorizedClient({
      credentials: {
        accessToken: 'stale-access',
        refreshToken: 'test-refresh',
        tokenEndpoint: 'https://auth.example.com/token',
        expiration: '2000-01-01T00:00:00.000Z',
      },
      server: 'https://registry.example.com',
      fetch: fetchFn,
    });

    await client.request('https://registry.example.com/x');

    expect(fetchFn).toHaveBeenCalledTimes(2);
    const [, init] = fetchFn.mock.calls[1] ?? [];
    expect(authorizationOf(init)).toBe('Bearer fresh-access');
    expect(client.refreshed).toBe(true);
    expect(client.credentials.accessToken).toBe('fresh-access');
    expect(client.credentials.refreshToken).toBe('test-refresh');
  });

  it('토큰을 갱신하지 않았으면 refreshed는 false', async () => {
    const client = new AuthorizedClient({
      credentials: { accessToken: 'test-access' },
      server: 'https://registry.example.com',
      fetch: async () => okResponse(),
    });

    await client.request('https://registry.example.com/x');
    expect(client.refreshed).toBe(false);
  });
});
