import { describe, it, expect, vi } from 'vitest';
import { withClient } from '../../src/oauth/with-client.js';
import { CredentialsExpiredError } from '../../src/oauth/errors.js';
import type { CredentialStore } from '../../src/oauth/store.js';
import type { Credentials, FetchFn } from '../../src/oauth/types.js';

interface MemoryStore extends CredentialStore {
  saved: Credentials[];
  removed: number;
}

function createMemoryStore(initial: Credentials | null): MemoryStore {
  let current = initial;
  const store: MemoryStore = {
    path: '/memory/credentials.json',
    saved: [],
    removed: 0,
    async load() {
      return current;
    },
    async save(credentials) {
      current = credentials;
      store.saved.push(credentials);
    },
    async remove() {
      current = null;
      store.removed += 1;
    },
  };
  return store;
}

const server = 'https://registry.example.com';

describe('withClient', () => {
  it('저장된 자격 증명으로 operation을 실행한다', async () => {
    const store = createMemoryStore({ accessToken: 'test-access' });
    const authorize = vi.fn(async () => ({ accessToken: 'unused' }));

    const result = await withClient(store, async () => 'done', { server, authorize });

    expect(result).toBe('done');
    expect(authorize).not.toHaveBeenCalled();
    expect(store.saved).toEqual([]);
  });

  it('자격 증명이 없으면 authorize 결과를 저장하고 사용한다', async () => {
    const store = createMemoryStore(null);
    const fetchFn = vi.fn<FetchFn>(async () => new Response('{}'));

    await withClient(store, (client) => client.request(`${server}/x`), {
      server,
      authorize: async () => ({ accessToken: 'new-access' }),
      fetch: fetchFn,
    });

    expect(store.saved).toEqual([{ accessToken: 'new-access' }]);
    const [, init] = fetchFn.mock.calls[0] ?? [];
    expect(new Headers(init?.headers).get('authorization')).toBe('Bearer new-access');
  });

  it('만료 신호가 나면 저장된 자격 증명을 지우고 그대로 다시 던진다', async () => {
    const store = createMemoryStore({ accessToken: 'test-access', expiration: '2000-01-01T00:00:00.000Z' });

    const promise = withClient(store, (client) => client.request(`${server}/x`), {
      server,
      authorize: async () => ({ accessToken: 'unused' }),
      fetch: async () => new Response('{}'),
    });

    await expect(promise).rejects.toBeInstanceOf(CredentialsExpiredError);
    expect(store.removed).toBe(1);
    await expect(store.load()).resolves.toBeNull();
  });

  it('다른 오류는 자격 증명을 지우지 않는다', async () => {
    const store = createMemoryStore({ accessToken: 'test-access' });
    const failure = new Error('boom');

    await expect(
      withClient(
        store,
        async () => {
          throw failure;
        },
        { server, authorize: async () => ({ accessToken: 'unused' }) },
      ),
    ).rejects.toBe(failure);
    expect(store.removed).toBe(0);
  });

  it('갱신된 토큰은 실패한 operation 뒤에도 저장된다', async () => {
    const store = createMemoryStore({
      accessToken: 'stale-access',
      refreshToken: 'test-refresh',
      tokenEndpoint: 'https://auth.example.com/token',
      expiration: '2000-01-01T00:00:00.000Z',
    });
    const fetchFn: FetchFn = async (input) => {
      if (String(input) === 'https://auth.example.com/token') {
        return new Response(JSON.stringify({ access_token: 'fresh-access' }));
      }
      return new Response('{}');
    };

    await expect(
      withClient(
        store,
        async (client) => {
          await client.request(`${server}/x`);
          throw new Error('later failure');
        },
        { server, authorize: async () => ({ accessToken: 'unused' }), fetch: fetchFn },
      ),
    ).rejects.toThrow('later failure');

    expect(store.saved.map((c) => c.accessToken)).toEqual(['fresh-access']);
  });
});
