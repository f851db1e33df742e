import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { run } from '../src/cli.js';
import { parseServerUrl } from '../src/commands/publish.js';
import { serverError } from '../src/errors.js';
import { AUTH_EXPIRED_NOTICE } from '../src/services/publish.js';
import type { PublishService, UploadRequest } from '../src/types.js';
import { createMockDependencies, createTempDir, removeTempDir, writeTree } from './helpers.js';

function createService(overrides: Partial<PublishService> = {}): PublishService {
  return {
    publish: vi.fn<PublishService['publish']>().mockResolvedValue('Published foo 1.0.0'),
    prepare: vi.fn<PublishService['prepare']>().mockResolvedValue({
      files: ['lib/foo.js', 'package.json'],
      archive: new Uint8Array(10),
    }),
    ...overrides,
  };
}

describe('parseServerUrl', () => {
  it('http(s) 절대 URL 만 받는다', () => {
    expect(parseServerUrl('https://registry.example.com').href).toBe('https://registry.example.com/');
    expect(() => parseServerUrl('registry.example.com')).toThrow('Invalid server URL: registry.example.com');
    expect(() => parseServerUrl('ftp://registry.example.com')).toThrow(
      'Server URL must use http or https: ftp://registry.example.com',
    );
  });
});

describe('pkgpost CLI', () => {
  let home: string;
  let project: string;

  beforeEach(async () => {
    home = await createTempDir('pkgpost-home-');
    project = await createTempDir('pkgpost-project-');
    await writeTree(project, { 'package.json': '{"name":"foo"}' });
  });

  afterEach(async () => {
    await removeTempDir(home);
    await removeTempDir(project);
  });

  it('publish 는 서버 메시지를 그대로 출력한다', async () => {
    const service = createService();
    const createPublishService = vi.fn(() => service);
    const { deps, io } = createMockDependencies({ home, cwd: project, createPublishService });

    const code = await run(['node', 'pkgpost', '--quiet', 'publish', '--server', 'https://registry.example.com'], deps);

    expect(code).toBe(0);
    expect(io.outs).toEqual(['Published foo 1.0.0']);
    const request = vi.mocked(service.publish).mock.calls[0]?.[0];
    expect(request?.server.href).toBe('https://registry.example.com/');
    expect(request?.packageDir).toBe(project);
    expect(createPublishService).toHaveBeenCalledWith(
      expect.objectContaining({ cacheDir: path.join(home, '.pkgpost') }),
    );
  });

  it('재시도 안내는 warn 으로 나간다', async () => {
    let notified: string[] = [];
    const { deps, log } = createMockDependencies({
      home,
      cwd: project,
      createPublishService: (options) => {
        notified = [];
        return createService({
          publish: async (_request: UploadRequest) => {
            options.notify(AUTH_EXPIRED_NOTICE);
            notified.push(AUTH_EXPIRED_NOTICE);
            return 'ok';
          },
        });
      },
    });

    await run(['node', 'pkgpost', '--no-color', 'publish'], deps);

    expect(notified).toEqual([AUTH_EXPIRED_NOTICE]);
    expect(log.errs).toEqual([`warning: ${AUTH_EXPIRED_NOTICE}`]);
  });

  it('실패하면 오류를 stderr 에 쓰고 종료 코드를 돌려준다', async () => {
    const service = createService({
      publish: vi.fn<PublishService['publish']>().mockRejectedValue(serverError('bad credentials')),
    });
    const { deps, io } = createMockDependencies({ home, cwd: project, service });

    const code = await run(['node', 'pkgpost', '--quiet', 'publish'], deps);

    expect(code).toBe(1);
    expect(io.errs).toEqual(['[SERVER_ERROR] bad credentials']);
  });

  it('--json 이면 오류도 JSON 으로 stdout 에 쓴다', async () => {
    const service = createService({
      publish: vi.fn<PublishService['publish']>().mockRejectedValue(serverError('bad credentials')),
    });
    const { deps, io } = createMockDependencies({ home, cwd: project, service });

    const code = await run(['node', 'pkgpost', '--json', 'publish'], deps);

    expect(code).toBe(1);
    expect(io.outs).toHaveLength(1);
    const parsed: unknown = JSON.parse(io.outs[0] ?? '');
    expect(parsed).toEqual({ code: 'SERVER_ERROR', message: 'bad credentials', exitCode: 1 });
  });

  it('--dry-run 은 업로드하지 않고 파일 목록을 보여준다', async () => {
    const service = createService();
    const { deps, io } = createMockDependencies({ home, cwd: project, service });

    const code = await run(['node', 'pkgpost', '--no-color', 'publish', '.', '--dry-run'], deps);

    expect(code).toBe(0);
    expect(service.publish).not.toHaveBeenCalled();
    expect(service.prepare).toHaveBeenCalledWith(project);
    expect(io.outs).toEqual(['  lib/foo.js\n  package.json\n2 file(s), archive 10 B']);
  });

  it('없는 디렉토리는 INVALID_ARGUMENT', async () => {
    const { deps, io } = createMockDependencies({ home, cwd: project, service: createService() });

    const code = await run(['node', 'pkgpost', 'publish', 'missing'], deps);

    expect(code).toBe(2);
    expect(io.errs).toEqual([`[INVALID_ARGUMENT] Package directory not found: ${path.join(project, 'missing')}`]);
  });

  it('잘못된 --server 는 INVALID_ARGUMENT', async () => {
    const { deps } = createMockDependencies({ home, cwd: project, service: createService() });

    const code = await run(['node', 'pkgpost', 'publish', '--server', 'not a url'], deps);

    expect(code).toBe(2);
  });

  it('login 은 토큰을 저장하고 logout 은 지운다', async () => {
    const { deps } = createMockDependencies({ home, cwd: project, env: { PKGPOST_TOKEN: 'test-secret' } });
    const credentialsPath = path.join(home, '.pkgpost', 'credentials.json');

    expect(await run(['node', 'pkgpost', 'login'], deps)).toBe(0);
    const stored: unknown = JSON.parse(await readFile(credentialsPath, 'utf8'));
    expect(stored).toEqual({ accessToken: 'test-secret' });

    expect(await run(['node', 'pkgpost', 'logout'], deps)).toBe(0);
    await expect(readFile(credentialsPath, 'utf8')).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('login 은 환경 변수의 만료 시각과 refresh 정보도 저장한다', async () => {
    const { deps } = createMockDependencies({
      home,
      cwd: project,
      env: {
        PKGPOST_TOKEN: 'test-secret',
        PKGPOST_REFRESH_TOKEN: 'test-refresh',
        PKGPOST_TOKEN_ENDPOINT: 'https://auth.example.com/token',
        PKGPOST_TOKEN_EXPIRES: '2030-01-02T03:04:05Z',
      },
    });

    expect(await run(['node', 'pkgpost', 'login'], deps)).toBe(0);

    const stored: unknown = JSON.parse(await readFile(path.join(home, '.pkgpost', 'credentials.json'), 'utf8'));
    expect(stored).toEqual({
      accessToken: 'test-secret',
      refreshToken: 'test-refresh',
      tokenEndpoint: 'https://auth.example.com/token',
      expiration: '2030-01-02T03:04:05.000Z',
    });
  });
});
