import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { HttpClient } from '@pkgpost/core';
import type { CliDependencies, CliIO, PublishService } from '../src/types.js';
import { createLogger, type Logger, type LogSink } from '../src/utils/logger.js';

export interface MockState {
  outs: string[];
  errs: string[];
}

export function createMockIO(): { io: CliIO; state: MockState } {
  const state: MockState = { outs: [], errs: [] };
  const io: CliIO = {
    out(message: string): void {
      state.outs.push(message);
    },
    err(message: string): void {
      state.errs.push(message);
    },
  };
  return { io, state };
}

export function createMemoryLogger(): { logger: Logger; state: MockState } {
  const state: MockState = { outs: [], errs: [] };
  const sink: LogSink = {
    stdout(line: string): void {
      state.outs.push(line);
    },
    stderr(line: string): void {
      state.errs.push(line);
    },
  };
  return { logger: createLogger(sink, { noColor: true }), state };
}

export interface RecordedRequest {
  url: URL;
  init: RequestInit;
}

export type RouteHandler = (request: RecordedRequest) => Response | Promise<Response>;

/**
 * method + href 로 응답을 고르는 in-process HttpClient
 */
export function createFakeClient(routes: Record<string, RouteHandler>): {
  client: HttpClient;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];
  const client: HttpClient = {
    async request(url: string | URL, init: RequestInit = {}): Promise<Response> {
      const target = new URL(url);
      const recorded = { url: target, init };
      requests.push(recorded);

      const key = `${init.method ?? 'GET'} ${target.href}`;
      const handler = routes[key];
      if (!handler) {
        throw new Error(`unexpected request: ${key}`);
      }
      return handler(recorded);
    },
  };
  return { client, requests };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

export async function createTempDir(prefix = 'pkgpost-test-'): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * 상대 경로 → 내용 맵으로 파일 트리를 만든다
 */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const target = path.join(root, relativePath);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, content, 'utf8');
  }
}

export function createMockDependencies(
  overrides: Partial<CliDependencies> & { service?: PublishService } = {},
): { deps: CliDependencies; io: MockState; log: MockState } {
  const { io, state: ioState } = createMockIO();
  const { logger, state: logState } = createMemoryLogger();
  const { service, ...rest } = overrides;

  const deps: CliDependencies = {
    io,
    logger,
    env: {},
    cwd: process.cwd(),
    version: '0.0.0-test',
    createPublishService: () => {
      if (!service) {
        throw new Error('publish service not configured');
      }
      return service;
    },
    ...rest,
  };

  return { deps, io: ioState, log: logState };
}
