import {
  createCredentialStore,
  isCredentialsExpiredError,
  withClient,
  type AuthorizeFn,
  type CredentialStore,
  type FetchFn,
  type HttpClient,
} from '@pkgpost/core';
import type { PreparedPackage, PublishAttemptResult, PublishService, UploadRequest } from '../types.js';
import { TarArchiveBuilder } from './archive.js';
import { DefaultFileSelector } from './file-selector.js';
import { UploadOrchestrator } from './upload.js';

export const AUTH_EXPIRED_NOTICE =
  "Authorization to upload packages has expired and can't be automatically refreshed.";

/**
 * 시도 하나의 결과를 PublishAttemptResult 로 정리한다. 만료 신호만 따로 구분한다.
 */
export async function runPublishAttempt(attempt: () => Promise<string>): Promise<PublishAttemptResult> {
  try {
    return { status: 'completed', message: await attempt() };
  } catch (error) {
    if (isCredentialsExpiredError(error)) {
      return { status: 'auth-expired', error };
    }
    return { status: 'failed', error };
  }
}

/**
 * 만료 신호를 받으면 안내를 남기고 전체 시도를 딱 한 번 다시 실행한다.
 * 두 번째 만료나 그 밖의 실패는 그대로 던진다.
 */
export async function publishWithAuthRetry(
  attempt: () => Promise<string>,
  notify: (message: string) => void,
): Promise<string> {
  const first = await runPublishAttempt(attempt);
  switch (first.status) {
    case 'completed':
      return first.message;
    case 'failed':
      throw first.error;
    case 'auth-expired':
      notify(AUTH_EXPIRED_NOTICE);
      return attempt();
  }
}

export interface PublishServiceOptions {
  cacheDir: string;
  authorize: AuthorizeFn;
  /** 재시도 안내 출력 */
  notify: (message: string) => void;
  uploader?: UploadOrchestrator;
  store?: CredentialStore;
  fetch?: FetchFn;
}

export class DefaultPublishService implements PublishService {
  private readonly uploader: UploadOrchestrator;

  private readonly store: CredentialStore;

  constructor(private readonly options: PublishServiceOptions) {
    this.uploader = options.uploader ?? new UploadOrchestrator(new DefaultFileSelector(), new TarArchiveBuilder());
    this.store = options.store ?? createCredentialStore(options.cacheDir);
  }

  async publish(request: UploadRequest): Promise<string> {
    const attempt = (): Promise<string> =>
      withClient(this.store, (client: HttpClient) => this.uploader.run(client, request), {
        server: request.server,
        authorize: this.options.authorize,
        fetch: this.options.fetch,
      });

    return publishWithAuthRetry(attempt, this.options.notify);
  }

  prepare(packageDir: string): Promise<PreparedPackage> {
    return this.uploader.prepare(packageDir);
  }
}
