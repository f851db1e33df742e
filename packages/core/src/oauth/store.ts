/**
 * CredentialStore - 캐시 디렉토리의 credentials.json
 */

import { mkdir, readFile, writeFile, unlink } from 'fs/promises';
import { dirname, join } from 'path';
import { AuthorizationError } from './errors.js';
import type { Credentials } from './types.js';

export const CREDENTIALS_FILE_NAME = 'credentials.json';

/**
 * NodeJS.ErrnoException 타입 가드
 */
function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

function isObjectRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined | null {
  if (value === undefined) {
    return undefined;
  }
  return typeof value === 'string' ? value : null;
}

/**
 * 저장된 JSON을 Credentials로 검증
 */
export function parseCredentials(value: unknown): Credentials | undefined {
  if (!isObjectRecord(value)) {
    return undefined;
  }

  const accessToken = value['accessToken'];
  if (typeof accessToken !== 'string' || accessToken.length === 0) {
    return undefined;
  }

  const refreshToken = optionalString(value['refreshToken']);
  const tokenEndpoint = optionalString(value['tokenEndpoint']);
  const expiration = optionalString(value['expiration']);
  if (refreshToken === null || tokenEndpoint === null || expiration === null) {
    return undefined;
  }

  const scopesRaw = value['scopes'];
  let scopes: string[] | undefined;
  if (scopesRaw !== undefined) {
    if (!Array.isArray(scopesRaw) || !scopesRaw.every((scope): scope is string => typeof scope === 'string')) {
      return undefined;
    }
    scopes = scopesRaw;
  }

  const credentials: Credentials = { accessToken };
  if (refreshToken !== undefined) credentials.refreshToken = refreshToken;
  if (tokenEndpoint !== undefined) credentials.tokenEndpoint = tokenEndpoint;
  if (expiration !== undefined) credentials.expiration = expiration;
  if (scopes !== undefined) credentials.scopes = scopes;

  return credentials;
}

/**
 * CredentialStore 인터페이스
 */
export interface CredentialStore {
  readonly path: string;
  load(): Promise<Credentials | null>;
  save(credentials: Credentials): Promise<void>;
  remove(): Promise<void>;
}

/**
 * 파일 시스템 기반 CredentialStore 생성
 */
export function createCredentialStore(cacheDir: string): CredentialStore {
  const filePath = join(cacheDir, CREDENTIALS_FILE_NAME);

  return {
    path: filePath,

    async load(): Promise<Credentials | null> {
      let content: string;
      try {
        content = await readFile(filePath, 'utf8');
      } catch (error) {
        if (isNodeError(error) && error.code === 'ENOENT') {
          return null;
        }
        throw error;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(content);
      } catch (error) {
        throw new AuthorizationError(`Unable to parse stored credentials: ${filePath}`, { cause: error });
      }

      const credentials = parseCredentials(parsed);
      if (!credentials) {
        throw new AuthorizationError(`Stored credentials are malformed: ${filePath}`);
      }
      return credentials;
    },

    async save(credentials: Credentials): Promise<void> {
      await mkdir(dirname(filePath), { recursive: true });
      await writeFile(filePath, JSON.stringify(credentials, null, 2), { encoding: 'utf8', mode: 0o600 });
    },

    async remove(): Promise<void> {
      try {
        await unlink(filePath);
      } catch (error) {
        // ENOENT (파일 없음)이면 무시, 그 외 에러는 전파
        if (isNodeError(error) && error.code === 'ENOENT') {
          return;
        }
        throw error;
      }
    },
  };
}
