import { AuthorizationError, type AuthorizeFn, type Credentials } from '@pkgpost/core';
import { password } from '../utils/prompt.js';

export interface AuthorizeOptions {
  /** PKGPOST_TOKEN */
  token?: string;
  /** PKGPOST_REFRESH_TOKEN */
  refreshToken?: string;
  /** PKGPOST_TOKEN_ENDPOINT */
  tokenEndpoint?: string;
  /** PKGPOST_TOKEN_EXPIRES, ISO-8601 */
  expiration?: string;
  /** 토큰 입력 프롬프트. 테스트에서 교체한다 */
  promptToken?: (message: string) => Promise<string>;
}

export const TOKEN_PROMPT_MESSAGE = 'Registry access token';

function promptWithPassword(message: string): Promise<string> {
  return password(message, {
    validate: (value) => value.trim().length > 0 || 'Token must not be empty',
  });
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function authorizeOptionsFromEnv(
  env: NodeJS.ProcessEnv,
  promptToken?: (message: string) => Promise<string>,
): AuthorizeOptions {
  return {
    token: env.PKGPOST_TOKEN,
    refreshToken: env.PKGPOST_REFRESH_TOKEN,
    tokenEndpoint: env.PKGPOST_TOKEN_ENDPOINT,
    expiration: env.PKGPOST_TOKEN_EXPIRES,
    promptToken,
  };
}

/**
 * 만료 시각과 refresh 정보를 검증해 자격 증명에 붙인다
 */
function buildCredentials(accessToken: string, options: AuthorizeOptions): Credentials {
  const credentials: Credentials = { accessToken };

  const expiration = nonEmpty(options.expiration);
  if (expiration !== undefined) {
    const parsed = Date.parse(expiration);
    if (Number.isNaN(parsed)) {
      throw new AuthorizationError(`Invalid token expiration: ${expiration}`);
    }
    credentials.expiration = new Date(parsed).toISOString();
  }

  const refreshToken = nonEmpty(options.refreshToken);
  const tokenEndpoint = nonEmpty(options.tokenEndpoint);
  if ((refreshToken === undefined) !== (tokenEndpoint === undefined)) {
    throw new AuthorizationError('A refresh token and a token endpoint must be given together.');
  }
  if (refreshToken !== undefined && tokenEndpoint !== undefined) {
    if (!URL.canParse(tokenEndpoint)) {
      throw new AuthorizationError(`Invalid token endpoint: ${tokenEndpoint}`);
    }
    credentials.refreshToken = refreshToken;
    credentials.tokenEndpoint = tokenEndpoint;
  }

  return credentials;
}

/**
 * 환경 변수 토큰이 있으면 그것을, 없으면 프롬프트 입력을 자격 증명으로 쓴다.
 */
export function createAuthorize(options: AuthorizeOptions = {}): AuthorizeFn {
  return async (): Promise<Credentials> => {
    const fromEnv = nonEmpty(options.token);
    if (fromEnv) {
      return buildCredentials(fromEnv, options);
    }

    const prompt = options.promptToken ?? promptWithPassword;
    const entered = (await prompt(TOKEN_PROMPT_MESSAGE)).trim();
    if (entered.length === 0) {
      throw new AuthorizationError('No access token was provided.');
    }
    return buildCredentials(entered, options);
  };
}
