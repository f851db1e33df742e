import { AuthorizationError, isCredentialsExpiredError } from '@pkgpost/core';
import type { ExitCode } from './types.js';
import { PromptCancelledError } from './utils/prompt.js';

export type ErrorCode =
  | 'INVALID_ARGUMENT'
  | 'CONFIG_ERROR'
  | 'FILE_SYSTEM_ERROR'
  | 'INVALID_SERVER_RESPONSE'
  | 'SERVER_ERROR'
  | 'UPLOAD_FAILED'
  | 'NETWORK_ERROR'
  | 'AUTH_ERROR'
  | 'AUTH_EXPIRED'
  | 'CANCELLED'
  | 'INTERNAL_ERROR'
  | 'UNKNOWN_ERROR';

export interface StructuredError {
  code: ErrorCode;
  message: string;
  suggestion?: string;
  /** 원본 응답 본문 등 진단용 데이터 */
  detail?: string;
  exitCode: ExitCode;
}

export class CliError extends Error implements StructuredError {
  code: ErrorCode;

  suggestion?: string;

  detail?: string;

  exitCode: ExitCode;

  constructor(error: StructuredError, options?: ErrorOptions) {
    super(error.message, options);
    this.name = 'CliError';
    this.code = error.code;
    this.suggestion = error.suggestion;
    this.detail = error.detail;
    this.exitCode = error.exitCode;
  }
}

export function isCliError(value: unknown): value is CliError {
  return value instanceof CliError;
}

export function readErrorMessage(error: unknown): string {
  if (error instanceof Error && error.message.length > 0) {
    return error.message;
  }
  return String(error);
}

export function toCliError(error: unknown): CliError {
  if (isCliError(error)) {
    return error;
  }

  if (isCredentialsExpiredError(error)) {
    return authExpiredError(error.message);
  }

  if (error instanceof AuthorizationError) {
    return authError(error.message, "Run 'pkgpost login' to store a new token.");
  }

  if (error instanceof PromptCancelledError) {
    return new CliError({
      code: 'CANCELLED',
      message: error.message,
      exitCode: 130,
    });
  }

  if (error instanceof Error) {
    return new CliError(
      {
        code: 'INTERNAL_ERROR',
        message: error.message,
        exitCode: 1,
        suggestion: 'Re-run with --verbose for more detail.',
      },
      { cause: error },
    );
  }

  return new CliError({
    code: 'UNKNOWN_ERROR',
    message: 'An unknown error occurred.',
    exitCode: 1,
  });
}

export function usageError(message: string, suggestion?: string): CliError {
  return new CliError({
    code: 'INVALID_ARGUMENT',
    message,
    exitCode: 2,
    suggestion,
  });
}

export function configError(message: string, suggestion?: string): CliError {
  return new CliError({
    code: 'CONFIG_ERROR',
    message,
    exitCode: 3,
    suggestion,
  });
}

export function fileSystemError(message: string, cause?: unknown): CliError {
  return new CliError(
    {
      code: 'FILE_SYSTEM_ERROR',
      message: cause === undefined ? message : `${message}: ${readErrorMessage(cause)}`,
      exitCode: 1,
    },
    { cause },
  );
}

export function invalidServerResponse(body: string): CliError {
  return new CliError({
    code: 'INVALID_SERVER_RESPONSE',
    message: `Invalid server response:\n${body}`,
    detail: body,
    exitCode: 5,
  });
}

export function serverError(message: string): CliError {
  return new CliError({
    code: 'SERVER_ERROR',
    message,
    exitCode: 1,
  });
}

export function uploadFailed(detail?: string): CliError {
  return new CliError({
    code: 'UPLOAD_FAILED',
    message: 'Failed to upload the package.',
    detail,
    exitCode: 5,
  });
}

export function networkError(message: string, suggestion?: string, cause?: unknown): CliError {
  return new CliError(
    {
      code: 'NETWORK_ERROR',
      message,
      exitCode: 5,
      suggestion,
    },
    { cause },
  );
}

export function authError(message: string, suggestion?: string): CliError {
  return new CliError({
    code: 'AUTH_ERROR',
    message,
    exitCode: 6,
    suggestion,
  });
}

export function authExpiredError(message: string): CliError {
  return new CliError({
    code: 'AUTH_EXPIRED',
    message,
    exitCode: 6,
    suggestion: "Run 'pkgpost login' to store a new token, then publish again.",
  });
}
