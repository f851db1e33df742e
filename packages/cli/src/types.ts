import type { CredentialsExpiredError, HttpClient } from '@pkgpost/core';
import type { PublishServiceOptions } from './services/publish.js';
import type { Logger } from './utils/logger.js';

export type ExitCode = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 130;

/**
 * 패키지 루트 기준 상대 경로 목록 (POSIX 구분자, 정렬, 중복 없음)
 */
export type FileList = readonly string[];

export interface UploadTicket {
  uploadUrl: URL;
  formFields: Record<string, string>;
}

export type UploadConfirmation =
  | { kind: 'success'; message: string }
  | { kind: 'failure'; message: string };

export type PublishAttemptResult =
  | { status: 'completed'; message: string }
  | { status: 'auth-expired'; error: CredentialsExpiredError }
  | { status: 'failed'; error: unknown };

export type UploadStage = 'start' | 'ticket-requested' | 'archive-ready' | 'uploaded' | 'confirmed' | 'failed';

export interface UploadRequest {
  server: URL;
  packageDir: string;
  onStage?: (stage: UploadStage) => void;
}

export interface PreparedPackage {
  files: FileList;
  archive: Uint8Array;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (command: string, args: string[], cwd?: string) => Promise<CommandResult>;

export interface FileSelector {
  selectFiles(rootDir: string): Promise<FileList>;
}

export interface ArchiveBuilder {
  build(rootDir: string, files: FileList): Promise<Uint8Array>;
}

export interface Uploader {
  run(client: HttpClient, request: UploadRequest): Promise<string>;
}

export interface PublishService {
  publish(request: UploadRequest): Promise<string>;
  prepare(packageDir: string): Promise<PreparedPackage>;
}

export interface CliIO {
  out(message: string): void;
  err(message: string): void;
}

export interface CliDependencies {
  io: CliIO;
  logger: Logger;
  env: NodeJS.ProcessEnv;
  cwd: string;
  /** 전역 설정과 ~ 확장 기준 */
  home?: string;
  version: string;
  createPublishService(options: PublishServiceOptions): PublishService;
  promptToken?: (message: string) => Promise<string>;
}
