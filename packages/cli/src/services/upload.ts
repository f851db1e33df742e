import { AuthorizationError, isCredentialsExpiredError, type HttpClient } from '@pkgpost/core';
import { fileSystemError, invalidServerResponse, isCliError, networkError, serverError, uploadFailed } from '../errors.js';
import type {
  ArchiveBuilder,
  FileSelector,
  PreparedPackage,
  UploadRequest,
  UploadStage,
  UploadTicket,
  Uploader,
} from '../types.js';
import { ARCHIVE_FILE_NAME } from './archive.js';
import { extractError, parseConfirmation, parseJsonBody, parseUploadTicket } from './response-parser.js';

export const NEW_UPLOAD_PATH = '/packages/versions/new.json';

const ARCHIVE_CONTENT_TYPE = 'application/gzip';

interface ServerReply {
  response: Response;
  body: string;
}

function isPassThroughError(error: unknown): boolean {
  return (
    isCliError(error) ||
    isCredentialsExpiredError(error) ||
    error instanceof AuthorizationError
  );
}

function readFailureMessage(error: unknown): string {
  if (error instanceof Error && error.message.length > 0) {
    return error.message;
  }
  return String(error);
}

async function send(client: HttpClient, url: URL, init: RequestInit, action: string): Promise<ServerReply> {
  try {
    const response = await client.request(url, init);
    const body = await response.text();
    return { response, body };
  } catch (error) {
    if (isPassThroughError(error)) {
      throw error;
    }
    throw networkError(
      `${action} failed: ${url.href}`,
      `Check --server or PKGPOST_SERVER. Cause: ${readFailureMessage(error)}`,
      error,
    );
  }
}

/**
 * ticket → upload → confirm 순서로 진행하는 업로드 상태 기계
 */
export class UploadOrchestrator implements Uploader {
  constructor(
    private readonly selector: FileSelector,
    private readonly archiver: ArchiveBuilder,
  ) {}

  async prepare(packageDir: string): Promise<PreparedPackage> {
    const files = await this.selector.selectFiles(packageDir);
    if (files.length === 0) {
      throw fileSystemError(`No files to publish in ${packageDir}`);
    }
    const archive = await this.archiver.build(packageDir, files);
    return { files, archive };
  }

  async run(client: HttpClient, request: UploadRequest): Promise<string> {
    const report = (stage: UploadStage): void => {
      request.onStage?.(stage);
    };

    report('start');
    try {
      const message = await this.execute(client, request, report);
      report('confirmed');
      return message;
    } catch (error) {
      report('failed');
      throw error;
    }
  }

  private async execute(
    client: HttpClient,
    request: UploadRequest,
    report: (stage: UploadStage) => void,
  ): Promise<string> {
    report('ticket-requested');
    const [ticket, prepared] = await this.requestTicketAndArchive(client, request);
    report('archive-ready');

    const location = await this.upload(client, ticket, prepared.archive);
    report('uploaded');

    return this.confirm(client, location);
  }

  private async requestTicketAndArchive(
    client: HttpClient,
    request: UploadRequest,
  ): Promise<[UploadTicket, PreparedPackage]> {
    const controller = new AbortController();

    const ticketPromise = this.requestTicket(client, request.server, controller.signal);
    const archivePromise = this.prepare(request.packageDir).catch((error: unknown) => {
      controller.abort();
      throw error;
    });

    return Promise.all([ticketPromise, archivePromise]);
  }

  private async requestTicket(client: HttpClient, server: URL, signal: AbortSignal): Promise<UploadTicket> {
    const url = new URL(NEW_UPLOAD_PATH, server);
    const { response, body } = await send(
      client,
      url,
      { method: 'GET', headers: { Accept: 'application/json' }, signal },
      'Upload ticket request',
    );

    const parameters = parseJsonBody(body);
    if (response.status !== 200) {
      extractError(parameters, body);
    }
    return parseUploadTicket(parameters, body);
  }

  private async upload(client: HttpClient, ticket: UploadTicket, archive: Uint8Array): Promise<URL> {
    const form = new FormData();
    for (const [key, value] of Object.entries(ticket.formFields)) {
      form.append(key, value);
    }
    form.append('file', new Blob([archive], { type: ARCHIVE_CONTENT_TYPE }), ARCHIVE_FILE_NAME);

    const { response, body } = await send(
      client,
      ticket.uploadUrl,
      { method: 'POST', body: form, redirect: 'manual' },
      'Package upload',
    );

    const location = response.headers.get('location');
    if (location === null) {
      // 블롭 스토어의 오류 본문은 형식이 정해져 있지 않아 detail 로만 남긴다
      throw uploadFailed(body.length > 0 ? body : undefined);
    }
    if (!URL.canParse(location, ticket.uploadUrl.href)) {
      throw invalidServerResponse(location);
    }
    return new URL(location, ticket.uploadUrl);
  }

  private async confirm(client: HttpClient, location: URL): Promise<string> {
    const { body } = await send(
      client,
      location,
      { method: 'GET', headers: { Accept: 'application/json' } },
      'Upload confirmation',
    );

    const confirmation = parseConfirmation(parseJsonBody(body), body);
    if (confirmation.kind === 'failure') {
      throw serverError(confirmation.message);
    }
    return confirmation.message;
  }
}
