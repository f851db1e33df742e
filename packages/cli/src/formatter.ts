import type { CliError } from './errors.js';
import type { FileList } from './types.js';
import { formatBytes } from './utils.js';

export function formatCliError(error: CliError, json: boolean): string {
  if (json) {
    return JSON.stringify(
      {
        code: error.code,
        message: error.message,
        suggestion: error.suggestion,
        detail: error.detail,
        exitCode: error.exitCode,
      },
      null,
      2,
    );
  }

  const lines = [`[${error.code}] ${error.message}`];
  // INVALID_SERVER_RESPONSE 는 본문이 이미 message에 들어 있다
  if (error.detail && !error.message.includes(error.detail)) {
    lines.push(`detail: ${error.detail}`);
  }
  if (error.suggestion) {
    lines.push(`suggestion: ${error.suggestion}`);
  }
  return lines.join('\n');
}

export function formatFileList(files: FileList, archiveBytes: number): string {
  const lines = files.map((file) => `  ${file}`);
  lines.push(`${files.length} file(s), archive ${formatBytes(archiveBytes)}`);
  return lines.join('\n');
}
