import { execFile } from 'node:child_process';
import { readErrorMessage } from '../errors.js';
import type { CommandResult, CommandRunner } from '../types.js';

/**
 * 외부 명령 실행. 실패하면 stderr(없으면 원인 메시지)를 담은 Error로 reject 한다.
 */
export const runCommand: CommandRunner = (command, args, cwd) => {
  return new Promise<CommandResult>((resolve, reject) => {
    execFile(
      command,
      args,
      {
        cwd,
        encoding: 'utf8',
        maxBuffer: 10 * 1024 * 1024,
      },
      (error, stdout, stderr) => {
        if (error) {
          const stderrMessage = stderr.trim();
          const detail = stderrMessage.length > 0 ? stderrMessage : readErrorMessage(error);
          reject(new Error(detail, { cause: error }));
          return;
        }
        resolve({ stdout, stderr });
      },
    );
  });
};
