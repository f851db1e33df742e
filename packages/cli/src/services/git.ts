import type { CommandRunner } from '../types.js';

export async function isGitInstalled(run: CommandRunner): Promise<boolean> {
  try {
    await run('git', ['--version']);
    return true;
  } catch {
    return false;
  }
}

/**
 * tracked 파일과 ignore 되지 않은 untracked 파일을 모두 나열한다.
 */
export async function listGitFiles(run: CommandRunner, rootDir: string): Promise<string[]> {
  const result = await run('git', ['ls-files', '--cached', '--others', '--exclude-standard', '-z'], rootDir);
  return result.stdout.split('\0').filter((entry) => entry.length > 0);
}
