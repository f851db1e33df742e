import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';
import { fileSystemError } from '../errors.js';
import type { CommandRunner, FileList, FileSelector } from '../types.js';
import { toPosixPath } from '../utils.js';
import { runCommand } from './command.js';
import { isGitInstalled, listGitFiles } from './git.js';

/**
 * 패키지에 절대 포함하지 않는 예약 이름
 */
export const RESERVED_PACKAGES_NAME = 'packages';

const GIT_DIR_NAME = '.git';

async function isDirectory(targetPath: string): Promise<boolean> {
  try {
    return (await stat(targetPath)).isDirectory();
  } catch {
    return false;
  }
}

async function isRegularFile(targetPath: string): Promise<boolean> {
  try {
    return (await stat(targetPath)).isFile();
  } catch {
    return false;
  }
}

export function isReservedEntry(relativePath: string): boolean {
  return path.posix.basename(relativePath) === RESERVED_PACKAGES_NAME;
}

async function walkFiles(rootDir: string, relativeDir: string, output: string[]): Promise<void> {
  const absoluteDir = path.join(rootDir, relativeDir);
  const entries = await readdir(absoluteDir, { withFileTypes: true });

  for (const entry of entries) {
    if (relativeDir === '' && entry.name === GIT_DIR_NAME) {
      continue;
    }

    const relativePath = relativeDir === '' ? entry.name : path.join(relativeDir, entry.name);
    if (entry.isDirectory()) {
      await walkFiles(rootDir, relativePath, output);
      continue;
    }

    // 심볼릭 링크는 stat 단계에서 대상이 일반 파일인지 판별한다
    output.push(toPosixPath(relativePath));
  }
}

export class DefaultFileSelector implements FileSelector {
  constructor(private readonly run: CommandRunner = runCommand) {}

  async selectFiles(rootDir: string): Promise<FileList> {
    const candidates = await this.listCandidates(rootDir);

    const unique = [...new Set(candidates)].filter((entry) => !isReservedEntry(entry));
    const checks = await Promise.all(
      unique.map(async (entry) => ((await isRegularFile(path.join(rootDir, entry))) ? entry : undefined)),
    );

    return checks.filter((entry): entry is string => entry !== undefined).sort();
  }

  private async listCandidates(rootDir: string): Promise<string[]> {
    const [hasGitDir, gitInstalled] = await Promise.all([
      isDirectory(path.join(rootDir, GIT_DIR_NAME)),
      isGitInstalled(this.run),
    ]);

    if (hasGitDir && gitInstalled) {
      try {
        return await listGitFiles(this.run, rootDir);
      } catch (error) {
        throw fileSystemError(`Failed to list files with git in ${rootDir}`, error);
      }
    }

    const files: string[] = [];
    try {
      await walkFiles(rootDir, '', files);
    } catch (error) {
      throw fileSystemError(`Failed to read directory ${rootDir}`, error);
    }
    return files;
  }
}
