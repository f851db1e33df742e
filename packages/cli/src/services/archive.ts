import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import * as tar from 'tar';
import { fileSystemError } from '../errors.js';
import type { ArchiveBuilder, FileList } from '../types.js';

export const ARCHIVE_FILE_NAME = 'package.tar.gz';

/**
 * node-tar 는 '@'로 시작하는 인자를 합칠 아카이브로 해석한다
 */
function toTarEntry(file: string): string {
  return file.startsWith('@') ? `./${file}` : file;
}

/**
 * FileList 를 패키지 루트 기준의 gzip tar 로 묶는다.
 */
export class TarArchiveBuilder implements ArchiveBuilder {
  async build(rootDir: string, files: FileList): Promise<Uint8Array> {
    const tempDir = await mkdtemp(path.join(os.tmpdir(), 'pkgpost-archive-'));
    const archivePath = path.join(tempDir, ARCHIVE_FILE_NAME);

    try {
      await tar.c(
        {
          gzip: true,
          file: archivePath,
          cwd: rootDir,
          portable: true,
          noDirRecurse: true,
        },
        files.map(toTarEntry),
      );
      return new Uint8Array(await readFile(archivePath));
    } catch (error) {
      throw fileSystemError(`Failed to create ${ARCHIVE_FILE_NAME}`, error);
    } finally {
      await rm(tempDir, { recursive: true, force: true });
    }
  }
}
