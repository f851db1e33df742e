import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { CliDependencies, CliIO } from '../types.js';
import { isObjectRecord } from '../utils.js';
import { logger } from '../utils/logger.js';
import { DefaultPublishService } from './publish.js';

function readCliVersion(): string {
  const cliPackageJson = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..', 'package.json');

  try {
    const parsed: unknown = JSON.parse(readFileSync(cliPackageJson, 'utf8'));
    if (isObjectRecord(parsed)) {
      const version = parsed['version'];
      if (typeof version === 'string' && version.trim().length > 0) {
        return version;
      }
    }
  } catch {
    // 버전을 읽지 못하면 기본값을 쓴다
  }

  return '0.0.0';
}

const processIO: CliIO = {
  out(message: string): void {
    process.stdout.write(`${message}\n`);
  },
  err(message: string): void {
    process.stderr.write(`${message}\n`);
  },
};

export function createDefaultDependencies(): CliDependencies {
  return {
    io: processIO,
    logger,
    env: process.env,
    cwd: process.cwd(),
    version: readCliVersion(),
    createPublishService: (options) => new DefaultPublishService(options),
  };
}
