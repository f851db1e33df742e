/**
 * pkgpost publish command
 *
 * Archives a package directory and uploads it to the package server
 */

import { stat } from "node:fs/promises";
import * as path from "node:path";
import { Command } from "commander";
import ora, { type Ora } from "ora";
import chalk from "chalk";
import { usageError } from "../errors.js";
import { formatFileList } from "../formatter.js";
import { authorizeOptionsFromEnv, createAuthorize } from "../services/authorize.js";
import type { CliDependencies, PublishService, UploadStage } from "../types.js";
import { setupGlobalOptions, type CommandContext } from "./context.js";

/**
 * Publish command options
 */
export interface PublishOptions {
  server?: string;
  dryRun: boolean;
}

const STAGE_TEXT: Record<UploadStage, string> = {
  start: "Preparing upload...",
  "ticket-requested": "Requesting upload ticket and building archive...",
  "archive-ready": "Uploading package...",
  uploaded: "Waiting for the server to confirm...",
  confirmed: "Package uploaded",
  failed: "Upload failed",
};

/**
 * Parse the --server value into an absolute http(s) URL
 */
export function parseServerUrl(value: string): URL {
  if (!URL.canParse(value)) {
    throw usageError(`Invalid server URL: ${value}`, "Pass an absolute URL such as https://packages.example.com");
  }
  const url = new URL(value);
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw usageError(`Server URL must use http or https: ${value}`);
  }
  return url;
}

async function resolvePackageDir(cwd: string, directory: string): Promise<string> {
  const packageDir = path.resolve(cwd, directory);
  try {
    if ((await stat(packageDir)).isDirectory()) {
      return packageDir;
    }
  } catch {
    // 아래에서 usage 오류로 보고한다
  }
  throw usageError(`Package directory not found: ${packageDir}`);
}

function followStages(spinner: Ora): (stage: UploadStage) => void {
  return (stage) => {
    if (stage === "confirmed" || stage === "failed") {
      return;
    }
    spinner.text = STAGE_TEXT[stage];
  };
}

async function executeDryRun(
  service: PublishService,
  packageDir: string,
  context: CommandContext
): Promise<void> {
  const { deps } = context;
  const prepared = await service.prepare(packageDir);

  if (context.globalOptions.json) {
    deps.logger.json({
      dryRun: true,
      packageDir,
      files: prepared.files,
      archiveBytes: prepared.archive.byteLength,
    });
    return;
  }

  deps.logger.info(`Dry run: ${chalk.cyan(packageDir)} would publish:`);
  deps.io.out(formatFileList(prepared.files, prepared.archive.byteLength));
  deps.logger.warn("Dry run - nothing was uploaded.");
}

/**
 * Execute the publish command
 */
async function executePublish(
  directory: string,
  options: PublishOptions,
  context: CommandContext
): Promise<void> {
  const { deps, config, globalOptions } = context;
  const packageDir = await resolvePackageDir(deps.cwd, directory);
  const server = parseServerUrl(config.server);

  const service = deps.createPublishService({
    cacheDir: config.cacheDir,
    authorize: createAuthorize(authorizeOptionsFromEnv(deps.env, deps.promptToken)),
    notify: (message) => deps.logger.warn(message),
  });

  if (options.dryRun) {
    await executeDryRun(service, packageDir, context);
    return;
  }

  deps.logger.debug(`Publishing ${packageDir} to ${server.href}`);

  const spinner = ora({
    text: STAGE_TEXT.start,
    isSilent: globalOptions.quiet === true || globalOptions.json === true,
  });
  spinner.start();

  let message: string;
  try {
    message = await service.publish({
      server,
      packageDir,
      onStage: followStages(spinner),
    });
  } catch (err) {
    spinner.fail(STAGE_TEXT.failed);
    throw err;
  }
  spinner.succeed(STAGE_TEXT.confirmed);

  if (globalOptions.json) {
    deps.logger.json({ published: true, server: server.href, message });
  } else {
    deps.io.out(message);
  }
}

/**
 * Create the publish command
 */
export function createPublishCommand(deps: CliDependencies): Command {
  return new Command("publish")
    .description("Publish a package directory to the package server")
    .argument("[directory]", "Package directory", ".")
    .option("--server <url>", "The package server to which to upload this package")
    .option("--dry-run", "Select files and build the archive without uploading", false)
    .action(async (directory: string, options: PublishOptions, command: Command) => {
      const context = await setupGlobalOptions(command, deps, { server: options.server });
      await executePublish(directory, options, context);
    });
}
