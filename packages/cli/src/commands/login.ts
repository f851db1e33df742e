/**
 * pkgpost login command
 *
 * Stores an access token for the package server
 */

import { Command } from "commander";
import chalk from "chalk";
import { createCredentialStore } from "@pkgpost/core";
import { authorizeOptionsFromEnv, createAuthorize } from "../services/authorize.js";
import type { CliDependencies } from "../types.js";
import { setupGlobalOptions, type CommandContext } from "./context.js";

async function executeLogin(context: CommandContext): Promise<void> {
  const { deps, config } = context;
  const store = createCredentialStore(config.cacheDir);

  if (deps.env.PKGPOST_TOKEN) {
    deps.logger.info("Using token from PKGPOST_TOKEN environment variable");
  } else {
    deps.logger.info(`Logging in to ${chalk.cyan(config.server)}`);
  }

  const authorize = createAuthorize(authorizeOptionsFromEnv(deps.env, deps.promptToken));
  await store.save(await authorize());

  if (context.globalOptions.json) {
    deps.logger.json({ loggedIn: true, credentials: store.path });
    return;
  }
  deps.logger.success(`Credentials saved to ${store.path}`);
}

/**
 * Create the login command
 */
export function createLoginCommand(deps: CliDependencies): Command {
  return new Command("login")
    .description("Store an access token for publishing")
    .action(async (_options: unknown, command: Command) => {
      const context = await setupGlobalOptions(command, deps);
      await executeLogin(context);
    });
}
