/**
 * pkgpost logout command
 *
 * Removes stored credentials
 */

import { Command } from "commander";
import { createCredentialStore } from "@pkgpost/core";
import type { CliDependencies } from "../types.js";
import { exists } from "../utils.js";
import { setupGlobalOptions, type CommandContext } from "./context.js";

async function executeLogout(context: CommandContext): Promise<void> {
  const { deps, config } = context;
  const store = createCredentialStore(config.cacheDir);

  if (!(await exists(store.path))) {
    deps.logger.info("No stored credentials.");
    return;
  }

  await store.remove();
  deps.logger.success(`Removed ${store.path}`);
}

/**
 * Create the logout command
 */
export function createLogoutCommand(deps: CliDependencies): Command {
  return new Command("logout")
    .description("Remove stored credentials")
    .action(async (_options: unknown, command: Command) => {
      const context = await setupGlobalOptions(command, deps);
      await executeLogout(context);
    });
}
