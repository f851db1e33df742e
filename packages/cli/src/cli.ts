/**
 * Main CLI setup using Commander.js
 *
 * Creates the main program with global options and registers all command modules
 */
import { Command, CommanderError, Option } from "commander";
import { toCliError } from "./errors.js";
import { formatCliError } from "./formatter.js";
import { createLoginCommand } from "./commands/login.js";
import { createLogoutCommand } from "./commands/logout.js";
import { createPublishCommand } from "./commands/publish.js";
import type { CliDependencies, ExitCode } from "./types.js";

/**
 * CLI name
 */
export const CLI_NAME = "pkgpost";

/**
 * Exit codes
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  INVALID_ARGUMENT: 2,
  CONFIG_ERROR: 3,
  NETWORK_ERROR: 5,
  AUTH_ERROR: 6,
  USER_INTERRUPT: 130,
} as const satisfies Record<string, ExitCode>;

/**
 * Create the main CLI program
 */
export function createProgram(deps: CliDependencies): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description("Publish packages to a package server")
    .version(deps.version, "-V, --version", "Output the version number")
    .helpOption("-h, --help", "Display help for command")
    .addHelpText(
      "after",
      `
Examples:
  $ pkgpost publish                      Publish the current directory
  $ pkgpost publish ./pkg --dry-run      List the files that would be published
  $ pkgpost login                        Store an access token
  $ pkgpost logout                       Remove stored credentials`
    );

  // Global options
  program
    .addOption(
      new Option("-v, --verbose", "Enable verbose output").default(false)
    )
    .addOption(
      new Option("-q, --quiet", "Minimize output (only errors)").default(false)
    )
    .addOption(
      new Option("-c, --config <path>", "Configuration file path")
    )
    .addOption(
      new Option("--no-color", "Disable color output")
    )
    .addOption(
      new Option("--json", "Output in JSON format").default(false)
    );

  program.addCommand(createPublishCommand(deps));
  program.addCommand(createLoginCommand(deps));
  program.addCommand(createLogoutCommand(deps));

  program.exitOverride();
  for (const command of program.commands) {
    command.exitOverride();
  }

  return program;
}

/**
 * Run the CLI program and return the process exit code
 */
export async function run(args: string[], deps: CliDependencies): Promise<ExitCode> {
  const program = createProgram(deps);

  try {
    await program.parseAsync(args);
    return EXIT_CODES.SUCCESS;
  } catch (err) {
    // commander has already printed its own message (or help/version)
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.INVALID_ARGUMENT;
    }

    const cliError = toCliError(err);
    const json = deps.logger.getOptions().json === true;
    if (json) {
      deps.io.out(formatCliError(cliError, true));
    } else {
      deps.io.err(formatCliError(cliError, false));
    }
    return cliError.exitCode;
  }
}

/**
 * Build the dependencies, then run. Failures while building them go to stderr.
 */
export async function main(
  args: string[],
  createDeps: () => CliDependencies,
  writeErr: (message: string) => void
): Promise<ExitCode> {
  let deps: CliDependencies;
  try {
    deps = createDeps();
  } catch (err) {
    const cliError = toCliError(err);
    writeErr(formatCliError(cliError, false));
    return cliError.exitCode;
  }

  return run(args, deps);
}
