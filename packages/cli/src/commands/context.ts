import type { Command } from 'commander';
import type { CliDependencies } from '../types.js';
import { loadConfig, type PkgpostConfig, type ResolvedConfig } from '../utils/config.js';

/**
 * Global CLI options
 */
export interface GlobalOptions {
  /** Enable verbose output */
  verbose?: boolean;
  /** Minimize output */
  quiet?: boolean;
  /** Configuration file path */
  config?: string;
  /** Disable color output */
  color?: boolean;
  /** Output in JSON format */
  json?: boolean;
}

/**
 * Context passed to command handlers
 */
export interface CommandContext {
  globalOptions: GlobalOptions;
  config: ResolvedConfig;
  deps: CliDependencies;
}

/**
 * Setup global options before command execution
 */
export async function setupGlobalOptions(
  command: Command,
  deps: CliDependencies,
  overrides: PkgpostConfig = {}
): Promise<CommandContext> {
  const opts = command.optsWithGlobals<GlobalOptions>();

  const cli: PkgpostConfig = { ...overrides };
  if (opts.color === false) {
    cli.color = false;
  }

  const config = await loadConfig({
    configPath: opts.config,
    cwd: deps.cwd,
    home: deps.home,
    env: deps.env,
    cli,
  });

  deps.logger.configure({
    verbose: opts.verbose,
    quiet: opts.quiet,
    noColor: !config.color,
    json: opts.json,
  });

  return {
    globalOptions: opts,
    config,
    deps,
  };
}
