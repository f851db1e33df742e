/**
 * Configuration management for CLI
 *
 * Loads and merges ~/.pkgpostrc and the nearest project .pkgpostrc
 */
import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join, resolve } from "node:path";
import YAML from "yaml";
import { configError } from "../errors.js";
import { isObjectRecord } from "../utils.js";

/**
 * pkgpost CLI configuration
 */
export interface PkgpostConfig {
  /** Package server that receives uploads */
  server?: string;
  /** Directory holding credentials.json */
  cacheDir?: string;
  /** Enable color output */
  color?: boolean;
}

/**
 * Configuration after merging, with every key filled in
 */
export type ResolvedConfig = Required<PkgpostConfig>;

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: Readonly<ResolvedConfig> = {
  server: "https://packages.pkgpost.dev",
  cacheDir: "~/.pkgpost",
  color: true,
};

/**
 * Default config file name
 */
export const CONFIG_FILE_NAME = ".pkgpostrc";

/**
 * Get the global config file path (~/.pkgpostrc)
 */
export function getGlobalConfigPath(home: string = homedir()): string {
  return join(home, CONFIG_FILE_NAME);
}

/**
 * Searches from startDir upward to find .pkgpostrc
 */
export function getProjectConfigPath(startDir: string): string | undefined {
  let currentDir = resolve(startDir);

  for (;;) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }
    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return undefined;
    }
    currentDir = parentDir;
  }
}

/**
 * Parse config file content (YAML, which also covers JSON)
 */
export function parseConfigContent(content: string, filePath: string): PkgpostConfig {
  let parsed: unknown;
  try {
    parsed = YAML.parse(content);
  } catch (err) {
    throw configError(
      `Unable to parse ${filePath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }

  if (!isObjectRecord(parsed)) {
    throw configError(`Configuration must be a mapping: ${filePath}`);
  }

  const config: PkgpostConfig = {};

  const server = parsed["server"];
  if (server !== undefined) {
    if (typeof server !== "string") {
      throw configError(`"server" must be a string: ${filePath}`);
    }
    config.server = server;
  }

  const cacheDir = parsed["cacheDir"];
  if (cacheDir !== undefined) {
    if (typeof cacheDir !== "string") {
      throw configError(`"cacheDir" must be a string: ${filePath}`);
    }
    config.cacheDir = cacheDir;
  }

  const color = parsed["color"];
  if (color !== undefined) {
    if (typeof color !== "boolean") {
      throw configError(`"color" must be true or false: ${filePath}`);
    }
    config.color = color;
  }

  return config;
}

/**
 * Load configuration from a file
 */
export async function loadConfigFile(
  filePath: string
): Promise<PkgpostConfig | undefined> {
  try {
    const content = await readFile(filePath, "utf-8");
    return parseConfigContent(content, filePath);
  } catch (err) {
    if (
      err !== null &&
      typeof err === "object" &&
      "code" in err &&
      err.code === "ENOENT"
    ) {
      return undefined;
    }
    throw err;
  }
}

/**
 * Expand tilde (~) in path to home directory
 */
export function expandPath(inputPath: string, home: string = homedir()): string {
  if (inputPath.startsWith("~/")) {
    return join(home, inputPath.slice(2));
  }
  if (inputPath === "~") {
    return home;
  }
  return inputPath;
}

/**
 * Merge multiple configs with priority (later configs override earlier)
 */
export function mergeConfigs(...configs: (PkgpostConfig | undefined)[]): PkgpostConfig {
  const result: PkgpostConfig = {};

  for (const config of configs) {
    if (!config) {
      continue;
    }

    if (config.server !== undefined) result.server = config.server;
    if (config.cacheDir !== undefined) result.cacheDir = config.cacheDir;
    if (config.color !== undefined) result.color = config.color;
  }

  return result;
}

/**
 * Configuration load options
 */
export interface LoadConfigOptions {
  /** Override project config file path */
  configPath?: string;
  /** Directory the project config search starts from */
  cwd?: string;
  /** Home directory for the global config and ~ expansion */
  home?: string;
  /** CLI flag overrides */
  cli?: PkgpostConfig;
  env?: {
    PKGPOST_SERVER?: string;
    PKGPOST_CACHE_DIR?: string;
    NO_COLOR?: string;
  };
}

/**
 * Load and merge all configuration sources
 *
 * Priority (highest to lowest):
 * 1. CLI options
 * 2. Environment variables
 * 3. Project config (.pkgpostrc found upward from cwd)
 * 4. Global config (~/.pkgpostrc)
 * 5. Defaults
 */
export async function loadConfig(
  options: LoadConfigOptions = {}
): Promise<ResolvedConfig> {
  const home = options.home ?? homedir();
  const globalConfigPath = getGlobalConfigPath(home);
  const globalConfig = await loadConfigFile(globalConfigPath);

  let projectConfig: PkgpostConfig | undefined;
  if (options.configPath) {
    projectConfig = await loadConfigFile(options.configPath);
    if (!projectConfig) {
      throw configError(`Configuration file not found: ${options.configPath}`);
    }
  } else {
    const projectConfigPath = getProjectConfigPath(options.cwd ?? process.cwd());
    projectConfig =
      projectConfigPath && projectConfigPath !== globalConfigPath
        ? await loadConfigFile(projectConfigPath)
        : undefined;
  }

  const env = options.env ?? process.env;
  const envConfig: PkgpostConfig = {};

  if (env.PKGPOST_SERVER) {
    envConfig.server = env.PKGPOST_SERVER;
  }
  if (env.PKGPOST_CACHE_DIR) {
    envConfig.cacheDir = env.PKGPOST_CACHE_DIR;
  }
  if (env.NO_COLOR) {
    envConfig.color = false;
  }

  const merged = mergeConfigs(
    DEFAULT_CONFIG,
    globalConfig,
    projectConfig,
    envConfig,
    options.cli
  );

  return {
    server: merged.server ?? DEFAULT_CONFIG.server,
    cacheDir: expandPath(merged.cacheDir ?? DEFAULT_CONFIG.cacheDir, home),
    color: merged.color ?? DEFAULT_CONFIG.color,
  };
}
