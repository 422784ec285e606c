// Configuration loading: optional JSON/JSONC file, command-line flags, defaults
import { existsSync, readFileSync } from 'fs';
import { dirname, isAbsolute, resolve } from 'path';
import { ConfigurationError } from './errors.js';
import type { LogLevel } from './logger.js';
import { type WatcherConfig, type WatcherConfigFile, WatcherConfigFileSchema } from './types.js';
import { parseDuration, splitRuleList } from './utils/duration.js';

export { ConfigurationError };

export const DEFAULT_CONFIG_FILE = 'cyclewatch.config.json';

export const DEFAULT_WATCHER_CONFIG: WatcherConfig = {
  rootDirectory: '.',
  pollInterval: 1000,
  buildCommand: "echo 'No build command specified'",
  runCommand: "echo 'No run command specified'",
  dependencyFilePath: '',
  dependencyCommand: '',
  includeRules: [],
  excludeRules: [],
};

/**
 * Raw command-line values. Rule lists arrive comma-separated, the interval as
 * a duration string; anything left undefined falls through to the file.
 */
export interface WatcherFlags {
  root?: string;
  build?: string;
  run?: string;
  depfile?: string;
  depcommand?: string;
  interval?: string;
  include?: string;
  exclude?: string;
  logLevel?: LogLevel;
  logFile?: string;
}

export interface ResolvedSettings {
  watcher: WatcherConfig;
  logging: { level: LogLevel; file?: string };
  configPath?: string;
}

export interface LoadedConfigFile {
  config: WatcherConfigFile;
  configPath: string;
}

export class ConfigLoader {
  private readonly configPath: string;

  constructor(configPath: string) {
    this.configPath = resolve(configPath);
  }

  public loadConfig(): WatcherConfigFile {
    if (!existsSync(this.configPath)) {
      throw new ConfigurationError(`Configuration file not found: ${this.configPath}`);
    }

    const rawConfig = this.readConfigFile();
    return this.validateConfig(rawConfig);
  }

  private readConfigFile(): unknown {
    try {
      const content = readFileSync(this.configPath, 'utf-8');
      // Support both JSON and JSONC (with comments)
      return JSON.parse(stripJSONComments(content));
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new ConfigurationError(`Invalid JSON in configuration file: ${error.message}`);
      }
      throw error;
    }
  }

  private validateConfig(config: unknown): WatcherConfigFile {
    const result = WatcherConfigFileSchema.safeParse(config);
    if (result.success) {
      return result.data;
    }
    const issues = result.error.errors
      .map((e) => `  - ${e.path.length > 0 ? e.path.join('.') : '(root)'}: ${e.message}`)
      .join('\n');
    throw new ConfigurationError(`Configuration validation failed:\n${issues}`);
  }
}

// A string literal, a line comment or a block comment, whichever starts first
const JSONC_TOKEN = /("(?:[^"\\]|\\.)*")|\/\/[^\n]*|\/\*[\s\S]*?(?:\*\/|$)/g;

/** Drops `//` and `/* *\/` comments outside string literals */
export function stripJSONComments(content: string): string {
  return content.replace(JSONC_TOKEN, (_token, literal: string | undefined) => literal ?? '');
}

/**
 * Loads the config file if there is one. An explicit path must exist; the
 * default file in `cwd` is optional.
 */
export function loadConfigFile(
  explicitPath: string | undefined,
  cwd: string = process.cwd()
): LoadedConfigFile | null {
  const candidate = explicitPath ? resolve(cwd, explicitPath) : resolve(cwd, DEFAULT_CONFIG_FILE);
  if (!explicitPath && !existsSync(candidate)) {
    return null;
  }
  const loader = new ConfigLoader(candidate);
  return { config: loader.loadConfig(), configPath: candidate };
}

/**
 * Merges defaults, file values and flags (in rising precedence) into the
 * immutable engine config. The root directory comes back absolute.
 */
export function resolveWatcherConfig(
  file: LoadedConfigFile | null,
  flags: WatcherFlags,
  cwd: string = process.cwd()
): ResolvedSettings {
  const fileConfig = file?.config ?? {};
  const fileBase = file ? dirname(file.configPath) : cwd;

  let rootDirectory = resolve(cwd, DEFAULT_WATCHER_CONFIG.rootDirectory);
  if (flags.root !== undefined) {
    rootDirectory = resolve(cwd, flags.root);
  } else if (fileConfig.rootDirectory !== undefined) {
    rootDirectory = isAbsolute(fileConfig.rootDirectory)
      ? fileConfig.rootDirectory
      : resolve(fileBase, fileConfig.rootDirectory);
  }

  const intervalSource = flags.interval ?? fileConfig.pollInterval;
  const pollInterval =
    intervalSource === undefined
      ? DEFAULT_WATCHER_CONFIG.pollInterval
      : parseDuration(intervalSource);

  const watcher: WatcherConfig = {
    rootDirectory,
    pollInterval,
    buildCommand: flags.build ?? fileConfig.buildCommand ?? DEFAULT_WATCHER_CONFIG.buildCommand,
    runCommand: flags.run ?? fileConfig.runCommand ?? DEFAULT_WATCHER_CONFIG.runCommand,
    dependencyFilePath:
      flags.depfile ?? fileConfig.dependencyFilePath ?? DEFAULT_WATCHER_CONFIG.dependencyFilePath,
    dependencyCommand:
      flags.depcommand ?? fileConfig.dependencyCommand ?? DEFAULT_WATCHER_CONFIG.dependencyCommand,
    includeRules:
      flags.include !== undefined
        ? splitRuleList(flags.include)
        : (fileConfig.includeRules ?? DEFAULT_WATCHER_CONFIG.includeRules),
    excludeRules:
      flags.exclude !== undefined
        ? splitRuleList(flags.exclude)
        : (fileConfig.excludeRules ?? DEFAULT_WATCHER_CONFIG.excludeRules),
  };

  const logFile = flags.logFile ?? fileConfig.logging?.file;
  return {
    watcher: Object.freeze(watcher),
    logging: {
      level: flags.logLevel ?? fileConfig.logging?.level ?? 'info',
      file: logFile === undefined ? undefined : resolve(flags.logFile ? cwd : fileBase, logFile),
    },
    configPath: file?.configPath,
  };
}
