import { Command } from 'commander';
import {
  type ResolvedSettings,
  type WatcherFlags,
  loadConfigFile,
  resolveWatcherConfig,
} from '../config.js';
import { ConfigurationError } from '../errors.js';
import type { LogLevel } from '../logger.js';
import { applyConfigOption, applyLogOptions, applyWatcherOptions } from './options.js';
import { exitWithError } from './shared.js';
import { type StartOptions, startWatching } from './start.js';
import { PACKAGE_INFO } from './version.js';

export interface CliOptions {
  config?: string;
  root?: string;
  build?: string;
  run?: string;
  depfile?: string;
  depcommand?: string;
  interval?: string;
  include?: string;
  exclude?: string;
  verbose?: boolean;
  logLevel?: LogLevel;
  logFile?: string;
  banner: boolean;
}

export type StartHandler = (settings: ResolvedSettings, options: StartOptions) => Promise<void>;

export function toWatcherFlags(options: CliOptions): WatcherFlags {
  return {
    root: options.root,
    build: options.build,
    run: options.run,
    depfile: options.depfile,
    depcommand: options.depcommand,
    interval: options.interval,
    include: options.include,
    exclude: options.exclude,
    logLevel: options.logLevel ?? (options.verbose ? 'debug' : undefined),
    logFile: options.logFile,
  };
}

/**
 * Settings for one CLI invocation. Throws ConfigurationError for a bad config
 * file or interval.
 */
export function resolveCliSettings(options: CliOptions, cwd: string = process.cwd()): ResolvedSettings {
  const file = loadConfigFile(options.config, cwd);
  return resolveWatcherConfig(file, toWatcherFlags(options), cwd);
}

export function createProgram(start: StartHandler = startWatching): Command {
  const program = new Command();

  program
    .name('cyclewatch')
    .description('Poll a directory, rebuild on change, restart the app. Change it. Build it. Run it. Repeat.')
    .version(PACKAGE_INFO.version, '-v, --version', 'output the version number');

  applyConfigOption(program);
  applyWatcherOptions(program);
  applyLogOptions(program);

  program.action(async () => {
    const options = program.opts<CliOptions>();
    let settings: ResolvedSettings;
    try {
      settings = resolveCliSettings(options);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        return exitWithError(error.message);
      }
      throw error;
    }
    await start(settings, { banner: options.banner });
  });

  return program;
}
