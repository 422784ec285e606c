// Factory functions for easier testing and initialization

import { TreeFingerprinter } from './core/tree-fingerprinter.js';
import { WatchLoop } from './core/watch-loop.js';
import type { WatchLoopDependencies } from './interfaces.js';
import { createLogger, type Logger } from './logger.js';
import { ProcessSupervisor } from './runners/process-supervisor.js';
import type { WatcherConfig } from './types.js';
import { ShellCommandRunner } from './utils/command-runner.js';

/**
 * Create a watch loop wired to the real filesystem, shell and process table.
 * Commands and the run process all start in the watched root.
 */
export function createWatchLoop(config: WatcherConfig, logger?: Logger): WatchLoop {
  const actualLogger = logger ?? createLogger();
  return new WatchLoop(config, createDefaultDependencies(config, actualLogger));
}

/**
 * Create a watch loop with custom dependencies (for testing)
 */
export function createWatchLoopWithDeps(
  config: WatcherConfig,
  deps: WatchLoopDependencies
): WatchLoop {
  return new WatchLoop(config, deps);
}

export function createDefaultDependencies(
  config: WatcherConfig,
  logger: Logger
): WatchLoopDependencies {
  return {
    fingerprinter: new TreeFingerprinter(config, logger),
    commandRunner: new ShellCommandRunner({ cwd: config.rootDirectory }),
    supervisor: new ProcessSupervisor({ cwd: config.rootDirectory, logger }),
    logger,
  };
}
