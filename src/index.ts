// cyclewatch public API

export {
  ConfigLoader,
  DEFAULT_CONFIG_FILE,
  DEFAULT_WATCHER_CONFIG,
  loadConfigFile,
  resolveWatcherConfig,
  stripJSONComments,
  type LoadedConfigFile,
  type ResolvedSettings,
  type WatcherFlags,
} from './config.js';
export { TreeFingerprinter, type FingerprintConfig } from './core/tree-fingerprinter.js';
export { INITIAL_FINGERPRINT, WatchLoop } from './core/watch-loop.js';
export {
  CommandFailedError,
  ConfigurationError,
  FingerprintError,
  ProcessStartError,
} from './errors.js';
export {
  createDefaultDependencies,
  createWatchLoop,
  createWatchLoopWithDeps,
} from './factories.js';
export type {
  Fingerprinter,
  SleepFn,
  Supervisor,
  WatchLoopDependencies,
} from './interfaces.js';
export { createLogger, SimpleLogger, type Logger, type LogLevel } from './logger.js';
export { ProcessSlot, type LockedSlot, type TrackedProcess } from './runners/process-slot.js';
export { ProcessSupervisor, type ProcessSupervisorOptions } from './runners/process-supervisor.js';
export type {
  CycleOutcome,
  ProcessSnapshot,
  RestartResult,
  ScanResult,
  WatcherConfig,
  WatcherConfigFile,
  WatcherStateSnapshot,
} from './types.js';
export { ShellCommandRunner, type CommandResult, type CommandRunner } from './utils/command-runner.js';
export { parseDuration, splitRuleList } from './utils/duration.js';
export { Fnv1a64, fnv1a64 } from './utils/fnv-hash.js';
export { createPathRuleMatcher, matchesPathRules, ruleMatches } from './utils/path-rules.js';
