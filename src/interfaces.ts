// Interfaces for dependency injection and better testability

import type { Logger } from './logger.js';
import type { ProcessSnapshot, RestartResult, ScanResult } from './types.js';
import type { CommandRunner } from './utils/command-runner.js';

/**
 * Produces the tree digest for one polling cycle. The dependency mtime from
 * the previous scan goes in; the one to keep for the next scan comes out.
 */
export interface Fingerprinter {
  scan(previousDepModTime: bigint | null): Promise<ScanResult>;
}

/**
 * Owner of the single tracked run process.
 */
export interface Supervisor {
  restart(runCommand: string): Promise<RestartResult>;
  /** Force-kills the tracked process, if any */
  stop(): Promise<void>;
  current(): Promise<ProcessSnapshot | null>;
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Everything the watch loop talks to. Tests swap each piece for a fake.
 */
export interface WatchLoopDependencies {
  fingerprinter: Fingerprinter;
  commandRunner: CommandRunner;
  supervisor: Supervisor;
  logger: Logger;
  sleep?: SleepFn;
}
