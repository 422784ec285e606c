// cyclewatch core types and the config-file schema
import { z } from 'zod';

/**
 * Immutable engine configuration. Produced by the config layer, consumed
 * as-is by the core: an empty command string means "nothing to run".
 */
export interface WatcherConfig {
  readonly rootDirectory: string;
  /** Fixed sleep after each cycle, in milliseconds */
  readonly pollInterval: number;
  readonly buildCommand: string;
  readonly runCommand: string;
  /** Only the base name is compared against scanned files */
  readonly dependencyFilePath: string;
  readonly dependencyCommand: string;
  readonly includeRules: readonly string[];
  readonly excludeRules: readonly string[];
}

export interface ScanResult {
  fingerprint: bigint;
  depChanged: boolean;
  /** Dependency file mtime (ns) to pass into the next scan */
  depModTime: bigint | null;
  fileCount: number;
}

export type CycleOutcome =
  | 'scan-failed'
  | 'unchanged'
  | 'dependency-failed'
  | 'build-failed'
  | 'restarted'
  | 'restart-failed';

export interface WatcherStateSnapshot {
  previousFingerprint: bigint;
  previousDepModTime: bigint | null;
  cycles: number;
}

export interface ProcessSnapshot {
  id: number;
  pid: number | undefined;
  command: string;
  startedAt: string;
}

export interface RestartResult {
  started: boolean;
  process: ProcessSnapshot | null;
  /** Handle that was force-killed to make room, if any */
  replaced: ProcessSnapshot | null;
}

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/**
 * Shape of cyclewatch.config.json. Every key is optional; command-line flags
 * override whatever the file sets.
 */
export const WatcherConfigFileSchema = z
  .object({
    rootDirectory: z.string().min(1).optional(),
    pollInterval: z.union([z.number().nonnegative(), z.string().min(1)]).optional(),
    buildCommand: z.string().optional(),
    runCommand: z.string().optional(),
    dependencyFilePath: z.string().optional(),
    dependencyCommand: z.string().optional(),
    includeRules: z.array(z.string().min(1)).optional(),
    excludeRules: z.array(z.string().min(1)).optional(),
    logging: z
      .object({
        level: LogLevelSchema.optional(),
        file: z.string().optional(),
      })
      .optional(),
  })
  .strict();

export type WatcherConfigFile = z.infer<typeof WatcherConfigFileSchema>;
