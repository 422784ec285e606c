import type { BigIntStats } from 'fs';
import { lstat, readdir, stat } from 'fs/promises';
import { basename, join } from 'path';
import { FingerprintError } from '../errors.js';
import type { Fingerprinter } from '../interfaces.js';
import type { Logger } from '../logger.js';
import type { ScanResult, WatcherConfig } from '../types.js';
import { Fnv1a64 } from '../utils/fnv-hash.js';
import { createPathRuleMatcher } from '../utils/path-rules.js';

export type FingerprintConfig = Pick<
  WatcherConfig,
  'rootDirectory' | 'includeRules' | 'excludeRules' | 'dependencyFilePath'
>;

interface ScanContext {
  hash: Fnv1a64;
  depModTime: bigint | null;
  depChanged: boolean;
  fileCount: number;
}

/**
 * Summarises the watched tree as one 64-bit digest over every accepted file's
 * relative path, size and modification time.
 *
 * Entries are visited depth-first in sorted name order, so two scans of an
 * untouched tree always agree. Dot-directories below the root are skipped
 * with their whole subtree. Entries that cannot be read are logged and left
 * out; only an unreadable root fails the scan.
 */
export class TreeFingerprinter implements Fingerprinter {
  private readonly rootDirectory: string;
  private readonly excludeRules: readonly string[];
  private readonly accepts: (relativePath: string) => boolean;
  private readonly depBaseName: string | null;

  constructor(
    config: FingerprintConfig,
    private readonly logger: Logger
  ) {
    this.rootDirectory = config.rootDirectory;
    this.excludeRules = config.excludeRules;
    this.accepts = createPathRuleMatcher(config.includeRules, config.excludeRules);
    this.depBaseName = config.dependencyFilePath ? basename(config.dependencyFilePath) : null;
  }

  public async scan(previousDepModTime: bigint | null): Promise<ScanResult> {
    let rootStats: BigIntStats;
    try {
      // The root itself may be a symlink; entries below it are never followed
      rootStats = await stat(this.rootDirectory, { bigint: true });
    } catch (error) {
      throw new FingerprintError(
        `Cannot access watch root ${this.rootDirectory}`,
        this.rootDirectory,
        { cause: error }
      );
    }
    if (!rootStats.isDirectory()) {
      throw new FingerprintError(
        `Watch root is not a directory: ${this.rootDirectory}`,
        this.rootDirectory
      );
    }

    const context: ScanContext = {
      hash: new Fnv1a64(),
      depModTime: previousDepModTime,
      depChanged: false,
      fileCount: 0,
    };

    await this.walkDirectory(this.rootDirectory, '', context);

    return {
      fingerprint: context.hash.digest(),
      depChanged: context.depChanged,
      depModTime: context.depModTime,
      fileCount: context.fileCount,
    };
  }

  private async walkDirectory(
    absoluteDir: string,
    relativeDir: string,
    context: ScanContext
  ): Promise<void> {
    let names: string[];
    try {
      names = await readdir(absoluteDir);
    } catch (error) {
      if (relativeDir === '') {
        throw new FingerprintError(
          `Cannot list watch root ${this.rootDirectory}`,
          this.rootDirectory,
          { cause: error }
        );
      }
      this.logger.warn(`Error accessing ${relativeDir}: ${describeError(error)}`);
      return;
    }

    names.sort();

    for (const name of names) {
      const absolutePath = join(absoluteDir, name);
      const relativePath = relativeDir === '' ? name : `${relativeDir}/${name}`;

      let stats: BigIntStats;
      try {
        stats = await lstat(absolutePath, { bigint: true });
      } catch (error) {
        this.logger.warn(`Error accessing ${relativePath}: ${describeError(error)}`);
        continue;
      }

      if (stats.isDirectory()) {
        if (name.startsWith('.')) {
          continue;
        }
        // Every file below would share the excluded prefix
        if (this.excludeRules.some((rule) => relativePath.startsWith(rule))) {
          continue;
        }
        await this.walkDirectory(absolutePath, relativePath, context);
        continue;
      }

      if (!this.accepts(relativePath)) {
        continue;
      }

      context.hash
        .update(relativePath)
        .update(stats.size.toString())
        .update(stats.mtimeNs.toString());
      context.fileCount++;

      if (this.depBaseName !== null && name === this.depBaseName) {
        if (stats.mtimeNs !== context.depModTime) {
          context.depChanged = true;
          context.depModTime = stats.mtimeNs;
        }
      }
    }
  }
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return 'code' in error && typeof error.code === 'string'
      ? `${error.code} ${error.message}`
      : error.message;
  }
  return String(error);
}
