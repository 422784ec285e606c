import type { SleepFn, WatchLoopDependencies } from '../interfaces.js';
import type { CycleOutcome, ScanResult, WatcherConfig, WatcherStateSnapshot } from '../types.js';
import { sleep as defaultSleep } from '../utils/sleep.js';

/** Sentinel the first scan is compared against */
export const INITIAL_FINGERPRINT = 0n;

/**
 * The polling cycle: scan, compare, refresh dependencies, build, restart.
 *
 * The stored fingerprint moves to the new digest as soon as a change is seen,
 * before any command runs. A failed build is therefore not retried until the
 * tree changes again. No failure ever ends the loop; only `stop()` or the
 * abort signal handed to `run()` does, and only between cycles.
 */
export class WatchLoop {
  private previousFingerprint = INITIAL_FINGERPRINT;
  private previousDepModTime: bigint | null = null;
  private cycles = 0;
  private readonly controller = new AbortController();
  private readonly sleep: SleepFn;

  constructor(
    private readonly config: WatcherConfig,
    private readonly deps: WatchLoopDependencies
  ) {
    this.sleep = deps.sleep ?? defaultSleep;
  }

  public async run(signal?: AbortSignal): Promise<void> {
    const onAbort = () => this.stop();
    if (signal?.aborted) {
      this.stop();
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      while (!this.controller.signal.aborted) {
        await this.tick();
        if (this.controller.signal.aborted) {
          break;
        }
        await this.sleep(this.config.pollInterval, this.controller.signal);
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }

  public stop(): void {
    this.controller.abort();
  }

  public isStopped(): boolean {
    return this.controller.signal.aborted;
  }

  public getState(): WatcherStateSnapshot {
    return {
      previousFingerprint: this.previousFingerprint,
      previousDepModTime: this.previousDepModTime,
      cycles: this.cycles,
    };
  }

  /**
   * One cycle without the trailing sleep.
   */
  public async tick(): Promise<CycleOutcome> {
    const { logger } = this.deps;
    this.cycles++;

    let scan: ScanResult;
    try {
      scan = await this.deps.fingerprinter.scan(this.previousDepModTime);
    } catch (error) {
      logger.error(`Error hashing ${this.config.rootDirectory}: ${describeError(error)}`);
      return 'scan-failed';
    }

    this.previousDepModTime = scan.depModTime;

    if (scan.fingerprint === this.previousFingerprint) {
      return 'unchanged';
    }

    logger.info(`Change detected (${scan.fileCount} watched file(s)), rebuilding...`);
    this.previousFingerprint = scan.fingerprint;

    if (scan.depChanged && this.config.dependencyCommand !== '') {
      logger.info(
        `${this.config.dependencyFilePath} changed: running ${this.config.dependencyCommand}...`
      );
      try {
        await this.deps.commandRunner.run(this.config.dependencyCommand);
      } catch (error) {
        logger.error(`Dependency command failed: ${describeError(error)}`);
        return 'dependency-failed';
      }
    }

    logger.info('Running build command...');
    try {
      const result = await this.deps.commandRunner.run(this.config.buildCommand);
      if (!result.skipped) {
        logger.success(`Build finished in ${result.durationMs}ms`);
      }
    } catch (error) {
      logger.error(`Build failed: ${describeError(error)}`);
      return 'build-failed';
    }

    try {
      await this.deps.supervisor.restart(this.config.runCommand);
    } catch (error) {
      logger.error(`App start failed: ${describeError(error)}`);
      return 'restart-failed';
    }

    return 'restarted';
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
