import type { ChildProcess } from 'child_process';
import type { Logger } from '../logger.js';
import type { ProcessSnapshot } from '../types.js';

export interface TrackedProcess {
  readonly id: number;
  readonly child: ChildProcess;
  readonly command: string;
  readonly startedAt: Date;
}

/**
 * Operations on the slot. Only handed out inside `ProcessSlot.withLock`, so
 * every read and write of the tracked handle happens under the lock.
 */
export interface LockedSlot {
  current(): TrackedProcess | null;
  /** SIGKILLs the tracked child (best-effort) and stores `next` in its place */
  swapAndKill(next: TrackedProcess | null): TrackedProcess | null;
  clearIfMatches(handle: TrackedProcess): boolean;
}

export function snapshotOf(handle: TrackedProcess | null): ProcessSnapshot | null {
  if (!handle) {
    return null;
  }
  return {
    id: handle.id,
    pid: handle.child.pid,
    command: handle.command,
    startedAt: handle.startedAt.toISOString(),
  };
}

/**
 * Holds at most one tracked process behind a promise-chain lock shared by
 * restarts and exit watchers.
 */
export class ProcessSlot {
  private tracked: TrackedProcess | null = null;
  private tail: Promise<void> = Promise.resolve();
  private readonly access: LockedSlot;

  constructor(private readonly logger: Logger) {
    this.access = {
      current: () => this.tracked,
      swapAndKill: (next) => this.swapAndKill(next),
      clearIfMatches: (handle) => this.clearIfMatches(handle),
    };
  }

  /**
   * Runs `section` once every previously queued section has settled. A
   * rejection propagates to the caller and still releases the lock.
   */
  public withLock<T>(section: (slot: LockedSlot) => T | Promise<T>): Promise<T> {
    const result = this.tail.then(() => section(this.access));
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  public getCurrent(): Promise<ProcessSnapshot | null> {
    return this.withLock((slot) => snapshotOf(slot.current()));
  }

  private swapAndKill(next: TrackedProcess | null): TrackedProcess | null {
    const previous = this.tracked;
    if (previous && previous !== next) {
      try {
        // No grace period and no wait for the exit to be confirmed
        previous.child.kill('SIGKILL');
      } catch (error) {
        this.logger.debug(`Kill of process ${previous.child.pid ?? '?'} failed: ${error}`);
      }
    }
    this.tracked = next;
    return previous;
  }

  private clearIfMatches(handle: TrackedProcess): boolean {
    if (this.tracked !== handle) {
      return false;
    }
    this.tracked = null;
    return true;
  }
}
