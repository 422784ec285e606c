import { type ChildProcess, spawn } from 'child_process';
import { ProcessStartError } from '../errors.js';
import type { Supervisor } from '../interfaces.js';
import type { Logger } from '../logger.js';
import type { ProcessSnapshot, RestartResult } from '../types.js';
import { ProcessSlot, snapshotOf, type TrackedProcess } from './process-slot.js';

export interface ProcessSupervisorOptions {
  cwd: string;
  logger: Logger;
  env?: NodeJS.ProcessEnv;
}

/**
 * Keeps exactly one run process alive.
 *
 * A restart force-kills the previous process and spawns the replacement
 * straight away, without waiting for the old one to go. For a short window
 * both can be alive and compete for the same port. Each spawned process gets
 * an exit listener that clears the slot, but only if the slot still holds
 * that same process.
 */
export class ProcessSupervisor implements Supervisor {
  private readonly slot: ProcessSlot;
  private nextId = 1;

  constructor(private readonly options: ProcessSupervisorOptions) {
    this.slot = new ProcessSlot(options.logger);
  }

  public restart(runCommand: string): Promise<RestartResult> {
    return this.slot.withLock(async (slot) => {
      const previous = slot.swapAndKill(null);
      if (previous) {
        this.options.logger.info(
          `Stopping previous app process (pid ${previous.child.pid ?? 'unknown'})...`
        );
      }

      if (runCommand === '') {
        return { started: false, process: null, replaced: snapshotOf(previous) };
      }

      this.options.logger.info(`Starting app: ${runCommand}`);
      let child: ChildProcess;
      try {
        child = spawn(runCommand, {
          cwd: this.options.cwd,
          env: this.options.env ?? process.env,
          shell: true,
          stdio: 'inherit',
        });
      } catch (error) {
        throw new ProcessStartError(runCommand, { cause: error });
      }
      const handle: TrackedProcess = {
        id: this.nextId++,
        child,
        command: runCommand,
        startedAt: new Date(),
      };
      child.once('exit', (code, signal) => this.handleExit(handle, code, signal));

      try {
        await waitForSpawn(child);
      } catch (error) {
        throw new ProcessStartError(runCommand, { cause: error });
      }

      child.on('error', (error) => {
        this.options.logger.error(`App process ${child.pid ?? '?'} error: ${error.message}`);
      });

      slot.swapAndKill(handle);
      return { started: true, process: snapshotOf(handle), replaced: snapshotOf(previous) };
    });
  }

  public stop(): Promise<void> {
    return this.slot.withLock((slot) => {
      const previous = slot.swapAndKill(null);
      if (previous) {
        this.options.logger.info(`Killed app process (pid ${previous.child.pid ?? 'unknown'})`);
      }
    });
  }

  public current(): Promise<ProcessSnapshot | null> {
    return this.slot.getCurrent();
  }

  private handleExit(
    handle: TrackedProcess,
    code: number | null,
    signal: NodeJS.Signals | null
  ): void {
    const status = signal ? `signal ${signal}` : `code ${code}`;
    this.options.logger.info(`App exited (pid ${handle.child.pid ?? 'unknown'}, ${status})`);
    void this.slot.withLock((slot) => {
      slot.clearIfMatches(handle);
    });
  }
}

function waitForSpawn(child: ChildProcess): Promise<void> {
  return new Promise((resolve, reject) => {
    const onSpawn = () => {
      child.removeListener('error', onError);
      resolve();
    };
    const onError = (error: Error) => {
      child.removeListener('spawn', onSpawn);
      reject(error);
    };
    child.once('spawn', onSpawn);
    child.once('error', onError);
  });
}
