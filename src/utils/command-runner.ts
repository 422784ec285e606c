import { spawn } from 'child_process';
import { CommandFailedError } from '../errors.js';

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface CommandResult {
  command: string;
  exitCode: number;
  /** True when the command string was empty and nothing was spawned */
  skipped: boolean;
  durationMs: number;
}

export interface CommandRunner {
  run(command: string): Promise<CommandResult>;
}

/**
 * Runs a command line through the system shell with the watcher's own
 * stdout/stderr, so build output shows up live. Blocks (asynchronously) until
 * the command exits; there is no timeout.
 */
export class ShellCommandRunner implements CommandRunner {
  constructor(private readonly options: RunOptions = {}) {}

  async run(command: string): Promise<CommandResult> {
    if (command === '') {
      return { command, exitCode: 0, skipped: true, durationMs: 0 };
    }

    const startTime = Date.now();
    return new Promise<CommandResult>((resolve, reject) => {
      const child = spawn(command, {
        cwd: this.options.cwd,
        env: this.options.env ?? process.env,
        shell: true,
        stdio: 'inherit',
      });

      child.on('close', (code, signal) => {
        if (code === 0) {
          resolve({ command, exitCode: 0, skipped: false, durationMs: Date.now() - startTime });
          return;
        }
        reject(new CommandFailedError(command, code, signal));
      });

      child.on('error', (error) => {
        reject(error);
      });
    });
  }
}
