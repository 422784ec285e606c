import { describe, expect, it } from 'vitest';
import { TreeFingerprinter } from '../src/core/tree-fingerprinter.js';
import { WatchLoop } from '../src/core/watch-loop.js';
import { createDefaultDependencies, createWatchLoop } from '../src/factories.js';
import { ProcessSupervisor } from '../src/runners/process-supervisor.js';
import { ShellCommandRunner } from '../src/utils/command-runner.js';
import { createMockLogger, makeConfig } from './helpers.js';

describe('factories', () => {
  it('wires the real implementations with the given logger', () => {
    const logger = createMockLogger();

    const deps = createDefaultDependencies(makeConfig(), logger);

    expect(deps.fingerprinter).toBeInstanceOf(TreeFingerprinter);
    expect(deps.commandRunner).toBeInstanceOf(ShellCommandRunner);
    expect(deps.supervisor).toBeInstanceOf(ProcessSupervisor);
    expect(deps.logger).toBe(logger);
    expect(deps.sleep).toBeUndefined();
  });

  it('creates a loop that has not run yet', () => {
    const loop = createWatchLoop(makeConfig(), createMockLogger());

    expect(loop).toBeInstanceOf(WatchLoop);
    expect(loop.isStopped()).toBe(false);
    expect(loop.getState()).toEqual({
      previousFingerprint: 0n,
      previousDepModTime: null,
      cycles: 0,
    });
  });
});
