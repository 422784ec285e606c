import { tmpdir } from 'os';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { ProcessSupervisor } from '../../src/runners/process-supervisor.js';
import { createMockLogger } from '../helpers.js';

function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

describe.skipIf(process.platform === 'win32')('ProcessSupervisor with real processes', () => {
  let supervisor: ProcessSupervisor | undefined;

  afterEach(async () => {
    await supervisor?.stop();
    supervisor = undefined;
  });

  it('kills the first process when the second one starts', async () => {
    supervisor = new ProcessSupervisor({ cwd: tmpdir(), logger: createMockLogger() });

    const first = await supervisor.restart('sleep 30');
    const second = await supervisor.restart('sleep 30');
    const firstPid = first.process?.pid;
    const secondPid = second.process?.pid;
    if (firstPid === undefined || secondPid === undefined) {
      throw new Error('spawned processes have no pid');
    }

    expect(second.replaced?.pid).toBe(firstPid);
    await vi.waitFor(() => {
      expect(isAlive(firstPid)).toBe(false);
    });
    expect(isAlive(secondPid)).toBe(true);
    expect((await supervisor.current())?.pid).toBe(secondPid);
  });

  it('forgets a process that exits on its own', async () => {
    supervisor = new ProcessSupervisor({ cwd: tmpdir(), logger: createMockLogger() });

    await supervisor.restart('exit 0');

    await vi.waitFor(async () => {
      expect(await supervisor?.current()).toBeNull();
    });
  });
});
