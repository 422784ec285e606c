// Test helpers for cyclewatch tests

import { EventEmitter } from 'events';
import { mkdirSync, mkdtempSync, utimesSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { vi } from 'vitest';
import type { Logger } from '../src/logger.js';
import type { WatcherConfig } from '../src/types.js';

/**
 * Create a mock logger
 */
export function createMockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    success: vi.fn(),
  };
}

export function createTempDir(prefix = 'cyclewatch-test-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

/**
 * Write a file (creating parent directories) and pin its mtime to whole
 * seconds so digests can be computed by hand.
 */
export function writeTreeFile(
  root: string,
  relativePath: string,
  content: string,
  mtimeSeconds?: number
): string {
  const fullPath = join(root, relativePath);
  mkdirSync(dirname(fullPath), { recursive: true });
  writeFileSync(fullPath, content);
  if (mtimeSeconds !== undefined) {
    utimesSync(fullPath, mtimeSeconds, mtimeSeconds);
  }
  return fullPath;
}

export function touch(path: string, mtimeSeconds: number): void {
  utimesSync(path, mtimeSeconds, mtimeSeconds);
}

export function makeConfig(overrides: Partial<WatcherConfig> = {}): WatcherConfig {
  return {
    rootDirectory: '/test/project',
    pollInterval: 1000,
    buildCommand: 'make build',
    runCommand: './app',
    dependencyFilePath: '',
    dependencyCommand: '',
    includeRules: [],
    excludeRules: [],
    ...overrides,
  };
}

/**
 * Stand-in for a spawned ChildProcess. `kill` only records the request; the
 * test decides when (and whether) the process exits.
 */
export class FakeChildProcess extends EventEmitter {
  public killed = false;
  public exitCode: number | null = null;
  public signalCode: NodeJS.Signals | null = null;
  public readonly kill = vi.fn((_signal?: NodeJS.Signals) => {
    this.killed = true;
    return true;
  });

  constructor(public readonly pid: number) {
    super();
  }

  public exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    this.exitCode = code;
    this.signalCode = signal;
    this.emit('exit', code, signal);
  }
}

/** Lets queued immediates, lock sections and promise callbacks run */
export function flushAsync(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
