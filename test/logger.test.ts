import { readFileSync, rmSync } from 'fs';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from 'vitest';
import { isLogLevel, SimpleLogger } from '../src/logger.js';
import { createTempDir } from './helpers.js';

describe('SimpleLogger', () => {
  let log: MockInstance<typeof console.log>;
  let warn: MockInstance<typeof console.warn>;
  let error: MockInstance<typeof console.error>;

  beforeEach(() => {
    log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('drops messages below the configured level', () => {
    const logger = new SimpleLogger('warn');

    logger.debug('noise');
    logger.info('chatter');
    logger.success('done');
    logger.warn('careful');
    logger.error('broken');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0]?.[0])).toContain('WARN: careful');
    expect(error).toHaveBeenCalledTimes(1);
    expect(String(error.mock.calls[0]?.[0])).toContain('ERROR: broken');
  });

  it('logs debug output at the debug level', () => {
    const logger = new SimpleLogger('debug');

    logger.debug('scanning');

    expect(String(log.mock.calls[0]?.[0])).toContain('DEBUG: scanning');
  });

  it('prints metadata on its own line', () => {
    const logger = new SimpleLogger('info');

    logger.info('state', { cycles: 2 });

    expect(log).toHaveBeenCalledTimes(2);
    expect(log.mock.calls[1]?.[0]).toEqual({ cycles: 2 });
  });

  describe('log file', () => {
    let dir: string;

    beforeEach(() => {
      dir = createTempDir('cyclewatch-log-');
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('appends level-tagged lines, creating missing directories', async () => {
      const file = join(dir, 'nested', 'watch.log');
      const logger = new SimpleLogger('info', file);

      logger.info('Running build command...');
      logger.debug('hidden');
      logger.error('Build failed: Command failed (code 2): make');
      await logger.flush();

      const lines = readFileSync(file, 'utf-8').trimEnd().split('\n');
      expect(lines).toHaveLength(2);
      expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z INFO : Running build command\.\.\.$/);
      expect(lines[1]).toMatch(/Z ERROR: Build failed: Command failed \(code 2\): make$/);
    });

    it('keeps earlier content', async () => {
      const file = join(dir, 'watch.log');
      const first = new SimpleLogger('info', file);
      first.info('one');
      await first.flush();

      const second = new SimpleLogger('info', file);
      second.info('two');
      await second.flush();

      expect(readFileSync(file, 'utf-8').trimEnd().split('\n')).toHaveLength(2);
    });
  });
});

describe('isLogLevel', () => {
  it('accepts the four levels only', () => {
    expect(['debug', 'info', 'warn', 'error'].every(isLogLevel)).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel('INFO')).toBe(false);
  });
});
