import type { ResolvedSettings } from '../config.js';
import { createDefaultDependencies, createWatchLoopWithDeps } from '../factories.js';
import { createLogger } from '../logger.js';
import { renderBanner } from '../utils/brand.js';

export interface StartOptions {
  banner: boolean;
  /** Stops the watcher like SIGINT does */
  signal?: AbortSignal;
}

/**
 * Runs the watcher in the foreground until SIGINT or SIGTERM, then kills the
 * tracked app process and closes the log file.
 */
export async function startWatching(
  settings: ResolvedSettings,
  options: StartOptions
): Promise<void> {
  if (options.banner) {
    console.log(renderBanner());
  }

  const { watcher } = settings;
  const logger = createLogger(settings.logging.file, settings.logging.level);
  const deps = createDefaultDependencies(watcher, logger);
  const loop = createWatchLoopWithDeps(watcher, deps);

  if (settings.configPath) {
    logger.debug(`Loaded configuration from ${settings.configPath}`);
  }
  logger.info(`Starting cyclewatch in ${watcher.rootDirectory} (every ${watcher.pollInterval}ms)`);
  if (watcher.includeRules.length > 0) {
    logger.debug(`Include rules: ${watcher.includeRules.join(', ')}`);
  }
  if (watcher.excludeRules.length > 0) {
    logger.debug(`Exclude rules: ${watcher.excludeRules.join(', ')}`);
  }

  const controller = new AbortController();
  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down...`);
    controller.abort();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
  const onAbort = () => controller.abort();
  if (options.signal?.aborted) {
    controller.abort();
  }
  options.signal?.addEventListener('abort', onAbort, { once: true });

  try {
    await loop.run(controller.signal);
  } finally {
    process.removeListener('SIGINT', shutdown);
    process.removeListener('SIGTERM', shutdown);
    options.signal?.removeEventListener('abort', onAbort);
    await deps.supervisor.stop();
    await logger.flush();
  }
}
