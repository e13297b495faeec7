// ============================================================================
// Graceful Shutdown
// ============================================================================

import { log, logError } from './config.js';

export const DRAIN_TIMEOUT_MS = 10_000;

/**
 * Stop the running transport on SIGINT/SIGTERM, forcing exit if it does not
 * drain within DRAIN_TIMEOUT_MS.
 */
export function installShutdownHandlers(cleanup: () => Promise<void>): void {
  let shuttingDown = false;

  async function shutdown(signal: string): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;

    log(`Shutdown: ${signal} received, stopping transport`);

    const timer = setTimeout(() => {
      logError(`Shutdown: drain timeout (${DRAIN_TIMEOUT_MS}ms) exceeded, forcing exit`);
      process.exit(1);
    }, DRAIN_TIMEOUT_MS);

    let code = 0;
    try {
      await cleanup();
      log('Shutdown: complete');
    } catch (err) {
      logError('Shutdown: error while stopping transport:', err);
      code = 1;
    } finally {
      clearTimeout(timer);
    }
    process.exit(code);
  }

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}
