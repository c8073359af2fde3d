import type { Server } from 'node:http';

import { destroyDispatcher } from '../services/origin-forwarder.js';
import { logError, logInfo, logWarn } from '../services/logger.js';

import { getErrorMessage } from '../utils/error-utils.js';

const FORCED_SHUTDOWN_MS = 10000;

export function createShutdownHandler(
  server: Server
): (signal: string) => Promise<void> {
  let shuttingDown = false;

  return async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;

    logInfo(`${signal} received, shutting down gracefully...`);
    scheduleForcedShutdown(FORCED_SHUTDOWN_MS);

    closeServer(server);
    await destroyDispatcher().catch((error: unknown) => {
      logWarn('Failed to close origin dispatcher', {
        error: getErrorMessage(error),
      });
    });
  };
}

function closeServer(server: Server): void {
  server.close(() => {
    logInfo('HTTP server closed');
    process.exit(0);
  });
  server.closeIdleConnections();
}

function scheduleForcedShutdown(timeoutMs: number): void {
  setTimeout(() => {
    logError('Forced shutdown after timeout');
    process.exit(1);
  }, timeoutMs).unref();
}

export function registerSignalHandlers(
  shutdown: (signal: string) => Promise<void>
): void {
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
}
