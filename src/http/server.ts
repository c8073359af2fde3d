import type { Server } from 'node:http';

import express, { type Express } from 'express';
import type { Dispatcher } from 'undici';

import type { AppConfig } from '../config/types.js';

import {
  configureLogger,
  logError,
  logInfo,
} from '../services/logger.js';

import { errorHandler } from '../middleware/error-handler.js';
import { createTokenGateMiddleware } from '../middleware/token-gate.js';

import {
  createContextMiddleware,
  registerHealthRoute,
} from './server-middleware.js';
import {
  createShutdownHandler,
  registerSignalHandlers,
} from './server-shutdown.js';

export interface GatewayAppOptions {
  readonly config: AppConfig;
  readonly dispatcher?: Dispatcher;
  readonly now?: () => number;
}

/**
 * Builds the express app. No body parser is mounted: request bodies are
 * streamed to the origin untouched.
 */
export function createGatewayApp(options: GatewayAppOptions): Express {
  const { config } = options;
  configureLogger(config.logging);

  const app = express();
  app.disable('x-powered-by');
  app.disable('etag');

  app.use(createContextMiddleware());
  registerHealthRoute(app, config.server);
  app.use(
    createTokenGateMiddleware({
      gate: config.gate,
      signing: config.signing,
      origin: config.origin,
      ...(options.dispatcher && { dispatcher: options.dispatcher }),
      ...(options.now && { now: options.now }),
    })
  );
  app.use(errorHandler);

  return app;
}

function startListening(app: Express, config: AppConfig): Server {
  const { host, port } = config.server;
  return app
    .listen(port, host, () => {
      logInfo(`${config.server.name} started`, {
        host,
        port,
        origin: config.origin.url.origin,
      });

      process.stdout.write(
        `✓ ${config.server.name} listening at http://${host}:${port}\n`
      );
      process.stdout.write(
        `  Health check: http://${host}:${port}${config.server.healthPath}\n`
      );
      process.stdout.write(`  Origin: ${config.origin.url.href}\n`);
    })
    .on('error', (err) => {
      logError('Failed to start server', err);
      process.exit(1);
    });
}

export function startHttpServer(config: AppConfig): {
  server: Server;
  shutdown: (signal: string) => Promise<void>;
} {
  const app = createGatewayApp({ config });
  const server = startListening(app, config);
  const shutdown = createShutdownHandler(server);
  registerSignalHandlers(shutdown);
  return { server, shutdown };
}
