#!/usr/bin/env node
import { parseCliArgs, renderCliUsage } from './cli.js';
import { config } from './config/index.js';
import { startHttpServer } from './http/server.js';
import { logError } from './services/logger.js';
import { toError } from './utils/error-utils.js';

process.on('uncaughtException', (error) => {
  logError('Uncaught exception', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logError('Unhandled rejection', toError(reason));
});

const cli = parseCliArgs(process.argv.slice(2));

if (!cli.ok) {
  process.stderr.write(`${cli.message}\n\n${renderCliUsage()}`);
  process.exitCode = 1;
} else if (cli.values.help) {
  process.stdout.write(renderCliUsage());
} else if (cli.values.version) {
  process.stdout.write(`${config.server.version}\n`);
} else {
  startHttpServer(config);
}
