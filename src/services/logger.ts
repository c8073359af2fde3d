import { config } from '../config/index.js';
import type {
  LoggingConfig,
  LogLevel,
  LogMetadata,
} from '../config/types.js';

import { getRequestId } from './context.js';

function formatMetadata(meta?: LogMetadata): string {
  const requestId = getRequestId();

  const contextMeta: LogMetadata = {};
  if (requestId) contextMeta.requestId = requestId;

  const merged = { ...contextMeta, ...meta };
  return Object.keys(merged).length > 0 ? ` ${JSON.stringify(merged)}` : '';
}

function createTimestamp(): string {
  return new Date().toISOString();
}

function formatLogEntry(
  level: LogLevel,
  message: string,
  meta?: LogMetadata
): string {
  return `[${createTimestamp()}] ${level.toUpperCase()}: ${message}${formatMetadata(meta)}`;
}

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let settings: LoggingConfig = config.logging;

export function configureLogger(next: LoggingConfig): void {
  settings = next;
}

function shouldLog(level: LogLevel): boolean {
  if (!settings.enabled) return false;
  return LEVEL_RANK[level] >= LEVEL_RANK[settings.level];
}

export function logInfo(message: string, meta?: LogMetadata): void {
  if (shouldLog('info')) {
    process.stderr.write(`${formatLogEntry('info', message, meta)}\n`);
  }
}

export function logDebug(message: string, meta?: LogMetadata): void {
  if (shouldLog('debug')) {
    process.stderr.write(`${formatLogEntry('debug', message, meta)}\n`);
  }
}

export function logWarn(message: string, meta?: LogMetadata): void {
  if (shouldLog('warn')) {
    process.stderr.write(`${formatLogEntry('warn', message, meta)}\n`);
  }
}

export function logError(message: string, error?: Error | LogMetadata): void {
  if (!shouldLog('error')) return;

  const errorMeta: LogMetadata =
    error instanceof Error
      ? { error: error.message, stack: error.stack }
      : (error ?? {});

  process.stderr.write(`${formatLogEntry('error', message, errorMeta)}\n`);
}
