import { parseArgs } from 'node:util';

import { getErrorMessage } from './utils/error-utils.js';

export interface CliValues {
  readonly help: boolean;
  readonly version: boolean;
}

interface CliParseSuccess {
  readonly ok: true;
  readonly values: CliValues;
}

interface CliParseFailure {
  readonly ok: false;
  readonly message: string;
}

export type CliParseResult = CliParseSuccess | CliParseFailure;

const usageLines = [
  'Login token gate',
  '',
  'Usage:',
  '  login-token-gate [--help|-h] [--version|-v]',
  '',
  'Options:',
  '  --help, -h    Show this help message.',
  '  --version, -v Show the gate version.',
  '',
  'Environment:',
  '  HMAC_SECRET               Shared signing secret (required for login requests).',
  '  ORIGIN_URL                Origin to forward to (default http://127.0.0.1:8080).',
  '  TOKEN_VALIDITY_SECONDS    Token lifetime in seconds (default 300).',
  '  TOKEN_CLOCK_SKEW_SECONDS  Accepted future skew in seconds (default 0).',
  '  HOST, PORT                Listen address (default 127.0.0.1:8787).',
  '',
] as const;

const optionSchema = {
  help: { type: 'boolean', short: 'h', default: false },
  version: { type: 'boolean', short: 'v', default: false },
} as const;

export function renderCliUsage(): string {
  return `${usageLines.join('\n')}\n`;
}

export function parseCliArgs(args: readonly string[]): CliParseResult {
  try {
    const { values } = parseArgs({
      args: [...args],
      options: optionSchema,
      strict: true,
      allowPositionals: false,
    });

    return {
      ok: true,
      values: {
        help: values.help,
        version: values.version,
      },
    };
  } catch (error: unknown) {
    return {
      ok: false,
      message: getErrorMessage(error),
    };
  }
}
