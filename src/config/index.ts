import { readFileSync } from 'node:fs';

import { z } from 'zod';

import {
  parseBoolean,
  parseHeaderName,
  parseInteger,
  parseLogLevel,
  parseString,
} from './env-parsers.js';
import type { AppConfig } from './types.js';

const packageJsonSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
});

const originUrlSchema = z
  .string()
  .url()
  .transform((value) => new URL(value))
  .refine((url) => url.protocol === 'http:' || url.protocol === 'https:', {
    message: 'ORIGIN_URL must use http or https',
  });

const configSchema = z.object({
  server: z.object({
    name: z.string().min(1),
    version: z.string().min(1),
    host: z.string().min(1),
    port: z.number().int().min(1024).max(65535),
    healthPath: z.string().startsWith('/'),
  }),
  origin: z.object({
    url: originUrlSchema,
    timeoutMs: z.number().int().positive(),
  }),
  gate: z.object({
    routingParam: z.string().min(1),
    loginFunctionId: z.string().min(1),
    tokenParam: z.string().min(1),
    accessCookieName: z.string().regex(/^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/),
    clientIpHeader: z.string().min(1),
    forwardedForHeader: z.string().min(1),
  }),
  signing: z.object({
    secret: z.string().optional(),
    validityWindowSeconds: z.number().int().positive(),
    clockSkewSeconds: z.number().int().nonnegative(),
  }),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
    enabled: z.boolean(),
  }),
});

function readPackageJson(): z.infer<typeof packageJsonSchema> {
  const raw = readFileSync(new URL('../../package.json', import.meta.url), 'utf8');
  return packageJsonSchema.parse(JSON.parse(raw));
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const packageJson = readPackageJson();

  return configSchema.parse({
    server: {
      name: packageJson.name,
      version: packageJson.version,
      host: parseString(env.HOST, '127.0.0.1'),
      port: parseInteger(env.PORT, 8787, 1024, 65535),
      healthPath: '/_gate/health',
    },
    origin: {
      url: parseString(env.ORIGIN_URL, 'http://127.0.0.1:8080'),
      timeoutMs: parseInteger(env.ORIGIN_TIMEOUT_MS, 30000, 1000, 120000),
    },
    gate: {
      routingParam: 'function_id',
      loginFunctionId: 'APPS_LOGIN_DEFAULT',
      tokenParam: 'oait',
      accessCookieName: parseString(env.ACCESS_COOKIE_NAME, 'CF_Authorization'),
      clientIpHeader: parseHeaderName(env.CLIENT_IP_HEADER, 'cf-connecting-ip'),
      forwardedForHeader: parseHeaderName(
        env.FORWARDED_FOR_HEADER,
        'x-forwarded-for'
      ),
    },
    signing: {
      // Kept unvalidated here: an unusable secret is reported per request.
      secret: env.HMAC_SECRET,
      validityWindowSeconds: parseInteger(
        env.TOKEN_VALIDITY_SECONDS,
        300,
        1,
        86400
      ),
      clockSkewSeconds: parseInteger(env.TOKEN_CLOCK_SKEW_SECONDS, 0, 0, 300),
    },
    logging: {
      level: parseLogLevel(env.LOG_LEVEL),
      enabled: parseBoolean(env.ENABLE_LOGGING, true),
    },
  });
}

export const config: AppConfig = loadConfig();
