/**
 * src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, `.env` in the working directory is loaded via dotenv.
 * - `loadConfig()` reads the env and the per-user config file; tests call
 *   `buildConfig({ env, fileValues })` directly.
 *
 * PRECEDENCE:
 * - environment > config file (written by `okta-mirror config`) > defaults.
 *
 * TYPING:
 * - `okta` is null until both org URL and token are known. Remote commands then
 *   fail with a FATAL "not configured" error instead of a half-built client.
 */

import 'dotenv/config';
import path from 'node:path';

import { z } from 'zod';

import { AppError } from '../shared/errors/errors';
import { LOG_LEVELS } from '../shared/logger/logger';
import type { LogLevel } from '../shared/logger/logger';
import { defaultConcurrency } from '../shared/concurrency/worker-pool';

import { APP_NAME, configDir, configFilePath, readConfigFile } from './config-file';
import type { FileConfig } from './config-file';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

// empty env vars count as unset
const optionalString = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.string().min(1).optional(),
);

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,

  OKTA_ORG_URL: z.preprocess((value) => (value === '' ? undefined : value), z.string().url().optional()),
  OKTA_API_TOKEN: optionalString,
  REQUEST_TIMEOUT_SECONDS: z.coerce.number().positive().max(600).default(30),

  SYNC_CONCURRENCY: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.coerce.number().int().min(1).max(256).optional(),
  ),
  SYNC_PAGE_SIZE: z.coerce.number().int().min(1).max(200).default(200),

  DATABASE_URL: optionalString,

  // Logging / service identity
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  LOG_FILE: optionalString,
  SERVICE_NAME: z.string().default(APP_NAME),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type OktaConfig = {
  orgUrl: string;
  apiToken: string;
};

export type AppConfig = {
  nodeEnv: NodeEnv;

  okta: OktaConfig | null;
  requestTimeoutSeconds: number;

  syncConcurrency: number;
  syncPageSize: number;

  databaseUrl: string;

  logLevel: LogLevel;
  logFile: string | null;
  serviceName: string;

  configDir: string;
};

export type BuildConfigInput = {
  env?: NodeJS.ProcessEnv;
  fileValues?: FileConfig;
  /** Directory holding config.json and the default SQLite database. */
  configDir?: string;
};

export function buildConfig(input: BuildConfigInput = {}): AppConfig {
  const env = input.env ?? process.env;
  const file = input.fileValues ?? {};
  const dir = input.configDir ?? configDir(env);

  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    const reason = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw AppError.validationError(`Invalid configuration: ${reason}`);
  }
  const parsed = result.data;

  const orgUrl = parsed.OKTA_ORG_URL ?? file.orgUrl;
  const apiToken = parsed.OKTA_API_TOKEN ?? file.apiToken;

  return {
    nodeEnv: parsed.NODE_ENV,

    okta: orgUrl && apiToken ? { orgUrl, apiToken } : null,
    requestTimeoutSeconds: parsed.REQUEST_TIMEOUT_SECONDS,

    syncConcurrency: parsed.SYNC_CONCURRENCY ?? file.syncConcurrency ?? defaultConcurrency(),
    syncPageSize: parsed.SYNC_PAGE_SIZE,

    databaseUrl: parsed.DATABASE_URL ?? file.databaseUrl ?? path.join(dir, `${APP_NAME}.db`),

    logLevel: parsed.LOG_LEVEL,
    logFile: parsed.LOG_FILE ?? null,
    serviceName: parsed.SERVICE_NAME,

    configDir: dir,
  };
}

/** Env + the config file under the resolved config dir. */
export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<AppConfig> {
  const dir = configDir(env);
  const fileValues = await readConfigFile(configFilePath(dir));
  return buildConfig({ env, fileValues, configDir: dir });
}
