/**
 * src/app/config-file.ts
 *
 * WHY:
 * - Persists what `okta-mirror config` was told (org URL, token, database, concurrency)
 *   so later commands work without exporting env vars.
 *
 * RULES:
 * - The file holds an API token: directory 0700, file 0600.
 * - Env vars always win over the file (see buildConfig).
 * - A missing file is an empty config, a malformed one is FATAL.
 */

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { z } from 'zod';

import { AppError } from '../shared/errors/errors';

export const APP_NAME = 'okta-mirror';
export const CONFIG_FILE_NAME = 'config.json';

export const FileConfigSchema = z
  .object({
    orgUrl: z.string().url(),
    apiToken: z.string().min(1),
    databaseUrl: z.string().min(1),
    syncConcurrency: z.number().int().positive(),
  })
  .partial();

export type FileConfig = z.infer<typeof FileConfigSchema>;

/** `$XDG_CONFIG_HOME/okta-mirror`, else `~/.config/okta-mirror`. */
export function configDir(env: NodeJS.ProcessEnv = process.env): string {
  const base = env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  return path.join(base, APP_NAME);
}

export function configFilePath(dir: string = configDir()): string {
  return path.join(dir, CONFIG_FILE_NAME);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export async function readConfigFile(file: string): Promise<FileConfig> {
  let text: string;
  try {
    text = await fs.readFile(file, 'utf8');
  } catch (err) {
    if (isMissingFile(err)) return {};
    throw AppError.fatal(`Cannot read config file ${file}`, { file }, err);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw AppError.fatal(`Config file ${file} is not valid JSON`, { file }, err);
  }

  const parsed = FileConfigSchema.safeParse(json);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw AppError.fatal(`Config file ${file} is invalid: ${reason}`, { file });
  }

  return parsed.data;
}

/** Merges `values` into the stored file and returns the merged config. */
export async function writeConfigFile(file: string, values: FileConfig): Promise<FileConfig> {
  const merged: FileConfig = { ...(await readConfigFile(file)), ...values };

  await fs.mkdir(path.dirname(file), { recursive: true, mode: 0o700 });
  await fs.writeFile(file, `${JSON.stringify(merged, null, 2)}\n`, { mode: 0o600 });
  // writeFile's mode only applies on create
  await fs.chmod(file, 0o600);

  return merged;
}
