/**
 * src/cli/options.ts
 *
 * WHY:
 * - commander hands actions an untyped options bag; every action parses it
 *   through one of these schemas before touching it.
 *
 * RULES:
 * - Parse failures are VALIDATION_ERROR (exit code 2), like commander's own usage errors.
 */

import { z } from 'zod';

import { AppError } from '../shared/errors/errors';
import type { FileConfig } from '../app/config-file';
import { PagingSchema, UserSelectorSchema, UserSourceSchema } from '../modules/users';
import type { UserSelector } from '../modules/users';

const concurrency = z.coerce.number().int().min(1).max(256);

export const GlobalOptionsSchema = z.object({
  verbose: z.boolean().default(false),
  json: z.boolean().default(false),
});

export const ConfigOptionsSchema = z.object({
  orgUrl: z.string().url(),
  apiToken: z.string().min(1),
  databaseUrl: z.string().min(1).optional(),
  concurrency: concurrency.optional(),
});

export const SyncOptionsSchema = z.object({
  concurrency: concurrency.optional(),
});

const SelectorFlagsSchema = z.object({
  id: z.string().optional(),
  email: z.string().optional(),
});

export const GetOptionsSchema = SelectorFlagsSchema.extend({
  source: UserSourceSchema.default('local'),
});

export const UpdateOptionsSchema = z.object({
  id: z.string().trim().min(1),
  profile: z.string().min(1),
});

export const DeleteOptionsSchema = SelectorFlagsSchema.extend({
  yes: z.boolean().default(false),
});

export const ListOptionsSchema = PagingSchema;

export const ResetPasswordOptionsSchema = z.object({
  id: z.string().trim().min(1),
  sendEmail: z.boolean().default(true),
});

export function parseOptions<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.output<S> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => (issue.path.length ? `--${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw AppError.validationError(`Invalid options: ${reason}`);
  }
  return parsed.data;
}

/** Exactly one of --id / --email. */
export function selectorFrom(flags: { id?: string; email?: string }): UserSelector {
  if (flags.id !== undefined && flags.email !== undefined) {
    throw AppError.validationError('Pass either --id or --email, not both');
  }

  const candidate =
    flags.id !== undefined ? { id: flags.id } : flags.email !== undefined ? { email: flags.email } : undefined;
  if (!candidate) throw AppError.validationError('One of --id or --email is required');

  return parseOptions(UserSelectorSchema, candidate);
}

/** `--profile '{"firstName":"Ada"}'` → plain object; field validation is the service's job. */
export function parseProfileJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw AppError.validationError('--profile must be a JSON object, e.g. {"firstName":"Ada"}');
  }
}

/** Only the flags that were given, so unset ones keep their stored value. */
export function toFileConfig(opts: z.output<typeof ConfigOptionsSchema>): FileConfig {
  const values: FileConfig = { orgUrl: opts.orgUrl, apiToken: opts.apiToken };
  if (opts.databaseUrl !== undefined) values.databaseUrl = opts.databaseUrl;
  if (opts.concurrency !== undefined) values.syncConcurrency = opts.concurrency;
  return values;
}
