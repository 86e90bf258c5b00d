/**
 * src/cli/program.ts
 *
 * WHY:
 * - The commander program for `okta-mirror`: one action per command, each a thin
 *   adapter from flags to UserService / SyncEngine calls.
 * - `runCli()` returns the exit code instead of exiting, so e2e tests drive the
 *   real program in process.
 *
 * RULES:
 * - stdout carries results only; logs, progress and errors go to stderr.
 * - Every action builds its deps through the runtime and always closes them.
 * - Exit codes come from AppError.exitCode; commander usage errors map to 2.
 */

import { Command, CommanderError, Option } from 'commander';

import { loadConfig } from '../app/config';
import type { AppConfig } from '../app/config';
import { configDir, configFilePath, writeConfigFile } from '../app/config-file';
import { buildDeps, buildLogger } from '../app/di';
import type { AppDeps, BuildDepsOverrides } from '../app/di';
import { AppError, isAppError } from '../shared/errors/errors';
import { withCommandContext } from '../shared/logger/with-context';

import {
  ConfigOptionsSchema,
  DeleteOptionsSchema,
  GetOptionsSchema,
  GlobalOptionsSchema,
  ListOptionsSchema,
  ResetPasswordOptionsSchema,
  SyncOptionsSchema,
  UpdateOptionsSchema,
  parseOptions,
  parseProfileJson,
  selectorFrom,
  toFileConfig,
} from './options';
import {
  renderDelete,
  renderError,
  renderPage,
  renderPasswordReset,
  renderProgress,
  renderRecord,
  renderSyncSummary,
  renderUpdate,
  toJson,
} from './render';

export const CLI_NAME = 'okta-mirror';
export const CLI_VERSION = '0.1.0';

export type CliIo = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  /** Resolves true when the user answered yes. */
  confirm: (question: string) => Promise<boolean>;
};

export type CliRuntime = {
  io: CliIo;
  env: NodeJS.ProcessEnv;
  /** Registers an interrupt handler (SIGINT); returns its disposer. */
  onInterrupt: (handler: () => void) => () => void;
  /** Test seam: replaces the Okta client or its fetch. */
  overrides?: Omit<BuildDepsOverrides, 'logger'>;
};

type GlobalOptions = { verbose: boolean; json: boolean };

/** Set by actions that finish "successfully" with a non-zero code (cancelled sync). */
type RunState = { exitCode: number };

function globalsOf(cmd: Command): GlobalOptions {
  return parseOptions(GlobalOptionsSchema, cmd.optsWithGlobals());
}

async function resolveConfig(runtime: CliRuntime, globals: GlobalOptions): Promise<AppConfig> {
  const config = await loadConfig(runtime.env);
  return globals.verbose ? { ...config, logLevel: 'debug' } : config;
}

async function withDeps(
  runtime: CliRuntime,
  cmd: Command,
  command: string,
  fn: (deps: AppDeps, globals: GlobalOptions) => Promise<void>,
): Promise<void> {
  const globals = globalsOf(cmd);
  const config = await resolveConfig(runtime, globals);
  const logger = withCommandContext(buildLogger(config), { command });

  const deps = await buildDeps(config, { ...runtime.overrides, logger });
  try {
    await fn(deps, globals);
  } finally {
    await deps.close();
  }
}

function emit(runtime: CliRuntime, globals: GlobalOptions, value: unknown, human: string): void {
  runtime.io.stdout(globals.json ? toJson(value) : human);
}

export function buildProgram(runtime: CliRuntime, state: RunState): Command {
  const program = new Command()
    .name(CLI_NAME)
    .description('Mirror an Okta user directory into a local database and query it')
    .version(CLI_VERSION, '-V, --version')
    .option('-v, --verbose', 'Debug-level logs on stderr')
    .option('--json', 'Print results as JSON')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => runtime.io.stdout(text.trimEnd()),
      writeErr: (text) => runtime.io.stderr(text.trimEnd()),
    });

  program
    .command('config')
    .description('Store Okta credentials and local settings in the user config file')
    .requiredOption('--org-url <url>', 'Okta org URL, e.g. https://example.okta.com')
    .requiredOption('--api-token <token>', 'Okta API token')
    .option('--database-url <url>', 'SQLite path or postgres:// URL of the local mirror')
    .option('--concurrency <n>', 'Default number of parallel upserts during sync')
    .action(async (raw: unknown, cmd: Command) => {
      const globals = globalsOf(cmd);
      const opts = parseOptions(ConfigOptionsSchema, raw);

      const file = configFilePath(configDir(runtime.env));
      const saved = await writeConfigFile(file, toFileConfig(opts));

      emit(
        runtime,
        globals,
        {
          path: file,
          orgUrl: saved.orgUrl ?? null,
          databaseUrl: saved.databaseUrl ?? null,
          syncConcurrency: saved.syncConcurrency ?? null,
        },
        `Configuration saved to ${file}`,
      );
    });

  const users = program.command('users').description('Sync, query and manage mirrored users');

  users
    .command('sync')
    .description('Pull every user from Okta into the local mirror')
    .option('--concurrency <n>', 'Parallel upserts (overrides config)')
    .action(async (raw: unknown, cmd: Command) => {
      const opts = parseOptions(SyncOptionsSchema, raw);

      await withDeps(runtime, cmd, 'users.sync', async (deps, globals) => {
        const engine = deps.sync.createEngine(
          opts.concurrency === undefined ? {} : { concurrency: opts.concurrency },
        );

        const controller = new AbortController();
        const dispose = runtime.onInterrupt(() => {
          deps.logger.warn('cli.sync.interrupted');
          runtime.io.stderr('Cancelling sync: waiting for in-flight upserts...');
          controller.abort();
        });

        try {
          const summary = await engine.run({
            signal: controller.signal,
            onProgress: (progress) => runtime.io.stderr(renderProgress(progress)),
          });

          emit(runtime, globals, summary, renderSyncSummary(summary));
          if (summary.cancelled) state.exitCode = AppError.cancelled().exitCode;
        } finally {
          dispose();
        }
      });
    });

  users
    .command('get')
    .description('Show one user from the local mirror or from Okta')
    .option('--id <id>', 'User id')
    .addOption(new Option('--email <email>', 'User email').conflicts('id'))
    .addOption(
      new Option('--source <source>', 'Where to read from').choices(['local', 'remote']).default('local'),
    )
    .action(async (raw: unknown, cmd: Command) => {
      const opts = parseOptions(GetOptionsSchema, raw);
      const selector = selectorFrom(opts);

      await withDeps(runtime, cmd, 'users.get', async (deps, globals) => {
        const record = await deps.users.userService.get(selector, opts.source);
        emit(runtime, globals, record, renderRecord(record));
      });
    });

  users
    .command('update')
    .description('Update profile fields in Okta and mirror the result locally')
    .requiredOption('--id <id>', 'User id')
    .requiredOption('--profile <json>', 'Profile fields as JSON, e.g. {"firstName":"Ada"}')
    .action(async (raw: unknown, cmd: Command) => {
      const opts = parseOptions(UpdateOptionsSchema, raw);
      const fields = parseProfileJson(opts.profile);

      await withDeps(runtime, cmd, 'users.update', async (deps, globals) => {
        const result = await deps.users.userService.update(opts.id, fields);
        emit(runtime, globals, result, renderUpdate(result));
      });
    });

  users
    .command('delete')
    .description('Delete a user in Okta, then from the local mirror')
    .option('--id <id>', 'User id')
    .addOption(new Option('--email <email>', 'User email').conflicts('id'))
    .option('-y, --yes', 'Skip the confirmation prompt')
    .action(async (raw: unknown, cmd: Command) => {
      const opts = parseOptions(DeleteOptionsSchema, raw);
      const selector = selectorFrom(opts);
      const label = 'id' in selector ? selector.id : selector.email;

      if (!opts.yes && !(await runtime.io.confirm(`Delete user ${label} in Okta?`))) {
        runtime.io.stderr('Deletion aborted');
        return;
      }

      await withDeps(runtime, cmd, 'users.delete', async (deps, globals) => {
        const result = await deps.users.userService.delete(selector);
        emit(runtime, globals, result, renderDelete(result));
      });
    });

  users
    .command('list')
    .description('List users from the local mirror')
    .option('--page <n>', 'Page number, starting at 1', '1')
    .option('--limit <n>', 'Users per page', '20')
    .action(async (raw: unknown, cmd: Command) => {
      const opts = parseOptions(ListOptionsSchema, raw);

      await withDeps(runtime, cmd, 'users.list', async (deps, globals) => {
        const result = await deps.users.userService.list(opts.page, opts.limit);
        emit(runtime, globals, result, renderPage(result));
      });
    });

  users
    .command('reset-password')
    .description('Start the Okta password reset flow for a user')
    .requiredOption('--id <id>', 'User id')
    .option('--no-send-email', 'Return a one-time reset URL instead of emailing the user')
    .action(async (raw: unknown, cmd: Command) => {
      const opts = parseOptions(ResetPasswordOptionsSchema, raw);

      await withDeps(runtime, cmd, 'users.reset_password', async (deps, globals) => {
        const result = await deps.users.userService.resetPassword(opts.id, {
          sendEmail: opts.sendEmail,
        });
        emit(runtime, globals, result, renderPasswordReset(opts.id, result));
      });
    });

  return program;
}

/** Parses `argv` (user args only, no node/script prefix) and returns the exit code. */
export async function runCli(argv: string[], runtime: CliRuntime): Promise<number> {
  const state: RunState = { exitCode: 0 };
  const program = buildProgram(runtime, state);

  try {
    await program.parseAsync(argv, { from: 'user' });
    return state.exitCode;
  } catch (err) {
    if (err instanceof CommanderError) {
      // commander already printed its message (or help/version) through configureOutput
      return err.exitCode === 0 ? 0 : AppError.validationError().exitCode;
    }

    runtime.io.stderr(renderError(err, argv.includes('--json')));
    return isAppError(err) ? err.exitCode : 1;
  }
}
