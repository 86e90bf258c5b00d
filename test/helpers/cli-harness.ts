import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { runCli } from '../../src/cli/program';
import type { CliRuntime } from '../../src/cli/program';
import type { UsersApi } from '../../src/modules/okta';

/**
 * WHY:
 * - Drives the real commander program in process: captured stdio, a temp
 *   XDG_CONFIG_HOME (config file + SQLite mirror), and an injectable UsersApi.
 */
export type CliHarness = {
  configHome: string;
  stdout: string[];
  stderr: string[];
  /** Answer given to the next confirmation prompts. */
  confirmAnswer: boolean;
  /** Fires the registered SIGINT handler, if a command registered one. */
  interrupt: () => void;
  run: (...argv: string[]) => Promise<number>;
  reset: () => void;
  cleanup: () => Promise<void>;
};

export async function createCliHarness(
  opts: { remote?: UsersApi; env?: NodeJS.ProcessEnv } = {},
): Promise<CliHarness> {
  const configHome = await fs.mkdtemp(path.join(os.tmpdir(), 'okta-mirror-cli-'));
  let onSigint: (() => void) | undefined;

  const harness: CliHarness = {
    configHome,
    stdout: [],
    stderr: [],
    confirmAnswer: false,
    interrupt: () => onSigint?.(),
    run: (...argv) => runCli(argv, runtime),
    reset: () => {
      harness.stdout.length = 0;
      harness.stderr.length = 0;
    },
    cleanup: () => fs.rm(configHome, { recursive: true, force: true }),
  };

  const runtime: CliRuntime = {
    io: {
      stdout: (text) => harness.stdout.push(text),
      stderr: (text) => harness.stderr.push(text),
      confirm: () => Promise.resolve(harness.confirmAnswer),
    },
    env: {
      NODE_ENV: 'test',
      XDG_CONFIG_HOME: configHome,
      ...opts.env,
    },
    onInterrupt: (handler) => {
      onSigint = handler;
      return () => {
        onSigint = undefined;
      };
    },
    overrides: opts.remote ? { remote: opts.remote } : undefined,
  };

  return harness;
}
