#!/usr/bin/env node
/**
 * src/index.ts
 *
 * WHY:
 * - Single entrypoint for the okta-mirror CLI.
 * - Keeps startup small: bind the real process (stdio, SIGINT) -> runCli -> exit code.
 */

import { createInterface } from 'node:readline/promises';

import { runCli } from './cli/program';
import type { CliRuntime } from './cli/program';

async function confirm(question: string): Promise<boolean> {
  // prompt on stderr: stdout stays machine-readable
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  try {
    const answer = await rl.question(`${question} [y/N] `);
    return /^y(es)?$/i.test(answer.trim());
  } finally {
    rl.close();
  }
}

function onInterrupt(handler: () => void): () => void {
  let interrupted = false;
  const listener = () => {
    // a second Ctrl-C stops waiting for in-flight work
    if (interrupted) process.exit(130);
    interrupted = true;
    handler();
  };

  process.on('SIGINT', listener);
  return () => {
    process.off('SIGINT', listener);
  };
}

const runtime: CliRuntime = {
  io: {
    stdout: (text) => process.stdout.write(`${text}\n`),
    stderr: (text) => process.stderr.write(`${text}\n`),
    confirm,
  },
  env: process.env,
  onInterrupt,
};

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2), runtime);
}

void main().catch((err: unknown) => {
  process.stderr.write(`Fatal: ${err instanceof Error ? (err.stack ?? err.message) : String(err)}\n`);
  process.exit(1);
});
