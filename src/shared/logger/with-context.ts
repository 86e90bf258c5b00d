/**
 * src/shared/logger/with-context.ts
 *
 * WHY:
 * - Every log line of one CLI invocation should carry the same runId + command,
 *   so a sync run can be traced end to end in a log file.
 * - We don't want every module repeating the same fields manually.
 *
 * HOW TO USE:
 * - In a CLI action: `const log = withCommandContext(deps.logger, { command: 'users.sync' })`
 * - Pass `log` down as the `logger` dependency; it is a regular winston child logger.
 */

import { randomUUID } from 'node:crypto';
import type { Logger } from './logger';

export type CommandContext = {
  command: string;
  runId?: string;
};

export function withCommandContext(logger: Logger, ctx: CommandContext): Logger {
  return logger.child({
    command: ctx.command,
    runId: ctx.runId ?? randomUUID(),
  });
}
