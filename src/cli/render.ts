/**
 * src/cli/render.ts
 *
 * Human-readable output for CLI results. `--json` bypasses all of this and
 * prints `toJson(result)` instead.
 */

import type { PasswordResetResult } from '../modules/okta';
import type { SyncProgress, SyncSummary } from '../modules/sync';
import type { DeleteUserResult, ListUsersResult, UpdateUserResult, UserRecord } from '../modules/users';
import { errorMessage, isAppError } from '../shared/errors/errors';

export function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

function fullName(record: UserRecord): string {
  return `${record.profile.firstName} ${record.profile.lastName}`;
}

export function renderRecord(record: UserRecord): string {
  const { user, profile, type } = record;
  const rows: Array<[string, string | null]> = [
    ['id', user.id],
    ['status', user.status],
    ['email', profile.email],
    ['login', profile.login],
    ['name', fullName(record)],
    ['phone', profile.phone],
    ['second email', profile.secondEmail],
    ['placement org', profile.placementOrg],
    ['portal access', profile.portalAccessGroup],
    ['report groups', profile.reportGroupList],
    ['ack new business', profile.ackNewBusiness === null ? null : String(profile.ackNewBusiness)],
    ['type', type.name ? `${type.name} (${type.id})` : type.id],
    ['created', user.createdAt],
    ['updated', user.updatedAt],
    ['activated', user.activatedAt],
    ['last login', user.lastLoginAt],
  ];

  const width = Math.max(...rows.map(([label]) => label.length));
  return rows
    .filter((row): row is [string, string] => row[1] !== null)
    .map(([label, value]) => `${label.padEnd(width)}  ${value}`)
    .join('\n');
}

export function renderPage(result: ListUsersResult): string {
  if (result.items.length === 0) {
    return `No users on page ${result.page} (${result.total} total)`;
  }

  const rows = result.items.map((r) => [r.user.id, r.user.status, r.profile.email, fullName(r)]);
  const header = ['ID', 'STATUS', 'EMAIL', 'NAME'];
  const widths = header.map((h, col) => Math.max(h.length, ...rows.map((row) => row[col].length)));
  const line = (cells: string[]) =>
    cells
      .map((cell, col) => (col === cells.length - 1 ? cell : cell.padEnd(widths[col])))
      .join('  ');

  const first = result.offset + 1;
  const last = result.offset + result.items.length;

  return [
    line(header),
    ...rows.map(line),
    '',
    `Page ${result.page}: users ${first}-${last} of ${result.total}`,
  ].join('\n');
}

export function renderProgress(progress: SyncProgress): string {
  return `sync: page ${progress.page}, ${progress.processed}/${progress.knownTotal} records processed`;
}

export function renderSyncSummary(summary: SyncSummary): string {
  const lines = [
    summary.cancelled ? 'Sync cancelled (partial results):' : 'Sync complete:',
    `  upserted:  ${summary.upserted}`,
    `  unchanged: ${summary.unchanged}`,
    `  skipped:   ${summary.skipped}`,
    `  failed:    ${summary.failed}`,
    `  pages:     ${summary.pages}`,
    `  duration:  ${(summary.durationMs / 1000).toFixed(1)}s`,
  ];

  for (const skipped of summary.skippedRecords) {
    lines.push(`  skipped ${skipped.id ?? '<no id>'}: ${skipped.reason}`);
  }
  for (const failure of summary.failures) {
    lines.push(`  failed ${failure.id} after ${failure.attempts} attempt(s): ${failure.reason}`);
  }

  return lines.join('\n');
}

export function renderUpdate(result: UpdateUserResult): string {
  return `${renderRecord(result.record)}\n\nUpdated remotely; local copy ${result.localOutcome}`;
}

export function renderDelete(result: DeleteUserResult): string {
  return result.removedLocally
    ? `Deleted user ${result.id}`
    : `Deleted user ${result.id} (it was not in the local mirror)`;
}

export function renderPasswordReset(id: string, result: PasswordResetResult): string {
  if (result.resetPasswordUrl) return `Password reset for ${id}: ${result.resetPasswordUrl}`;
  return `Password reset email sent for ${id}`;
}

export function renderError(err: unknown, json: boolean): string {
  if (json) {
    return toJson({
      error: isAppError(err)
        ? { code: err.code, message: err.message }
        : { code: 'INTERNAL', message: errorMessage(err) },
    });
  }
  return `Error: ${errorMessage(err)}`;
}
