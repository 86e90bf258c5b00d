/**
 * src/modules/okta/okta.client.ts
 *
 * WHY:
 * - Production UsersApi over the Okta Users API (/api/v1/users).
 * - Describes endpoints only; timeouts, retries and error classification live
 *   in shared/http/request-client.ts.
 *
 * RULES:
 * - Returns raw records; never maps or validates them.
 * - Never logs the API token.
 */

import type { Logger } from '../../shared/logger/logger';
import { RequestClient } from '../../shared/http/request-client';
import type { RequestRetryPolicy } from '../../shared/http/request-client';

import { nextCursorFrom } from './link-header';
import { OktaErrors } from './okta.errors';
import type {
  CallOptions,
  PasswordResetResult,
  RawUser,
  RemoteProfileUpdate,
  UsersApi,
  UsersPage,
} from './users-api';

const USERS_PATH = 'api/v1/users';

export type OktaClientOptions = {
  orgUrl: string;
  apiToken: string;
  timeoutSeconds: number;
  pageSize: number;
  retry?: Partial<RequestRetryPolicy>;
  fetchFn?: typeof fetch;
  logger?: Logger;
};

function stringOrNull(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

export class OktaUsersClient implements UsersApi {
  private readonly http: RequestClient;

  constructor(private readonly opts: OktaClientOptions) {
    this.http = new RequestClient({
      baseUrl: opts.orgUrl,
      headers: { Authorization: `SSWS ${opts.apiToken}` },
      timeoutMs: opts.timeoutSeconds * 1000,
      retry: opts.retry,
      fetchFn: opts.fetchFn,
      logger: opts.logger,
    });
  }

  async listUsersPage(cursor?: string, opts: CallOptions = {}): Promise<UsersPage> {
    const res = await this.http.get(USERS_PATH, {
      query: { limit: this.opts.pageSize, after: cursor },
      signal: opts.signal,
    });

    if (!Array.isArray(res.body)) {
      throw OktaErrors.unexpectedResponse('user list is not an array', { cursor });
    }

    const records: RawUser[] = res.body;
    const nextCursor = nextCursorFrom(res.headers.get('link'));

    this.opts.logger?.debug('okta.users.page', {
      cursor: cursor ?? null,
      count: records.length,
      hasNext: nextCursor !== undefined,
    });

    return { records, nextCursor };
  }

  async getUserById(id: string, opts: CallOptions = {}): Promise<RawUser> {
    const res = await this.http.get(`${USERS_PATH}/${encodeURIComponent(id)}`, {
      signal: opts.signal,
    });
    return res.body;
  }

  async findUserByEmail(email: string, opts: CallOptions = {}): Promise<RawUser | undefined> {
    const res = await this.http.get(USERS_PATH, {
      query: { filter: `profile.email eq "${email.replace(/"/g, '\\"')}"`, limit: 1 },
      signal: opts.signal,
    });

    if (!Array.isArray(res.body)) {
      throw OktaErrors.unexpectedResponse('user search result is not an array', { email });
    }

    const found: RawUser[] = res.body;
    return found[0];
  }

  async updateUserProfile(
    id: string,
    profile: RemoteProfileUpdate,
    opts: CallOptions = {},
  ): Promise<RawUser> {
    // POST is Okta's partial profile update; PUT would replace the whole profile.
    const res = await this.http.post(`${USERS_PATH}/${encodeURIComponent(id)}`, {
      body: { profile },
      signal: opts.signal,
    });
    return res.body;
  }

  async deleteUser(id: string, opts: CallOptions = {}): Promise<void> {
    await this.http.delete(`${USERS_PATH}/${encodeURIComponent(id)}`, { signal: opts.signal });
  }

  async resetPassword(
    id: string,
    params: { sendEmail: boolean },
    opts: CallOptions = {},
  ): Promise<PasswordResetResult> {
    const res = await this.http.post(
      `${USERS_PATH}/${encodeURIComponent(id)}/lifecycle/reset_password`,
      { query: { sendEmail: params.sendEmail }, signal: opts.signal },
    );

    const body: Record<string, unknown> =
      res.body && typeof res.body === 'object' ? { ...res.body } : {};

    return {
      summary: stringOrNull(body.summary),
      resetPasswordUrl: stringOrNull(body.resetPasswordUrl),
    };
  }
}
