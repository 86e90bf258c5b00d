/**
 * src/modules/okta/okta.pagination.ts
 *
 * Lazy, finite page sequence over UsersApi.listUsersPage.
 * - Restartable: pass the cursor of the last completed page to resume.
 * - Sequential by construction: each page's cursor comes from the previous response.
 * - Stops before the next fetch once `signal` aborts.
 */

import type { UsersApi, UsersPage } from './users-api';

export type PageIterationOptions = {
  cursor?: string;
  signal?: AbortSignal;
};

export type NumberedPage = UsersPage & {
  /** 1-based position in this iteration. */
  page: number;
  /** The cursor this page was fetched with. */
  cursor?: string;
};

export async function* iterateUserPages(
  api: UsersApi,
  opts: PageIterationOptions = {},
): AsyncGenerator<NumberedPage, void, undefined> {
  let cursor = opts.cursor;
  let page = 0;

  for (;;) {
    if (opts.signal?.aborted) return;

    const result = await api.listUsersPage(cursor, { signal: opts.signal });
    page += 1;

    yield { ...result, page, cursor };

    if (result.nextCursor === undefined) return;
    cursor = result.nextCursor;
  }
}
