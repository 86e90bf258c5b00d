/**
 * src/shared/db/migrations/index.ts
 *
 * Static migration list: the CLI ships compiled, so migrations are imported
 * rather than discovered on disk. Keys sort in execution order.
 */

import type { Migration } from 'kysely';

import * as m0001 from './0001_user_types';
import * as m0002 from './0002_users';
import * as m0003 from './0003_user_profiles';
import * as m0004 from './0004_user_profiles_org_attributes';

export const migrations: Record<string, Migration> = {
  '0001_user_types': m0001,
  '0002_users': m0002,
  '0003_user_profiles': m0003,
  '0004_user_profiles_org_attributes': m0004,
};
