/**
 * Raw Okta user payloads for tests, shaped like GET /api/v1/users items.
 */

export type RawUserOverrides = {
  id?: string;
  status?: string;
  lastUpdated?: string;
  created?: string;
  typeId?: string;
  profile?: Record<string, unknown>;
};

export function rawUser(overrides: RawUserOverrides = {}): Record<string, unknown> {
  const id = overrides.id ?? 'u1';
  return {
    id,
    status: overrides.status ?? 'ACTIVE',
    created: overrides.created ?? '2024-01-01T00:00:00.000Z',
    activated: '2024-01-01T00:05:00.000Z',
    statusChanged: null,
    lastLogin: null,
    lastUpdated: overrides.lastUpdated ?? '2024-02-01T00:00:00.000Z',
    passwordChanged: null,
    type: { id: overrides.typeId ?? 'oty1' },
    profile: {
      firstName: 'Test',
      lastName: `User ${id}`,
      email: `${id}@example.com`,
      login: `${id}@example.com`,
      mobilePhone: null,
      ...overrides.profile,
    },
    _links: { self: { href: `https://example.okta.com/api/v1/users/${id}` } },
  };
}

/** `count` valid users with ids `${prefix}1..${prefix}count`. */
export function rawUsers(count: number, prefix = 'u'): Record<string, unknown>[] {
  return Array.from({ length: count }, (_, i) => rawUser({ id: `${prefix}${i + 1}` }));
}
