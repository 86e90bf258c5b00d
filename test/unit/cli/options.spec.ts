import { describe, it, expect } from 'vitest';

import {
  ConfigOptionsSchema,
  ListOptionsSchema,
  parseOptions,
  parseProfileJson,
  selectorFrom,
  toFileConfig,
} from '../../../src/cli/options';
import { AppError } from '../../../src/shared/errors/errors';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe('parseOptions', () => {
  it('coerces commander strings and applies defaults', () => {
    expect(parseOptions(ListOptionsSchema, { page: '3' })).toEqual({ page: 3, limit: 20 });
  });

  it('throws VALIDATION_ERROR naming the flag', () => {
    expect(() => parseOptions(ListOptionsSchema, { page: '1', limit: 'lots' })).toThrow(
      'Invalid options: --limit: Expected number, received nan',
    );

    const err = captureError(() => parseOptions(ListOptionsSchema, { page: '0' }));
    expect(err).toBeInstanceOf(AppError);
    expect(err instanceof AppError && err.exitCode).toBe(2);
  });
});

describe('selectorFrom', () => {
  it('builds an id or email selector', () => {
    expect(selectorFrom({ id: ' u1 ' })).toEqual({ id: 'u1' });
    expect(selectorFrom({ email: 'ada@example.com' })).toEqual({ email: 'ada@example.com' });
  });

  it('requires exactly one flag', () => {
    expect(() => selectorFrom({})).toThrow('One of --id or --email is required');
    expect(() => selectorFrom({ id: 'u1', email: 'ada@example.com' })).toThrow(
      'Pass either --id or --email, not both',
    );
  });

  it('rejects a malformed email', () => {
    expect(() => selectorFrom({ email: 'not-an-email' })).toThrow(/^Invalid options:/);
  });
});

describe('parseProfileJson', () => {
  it('parses JSON and leaves field checks to the service', () => {
    expect(parseProfileJson('{"firstName":"Ada"}')).toEqual({ firstName: 'Ada' });
  });

  it('rejects text that is not JSON', () => {
    expect(() => parseProfileJson('{firstName: Ada}')).toThrow(
      '--profile must be a JSON object, e.g. {"firstName":"Ada"}',
    );
  });
});

describe('toFileConfig', () => {
  it('keeps only the flags that were given', () => {
    const opts = parseOptions(ConfigOptionsSchema, {
      orgUrl: 'https://example.okta.com',
      apiToken: 'test-secret',
    });

    expect(toFileConfig(opts)).toEqual({ orgUrl: 'https://example.okta.com', apiToken: 'test-secret' });
  });

  it('maps --concurrency to syncConcurrency', () => {
    const opts = parseOptions(ConfigOptionsSchema, {
      orgUrl: 'https://example.okta.com',
      apiToken: 'test-secret',
      databaseUrl: '/tmp/mirror.db',
      concurrency: '8',
    });

    expect(toFileConfig(opts)).toEqual({
      orgUrl: 'https://example.okta.com',
      apiToken: 'test-secret',
      databaseUrl: '/tmp/mirror.db',
      syncConcurrency: 8,
    });
  });
});
