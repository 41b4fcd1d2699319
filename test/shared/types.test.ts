import { describe, it, expect } from 'vitest';
import {
  TagCatalogError,
  MalformedHeaderError,
  CatalogIoError,
  ConfigError,
} from '../../src/shared/types';

describe('TagCatalogError', () => {
  it('defaults context to an empty object', () => {
    const err = new TagCatalogError({ code: 'TAGCATALOG_E999', severity: 'low', message: 'boom' });
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('TagCatalogError');
    expect(err.context).toEqual({});
    expect(err.cause).toBeUndefined();
    expect(Number.isNaN(Date.parse(err.timestamp))).toBe(false);
  });

  it('names each subclass', () => {
    expect(new MalformedHeaderError(1, '[x').name).toBe('MalformedHeaderError');
    expect(new CatalogIoError('a.txt').name).toBe('CatalogIoError');
    expect(new ConfigError('bad').name).toBe('ConfigError');
  });
});

describe('CatalogIoError', () => {
  it('carries the path and the underlying cause', () => {
    const cause = new Error('ENOENT: no such file or directory');
    const err = new CatalogIoError('tags.txt', cause);
    expect(err).toBeInstanceOf(TagCatalogError);
    expect(err.code).toBe('TAGCATALOG_E201');
    expect(err.severity).toBe('high');
    expect(err.context).toEqual({ path: 'tags.txt' });
    expect(err.cause).toBe(cause);
    expect(err.message).toBe('Failed to read tag catalog "tags.txt": ENOENT: no such file or directory');
  });

  it('falls back to a generic message without a cause', () => {
    expect(new CatalogIoError('tags.txt').message).toBe(
      'Failed to read tag catalog "tags.txt": unknown error',
    );
  });
});
