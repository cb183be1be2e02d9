import { describe, expect, it } from 'vitest';
import { buildPath, concreteKey, createAddressScheme, parseAddress } from '../src/addressing';
import { RoutingError } from '../src/errors';

const scheme = createAddressScheme({
  version: '/api/v1',
  defaultNamespace: 'default',
  resourceTypes: ['films', 'books'],
});

const ID = '3f2b8c1e-9a4d-4e6f-8b7a-1c2d3e4f5a6b';

describe('parseAddress', () => {
  it('resolves {type}LIST with and without trailing slash to an allocate key', () => {
    for (const path of ['/api/v1/namespace/example.org/filmsLIST/', '/api/v1/namespace/example.org/filmsLIST']) {
      expect(parseAddress('GET', path, scheme)).toEqual({
        namespace: 'example.org',
        resourceType: 'films',
        key: { kind: 'allocate' },
      });
    }
  });

  it('accepts {type}/LIST as the allocate key', () => {
    expect(parseAddress('GET', '/api/v1/namespace/team-a/books/LIST', scheme).key).toEqual({ kind: 'allocate' });
  });

  it('resolves a concrete identifier and lowercases it', () => {
    const address = parseAddress('PUT', `/api/v1/namespace/team-a/films/${ID.toUpperCase()}`, scheme);
    expect(address).toEqual({ namespace: 'team-a', resourceType: 'films', key: { kind: 'concrete', identifier: ID } });
  });

  it('ignores the query string', () => {
    const address = parseAddress('GET', `/api/v1/namespace/ns/films/${ID}?verbose=1`, scheme);
    expect(address.key).toEqual(concreteKey(ID));
  });

  it('decodes percent-encoded namespaces', () => {
    expect(parseAddress('GET', `/api/v1/namespace/a%2Eb/films/${ID}`, scheme).namespace).toBe('a.b');
  });

  it.each([
    ['wrong version', `/api/v2/namespace/ns/films/${ID}`, 'path must start with /api/v1/'],
    ['missing namespace segment', `/api/v1/films/${ID}`, 'missing "namespace" segment'],
    ['missing namespace value', `/api/v1/namespace/films/${ID}`, `missing key for "${ID}"`],
    ['too many segments', `/api/v1/namespace/ns/films/${ID}/extra`, 'expected /api/v1/namespace/{namespace}/{type}/{key}'],
    ['unknown resource type', `/api/v1/namespace/ns/songs/${ID}`, 'unknown resource type "songs"'],
    ['unknown resource type on allocate', '/api/v1/namespace/ns/songsLIST/', 'unknown resource type "songs"'],
    ['bare sentinel', '/api/v1/namespace/ns/LIST', 'missing key for "LIST"'],
    ['invalid identifier', '/api/v1/namespace/ns/films/42', '"42" is not a valid identifier'],
    ['invalid namespace', `/api/v1/namespace/-ns/films/${ID}`, 'invalid namespace "-ns"'],
    ['broken escape', `/api/v1/namespace/%E0%A4%A/films/${ID}`, 'malformed path segment "%E0%A4%A"'],
  ])('rejects %s', (_label, path, message) => {
    expect(() => parseAddress('GET', path, scheme)).toThrowError(new RoutingError(message));
  });

  it('rejects the allocate key on PUT and DELETE', () => {
    expect(() => parseAddress('PUT', '/api/v1/namespace/ns/filmsLIST/', scheme)).toThrow(
      'PUT requires a concrete identifier',
    );
    expect(() => parseAddress('DELETE', '/api/v1/namespace/ns/films/LIST', scheme)).toThrow(
      'DELETE requires a concrete identifier',
    );
  });

  it('rejects a concrete key on POST', () => {
    expect(() => parseAddress('POST', `/api/v1/namespace/ns/films/${ID}`, scheme)).toThrow(RoutingError);
  });
});

describe('buildPath', () => {
  it('renders the allocate key as {type}LIST/ under the default namespace', () => {
    expect(buildPath({ resourceType: 'films', key: { kind: 'allocate' } }, scheme)).toBe(
      '/api/v1/namespace/default/filmsLIST/',
    );
  });

  it('renders a concrete key under the given namespace', () => {
    expect(buildPath({ namespace: 'example.org', resourceType: 'books', key: concreteKey(ID) }, scheme)).toBe(
      `/api/v1/namespace/example.org/books/${ID}`,
    );
  });

  it('round-trips through parseAddress', () => {
    const address = { namespace: 'team-a', resourceType: 'films', key: concreteKey(ID) };
    expect(parseAddress('DELETE', buildPath(address, scheme), scheme)).toEqual(address);
  });

  it('strips a trailing slash from the configured version', () => {
    const s = createAddressScheme({ version: '/api/v1/', defaultNamespace: 'x', resourceTypes: ['films'] });
    expect(buildPath({ resourceType: 'films', key: { kind: 'allocate' } }, s)).toBe('/api/v1/namespace/x/filmsLIST/');
  });
});
