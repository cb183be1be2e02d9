import { z } from 'zod';
import { RoutingError } from './errors';
import type { Identifier, Namespace, ResourceAddress, ResourceKey, ResourceType } from './types';

/** Literal segment that precedes the namespace value in every address. */
export const NAMESPACE_SEGMENT = 'namespace';

/** Reserved key suffix: `filmsLIST` or `films/LIST` asks for a new identifier. */
export const ALLOCATE_SENTINEL = 'LIST';

export interface AddressScheme {
  version: string; // e.g. "/api/v1"
  defaultNamespace: Namespace;
  resourceTypes: ReadonlySet<ResourceType>;
}

export type AddressMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

// Namespaces are DNS-ish labels (e.g. "example.org", "team-a")
const namespaceSchema = z.string().regex(/^[A-Za-z0-9]([A-Za-z0-9._-]{0,252})$/);
const identifierSchema = z.string().uuid();

export function createAddressScheme(opts: {
  version: string;
  defaultNamespace: Namespace;
  resourceTypes: Iterable<ResourceType>;
}): AddressScheme {
  return {
    version: opts.version.replace(/\/+$/, ''),
    defaultNamespace: opts.defaultNamespace,
    resourceTypes: new Set(opts.resourceTypes),
  };
}

/**
 * Resolves a request path into a structured address.
 *
 * Accepted forms, below `{version}/namespace/{ns}/`:
 *   `{type}LIST`, `{type}/LIST` -> allocate
 *   `{type}/{uuid}`             -> concrete
 *
 * The allocate form is only valid for GET and POST, the concrete form for
 * GET, PUT and DELETE.
 */
export function parseAddress(method: AddressMethod, rawPath: string, scheme: AddressScheme): ResourceAddress {
  const path = stripQuery(rawPath);
  if (!path.startsWith(`${scheme.version}/`)) {
    throw new RoutingError(`path must start with ${scheme.version}/`);
  }

  const segments = path
    .slice(scheme.version.length + 1)
    .replace(/\/$/, '')
    .split('/')
    .map(decodeSegment);

  if (segments[0] !== NAMESPACE_SEGMENT) {
    throw new RoutingError(`missing "${NAMESPACE_SEGMENT}" segment`);
  }
  if (segments.length < 3 || segments.length > 4) {
    throw new RoutingError(`expected ${scheme.version}/${NAMESPACE_SEGMENT}/{namespace}/{type}/{key}`);
  }

  const namespace = segments[1];
  if (!namespaceSchema.safeParse(namespace).success) {
    throw new RoutingError(`invalid namespace "${namespace}"`);
  }

  let resourceType: string;
  let key: ResourceKey;
  if (segments.length === 3) {
    const tail = segments[2];
    if (!tail.endsWith(ALLOCATE_SENTINEL) || tail.length === ALLOCATE_SENTINEL.length) {
      throw new RoutingError(`missing key for "${tail}"`);
    }
    resourceType = tail.slice(0, -ALLOCATE_SENTINEL.length);
    key = { kind: 'allocate' };
  } else {
    resourceType = segments[2];
    key = parseKey(segments[3]);
  }

  if (!scheme.resourceTypes.has(resourceType)) {
    throw new RoutingError(`unknown resource type "${resourceType}"`);
  }
  if (key.kind === 'allocate' && (method === 'PUT' || method === 'DELETE')) {
    throw new RoutingError(`${method} requires a concrete identifier`);
  }
  if (key.kind === 'concrete' && method === 'POST') {
    throw new RoutingError(`POST creates documents under ${resourceType}${ALLOCATE_SENTINEL}; use PUT to replace`);
  }

  return { namespace, resourceType, key };
}

function parseKey(segment: string): ResourceKey {
  if (segment === ALLOCATE_SENTINEL) return { kind: 'allocate' };
  const parsed = identifierSchema.safeParse(segment);
  if (!parsed.success) {
    throw new RoutingError(`"${segment}" is not a valid identifier`);
  }
  return { kind: 'concrete', identifier: parsed.data.toLowerCase() };
}

/** Inverse of `parseAddress`. The allocate key renders as `{type}LIST/`. */
export function buildPath(
  address: { namespace?: Namespace; resourceType: ResourceType; key: ResourceKey },
  scheme: AddressScheme,
): string {
  const ns = encodeURIComponent(address.namespace ?? scheme.defaultNamespace);
  const base = `${scheme.version}/${NAMESPACE_SEGMENT}/${ns}`;
  if (address.key.kind === 'allocate') {
    return `${base}/${address.resourceType}${ALLOCATE_SENTINEL}/`;
  }
  return `${base}/${address.resourceType}/${address.key.identifier}`;
}

export function concreteKey(identifier: Identifier): ResourceKey {
  return { kind: 'concrete', identifier };
}

function stripQuery(path: string): string {
  const q = path.indexOf('?');
  return q === -1 ? path : path.slice(0, q);
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new RoutingError(`malformed path segment "${segment}"`);
  }
}
