import { z } from 'zod';
import { buildPath, concreteKey, createAddressScheme } from '../addressing';
import type { Identifier, Namespace, ResourceType } from '../types';

const DEFAULT_BASE_URL = 'http://127.0.0.1:8082';
const DEFAULT_API_VERSION = '/api/v1';

type FetchImpl = typeof fetch;

interface DocumentClientOptions {
  resourceType: ResourceType;
  namespace?: Namespace;
  baseUrl?: string;
  apiVersion?: string;
  fetch?: FetchImpl;
}

const IdentifierResponse = z.object({ identifier: z.string() });
const ErrorResponse = z.object({ error: z.string(), detail: z.string() }).partial();

/** Non-2xx answer from the service, carrying the `{ error, detail }` body when there is one. */
export class DocumentClientError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    detail: string,
  ) {
    super(`${status} ${code}: ${detail}`);
    this.name = 'DocumentClientError';
  }
}

export interface DocumentClient<TDoc> {
  allocate(): Promise<Identifier>;
  create(doc: TDoc): Promise<Identifier>;
  /** Resolves to null for a reserved identifier nothing has been written to. */
  get(id: Identifier): Promise<TDoc | null>;
  put(id: Identifier, doc: TDoc): Promise<void>;
  remove(id: Identifier): Promise<void>;
}

/**
 * Typed fetch client for one resource type in one namespace. The document
 * type is the caller's; the service itself stores bodies untyped.
 */
export function createDocumentClient<TDoc>(options: DocumentClientOptions): DocumentClient<TDoc> {
  if (!options.resourceType || !options.resourceType.trim()) {
    throw new Error('createDocumentClient: resourceType is required');
  }

  const baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
  const scheme = createAddressScheme({
    version: options.apiVersion ?? DEFAULT_API_VERSION,
    defaultNamespace: options.namespace ?? 'default',
    resourceTypes: [options.resourceType],
  });
  const fetchImpl: FetchImpl = options.fetch ?? globalThis.fetch.bind(globalThis);

  const allocateUrl = () => baseUrl + buildPath({ resourceType: options.resourceType, key: { kind: 'allocate' } }, scheme);
  const documentUrl = (id: Identifier) =>
    baseUrl + buildPath({ resourceType: options.resourceType, key: concreteKey(id) }, scheme);

  async function request(url: string, init: RequestInit): Promise<Response> {
    const res = await fetchImpl(url, init);
    if (!res.ok) throw await toClientError(res);
    return res;
  }

  return {
    async allocate() {
      const res = await request(allocateUrl(), { method: 'GET' });
      return readIdentifier(res);
    },

    async create(doc) {
      const res = await request(allocateUrl(), jsonInit('POST', doc));
      return readIdentifier(res);
    },

    async get(id) {
      const res = await request(documentUrl(id), { method: 'GET' });
      // bodies are stored untyped; the document type is the caller's choice
      return (await res.json()) as TDoc | null;
    },

    async put(id, doc) {
      await request(documentUrl(id), jsonInit('PUT', doc));
    },

    async remove(id) {
      await request(documentUrl(id), { method: 'DELETE' });
    },
  };
}

function jsonInit(method: string, doc: unknown): RequestInit {
  return {
    method,
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(doc),
  };
}

async function readIdentifier(res: Response): Promise<Identifier> {
  const parsed = IdentifierResponse.safeParse(await res.json());
  if (!parsed.success) {
    throw new DocumentClientError(res.status, 'invalid_response', 'response has no identifier');
  }
  return parsed.data.identifier;
}

async function toClientError(res: Response): Promise<DocumentClientError> {
  // non-JSON error pages fall back to the status text
  const parsed = ErrorResponse.safeParse(await res.json().catch(() => undefined));
  const body: z.infer<typeof ErrorResponse> = parsed.success ? parsed.data : {};
  return new DocumentClientError(res.status, body.error ?? 'http_error', body.detail ?? res.statusText);
}
