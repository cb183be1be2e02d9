import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import { loadConfig } from '../src/config';
import { createContext } from '../src/context';
import { buildApp } from '../src/server';
import { createDocumentClient, DocumentClientError } from '../src/sdk/documentClient';
import { MemoryDocumentStore } from '../src/storage/memoryDocumentStore';

type AppInstance = Awaited<ReturnType<typeof buildApp>>;

interface Film {
  title: string;
  year?: number;
}

const BASE_URL = 'http://docs.test';

/** fetch that answers from the in-process app instead of the network. */
function injectFetch(app: AppInstance): typeof fetch {
  return async (input, init) => {
    const url = new URL(typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url);
    const res = await app.inject({
      method: init?.method === 'PUT' ? 'PUT' : init?.method === 'POST' ? 'POST' : init?.method === 'DELETE' ? 'DELETE' : 'GET',
      url: url.pathname + url.search,
      headers: Object.fromEntries(new Headers(init?.headers)),
      payload: typeof init?.body === 'string' ? init.body : undefined,
    });
    return new Response(res.statusCode === 204 ? null : res.body, {
      status: res.statusCode,
      headers: { 'content-type': String(res.headers['content-type'] ?? 'text/plain') },
    });
  };
}

describe('createDocumentClient', () => {
  let app: AppInstance;

  beforeAll(async () => {
    const config = loadConfig({ STORE_DRIVER: 'memory', RESOURCE_TYPES: 'films' });
    app = await buildApp(createContext(config, new MemoryDocumentStore()), { logger: false });
  });

  afterAll(async () => {
    await app.close();
  });

  const client = () =>
    createDocumentClient<Film>({ resourceType: 'films', namespace: 'example.org', baseUrl: BASE_URL, fetch: injectFetch(app) });

  it('allocates, writes, reads and removes a document', async () => {
    const films = client();
    const id = await films.allocate();
    expect(await films.get(id)).toBeNull();

    await films.put(id, { title: 'Alien', year: 1979 });
    expect(await films.get(id)).toEqual({ title: 'Alien', year: 1979 });

    await films.remove(id);
    await expect(films.get(id)).rejects.toMatchObject({ status: 404, code: 'not_found' });
  });

  it('creates in one call', async () => {
    const films = client();
    const id = await films.create({ title: 'Heat' });
    expect(await films.get(id)).toEqual({ title: 'Heat' });
  });

  it('surfaces the service error body', async () => {
    const films = client();
    const err = await films.put('00000000-0000-4000-8000-000000000000', { title: 'x' }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DocumentClientError);
    expect(err).toMatchObject({
      status: 404,
      code: 'not_found',
      message: '404 not_found: films 00000000-0000-4000-8000-000000000000 has not been allocated',
    });
  });

  it('builds paths from the namespace and resource type', async () => {
    const fetchMock = vi.fn(async () => new Response(JSON.stringify({ identifier: 'abc' }), { status: 200 }));
    const films = createDocumentClient<Film>({ resourceType: 'films', namespace: 'team-a', baseUrl: `${BASE_URL}/`, fetch: fetchMock });

    await films.allocate();
    expect(fetchMock).toHaveBeenCalledWith(`${BASE_URL}/api/v1/namespace/team-a/filmsLIST/`, { method: 'GET' });
  });

  it('falls back to the status text for non-JSON errors', async () => {
    const fetchMock = vi.fn(async () => new Response('gateway down', { status: 502, statusText: 'Bad Gateway' }));
    const films = createDocumentClient<Film>({ resourceType: 'films', fetch: fetchMock });

    await expect(films.allocate()).rejects.toMatchObject({ status: 502, code: 'http_error', message: '502 http_error: Bad Gateway' });
  });

  it('rejects a success answer without a string identifier', async () => {
    const fetchMock = vi.fn(async () => new Response(JSON.stringify({ identifier: 42 }), { status: 201 }));
    const films = createDocumentClient<Film>({ resourceType: 'films', fetch: fetchMock });

    await expect(films.create({ title: 'Ran' })).rejects.toMatchObject({
      status: 201,
      code: 'invalid_response',
      message: '201 invalid_response: response has no identifier',
    });
  });

  it('ignores error bodies that do not carry string fields', async () => {
    const fetchMock = vi.fn(async () => new Response(JSON.stringify({ error: 7 }), { status: 500, statusText: 'Internal Server Error' }));
    const films = createDocumentClient<Film>({ resourceType: 'films', fetch: fetchMock });

    await expect(films.remove('00000000-0000-4000-8000-000000000000')).rejects.toMatchObject({
      status: 500,
      code: 'http_error',
      message: '500 http_error: Internal Server Error',
    });
  });

  it('requires a resource type', () => {
    expect(() => createDocumentClient({ resourceType: ' ' })).toThrow('createDocumentClient: resourceType is required');
  });
});
