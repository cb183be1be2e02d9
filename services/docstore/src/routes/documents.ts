import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { parseAddress } from '../addressing';
import type { AddressMethod } from '../addressing';
import { NotFoundError, RoutingError, StoreError, ValidationError } from '../errors';
import type { AppContext } from '../context';
import type { StoreCallOptions } from '../contracts/documentStore';
import type { Identifier, JsonText, ResourceAddress } from '../types';
import { withDeadline } from './deadline';

type Operation = 'allocate' | 'create' | 'read' | 'replace' | 'upsert' | 'delete';

// ---------- Body parsing ----------
// JSON bodies are checked for syntax and then kept as text; the store casts
// them to jsonb and nothing here interprets their shape.
function registerJsonTextParser(app: FastifyInstance) {
  app.removeContentTypeParser('application/json');
  app.addContentTypeParser(
    'application/json',
    { parseAs: 'string' },
    (_req: FastifyRequest, text: string, done: (err: Error | null, body?: unknown) => void) => {
      if (text.trim() === '') {
        done(null, undefined);
        return;
      }
      try {
        JSON.parse(text);
      } catch {
        done(new ValidationError('request body is not valid JSON'), undefined);
        return;
      }
      done(null, text);
    },
  );
}

function requireBody(req: FastifyRequest): JsonText {
  if (typeof req.body !== 'string') {
    throw new ValidationError('a JSON request body is required');
  }
  return req.body;
}

// ---------- Helper ----------
function identifierOf(address: ResourceAddress): Identifier | undefined {
  return address.key.kind === 'concrete' ? address.key.identifier : undefined;
}

// ---------- Routes ----------
export async function registerDocumentRoutes(app: FastifyInstance, ctx: AppContext) {
  const { store, scheme } = ctx;
  const { putPolicy } = ctx.config.api;
  const deadlineMs = ctx.config.http.writeTimeoutMs;

  registerJsonTextParser(app);

  /**
   * Runs one store call under the request deadline. Store failures are logged
   * with the address they concern and rethrown for the error handler.
   */
  async function call<T>(
    req: FastifyRequest,
    operation: Operation,
    address: ResourceAddress,
    run: (opts: StoreCallOptions) => Promise<T>,
  ): Promise<T> {
    try {
      return await withDeadline(deadlineMs, (signal) => run({ signal }));
    } catch (err) {
      if (err instanceof StoreError) {
        req.log.error(
          {
            err,
            operation,
            namespace: address.namespace,
            resourceType: address.resourceType,
            identifier: identifierOf(address),
          },
          'Document store operation failed',
        );
      }
      throw err;
    }
  }

  const handlers: Record<AddressMethod, (req: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply>> = {
    // Allocate an identifier, or read a document
    GET: async (req, reply) => {
      const address = parseAddress('GET', req.url, scheme);
      const { resourceType, key } = address;

      if (key.kind === 'allocate') {
        const identifier = await call(req, 'allocate', address, (opts) => store.allocate(resourceType, opts));
        return reply.send({ identifier });
      }

      const doc = await call(req, 'read', address, (opts) => store.get(resourceType, key.identifier, opts));
      if (!doc) throw new NotFoundError(`${resourceType} ${key.identifier} not found`);
      // reserved rows have no body yet and read back as JSON null
      return reply.type('application/json; charset=utf-8').send(doc.body ?? 'null');
    },

    // Create with a body in one step
    POST: async (req, reply) => {
      const address = parseAddress('POST', req.url, scheme);
      const body = requireBody(req);
      const identifier = await call(req, 'create', address, (opts) => store.create(address.resourceType, body, opts));
      return reply.code(201).send({ identifier });
    },

    // Replace the body of a reserved identifier
    PUT: async (req, reply) => {
      const address = parseAddress('PUT', req.url, scheme);
      const { resourceType, key } = address;
      if (key.kind !== 'concrete') throw new RoutingError('PUT requires a concrete identifier');
      const body = requireBody(req);

      if (putPolicy === 'create') {
        const inserted = await call(req, 'upsert', address, (opts) => store.upsert(resourceType, key.identifier, body, opts));
        return reply.code(inserted ? 201 : 200).send({ identifier: key.identifier });
      }

      const replaced = await call(req, 'replace', address, (opts) => store.replace(resourceType, key.identifier, body, opts));
      if (!replaced) throw new NotFoundError(`${resourceType} ${key.identifier} has not been allocated`);
      return reply.send({ identifier: key.identifier });
    },

    DELETE: async (req, reply) => {
      const address = parseAddress('DELETE', req.url, scheme);
      const { resourceType, key } = address;
      if (key.kind !== 'concrete') throw new RoutingError('DELETE requires a concrete identifier');

      const deleted = await call(req, 'delete', address, (opts) => store.delete(resourceType, key.identifier, opts));
      if (!deleted) throw new NotFoundError(`${resourceType} ${key.identifier} not found`);
      return reply.code(204).send();
    },
  };

  const url = `${scheme.version}/*`;
  // allocation writes a row, so GET must not be reachable through HEAD
  app.get(url, { exposeHeadRoute: false }, handlers.GET);
  app.post(url, handlers.POST);
  app.put(url, handlers.PUT);
  app.delete(url, handlers.DELETE);
}
