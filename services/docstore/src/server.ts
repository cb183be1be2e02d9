import Fastify from 'fastify';
import type { FastifyServerOptions } from 'fastify';
import type { AppContext } from './context';
import { classifyError, StoreError } from './errors';
import { registerDocumentRoutes } from './routes/documents';

export interface BuildAppOptions {
  logger?: FastifyServerOptions['logger'];
}

/** Pino options derived from the HTTP config: level, and a file when HTTP_LOG is set. */
export function loggerOptions(ctx: AppContext): FastifyServerOptions['logger'] {
  const { logLevel, logPath } = ctx.config.http;
  if (!logPath) return { level: logLevel };
  return {
    level: logLevel,
    transport: { target: 'pino/file', options: { destination: logPath, mkdir: true } },
  };
}

export async function buildApp(ctx: AppContext, opts: BuildAppOptions = {}) {
  const app = Fastify({
    logger: opts.logger ?? loggerOptions(ctx),
    requestTimeout: ctx.config.http.readTimeoutMs,
  });

  app.setErrorHandler((err, req, reply) => {
    const { statusCode, body } = classifyError(err);
    if (statusCode >= 500 && !(err instanceof StoreError)) {
      req.log.error({ err }, 'Unhandled request error');
    }
    return reply.code(statusCode).send(body);
  });

  app.setNotFoundHandler((req, reply) => {
    return reply.code(404).send({ error: 'not_found', detail: `no route for ${req.method} ${req.url}` });
  });

  app.get('/health', async () => {
    try {
      await ctx.store.ping();
      return { status: 'ok', store: 'ok' };
    } catch (err) {
      app.log.error({ err }, 'Store health check failed');
      return { status: 'degraded', store: 'error' };
    }
  });

  app.addHook('onClose', async () => {
    await ctx.store.close();
  });

  await registerDocumentRoutes(app, ctx);
  return app;
}
