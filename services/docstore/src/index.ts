import { loadConfig } from './config';
import { createAppContext } from './context';
import { buildApp } from './server';

/**
 * Main entrypoint for the document service.
 * Builds the context once, starts Fastify and closes it (and the store) on SIGINT/SIGTERM.
 */
async function main() {
  const config = loadConfig();
  const ctx = await createAppContext(config);
  const app = await buildApp(ctx);

  let closing = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (closing) return;
    closing = true;
    app.log.info({ signal }, 'Shutting down');

    const forced = setTimeout(() => {
      app.log.error('Shutdown timed out, exiting');
      process.exit(1);
    }, config.http.shutdownTimeoutMs);
    forced.unref();

    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error({ err }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  // --- Start server ---
  try {
    await app.listen({ port: config.http.port, host: config.http.host });
    app.log.info(
      { storeDriver: config.storeDriver, resourceTypes: config.api.resourceTypes, putPolicy: config.api.putPolicy },
      `Document service listening on http://${config.http.host}:${config.http.port}${config.api.version}`,
    );
  } catch (err) {
    app.log.error({ err }, 'Server startup failed');
    await app.close();
    process.exit(1);
  }
}

// run
main().catch((err) => {
  // last-resort catch for any uncaught promise
  console.error('Fatal error starting document service:', err);
  process.exit(1);
});
