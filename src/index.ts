import { loadConfig } from './infrastructure/index.js';
import { buildServer } from './server.js';

/**
 * Process entry point: load config, build the app, listen, and close
 * plugins (db pool, S3 client) on SIGINT / SIGTERM.
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const fastify = await buildServer(config);

  let closing = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (closing) return;
    closing = true;
    fastify.log.info({ signal }, 'Shutting down...');

    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await fastify.listen({
    host: config.server.host,
    port: config.server.port,
  });
}

main().catch((err: unknown) => {

  console.error(
    'Fatal: failed to start server',
    err,
  );

  process.exit(1);

});
