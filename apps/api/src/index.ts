import { createLogger, errorMessage } from '@alertline/core';
import { createRuntime } from '@alertline/pipeline';
import { initDb } from '@alertline/store';
import { getConfig } from './lib/config.js';
import { buildServer } from './server.js';

/**
 * Start the server
 */
async function start(): Promise<void> {
  const config = getConfig();
  const logger = createLogger({ level: config.logging.level, format: config.logging.format, name: 'alertline-api' });
  const db = initDb(config.store.dbPath);
  const runtime = createRuntime(config, db, logger);
  const server = await buildServer(runtime, { logger });

  server.addHook('onClose', async () => {
    db.close();
  });

  try {
    await server.listen({
      port: config.api.port,
      host: config.api.host,
    });

    server.log.info(
      {
        port: config.api.port,
        host: config.api.host,
        signedWebhooks: config.api.webhookSecret !== undefined,
        drivers: runtime.engine.drivers.getNames(),
      },
      'Alertline API started',
    );
  } catch (err) {
    logger.error({ error: errorMessage(err) }, 'Failed to start API server');
    process.exit(1);
  }
}

start().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exit(1);
});
