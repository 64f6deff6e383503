import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import { createLogger, type Logger } from '@alertline/core';
import type { Runtime } from '@alertline/pipeline';
import { healthRoutes } from './routes/health.js';
import { alertRoutes } from './routes/alerts.js';
import { incidentRoutes } from './routes/incidents.js';
import { pipelineRoutes } from './routes/pipelines.js';

export interface ServerOptions {
  /** Request logger; `false` disables request logging (default: one built from the runtime config) */
  logger?: Logger | false;
}

/**
 * Build and configure the Fastify server
 */
export async function buildServer(runtime: Runtime, options: ServerOptions = {}): Promise<FastifyInstance> {
  const logger: FastifyBaseLogger | false =
    options.logger ??
    createLogger({
      level: runtime.config.logging.level,
      format: runtime.config.logging.format,
      name: 'alertline-api',
    });
  const server = logger === false ? Fastify({ logger: false }) : Fastify({ logger });

  // Register routes
  await server.register(healthRoutes, { db: runtime.db });
  await server.register(alertRoutes, {
    engine: runtime.engine,
    webhookSecret: runtime.config.api.webhookSecret,
  });
  await server.register(incidentRoutes, { db: runtime.db, incidents: runtime.incidents });
  await server.register(pipelineRoutes, { runtime });

  return server;
}
