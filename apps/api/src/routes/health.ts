import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { errorMessage } from '@alertline/core';
import type { Db } from '@alertline/store';

interface HealthResponse {
  status: 'ok' | 'degraded' | 'error';
  timestamp: string;
  version: string;
  uptime: number;
  error?: string;
}

export async function healthRoutes(fastify: FastifyInstance, opts: { db: Db }): Promise<void> {
  const startTime = Date.now();

  const respond = (status: HealthResponse['status'], error?: string): HealthResponse => ({
    status,
    timestamp: new Date().toISOString(),
    version: '0.1.0',
    uptime: Math.floor((Date.now() - startTime) / 1000),
    ...(error !== undefined && { error }),
  });

  /**
   * GET /health
   *
   * Liveness check - returns 200 if the service is running
   */
  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.send(respond('ok'));
  });

  /**
   * GET /health/ready
   *
   * Readiness check - the database must answer a query
   */
  fastify.get('/health/ready', async (_request: FastifyRequest, reply: FastifyReply) => {
    try {
      opts.db.prepare('SELECT 1').get();
      return reply.send(respond('ok'));
    } catch (error) {
      return reply.status(503).send(respond('error', errorMessage(error)));
    }
  });
}
