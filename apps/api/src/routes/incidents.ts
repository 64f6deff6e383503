import type { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';
import { IncidentNotFoundError, InvalidTransitionError, errorMessage } from '@alertline/core';
import type { IncidentManager } from '@alertline/lifecycle';
import { INCIDENT_STATUSES, listIncidents, type Db } from '@alertline/store';

const idParamsSchema = z.object({ id: z.coerce.number().int().positive() });

const listQuerySchema = z.object({
  status: z.enum(INCIDENT_STATUSES).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

const acknowledgeBodySchema = z.object({ by: z.string().default('') }).default({});
const resolveBodySchema = z.object({ summary: z.string().default(''), by: z.string().default('') }).default({});
const noteBodySchema = z.object({ text: z.string().min(1), author: z.string().default('') });

/**
 * Map incident errors onto HTTP statuses
 */
function sendError(reply: FastifyReply, error: unknown): FastifyReply {
  if (error instanceof IncidentNotFoundError) {
    return reply.status(404).send({ success: false, code: error.code, error: error.message });
  }
  if (error instanceof InvalidTransitionError) {
    return reply.status(409).send({ success: false, code: error.code, error: error.message });
  }
  if (error instanceof z.ZodError) {
    return reply.status(400).send({
      success: false,
      error: error.errors.map((e) => `${e.path.join('.') || 'body'}: ${e.message}`).join('; '),
    });
  }
  throw error;
}

export async function incidentRoutes(
  fastify: FastifyInstance,
  opts: { db: Db; incidents: IncidentManager },
): Promise<void> {
  /**
   * GET /incidents?status=&limit=
   */
  fastify.get('/incidents', async (request, reply) => {
    try {
      const query = listQuerySchema.parse(request.query);
      const incidents = listIncidents(opts.db, {
        ...(query.status ? { statuses: [query.status] } : {}),
        limit: query.limit,
      });
      return reply.send({ incidents });
    } catch (error) {
      return sendError(reply, error);
    }
  });

  /**
   * GET /incidents/:id
   *
   * Incident with its alerts and their history
   */
  fastify.get('/incidents/:id', async (request, reply) => {
    try {
      const { id } = idParamsSchema.parse(request.params);
      return reply.send(opts.incidents.getIncidentWithAlerts(id));
    } catch (error) {
      return sendError(reply, error);
    }
  });

  fastify.post('/incidents/:id/acknowledge', async (request, reply) => {
    try {
      const { id } = idParamsSchema.parse(request.params);
      const { by } = acknowledgeBodySchema.parse(request.body ?? undefined);
      return reply.send({ success: true, incident: opts.incidents.acknowledge(id, by) });
    } catch (error) {
      return sendError(reply, error);
    }
  });

  fastify.post('/incidents/:id/resolve', async (request, reply) => {
    try {
      const { id } = idParamsSchema.parse(request.params);
      const { summary, by } = resolveBodySchema.parse(request.body ?? undefined);
      return reply.send({ success: true, incident: opts.incidents.resolve(id, summary, by) });
    } catch (error) {
      return sendError(reply, error);
    }
  });

  fastify.post('/incidents/:id/close', async (request, reply) => {
    try {
      const { id } = idParamsSchema.parse(request.params);
      return reply.send({ success: true, incident: opts.incidents.close(id) });
    } catch (error) {
      return sendError(reply, error);
    }
  });

  fastify.post('/incidents/:id/notes', async (request, reply) => {
    try {
      const { id } = idParamsSchema.parse(request.params);
      const { text, author } = noteBodySchema.parse(request.body);
      return reply.send({ success: true, incident: opts.incidents.addNote(id, text, author) });
    } catch (error) {
      fastify.log.debug({ error: errorMessage(error) }, 'Note rejected');
      return sendError(reply, error);
    }
  });
}
