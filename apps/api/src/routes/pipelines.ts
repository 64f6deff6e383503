import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { PipelineDefinitionError, parseDefinition, type PipelineDefinition, type Runtime } from '@alertline/pipeline';
import { getPipelineRun, listPipelineRuns } from '@alertline/store';

const runBodySchema = z.object({
  definition: z.unknown(),
  payload: z.record(z.unknown()).default({}),
  source: z.string().min(1).optional(),
  environment: z.string().min(1).optional(),
});

const runsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

export async function pipelineRoutes(fastify: FastifyInstance, opts: { runtime: Runtime }): Promise<void> {
  const { runtime } = opts;

  /**
   * POST /pipelines/run
   *
   * Validates the definition against the registered node types, then runs it
   * synchronously and returns every node's result.
   */
  fastify.post('/pipelines/run', async (request, reply) => {
    const body = runBodySchema.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send({
        success: false,
        error: body.error.errors.map((e) => `${e.path.join('.') || 'body'}: ${e.message}`).join('; '),
      });
    }

    let definition: PipelineDefinition;
    try {
      definition = parseDefinition(body.data.definition, runtime.nodes);
    } catch (error) {
      if (error instanceof PipelineDefinitionError) {
        return reply.status(400).send({ success: false, error: error.message, problems: error.problems });
      }
      throw error;
    }

    const result = await runtime.executor.run(definition, {
      payload: body.data.payload,
      source: body.data.source,
      environment: body.data.environment ?? runtime.config.nodeEnv,
    });

    return reply.send({ success: result.status === 'completed', ...result });
  });

  /**
   * GET /pipelines/runs?limit=
   */
  fastify.get('/pipelines/runs', async (request, reply) => {
    const query = runsQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.status(400).send({ success: false, error: query.error.errors[0]?.message ?? 'Invalid query' });
    }
    return reply.send({ runs: listPipelineRuns(runtime.db, query.data.limit) });
  });

  fastify.get<{ Params: { runId: string } }>('/pipelines/runs/:runId', async (request, reply) => {
    const run = getPipelineRun(runtime.db, request.params.runId);
    if (!run) {
      return reply.status(404).send({ success: false, error: `Pipeline run ${request.params.runId} not found` });
    }
    return reply.send(run);
  });
}
