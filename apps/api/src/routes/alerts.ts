import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { errorMessage, isRecord } from '@alertline/core';
import type { AlertLifecycleEngine } from '@alertline/lifecycle';
import { SIGNATURE_HEADER, verifySignature } from '@alertline/notify';

export interface AlertRoutesOptions {
  engine: AlertLifecycleEngine;
  /** When set, every webhook must carry a valid signature header */
  webhookSecret?: string;
}

/**
 * JSON body together with the exact bytes it was parsed from
 */
interface SignedBody {
  raw: string;
  json: unknown;
}

function isSignedBody(value: unknown): value is SignedBody {
  return isRecord(value) && typeof value['raw'] === 'string' && 'json' in value;
}

/**
 * Register webhook intake routes
 */
export async function alertRoutes(fastify: FastifyInstance, opts: AlertRoutesOptions): Promise<void> {
  // Signatures cover the raw body, so keep it next to the parsed value
  fastify.addContentTypeParser('application/json', { parseAs: 'string' }, (_request, body, done) => {
    const raw = body.toString();
    try {
      done(null, { raw, json: raw.trim() === '' ? {} : JSON.parse(raw) });
    } catch (error) {
      done(Object.assign(new Error(`Invalid JSON body: ${errorMessage(error)}`), { statusCode: 400 }), undefined);
    }
  });

  const handle = async (
    request: FastifyRequest<{ Params: { driver?: string } }>,
    reply: FastifyReply,
  ): Promise<FastifyReply> => {
    const body = isSignedBody(request.body) ? request.body : { raw: '', json: undefined };

    if (opts.webhookSecret) {
      const header = request.headers[SIGNATURE_HEADER.toLowerCase()];
      if (typeof header !== 'string') {
        return reply.status(401).send({ success: false, error: `Missing ${SIGNATURE_HEADER} header` });
      }
      const check = verifySignature(body.raw, header, opts.webhookSecret);
      if (!check.valid) {
        request.log.warn({ error: check.error }, 'Webhook signature rejected');
        return reply.status(401).send({ success: false, error: check.error });
      }
    }

    const driver = request.params.driver;
    const result = opts.engine.processWebhook(body.json, driver);

    if (result.rejection) {
      request.log.warn({ driver, code: result.rejection.code }, 'Webhook rejected');
      return reply.status(400).send({
        success: false,
        code: result.rejection.code,
        error: result.rejection.message,
        ...result.toJSON(),
      });
    }

    request.log.info({ driver, processed: result.totalProcessed, errors: result.errors.length }, 'Webhook processed');
    return reply.send({ success: !result.hasErrors, ...result.toJSON() });
  };

  /**
   * POST /alerts/webhook
   *
   * Ingest a webhook, detecting the source from its shape
   */
  fastify.post<{ Params: { driver?: string } }>('/alerts/webhook', handle);

  /**
   * POST /alerts/webhook/:driver
   *
   * Ingest a webhook with an explicit source driver
   */
  fastify.post<{ Params: { driver?: string } }>('/alerts/webhook/:driver', handle);
}
