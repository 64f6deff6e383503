import { z } from 'zod';
import { isRecord, silentLogger, type JsonObject, type Logger } from '@alertline/core';
import type { DeliveryResult, NotifyDriver } from '../driver.js';
import { sendRequest, requestFailure, httpFailure } from '../http.js';
import type { NotificationMessage } from '../message.js';
import { DELIVERY_ID_HEADER, SIGNATURE_HEADER, formatSignatureHeader, generateDeliveryId } from '../signing.js';

export const webhookConfigSchema = z.object({
  url: z.string().regex(/^https?:\/\//, 'must be an http(s) URL'),
  method: z.enum(['POST', 'PUT', 'PATCH']).default('POST'),
  headers: z.record(z.string()).default({}),
  /** Per-channel signing secret; overrides the driver-wide one */
  secret: z.string().min(32, 'must be at least 32 characters').optional(),
  timeoutMs: z.number().int().positive().optional(),
  /** JSON body with `{title}`, `{message}`, `{severity}` and `{channel}` placeholders */
  payloadTemplate: z.unknown().optional(),
});

export type WebhookChannelConfig = z.infer<typeof webhookConfigSchema>;

export interface WebhookDriverOptions {
  /** Request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
  /** Signs every request that has no per-channel secret */
  signingSecret?: string;
  logger?: Logger;
}

/**
 * `endpoint` is accepted as an alias of `url`
 */
function parseConfig(config: JsonObject) {
  const candidate = config['url'] === undefined ? { ...config, url: config['endpoint'] } : config;
  return webhookConfigSchema.safeParse(candidate);
}

/**
 * Substitute message fields into every string of a template
 */
export function applyTemplate(template: unknown, message: NotificationMessage): unknown {
  if (typeof template === 'string') {
    return template
      .replaceAll('{title}', message.title)
      .replaceAll('{message}', message.message)
      .replaceAll('{severity}', message.severity)
      .replaceAll('{channel}', message.channel);
  }
  if (Array.isArray(template)) {
    return template.map((entry) => applyTemplate(entry, message));
  }
  if (isRecord(template)) {
    return Object.fromEntries(Object.entries(template).map(([key, value]) => [key, applyTemplate(value, message)]));
  }
  return template;
}

/**
 * Generic JSON webhook. One attempt per send; failures are reported, not retried.
 */
export class WebhookNotifyDriver implements NotifyDriver {
  readonly name = 'webhook';
  private readonly timeoutMs: number;
  private readonly signingSecret: string | undefined;
  private readonly logger: Logger;

  constructor(options: WebhookDriverOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.signingSecret = options.signingSecret;
    this.logger = options.logger ?? silentLogger();
  }

  validateConfig(config: JsonObject): boolean {
    return parseConfig(config).success;
  }

  async send(message: NotificationMessage, config: JsonObject): Promise<DeliveryResult> {
    const parsed = parseConfig(config);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      return { success: false, error: `Invalid webhook configuration: ${issues.join('; ')}`, metadata: {} };
    }

    const channel = parsed.data;
    const deliveryId = generateDeliveryId();
    const payload =
      channel.payloadTemplate === undefined
        ? {
            deliveryId,
            title: message.title,
            message: message.message,
            severity: message.severity,
            channel: message.channel,
            tags: message.tags,
            context: message.context,
          }
        : applyTemplate(channel.payloadTemplate, message);
    const body = JSON.stringify(payload);

    const secret = channel.secret ?? this.signingSecret;
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      [DELIVERY_ID_HEADER]: deliveryId,
      ...channel.headers,
    };
    if (secret) {
      headers[SIGNATURE_HEADER] = formatSignatureHeader(body, secret);
    }

    const metadata: JsonObject = { url: channel.url, method: channel.method, signed: secret !== undefined };

    try {
      const response = await sendRequest(channel.url, {
        method: channel.method,
        headers,
        body,
        timeoutMs: channel.timeoutMs ?? this.timeoutMs,
      });
      metadata['statusCode'] = response.status;

      if (!response.ok) {
        this.logger.warn({ url: channel.url, status: response.status, deliveryId }, 'Webhook delivery rejected');
        return { success: false, error: httpFailure(response), metadata };
      }

      this.logger.info({ url: channel.url, status: response.status, deliveryId }, 'Webhook delivered');
      return { success: true, messageId: deliveryId, metadata };
    } catch (error) {
      const reason = requestFailure(error);
      this.logger.warn({ url: channel.url, deliveryId, error: reason }, 'Webhook delivery failed');
      return { success: false, error: reason, metadata };
    }
  }
}
