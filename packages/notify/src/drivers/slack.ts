import { z } from 'zod';
import { asString, silentLogger, type JsonObject, type Logger } from '@alertline/core';
import type { DeliveryResult, NotifyDriver } from '../driver.js';
import { httpFailure, requestFailure, sendRequest } from '../http.js';
import type { NotificationMessage, NotifySeverity } from '../message.js';
import { generateDeliveryId } from '../signing.js';

export const slackConfigSchema = z.object({
  webhookUrl: z.string().startsWith('https://hooks.slack.com/', 'must be a Slack incoming webhook URL'),
  channel: z.string().optional(),
  username: z.string().optional(),
  iconEmoji: z.string().optional(),
  timeoutMs: z.number().int().positive().optional(),
});

export type SlackChannelConfig = z.infer<typeof slackConfigSchema>;

const COLORS: Readonly<Record<NotifySeverity, string>> = {
  critical: '#dc3545',
  warning: '#ffc107',
  info: '#17a2b8',
  success: '#28a745',
};

const EMOJI: Readonly<Record<NotifySeverity, string>> = {
  critical: ':rotating_light:',
  warning: ':warning:',
  info: ':information_source:',
  success: ':white_check_mark:',
};

// Slack rejects section text longer than this
const SECTION_LIMIT = 3000;

function fieldTitle(key: string): string {
  return key
    .split('_')
    .filter((word) => word !== '')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

function fieldValue(value: unknown): string {
  return typeof value === 'object' && value !== null ? JSON.stringify(value) : asString(value);
}

/**
 * Incoming-webhook payload: block layout plus a colored attachment for tags and context
 */
export function buildSlackPayload(message: NotificationMessage, config: SlackChannelConfig): JsonObject {
  const heading = `${EMOJI[message.severity]} ${message.title}`;
  const fields = [...Object.entries(message.tags), ...Object.entries(message.context)].map(([key, value]) => ({
    title: fieldTitle(key),
    value: fieldValue(value),
    short: true,
  }));

  const payload: JsonObject = {
    text: heading,
    blocks: [
      { type: 'header', text: { type: 'plain_text', text: heading.slice(0, 150) } },
      { type: 'section', text: { type: 'mrkdwn', text: message.message.slice(0, SECTION_LIMIT) || ' ' } },
      { type: 'context', elements: [{ type: 'mrkdwn', text: `Severity: *${message.severity.toUpperCase()}*` }] },
    ],
    attachments: [{ color: COLORS[message.severity], fields }],
  };

  const channel = config.channel ?? (message.channel !== 'default' ? message.channel : undefined);
  if (channel) payload['channel'] = channel;
  if (config.username) payload['username'] = config.username;
  if (config.iconEmoji) payload['icon_emoji'] = config.iconEmoji;

  return payload;
}

export class SlackNotifyDriver implements NotifyDriver {
  readonly name = 'slack';
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: { timeoutMs?: number; logger?: Logger } = {}) {
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.logger = options.logger ?? silentLogger();
  }

  validateConfig(config: JsonObject): boolean {
    return slackConfigSchema.safeParse(config).success;
  }

  async send(message: NotificationMessage, config: JsonObject): Promise<DeliveryResult> {
    const parsed = slackConfigSchema.safeParse(config);
    if (!parsed.success) {
      return { success: false, error: 'Invalid Slack configuration (webhookUrl required)', metadata: {} };
    }

    const payload = buildSlackPayload(message, parsed.data);
    const metadata: JsonObject = { channel: asString(payload['channel'], 'default') };

    try {
      const response = await sendRequest(parsed.data.webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        timeoutMs: parsed.data.timeoutMs ?? this.timeoutMs,
      });
      metadata['statusCode'] = response.status;

      if (!response.ok) {
        this.logger.warn({ status: response.status }, 'Slack delivery rejected');
        return { success: false, error: httpFailure(response), metadata };
      }

      const messageId = `slack_${generateDeliveryId()}`;
      this.logger.info({ messageId }, 'Slack notification sent');
      return { success: true, messageId, metadata };
    } catch (error) {
      const reason = requestFailure(error);
      this.logger.warn({ error: reason }, 'Slack delivery failed');
      return { success: false, error: reason, metadata };
    }
  }
}
