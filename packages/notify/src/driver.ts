import type { JsonObject } from '@alertline/core';
import type { NotificationMessage } from './message.js';

/**
 * Outcome of one send; drivers report failures here rather than throwing
 */
export interface DeliveryResult {
  success: boolean;
  messageId?: string;
  error?: string;
  metadata: JsonObject;
}

export interface NotifyDriver {
  readonly name: string;

  validateConfig(config: JsonObject): boolean;

  send(message: NotificationMessage, config: JsonObject): Promise<DeliveryResult>;
}
