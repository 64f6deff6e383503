import type { JsonObject } from '@alertline/core';

export const NOTIFY_SEVERITIES = ['critical', 'warning', 'info', 'success'] as const;
export type NotifySeverity = (typeof NOTIFY_SEVERITIES)[number];

/**
 * Outbound message every notify driver understands
 */
export interface NotificationMessage {
  title: string;
  /** Markdown body */
  message: string;
  severity: NotifySeverity;
  /** Routing hint; drivers may override it from their own config */
  channel: string;
  tags: Record<string, string>;
  context: JsonObject;
}

export interface NotificationMessageInput {
  title: string;
  message: string;
  severity?: string;
  channel?: string;
  tags?: Record<string, string>;
  context?: JsonObject;
}

export function isNotifySeverity(value: string): value is NotifySeverity {
  return NOTIFY_SEVERITIES.some((severity) => severity === value);
}

/**
 * Build a message; unrecognized severities become info
 */
export function createNotificationMessage(input: NotificationMessageInput): NotificationMessage {
  const severity = (input.severity ?? '').toLowerCase();
  return {
    title: input.title,
    message: input.message,
    severity: isNotifySeverity(severity) ? severity : 'info',
    channel: input.channel ?? 'default',
    tags: input.tags ?? {},
    context: input.context ?? {},
  };
}
