import {
  createNormalizedAlert,
  createNormalizedPayload,
  type AlertSeverity,
  type NormalizedPayload,
} from '../alert.js';
import { asRecord, asString, hasKey, parseTags, type JsonObject } from '../json.js';
import { parseTimestamp } from '../time.js';
import { BaseSourceDriver } from './driver.js';

const RESOLVING_ACTIONS = new Set(['close', 'acknowledge', 'ack', 'resolve', 'delete']);

const PRIORITY_SEVERITY: Readonly<Record<string, AlertSeverity>> = {
  P1: 'critical',
  P2: 'critical',
  P3: 'warning',
  P4: 'info',
  P5: 'info',
};

/**
 * Map an OpsGenie priority tier onto a severity; unknown tiers are warnings
 */
export function opsgeniePrioritySeverity(priority: string): AlertSeverity {
  return PRIORITY_SEVERITY[priority.toUpperCase()] ?? 'warning';
}

/**
 * OpsGenie outgoing webhooks (`{ action, alert: {...}, integrationId, ... }`)
 */
export class OpsgenieDriver extends BaseSourceDriver {
  readonly name = 'opsgenie';

  protected matches(payload: JsonObject): boolean {
    if (hasKey(payload, 'alert') && hasKey(payload, 'action')) {
      const alert = asRecord(payload.alert);
      return hasKey(alert, 'alertId') || hasKey(alert, 'tinyId');
    }
    return hasKey(payload, 'integrationId') && hasKey(payload, 'integrationName');
  }

  protected parseRecord(payload: JsonObject): NormalizedPayload {
    const alertData = asRecord(payload.alert);
    const action = asString(payload.action).toLowerCase();
    const name = asString(alertData.message) || 'OpsGenie Alert';
    const priority = asString(alertData.priority, 'P3').toUpperCase();

    const labels: Record<string, string> = {
      alertname: name,
      ...parseTags(alertData.tags, (tag) => `tag_${tag}`),
      alert_id: asString(alertData.alertId),
      tiny_id: asString(alertData.tinyId),
      priority,
    };
    for (const key of ['entity', 'alias', 'team', 'source'] as const) {
      const value = asString(alertData[key]);
      if (value) labels[key] = value;
    }

    const fingerprint =
      asString(alertData.alertId) ||
      asString(alertData.alias) ||
      this.generateFingerprint(labels, name);

    const alert = createNormalizedAlert({
      fingerprint,
      name,
      status: RESOLVING_ACTIONS.has(action) ? 'resolved' : 'firing',
      severity: opsgeniePrioritySeverity(priority),
      description: asString(alertData.description),
      labels,
      annotations: { action, username: asString(alertData.username) },
      startedAt: parseTimestamp(alertData.createdAt),
      rawPayload: payload,
    });

    return createNormalizedPayload(this.name, [alert], { rawPayload: payload });
  }
}
