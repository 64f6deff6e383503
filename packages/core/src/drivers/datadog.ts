import {
  createNormalizedAlert,
  createNormalizedPayload,
  type AlertSeverity,
  type NormalizedPayload,
} from '../alert.js';
import { asString, hasKey, isRecord, parseTags, type JsonObject } from '../json.js';
import { parseTimestamp } from '../time.js';
import { BaseSourceDriver } from './driver.js';

const RESOLVED_TRANSITIONS = new Set(['recovered', 'resolved']);
const RESOLVED_STATUSES = new Set(['ok', 'recovered']);
const CRITICAL_PRIORITIES = new Set(['p1', 'high', 'critical']);
const INFO_PRIORITIES = new Set(['p3', 'p4', 'low', 'info']);

function datadogSeverity(alertType: string, priority: string): AlertSeverity {
  if (alertType === 'error' || CRITICAL_PRIORITIES.has(priority)) return 'critical';
  if (INFO_PRIORITIES.has(priority)) return 'info';
  return 'warning';
}

/**
 * Datadog webhook integration (one alert per delivery, `tags` as "k:v" list)
 */
export class DatadogDriver extends BaseSourceDriver {
  readonly name = 'datadog';

  protected matches(payload: JsonObject): boolean {
    if (isRecord(payload.org)) return true;
    return ['alert_id', 'alert_status', 'alert_type', 'alert_transition'].some((key) =>
      hasKey(payload, key)
    );
  }

  protected parseRecord(payload: JsonObject): NormalizedPayload {
    const name = asString(payload.alert_title) || asString(payload.title) || 'Datadog Alert';

    const transition = asString(payload.alert_transition).toLowerCase();
    const alertStatus = asString(payload.alert_status).toLowerCase();
    const status =
      RESOLVED_TRANSITIONS.has(transition) || RESOLVED_STATUSES.has(alertStatus)
        ? 'resolved'
        : 'firing';

    const severity = datadogSeverity(
      asString(payload.alert_type).toLowerCase(),
      asString(payload.priority).toLowerCase(),
    );

    const labels: Record<string, string> = { alertname: name, ...parseTags(payload.tags) };
    const hostname = asString(payload.hostname);
    if (hostname) labels.hostname = hostname;
    const metric = asString(payload.alert_metric);
    if (metric) labels.metric = metric;
    const alertId = asString(payload.alert_id);
    if (alertId) labels.alert_id = alertId;

    const fingerprint = alertId || asString(payload.id) || this.generateFingerprint(labels, name);
    const url = asString(payload.url);

    const alert = createNormalizedAlert({
      fingerprint,
      name,
      status,
      severity,
      description: asString(payload.event_msg) || asString(payload.body),
      labels,
      annotations: { url },
      startedAt: parseTimestamp(payload.last_updated),
      rawPayload: payload,
    });

    return createNormalizedPayload(this.name, [alert], { externalUrl: url, rawPayload: payload });
  }
}
