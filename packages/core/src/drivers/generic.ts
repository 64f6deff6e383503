import {
  createNormalizedAlert,
  createNormalizedPayload,
  isAlertSeverity,
  type AlertSeverity,
  type NormalizedAlert,
  type NormalizedPayload,
} from '../alert.js';
import { asArray, asRecord, asString, firstString, hasKey, isRecord, toStringMap, type JsonObject } from '../json.js';
import { parseTimestamp } from '../time.js';
import { BaseSourceDriver } from './driver.js';

const NAME_KEYS = ['name', 'alert_name', 'title', 'alertname'] as const;
const RESOLVED_STATES = new Set(['ok', 'resolved', 'normal']);

function inferStatus(alertData: JsonObject): string {
  const rawStatus = alertData.status;
  const rawState = alertData.state;
  const status =
    rawStatus === undefined || rawStatus === null
      ? asString(rawState, 'firing').toLowerCase()
      : asString(rawStatus, 'firing').toLowerCase() || 'firing';

  if (status === 'firing' || status === 'resolved') return status;
  return RESOLVED_STATES.has(asString(rawState).toLowerCase()) ? 'resolved' : 'firing';
}

function inferSeverity(alertData: JsonObject): AlertSeverity {
  const rawSeverity = alertData.severity;
  const priority = asString(alertData.priority).toLowerCase();
  const level = asString(alertData.level).toLowerCase();

  const severity =
    (rawSeverity === undefined || rawSeverity === null) && priority
      ? priority
      : asString(rawSeverity, 'warning').toLowerCase() || 'warning';
  if (isAlertSeverity(severity)) return severity;

  if (['high', 'critical', 'p1'].includes(priority) || ['error', 'critical'].includes(level)) {
    return 'critical';
  }
  if (['low', 'p3', 'p4'].includes(priority) || ['info', 'debug'].includes(level)) {
    return 'info';
  }
  return 'warning';
}

/**
 * Catch-all driver for custom integrations.
 *
 * Accepts `{ alerts: [...], source }` or a single flat alert object and
 * tolerates the common field-name variants (`status`/`state`,
 * `severity`/`priority`/`level`, `started_at`/`startsAt`/`timestamp`).
 */
export class GenericDriver extends BaseSourceDriver {
  readonly name = 'generic';

  protected matches(payload: JsonObject): boolean {
    return Array.isArray(payload.alerts) || NAME_KEYS.some((key) => hasKey(payload, key));
  }

  protected parseRecord(payload: JsonObject): NormalizedPayload {
    const alerts = Array.isArray(payload.alerts)
      ? asArray(payload.alerts).filter(isRecord).map((entry) => this.parseAlert(entry))
      : [this.parseAlert(payload)];

    return createNormalizedPayload(asString(payload.source) || this.name, alerts, {
      version: asString(payload.version),
      groupKey: firstString(payload, ['group_key', 'groupKey']),
      receiver: asString(payload.receiver),
      externalUrl: asString(payload.external_url),
      rawPayload: payload,
    });
  }

  private parseAlert(alertData: JsonObject): NormalizedAlert {
    const name = firstString(alertData, NAME_KEYS, 'Unknown Alert');
    const labels = toStringMap(alertData.labels);
    const status = inferStatus(alertData);

    const endedAt =
      status === 'resolved'
        ? parseTimestamp(alertData.ended_at ?? alertData.endsAt ?? alertData.resolved_at)
        : null;

    return createNormalizedAlert({
      fingerprint: asString(alertData.fingerprint) || this.generateFingerprint(labels, name),
      name,
      status,
      severity: inferSeverity(alertData),
      description: firstString(alertData, ['description', 'message', 'summary', 'text']),
      labels,
      annotations: toStringMap(asRecord(alertData.annotations)),
      startedAt: parseTimestamp(
        alertData.started_at ?? alertData.startsAt ?? alertData.timestamp ?? alertData.time,
      ),
      endedAt,
      rawPayload: alertData,
    });
  }
}
