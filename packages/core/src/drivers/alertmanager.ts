import {
  createNormalizedAlert,
  createNormalizedPayload,
  type NormalizedAlert,
  type NormalizedPayload,
} from '../alert.js';
import { asArray, asRecord, asString, hasKey, toStringMap, type JsonObject } from '../json.js';
import { parseOptionalTimestamp, parseTimestamp } from '../time.js';
import { BaseSourceDriver } from './driver.js';

/**
 * Firing alerts carry a placeholder `endsAt`: either the zero time or a date
 * far in the future. Anything past next calendar year, or before the epoch,
 * counts as "no end yet".
 */
export function effectiveEndsAt(endsAt: Date | null, now: Date = new Date()): Date | null {
  if (endsAt === null || endsAt.getTime() <= 0) return null;
  return endsAt.getUTCFullYear() > now.getUTCFullYear() + 1 ? null : endsAt;
}

/**
 * Parse one entry of a Prometheus-style `alerts` array (AlertManager and
 * Grafana unified alerting share this shape).
 */
export function parsePrometheusStyleAlert(
  driver: BaseSourceDriver,
  alertData: JsonObject,
  fallbackDescription = '',
): NormalizedAlert {
  const labels = toStringMap(alertData.labels);
  const annotations = toStringMap(alertData.annotations);
  const name = labels.alertname || asString(alertData.alertname) || 'Unknown Alert';

  const fingerprint = asString(alertData.fingerprint) || driver.generateFingerprint(labels, name);

  return createNormalizedAlert({
    fingerprint,
    name,
    status: asString(alertData.status, 'firing'),
    severity: labels.severity ?? 'warning',
    description: annotations.description || annotations.summary || fallbackDescription,
    labels,
    annotations,
    startedAt: parseTimestamp(alertData.startsAt),
    endedAt: effectiveEndsAt(parseOptionalTimestamp(alertData.endsAt)),
    rawPayload: alertData,
  });
}

/**
 * Prometheus AlertManager webhook receiver
 *
 * Payload: `{ version, groupKey, receiver, status, alerts[], groupLabels,
 * commonLabels, commonAnnotations, externalURL }`
 */
export class AlertmanagerDriver extends BaseSourceDriver {
  readonly name = 'alertmanager';

  protected matches(payload: JsonObject): boolean {
    const hasRequired = hasKey(payload, 'alerts') && hasKey(payload, 'status');
    const hasSpecific = ['groupKey', 'receiver', 'groupLabels', 'commonLabels'].some((key) =>
      hasKey(payload, key)
    );
    return hasRequired && hasSpecific;
  }

  protected parseRecord(payload: JsonObject): NormalizedPayload {
    const alerts = asArray(payload.alerts).map((entry) =>
      parsePrometheusStyleAlert(this, asRecord(entry))
    );

    return createNormalizedPayload(this.name, alerts, {
      version: asString(payload.version),
      groupKey: asString(payload.groupKey),
      receiver: asString(payload.receiver),
      externalUrl: asString(payload.externalURL),
      rawPayload: payload,
    });
  }
}
