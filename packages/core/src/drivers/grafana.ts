import {
  createNormalizedAlert,
  createNormalizedPayload,
  type NormalizedAlert,
  type NormalizedPayload,
} from '../alert.js';
import { asArray, asRecord, asString, hasKey, type JsonObject } from '../json.js';
import { parsePrometheusStyleAlert } from './alertmanager.js';
import { BaseSourceDriver } from './driver.js';

/**
 * Grafana alerting webhooks.
 *
 * Unified alerting posts an AlertManager-like `alerts` array; legacy
 * dashboard alerting posts a single rule with `evalMatches`.
 */
export class GrafanaDriver extends BaseSourceDriver {
  readonly name = 'grafana';

  protected matches(payload: JsonObject): boolean {
    const hasGrafanaKeys = ['orgId', 'state', 'title'].some((key) => hasKey(payload, key));
    const hasAlerts = hasKey(payload, 'alerts') || hasKey(payload, 'evalMatches');
    return hasGrafanaKeys || (hasAlerts && hasKey(payload, 'dashboardId'));
  }

  protected parseRecord(payload: JsonObject): NormalizedPayload {
    let alerts: NormalizedAlert[] = [];

    if (hasKey(payload, 'alerts')) {
      alerts = asArray(payload.alerts).map((entry) => {
        const alertData = asRecord(entry);
        return parsePrometheusStyleAlert(this, alertData, asString(alertData.message));
      });
    } else if (hasKey(payload, 'evalMatches')) {
      alerts = [this.parseLegacy(payload)];
    }

    return createNormalizedPayload(this.name, alerts, {
      version: asString(payload.version),
      groupKey: asString(payload.groupKey),
      receiver: asString(payload.receiver),
      externalUrl: asString(payload.externalURL),
      rawPayload: payload,
    });
  }

  private parseLegacy(payload: JsonObject): NormalizedAlert {
    const name = asString(payload.ruleName) || asString(payload.title) || 'Unknown Alert';
    const labels = {
      alertname: name,
      ruleId: asString(payload.ruleId),
      dashboardId: asString(payload.dashboardId),
      panelId: asString(payload.panelId),
      orgId: asString(payload.orgId),
    };

    const state = asString(payload.state, 'alerting').toLowerCase();
    const status = state === 'ok' ? 'resolved' : 'firing';
    const severity = state === 'alerting' || state === 'critical' ? 'critical' : 'warning';
    const now = new Date();

    return createNormalizedAlert({
      fingerprint: this.generateFingerprint(labels, name),
      name,
      status,
      severity,
      description: asString(payload.message),
      labels,
      annotations: { ruleUrl: asString(payload.ruleUrl) },
      startedAt: now,
      endedAt: status === 'resolved' ? now : null,
      rawPayload: payload,
    });
  }
}
