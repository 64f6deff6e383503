import {
  createNormalizedAlert,
  createNormalizedPayload,
  type AlertSeverity,
  type NormalizedAlert,
  type NormalizedPayload,
} from '../alert.js';
import { asArray, asRecord, asString, countKeys, hasKey, isRecord, type JsonObject } from '../json.js';
import { parseTimestamp } from '../time.js';
import { BaseSourceDriver } from './driver.js';

const CLASSIC_SEVERITY: Readonly<Record<string, AlertSeverity>> = {
  critical: 'critical',
  high: 'critical',
  warning: 'warning',
  medium: 'warning',
  low: 'info',
  info: 'info',
};

const RESOLVED_STATES = new Set(['closed', 'acknowledged']);

/** Targets beyond this many are not copied into labels */
const MAX_TARGET_LABELS = 3;

/**
 * New Relic alerts: classic incident webhooks and workflow (issue) webhooks
 */
export class NewRelicDriver extends BaseSourceDriver {
  readonly name = 'newrelic';

  protected matches(payload: JsonObject): boolean {
    if (hasKey(payload, 'account_id') && hasKey(payload, 'current_state')) return true;
    if (hasKey(payload, 'issueUrl') && hasKey(payload, 'accumulations')) return true;
    return countKeys(payload, ['condition_id', 'incident_id', 'policy_name', 'condition_name']) >= 2;
  }

  protected parseRecord(payload: JsonObject): NormalizedPayload {
    const alert = hasKey(payload, 'issueUrl')
      ? this.parseWorkflow(payload)
      : this.parseClassic(payload);

    return createNormalizedPayload(this.name, [alert], {
      externalUrl: asString(payload.incident_url) || asString(payload.issueUrl),
      rawPayload: payload,
    });
  }

  private parseClassic(payload: JsonObject): NormalizedAlert {
    const name =
      asString(payload.condition_name) || asString(payload.policy_name) || 'New Relic Alert';
    const currentState = asString(payload.current_state).toLowerCase();
    const severity = CLASSIC_SEVERITY[asString(payload.severity, 'warning').toLowerCase()] ?? 'warning';

    const labels: Record<string, string> = {
      alertname: name,
      account_id: asString(payload.account_id),
      account_name: asString(payload.account_name),
      condition_id: asString(payload.condition_id),
      policy_name: asString(payload.policy_name),
      incident_id: asString(payload.incident_id),
    };

    asArray(payload.targets)
      .slice(0, MAX_TARGET_LABELS)
      .forEach((target, index) => {
        if (!isRecord(target)) return;
        labels[`target_${index}_name`] = asString(target.name);
        labels[`target_${index}_type`] = asString(target.type);
      });

    return createNormalizedAlert({
      fingerprint: asString(payload.incident_id) || this.generateFingerprint(labels, name),
      name,
      status: RESOLVED_STATES.has(currentState) ? 'resolved' : 'firing',
      severity,
      description: asString(payload.details),
      labels,
      annotations: {
        incident_url: asString(payload.incident_url),
        runbook_url: asString(payload.runbook_url),
      },
      startedAt: parseTimestamp(payload.timestamp),
      rawPayload: payload,
    });
  }

  private parseWorkflow(payload: JsonObject): NormalizedAlert {
    const [conditionName] = asArray(asRecord(payload.accumulations).conditionName);
    const name = asString(payload.title) || asString(conditionName) || 'New Relic Alert';

    const state = asString(payload.state).toLowerCase();
    const priority = asString(payload.priority).toLowerCase();
    const severity: AlertSeverity =
      priority === 'critical' || priority === 'high'
        ? 'critical'
        : priority === 'medium'
          ? 'warning'
          : 'info';

    const issueId = asString(payload.issueId);
    const labels = { alertname: name, issue_id: issueId };

    return createNormalizedAlert({
      fingerprint: issueId || this.generateFingerprint(labels, name),
      name,
      status: RESOLVED_STATES.has(state) ? 'resolved' : 'firing',
      severity,
      description: asString(payload.description),
      labels,
      annotations: { issue_url: asString(payload.issueUrl) },
      startedAt: parseTimestamp(payload.createdAt),
      rawPayload: payload,
    });
  }
}
