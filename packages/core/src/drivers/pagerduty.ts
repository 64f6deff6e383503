import {
  createNormalizedAlert,
  createNormalizedPayload,
  type AlertSeverity,
  type NormalizedAlert,
  type NormalizedPayload,
} from '../alert.js';
import { asArray, asRecord, asString, hasKey, isRecord, type JsonObject } from '../json.js';
import { parseTimestamp } from '../time.js';
import { BaseSourceDriver } from './driver.js';

function urgencySeverity(urgency: string): AlertSeverity {
  return urgency === 'high' ? 'critical' : 'warning';
}

/**
 * PagerDuty webhooks: V3 `{ event: {...} }` and legacy V2 `{ messages: [...] }`
 */
export class PagerDutyDriver extends BaseSourceDriver {
  readonly name = 'pagerduty';

  protected matches(payload: JsonObject): boolean {
    if (hasKey(payload, 'event')) {
      const event = asRecord(payload.event);
      return hasKey(event, 'event_type') && hasKey(event, 'resource_type');
    }
    if (hasKey(payload, 'messages')) {
      const [first] = asArray(payload.messages);
      return isRecord(first) && (hasKey(first, 'incident') || hasKey(first, 'type'));
    }
    return false;
  }

  protected parseRecord(payload: JsonObject): NormalizedPayload {
    const alerts = hasKey(payload, 'event')
      ? [this.parseV3Event(asRecord(payload.event))]
      : asArray(payload.messages).map((message) => this.parseV2Message(asRecord(message)));

    return createNormalizedPayload(this.name, alerts, { rawPayload: payload });
  }

  private parseV3Event(event: JsonObject): NormalizedAlert {
    const data = asRecord(event.data);
    const eventType = asString(event.event_type);
    const status =
      eventType.includes('resolved') || eventType.includes('acknowledged') ? 'resolved' : 'firing';

    const name = asString(data.title) || 'PagerDuty Incident';
    const urgency = asString(data.urgency, 'high');
    let severity = urgencySeverity(urgency);

    const priorityName = asString(asRecord(data.priority).name).toLowerCase();
    if (priorityName.includes('p1') || priorityName.includes('critical')) {
      severity = 'critical';
    } else if (priorityName.includes('p3') || priorityName.includes('low')) {
      severity = 'info';
    }

    const service = asRecord(data.service);
    const labels = {
      alertname: name,
      incident_id: asString(data.id),
      incident_number: asString(data.number),
      service_id: asString(service.id),
      service_name: asString(service.summary),
      urgency,
    };

    return createNormalizedAlert({
      fingerprint: asString(data.id) || this.generateFingerprint(labels, name),
      name,
      status,
      severity,
      description: asString(data.description),
      labels,
      annotations: { html_url: asString(data.html_url) },
      startedAt: parseTimestamp(event.occurred_at),
      rawPayload: event,
    });
  }

  private parseV2Message(message: JsonObject): NormalizedAlert {
    const incident = asRecord(message.incident);
    const status = asString(message.type).includes('resolve') ? 'resolved' : 'firing';

    const name =
      asString(asRecord(incident.trigger_summary_data).subject) ||
      asString(incident.title) ||
      'PagerDuty Incident';
    const labels = {
      alertname: name,
      incident_id: asString(incident.id),
      incident_number: asString(incident.incident_number),
      service_name: asString(asRecord(incident.service).name),
    };

    return createNormalizedAlert({
      fingerprint: asString(incident.id) || this.generateFingerprint(labels, name),
      name,
      status,
      severity: urgencySeverity(asString(incident.urgency, 'high')),
      description: asString(incident.description),
      labels,
      startedAt: parseTimestamp(incident.created_on),
      rawPayload: message,
    });
  }
}
