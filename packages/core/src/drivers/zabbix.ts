import {
  createNormalizedAlert,
  createNormalizedPayload,
  type AlertSeverity,
  type AlertStatus,
  type NormalizedPayload,
} from '../alert.js';
import { asString, countKeys, firstString, hasKey, type JsonObject } from '../json.js';
import { parseTimestamp } from '../time.js';
import { BaseSourceDriver } from './driver.js';

/**
 * Zabbix severities arrive either as names or as the numeric 0–5 scale
 */
const SEVERITY_TABLE: Readonly<Record<string, AlertSeverity>> = {
  disaster: 'critical',
  high: 'critical',
  average: 'warning',
  warning: 'warning',
  information: 'info',
  'not classified': 'info',
  '5': 'critical',
  '4': 'critical',
  '3': 'warning',
  '2': 'warning',
  '1': 'info',
  '0': 'info',
};

export function zabbixSeverity(value: string): AlertSeverity {
  return SEVERITY_TABLE[value.trim().toLowerCase()] ?? 'warning';
}

function zabbixStatus(payload: JsonObject): AlertStatus {
  const eventValue = asString(payload.event_value);
  const triggerStatus = asString(payload.trigger_status).toUpperCase();
  const eventStatus = asString(payload.event_status).toUpperCase();

  if (eventValue === '0' || triggerStatus === 'OK' || eventStatus === 'RESOLVED' || eventStatus === 'OK') {
    return 'resolved';
  }
  return 'firing';
}

/**
 * Zabbix media-type webhooks. The body is user-defined, so detection relies on
 * the macro names most templates use (`event_id`, `trigger_name`, `host_name`, ...).
 */
export class ZabbixDriver extends BaseSourceDriver {
  readonly name = 'zabbix';

  protected matches(payload: JsonObject): boolean {
    if (hasKey(payload, 'event_source') && hasKey(payload, 'event_value')) return true;
    return countKeys(payload, ['event_id', 'trigger_id', 'trigger_name', 'trigger_severity', 'host_name']) >= 2;
  }

  protected parseRecord(payload: JsonObject): NormalizedPayload {
    const name = firstString(payload, ['trigger_name', 'event_name'], 'Zabbix Alert');

    const labels: Record<string, string> = {
      alertname: name,
      host_name: asString(payload.host_name),
      host_ip: asString(payload.host_ip),
      trigger_id: asString(payload.trigger_id),
      event_id: asString(payload.event_id),
    };
    const itemName = asString(payload.item_name);
    if (itemName) labels.item_name = itemName;
    const hostGroup = asString(payload.host_group);
    if (hostGroup) labels.host_group = hostGroup;

    const eventDate = asString(payload.event_date);
    const startedAt = parseTimestamp(
      eventDate ? `${eventDate} ${asString(payload.event_time)}`.trim() : payload.event_timestamp,
    );

    const itemValue = asString(payload.item_value);
    let description = firstString(payload, ['alert_message', 'event_message']);
    if (!description && itemName && itemValue) {
      description = `${itemName}: ${itemValue}`;
    }

    const fingerprint =
      firstString(payload, ['event_id', 'trigger_id']) || this.generateFingerprint(labels, name);
    const zabbixUrl = asString(payload.zabbix_url);

    const alert = createNormalizedAlert({
      fingerprint,
      name,
      status: zabbixStatus(payload),
      severity: zabbixSeverity(firstString(payload, ['trigger_severity', 'event_severity'])),
      description,
      labels,
      annotations: { item_value: itemValue, zabbix_url: zabbixUrl },
      startedAt,
      rawPayload: payload,
    });

    return createNormalizedPayload(this.name, [alert], { externalUrl: zabbixUrl, rawPayload: payload });
  }
}
