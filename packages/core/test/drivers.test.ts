import { createHash } from 'node:crypto';
import { describe, it, expect } from 'vitest';
import {
  AlertmanagerDriver,
  DatadogDriver,
  GenericDriver,
  GrafanaDriver,
  InvalidPayloadError,
  NewRelicDriver,
  OpsgenieDriver,
  PagerDutyDriver,
  ZabbixDriver,
  createDefaultDriverRegistry,
  effectiveEndsAt,
  fingerprintOf,
  type NormalizedAlert,
  type NormalizedPayload,
} from '../src/index.js';

function only(payload: NormalizedPayload): NormalizedAlert {
  expect(payload.alerts).toHaveLength(1);
  const [alert] = payload.alerts;
  if (!alert) throw new Error('expected one alert');
  return alert;
}

describe('fingerprints', () => {
  it('is independent of label order', () => {
    const driver = new GenericDriver();
    const a = driver.generateFingerprint({ host: 'web-1', env: 'prod', region: 'eu' }, 'DiskFull');
    const b = driver.generateFingerprint({ region: 'eu', env: 'prod', host: 'web-1' }, 'DiskFull');
    expect(a).toBe(b);
  });

  it('is a 16 character hex digest', () => {
    expect(fingerprintOf({ a: '1' }, 'x')).toMatch(/^[0-9a-f]{16}$/);
  });

  it('changes with the name or labels', () => {
    const base = fingerprintOf({ a: '1' }, 'x');
    expect(fingerprintOf({ a: '1' }, 'y')).not.toBe(base);
    expect(fingerprintOf({ a: '2' }, 'x')).not.toBe(base);
  });
});

describe('invalid payloads', () => {
  const registry = createDefaultDriverRegistry();
  const rejected: unknown[] = [null, undefined, 42, 'text', [], {}, { foo: 'bar' }];

  for (const name of registry.getNames()) {
    it(`${name} rejects foreign shapes and refuses to parse them`, () => {
      const driver = registry.get(name);
      for (const payload of rejected) {
        expect(driver.validate(payload)).toBe(false);
        expect(() => driver.parse(payload)).toThrow(InvalidPayloadError);
      }
    });
  }
});

describe('AlertmanagerDriver', () => {
  const driver = new AlertmanagerDriver();

  const highCpu = {
    version: '4',
    groupKey: '{}:{alertname="HighCPU"}',
    receiver: 'webhook',
    status: 'firing',
    externalURL: 'http://alertmanager:9093',
    alerts: [
      {
        status: 'firing',
        labels: { alertname: 'HighCPU', severity: 'critical' },
        annotations: { summary: 'CPU above 90%' },
        startsAt: '2024-01-08T10:30:00Z',
        endsAt: '0001-01-01T00:00:00Z',
      },
    ],
  };

  it('normalizes a firing alert without a native fingerprint', () => {
    const parsed = driver.parse(highCpu);
    const alert = only(parsed);

    const digest = createHash('sha256')
      .update('HighCPU:[["alertname","HighCPU"],["severity","critical"]]')
      .digest('hex')
      .slice(0, 16);

    expect(alert.name).toBe('HighCPU');
    expect(alert.severity).toBe('critical');
    expect(alert.status).toBe('firing');
    expect(alert.fingerprint).toBe(digest);
    expect(alert.fingerprint).toBe(driver.parse(highCpu).alerts[0]?.fingerprint);
    expect(alert.description).toBe('CPU above 90%');
    expect(alert.startedAt).toEqual(new Date('2024-01-08T10:30:00Z'));
    expect(alert.endedAt).toBeNull();

    expect(parsed.source).toBe('alertmanager');
    expect(parsed.version).toBe('4');
    expect(parsed.groupKey).toBe('{}:{alertname="HighCPU"}');
    expect(parsed.receiver).toBe('webhook');
    expect(parsed.externalUrl).toBe('http://alertmanager:9093');
  });

  it('uses the native fingerprint and real end time when present', () => {
    const alert = only(
      driver.parse({
        status: 'resolved',
        receiver: 'webhook',
        alerts: [
          {
            status: 'resolved',
            fingerprint: 'abc123',
            labels: { alertname: 'DiskFull' },
            annotations: { description: 'Disk at 95%', summary: 'ignored' },
            endsAt: '2024-01-08T11:00:00Z',
          },
        ],
      }),
    );

    expect(alert.fingerprint).toBe('abc123');
    expect(alert.status).toBe('resolved');
    expect(alert.severity).toBe('warning');
    expect(alert.description).toBe('Disk at 95%');
    expect(alert.endedAt).toEqual(new Date('2024-01-08T11:00:00Z'));
  });

  it('defaults the name when alertname is missing', () => {
    const alert = only(driver.parse({ status: 'firing', groupKey: 'g', alerts: [{ labels: {} }] }));
    expect(alert.name).toBe('Unknown Alert');
  });

  it('requires an AlertManager-specific key', () => {
    expect(driver.validate({ status: 'firing', alerts: [] })).toBe(false);
  });

  it('treats far-future end times as still firing', () => {
    const now = new Date(Date.UTC(2024, 0, 1));
    expect(effectiveEndsAt(new Date(Date.UTC(2099, 0, 1)), now)).toBeNull();
    expect(effectiveEndsAt(new Date(Date.UTC(2025, 5, 1)), now)).toEqual(new Date(Date.UTC(2025, 5, 1)));
  });
});

describe('GrafanaDriver', () => {
  const driver = new GrafanaDriver();

  it('parses unified alerting payloads', () => {
    const parsed = driver.parse({
      receiver: 'alertline',
      status: 'firing',
      orgId: 1,
      title: '[FIRING:1] MemoryHigh',
      groupKey: 'grafana-group',
      alerts: [
        {
          status: 'firing',
          labels: { alertname: 'MemoryHigh', severity: 'critical', instance: 'db-1' },
          annotations: {},
          message: 'Memory above 95%',
          fingerprint: 'g-1',
        },
      ],
    });
    const alert = only(parsed);

    expect(parsed.source).toBe('grafana');
    expect(parsed.groupKey).toBe('grafana-group');
    expect(alert.fingerprint).toBe('g-1');
    expect(alert.severity).toBe('critical');
    expect(alert.description).toBe('Memory above 95%');
  });

  it('parses legacy evalMatches payloads', () => {
    const alert = only(
      driver.parse({
        ruleName: 'High memory',
        ruleId: 7,
        dashboardId: 1,
        panelId: 2,
        orgId: 1,
        state: 'alerting',
        message: 'Memory is high',
        ruleUrl: 'http://grafana/d/1',
        evalMatches: [{ value: 97, metric: 'mem' }],
      }),
    );

    expect(alert.name).toBe('High memory');
    expect(alert.status).toBe('firing');
    expect(alert.severity).toBe('critical');
    expect(alert.labels).toEqual({
      alertname: 'High memory',
      ruleId: '7',
      dashboardId: '1',
      panelId: '2',
      orgId: '1',
    });
    expect(alert.annotations.ruleUrl).toBe('http://grafana/d/1');
    expect(alert.endedAt).toBeNull();
  });

  it('maps the legacy ok state to resolved', () => {
    const alert = only(
      driver.parse({ ruleName: 'High memory', state: 'ok', dashboardId: 1, evalMatches: [] }),
    );
    expect(alert.status).toBe('resolved');
    expect(alert.severity).toBe('warning');
    expect(alert.endedAt).toBeInstanceOf(Date);
  });
});

describe('PagerDutyDriver', () => {
  const driver = new PagerDutyDriver();

  it('parses V3 events', () => {
    const alert = only(
      driver.parse({
        event: {
          id: 'evt-1',
          event_type: 'incident.triggered',
          resource_type: 'incident',
          occurred_at: '2024-01-08T10:30:00Z',
          data: {
            id: 'PABC123',
            number: 42,
            title: 'Checkout errors',
            urgency: 'high',
            html_url: 'https://pd/incidents/PABC123',
            service: { id: 'SVC1', summary: 'checkout' },
          },
        },
      }),
    );

    expect(alert.fingerprint).toBe('PABC123');
    expect(alert.name).toBe('Checkout errors');
    expect(alert.status).toBe('firing');
    expect(alert.severity).toBe('critical');
    expect(alert.labels.service_name).toBe('checkout');
    expect(alert.labels.incident_number).toBe('42');
  });

  it('resolves on resolved or acknowledged event types and reads priority names', () => {
    const resolved = only(
      driver.parse({
        event: {
          event_type: 'incident.acknowledged',
          resource_type: 'incident',
          data: { id: 'P1', urgency: 'low', priority: { name: 'P3' } },
        },
      }),
    );
    expect(resolved.status).toBe('resolved');
    expect(resolved.severity).toBe('info');

    const escalated = only(
      driver.parse({
        event: {
          event_type: 'incident.triggered',
          resource_type: 'incident',
          data: { id: 'P2', urgency: 'low', priority: { name: 'P1' } },
        },
      }),
    );
    expect(escalated.severity).toBe('critical');
  });

  it('parses legacy V2 messages', () => {
    const parsed = driver.parse({
      messages: [
        {
          type: 'incident.resolve',
          incident: { id: 'LEG1', urgency: 'low', trigger_summary_data: { subject: 'Old alert' } },
        },
      ],
    });
    const alert = only(parsed);
    expect(alert.name).toBe('Old alert');
    expect(alert.status).toBe('resolved');
    expect(alert.severity).toBe('warning');
    expect(alert.fingerprint).toBe('LEG1');
  });
});

describe('DatadogDriver', () => {
  const driver = new DatadogDriver();

  it('parses tags and native ids', () => {
    const parsed = driver.parse({
      alert_id: 1234,
      alert_title: 'High latency',
      alert_transition: 'Triggered',
      alert_type: 'warning',
      priority: 'normal',
      tags: 'env:prod,service:api,paging',
      hostname: 'web-1',
      alert_metric: 'trace.http.request.duration',
      event_msg: 'p99 above 2s',
      url: 'https://dd/monitors/1234',
    });
    const alert = only(parsed);

    expect(alert.fingerprint).toBe('1234');
    expect(alert.status).toBe('firing');
    expect(alert.severity).toBe('warning');
    expect(alert.labels).toEqual({
      alertname: 'High latency',
      env: 'prod',
      service: 'api',
      paging: 'true',
      hostname: 'web-1',
      metric: 'trace.http.request.duration',
      alert_id: '1234',
    });
    expect(alert.description).toBe('p99 above 2s');
    expect(parsed.externalUrl).toBe('https://dd/monitors/1234');
  });

  it('maps recovery transitions and priorities', () => {
    const recovered = only(driver.parse({ alert_id: 'a', alert_transition: 'Recovered', priority: 'P1' }));
    expect(recovered.status).toBe('resolved');
    expect(recovered.severity).toBe('critical');

    const ok = only(driver.parse({ alert_status: 'OK', priority: 'low' }));
    expect(ok.status).toBe('resolved');
    expect(ok.severity).toBe('info');

    const error = only(driver.parse({ alert_type: 'error', tags: ['team:core'] }));
    expect(error.severity).toBe('critical');
    expect(error.labels.team).toBe('core');
  });

  it('accepts payloads with an org object', () => {
    expect(driver.validate({ org: { id: 1, name: 'acme' } })).toBe(true);
    expect(driver.validate({ org: 'acme' })).toBe(false);
  });
});

describe('NewRelicDriver', () => {
  const driver = new NewRelicDriver();

  it('parses classic incident webhooks', () => {
    const alert = only(
      driver.parse({
        account_id: 100,
        account_name: 'Acme',
        condition_id: 456,
        condition_name: 'Error rate',
        current_state: 'open',
        details: 'Error rate above 5%',
        incident_id: 789,
        policy_name: 'Checkout',
        severity: 'CRITICAL',
        targets: [
          { name: 'a', type: 'Application' },
          { name: 'b', type: 'Application' },
          { name: 'c', type: 'Host' },
          { name: 'd', type: 'Host' },
        ],
      }),
    );

    expect(alert.fingerprint).toBe('789');
    expect(alert.name).toBe('Error rate');
    expect(alert.status).toBe('firing');
    expect(alert.severity).toBe('critical');
    expect(alert.labels.target_2_type).toBe('Host');
    expect(alert.labels.target_3_name).toBeUndefined();
  });

  it('maps closed states and the severity table', () => {
    const alert = only(
      driver.parse({ account_id: 1, current_state: 'closed', severity: 'medium', condition_name: 'x' }),
    );
    expect(alert.status).toBe('resolved');
    expect(alert.severity).toBe('warning');

    const unknown = only(driver.parse({ account_id: 1, current_state: 'open', severity: 'weird' }));
    expect(unknown.severity).toBe('warning');
  });

  it('parses workflow issue payloads', () => {
    const alert = only(
      driver.parse({
        issueId: 'issue-1',
        issueUrl: 'https://nr/issues/1',
        accumulations: { conditionName: ['High error rate'] },
        state: 'ACTIVATED',
        priority: 'HIGH',
      }),
    );

    expect(alert.fingerprint).toBe('issue-1');
    expect(alert.name).toBe('High error rate');
    expect(alert.severity).toBe('critical');
    expect(alert.status).toBe('firing');
    expect(alert.annotations.issue_url).toBe('https://nr/issues/1');
  });
});

describe('OpsgenieDriver', () => {
  const driver = new OpsgenieDriver();

  function payload(action: string, priority?: string) {
    return {
      action,
      integrationId: 'int-1',
      integrationName: 'Alertline',
      alert: {
        alertId: 'og-1',
        tinyId: '12',
        message: 'Disk full on db-1',
        tags: ['env:prod', 'urgent'],
        alias: 'disk-db-1',
        createdAt: 1704709800000,
        ...(priority !== undefined && { priority }),
      },
    };
  }

  it('resolves on a Close action regardless of priority', () => {
    const alert = only(driver.parse(payload('Close', 'P1')));
    expect(alert.status).toBe('resolved');
    expect(alert.severity).toBe('critical');
  });

  it('maps priority tiers', () => {
    expect(only(driver.parse(payload('Create', 'P1'))).severity).toBe('critical');
    expect(only(driver.parse(payload('Create', 'P2'))).severity).toBe('critical');
    expect(only(driver.parse(payload('Create', 'P3'))).severity).toBe('warning');
    expect(only(driver.parse(payload('Create', 'P4'))).severity).toBe('info');
    expect(only(driver.parse(payload('Create', 'P99'))).severity).toBe('warning');
    expect(only(driver.parse(payload('Create'))).severity).toBe('warning');
  });

  it('builds labels from tags and alert fields', () => {
    const alert = only(driver.parse(payload('Create', 'p4')));
    expect(alert.status).toBe('firing');
    expect(alert.fingerprint).toBe('og-1');
    expect(alert.labels).toEqual({
      alertname: 'Disk full on db-1',
      env: 'prod',
      tag_urgent: 'true',
      alert_id: 'og-1',
      tiny_id: '12',
      priority: 'P4',
      alias: 'disk-db-1',
    });
    expect(alert.startedAt).toEqual(new Date(1704709800000));
    expect(alert.annotations.action).toBe('create');
  });

  it('falls back to the alias as fingerprint', () => {
    const alert = only(
      driver.parse({ action: 'Create', alert: { tinyId: '5', alias: 'only-alias', message: 'x' } }),
    );
    expect(alert.fingerprint).toBe('only-alias');
  });
});

describe('ZabbixDriver', () => {
  const driver = new ZabbixDriver();

  it('parses problem events', () => {
    const alert = only(
      driver.parse({
        event_id: '9001',
        event_source: '0',
        event_value: '1',
        trigger_id: '77',
        trigger_name: 'CPU load too high',
        trigger_severity: 'Disaster',
        host_name: 'db-1',
        host_ip: '10.0.0.5',
        item_name: 'CPU load',
        item_value: '95',
        event_date: '2024.01.08',
        event_time: '10:30:00',
      }),
    );

    expect(alert.fingerprint).toBe('9001');
    expect(alert.status).toBe('firing');
    expect(alert.severity).toBe('critical');
    expect(alert.description).toBe('CPU load: 95');
    expect(alert.startedAt).toEqual(new Date(Date.UTC(2024, 0, 8, 10, 30, 0)));
    expect(alert.labels.item_name).toBe('CPU load');
  });

  it('resolves on event value 0 or an OK status', () => {
    expect(only(driver.parse({ event_source: '0', event_value: '0' })).status).toBe('resolved');
    expect(
      only(driver.parse({ trigger_id: '1', host_name: 'h', trigger_status: 'OK' })).status,
    ).toBe('resolved');
    expect(
      only(driver.parse({ trigger_id: '1', host_name: 'h', event_status: 'PROBLEM' })).status,
    ).toBe('firing');
  });

  it('maps numeric and textual severities through one table', () => {
    const severityOf = (value: string) =>
      only(driver.parse({ trigger_id: '1', host_name: 'h', trigger_severity: value })).severity;
    expect(severityOf('4')).toBe('critical');
    expect(severityOf('3')).toBe('warning');
    expect(severityOf('Average')).toBe('warning');
    expect(severityOf('Not classified')).toBe('info');
    expect(severityOf('1')).toBe('info');
    expect(severityOf('bogus')).toBe('warning');
  });

  it('falls back to the trigger id as fingerprint', () => {
    const alert = only(driver.parse({ trigger_id: '77', host_name: 'h' }));
    expect(alert.fingerprint).toBe('77');
  });
});

describe('GenericDriver', () => {
  const driver = new GenericDriver();

  it('parses a list of alerts and keeps the named source', () => {
    const parsed = driver.parse({
      source: 'batch-jobs',
      alerts: [
        { name: 'Job failed', severity: 'critical', labels: { job: 'nightly' } },
        { name: 'Job slow', status: 'resolved', ended_at: '2024-01-08T11:00:00Z' },
      ],
    });

    expect(parsed.source).toBe('batch-jobs');
    expect(parsed.alerts).toHaveLength(2);
    expect(parsed.alerts[0]?.severity).toBe('critical');
    expect(parsed.alerts[0]?.labels).toEqual({ job: 'nightly' });
    expect(parsed.alerts[1]?.status).toBe('resolved');
    expect(parsed.alerts[1]?.endedAt).toEqual(new Date('2024-01-08T11:00:00Z'));
  });

  it('parses a single flat alert with the default source', () => {
    const parsed = driver.parse({ title: 'Queue backlog', message: '5000 messages waiting' });
    const alert = only(parsed);
    expect(parsed.source).toBe('generic');
    expect(alert.name).toBe('Queue backlog');
    expect(alert.description).toBe('5000 messages waiting');
    expect(alert.status).toBe('firing');
    expect(alert.severity).toBe('warning');
  });

  it('infers status from state words', () => {
    expect(only(driver.parse({ name: 'a', state: 'normal' })).status).toBe('resolved');
    expect(only(driver.parse({ name: 'a', state: 'OK' })).status).toBe('resolved');
    expect(only(driver.parse({ name: 'a', state: 'alerting' })).status).toBe('firing');
  });

  it('infers severity from priority and level', () => {
    expect(only(driver.parse({ name: 'a', priority: 'P1' })).severity).toBe('critical');
    expect(only(driver.parse({ name: 'a', priority: 'p4' })).severity).toBe('info');
    expect(only(driver.parse({ name: 'a', severity: 'major', level: 'error' })).severity).toBe(
      'critical',
    );
    expect(only(driver.parse({ name: 'a', severity: 'major', level: 'debug' })).severity).toBe('info');
  });

  it('reads epoch timestamps in seconds or milliseconds', () => {
    const expected = new Date(Date.UTC(2024, 0, 8, 10, 30, 0));
    expect(only(driver.parse({ name: 'a', started_at: 1704709800 })).startedAt).toEqual(expected);
    expect(only(driver.parse({ name: 'a', timestamp: 1704709800000 })).startedAt).toEqual(expected);
  });
});
