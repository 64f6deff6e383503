import { describe, it, expect } from 'vitest';
import {
  DriverRegistry,
  GenericDriver,
  UnknownDriverError,
  createDefaultDriverRegistry,
  type SourceDriver,
} from '../src/index.js';

const samples: Record<string, unknown> = {
  alertmanager: {
    receiver: 'webhook',
    status: 'firing',
    groupKey: 'g',
    alerts: [{ labels: { alertname: 'HighCPU' } }],
  },
  grafana: { orgId: 1, state: 'alerting', title: 'Memory', alerts: [] },
  pagerduty: {
    event: { event_type: 'incident.triggered', resource_type: 'incident', data: { id: 'P1' } },
  },
  datadog: { alert_id: '42', alert_transition: 'Triggered', alert_title: 'Latency' },
  newrelic: { account_id: 1, current_state: 'open', condition_name: 'Errors', incident_id: 7 },
  opsgenie: { action: 'Create', alert: { alertId: 'og-1', message: 'Disk full' } },
  zabbix: { event_id: '1', trigger_name: 'CPU', host_name: 'db-1', trigger_severity: 'High' },
  generic: { name: 'Backup failed', status: 'firing' },
};

describe('default driver registry', () => {
  const registry = createDefaultDriverRegistry();

  it('registers drivers in detection order with generic last', () => {
    expect(registry.getNames()).toEqual([
      'alertmanager',
      'grafana',
      'pagerduty',
      'datadog',
      'newrelic',
      'opsgenie',
      'zabbix',
      'generic',
    ]);
  });

  for (const [name, payload] of Object.entries(samples)) {
    it(`detects ${name} payloads`, () => {
      expect(registry.detect(payload)?.name).toBe(name);
    });
  }

  it('returns undefined when nothing matches', () => {
    expect(registry.detect({ foo: 'bar' })).toBeUndefined();
    expect(registry.detect('not json')).toBeUndefined();
  });

  it('attributes overlapping shapes to the earlier registered driver', () => {
    // a Datadog body that carries `title` also satisfies the Grafana predicate
    const ambiguous = { title: 'Latency', alert_id: '42', alert_transition: 'Triggered' };
    expect(registry.detect(ambiguous)?.name).toBe('grafana');
  });

  it('throws UnknownDriverError for unregistered names', () => {
    expect(() => registry.get('nagios')).toThrow(UnknownDriverError);
  });

  it('returns a fresh instance per lookup', () => {
    expect(registry.get('generic')).not.toBe(registry.get('generic'));
  });
});

describe('DriverRegistry', () => {
  function stub(name: string, accepts: boolean): SourceDriver {
    const generic = new GenericDriver();
    return {
      name,
      validate: () => accepts,
      parse: (payload) => generic.parse(payload),
      generateFingerprint: (labels, alertName) => generic.generateFingerprint(labels, alertName),
    };
  }

  it('skips the catch-all during the first pass even when registered first', () => {
    const registry = new DriverRegistry();
    registry.register('fallback', () => stub('fallback', true), { catchAll: true });
    registry.register('specific', () => stub('specific', true));

    expect(registry.detect({})?.name).toBe('specific');
  });

  it('uses the catch-all only when it validates', () => {
    const registry = new DriverRegistry();
    registry.register('specific', () => stub('specific', false));
    registry.register('fallback', () => stub('fallback', false), { catchAll: true });

    expect(registry.detect({})).toBeUndefined();
  });

  it('rejects duplicate names and a second catch-all', () => {
    const registry = new DriverRegistry();
    registry.register('a', () => stub('a', true), { catchAll: true });
    expect(() => registry.register('a', () => stub('a', true))).toThrow('already registered');
    expect(() => registry.register('b', () => stub('b', true), { catchAll: true })).toThrow(
      'Only one catch-all',
    );
  });
});
