import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createHash } from 'node:crypto';
import { IncidentNotFoundError, InvalidTransitionError } from '@alertline/core';
import {
  BaseChecker,
  CheckerRegistry,
  type CheckResult,
  type CheckStatus,
} from '@alertline/checkers';
import {
  findAlert,
  getIncident,
  initDb,
  insertIncident,
  listAlerts,
  listCheckRuns,
  listIncidents,
  type Db,
} from '@alertline/store';
import {
  AlertLifecycleEngine,
  CHECKER_ALERT_SOURCE,
  CheckAlertBridge,
  IncidentManager,
  checkerFingerprint,
} from '../src/index.js';

const T0 = new Date('2024-04-01T08:00:00Z');

function diskResult(status: CheckStatus, percent: number): CheckResult {
  return {
    status,
    message: `Disk /: ${percent}% used`,
    metrics: { disk_percent: percent, path: '/', mounts: ['/', '/data'] },
    checkerName: 'disk',
  };
}

class StubChecker extends BaseChecker {
  constructor(
    readonly name: string,
    private readonly value: number,
  ) {
    super();
  }

  async check(): Promise<CheckResult> {
    return this.makeResult(this.determineStatus(this.value), `${this.name} at ${this.value}%`, {
      percent: this.value,
    });
  }
}

describe('IncidentManager', () => {
  let db: Db;
  let manager: IncidentManager;

  beforeEach(() => {
    db = initDb(':memory:');
    manager = new IncidentManager(db, { now: () => T0 });
  });

  afterEach(() => {
    db.close();
  });

  it('acknowledges an open incident and records who did it', () => {
    const { id } = insertIncident(db, { title: 'HighCPU', severity: 'critical' });
    const incident = manager.acknowledge(id, 'alice');

    expect(incident.status).toBe('acknowledged');
    expect(incident.acknowledgedAt?.toISOString()).toBe('2024-04-01T08:00:00.000Z');
    expect(incident.metadata).toEqual({ acknowledgedBy: 'alice' });
  });

  it('resolves with a summary and then closes', () => {
    const { id } = insertIncident(db, { title: 'HighCPU', severity: 'critical' });

    const resolved = manager.resolve(id, 'Restarted the service', 'bob');
    expect(resolved.status).toBe('resolved');
    expect(resolved.summary).toBe('Restarted the service');
    expect(resolved.metadata).toEqual({ resolvedBy: 'bob' });

    const closed = manager.close(id);
    expect(closed.status).toBe('closed');
    expect(closed.closedAt?.toISOString()).toBe('2024-04-01T08:00:00.000Z');
  });

  it('refuses to resolve while an attached alert is firing', () => {
    const engine = new AlertLifecycleEngine(db, { now: () => T0 });
    engine.processWebhook({
      receiver: 'ops',
      status: 'firing',
      alerts: [
        {
          status: 'firing',
          fingerprint: 'fp-cpu',
          labels: { alertname: 'HighCPU', severity: 'critical' },
          startsAt: '2024-04-01T07:55:00Z',
        },
      ],
    });
    const [incident] = listIncidents(db);
    const id = incident?.id ?? -1;

    expect(() => manager.resolve(id)).toThrow(InvalidTransitionError);
    expect(() => manager.resolve(id)).toThrow(`Cannot resolve incident ${id} while 1 attached alert(s) are firing`);
    expect(getIncident(db, id)?.status).toBe('open');
  });

  it('resolves once every attached alert has stopped firing', () => {
    const engine = new AlertLifecycleEngine(db, { now: () => T0, autoResolveIncidents: false });
    const alertBody = (status: string) => ({
      receiver: 'ops',
      status,
      alerts: [
        {
          status,
          fingerprint: 'fp-cpu',
          labels: { alertname: 'HighCPU', severity: 'critical' },
          startsAt: '2024-04-01T07:55:00Z',
        },
      ],
    });
    engine.processWebhook(alertBody('firing'));
    engine.processWebhook(alertBody('resolved'));
    const [incident] = listIncidents(db);

    expect(manager.resolve(incident?.id ?? -1).status).toBe('resolved');
  });

  it('refuses to close an incident that is not resolved', () => {
    const { id } = insertIncident(db, { title: 'HighCPU', severity: 'critical' });
    expect(() => manager.close(id)).toThrow(InvalidTransitionError);
    expect(() => manager.close(id)).toThrow(`Cannot close incident ${id} in status open`);
  });

  it('refuses to acknowledge a closed incident', () => {
    const { id } = insertIncident(db, { title: 'HighCPU', severity: 'critical' });
    manager.resolve(id);
    manager.close(id);
    expect(() => manager.acknowledge(id)).toThrow(InvalidTransitionError);
  });

  it('appends notes', () => {
    const { id } = insertIncident(db, { title: 'HighCPU', severity: 'critical' });
    manager.addNote(id, 'Looking into it', 'alice');
    const incident = manager.addNote(id, 'Found the cause');

    expect(incident.metadata['notes']).toEqual([
      { text: 'Looking into it', author: 'alice', timestamp: '2024-04-01T08:00:00.000Z' },
      { text: 'Found the cause', author: '', timestamp: '2024-04-01T08:00:00.000Z' },
    ]);
  });

  it('throws IncidentNotFoundError for unknown ids', () => {
    expect(() => manager.acknowledge(404)).toThrow(IncidentNotFoundError);
    expect(() => manager.getIncidentWithAlerts(404)).toThrow('Incident 404 not found');
  });

  it('lists open and acknowledged incidents', () => {
    const a = insertIncident(db, { title: 'A', severity: 'critical' }, new Date(1_000));
    const b = insertIncident(db, { title: 'B', severity: 'warning' }, new Date(2_000));
    insertIncident(db, { title: 'C', severity: 'warning' }, new Date(3_000));
    manager.acknowledge(a.id);
    manager.resolve(b.id);

    expect(manager.getOpenIncidents().map((i) => i.title)).toEqual(['C', 'A']);
  });
});

describe('CheckAlertBridge', () => {
  let db: Db;
  let engine: AlertLifecycleEngine;
  let bridge: CheckAlertBridge;

  beforeEach(() => {
    db = initDb(':memory:');
    engine = new AlertLifecycleEngine(db);
    bridge = new CheckAlertBridge(engine, { hostname: 'web-1' });
  });

  afterEach(() => {
    db.close();
  });

  it('fingerprints by checker and host', () => {
    const expected = createHash('sha256').update('disk:web-1').digest('hex').slice(0, 16);
    expect(checkerFingerprint('disk', 'web-1')).toBe(expected);
  });

  it('maps a check result onto an alert', () => {
    const alert = bridge.toAlert({ ...diskResult('warning', 82), error: 'slow mount' });

    expect(alert.name).toBe('DISK Check Alert');
    expect(alert.status).toBe('firing');
    expect(alert.severity).toBe('warning');
    expect(alert.description).toBe('Disk /: 82% used\nError: slow mount');
    expect(alert.labels).toEqual({
      hostname: 'web-1',
      checker: 'disk',
      metric_disk_percent: '82',
      metric_path: '/',
    });
    expect(alert.annotations).toEqual({ disk_percent: '82', path: '/', mounts: '["/","/data"]' });
    expect(alert.endedAt).toBeNull();
  });

  it('maps statuses to severities', () => {
    expect(bridge.toAlert(diskResult('critical', 95)).severity).toBe('critical');
    expect(bridge.toAlert(diskResult('unknown', 0)).severity).toBe('warning');
    const ok = bridge.toAlert(diskResult('ok', 40));
    expect(ok.severity).toBe('info');
    expect(ok.status).toBe('resolved');
    expect(ok.endedAt).not.toBeNull();
  });

  it('opens and then resolves one alert and one incident for a disk warning', () => {
    const fired = bridge.processCheckResult(diskResult('warning', 82));
    expect(fired.alertsCreated).toBe(1);
    expect(fired.incidentsCreated).toBe(1);

    const alerts = listAlerts(db);
    expect(alerts).toHaveLength(1);
    expect(alerts[0]?.source).toBe(CHECKER_ALERT_SOURCE);
    expect(alerts[0]?.severity).toBe('warning');
    expect(alerts[0]?.status).toBe('firing');
    expect(alerts[0]?.groupingKey).toBe('checker:disk@web-1');

    const incidents = listIncidents(db);
    expect(incidents).toHaveLength(1);
    expect(incidents[0]?.status).toBe('open');

    const cleared = bridge.processCheckResult(diskResult('ok', 40));
    expect(cleared.alertsResolved).toBe(1);
    expect(cleared.incidentsResolved).toBe(1);

    expect(findAlert(db, checkerFingerprint('disk', 'web-1'), CHECKER_ALERT_SOURCE)?.status).toBe('resolved');
    expect(getIncident(db, incidents[0]?.id ?? -1)?.status).toBe('resolved');
    expect(listAlerts(db)).toHaveLength(1);
  });

  it('does nothing for an ok result with no prior alert', () => {
    const result = bridge.processCheckResult(diskResult('ok', 10));
    expect(result.totalProcessed).toBe(0);
    expect(listAlerts(db)).toHaveLength(0);
  });

  it('runs checkers, records runs and reports unknown names', async () => {
    const registry = new CheckerRegistry();
    registry.register('cpu', () => new StubChecker('cpu', 95));
    registry.register('memory', () => new StubChecker('memory', 20));
    bridge = new CheckAlertBridge(engine, { hostname: 'web-1', checkers: registry });

    const summary = await bridge.runChecksAndAlert(['cpu', 'memory', 'gpu'], 'trace-9');

    expect(summary.checksRun).toBe(2);
    expect(summary.alertsCreated).toBe(1);
    expect(summary.incidentsCreated).toBe(1);
    expect(summary.errors).toEqual(['Unknown checker: gpu. Available: cpu, memory']);

    const runs = listCheckRuns(db);
    expect(runs.map((r) => r.checkerName).sort()).toEqual(['cpu', 'memory']);
    expect(runs.every((r) => r.traceId === 'trace-9')).toBe(true);
  });

  it('runs every enabled checker by default', async () => {
    const registry = new CheckerRegistry({ skip: ['memory'] });
    registry.register('cpu', () => new StubChecker('cpu', 75));
    registry.register('memory', () => new StubChecker('memory', 75));
    bridge = new CheckAlertBridge(engine, { hostname: 'web-1', checkers: registry });

    const summary = await bridge.runChecksAndAlert();

    expect(summary.checksRun).toBe(1);
    expect(listAlerts(db).map((a) => a.name)).toEqual(['CPU Check Alert']);
  });
});
