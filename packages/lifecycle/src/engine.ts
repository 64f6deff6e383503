import {
  SEVERITY_RANK,
  PersistenceError,
  createDefaultDriverRegistry,
  errorMessage,
  isAlertlineError,
  silentLogger,
  type AlertSeverity,
  type DriverRegistry,
  type Logger,
  type NormalizedAlert,
  type NormalizedPayload,
  type SourceDriver,
} from '@alertline/core';
import {
  ACTIVE_INCIDENT_STATUSES,
  countFiringAlerts,
  findActiveIncidentByGroupingKey,
  findAlert,
  getIncident,
  insertAlert,
  insertHistory,
  insertIncident,
  listAlerts,
  listIncidents,
  updateAlert,
  updateIncident,
  type Db,
  type PersistedAlert,
} from '@alertline/store';
import { groupingKeyFor } from './grouping.js';
import { ProcessingResult, emptyCounts, type ProcessingCounts } from './result.js';

export interface LifecycleEngineOptions {
  /** Create or join an incident for new critical/warning alerts (default true) */
  autoCreateIncidents?: boolean;
  /** Resolve incidents whose alerts have all stopped firing (default true) */
  autoResolveIncidents?: boolean;
  /** Let a resolved alert flip back to firing (default true) */
  refireResolvedAlerts?: boolean;
  drivers?: DriverRegistry;
  logger?: Logger;
  /** Clock, overridable in tests */
  now?: () => Date;
}

export const AUTO_RESOLVE_SUMMARY = 'All alerts resolved automatically';

function opensIncident(severity: AlertSeverity): boolean {
  return severity === 'critical' || severity === 'warning';
}

/**
 * Alert/incident state machine.
 *
 * Each (fingerprint, source) pair is one alert row that moves between firing
 * and resolved. A payload is applied in one transaction; each alert inside it
 * gets its own savepoint so a failing alert is rolled back and reported while
 * the rest of the payload still commits.
 */
export class AlertLifecycleEngine {
  readonly autoCreateIncidents: boolean;
  readonly autoResolveIncidents: boolean;
  readonly refireResolvedAlerts: boolean;
  readonly drivers: DriverRegistry;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    readonly db: Db,
    options: LifecycleEngineOptions = {},
  ) {
    this.autoCreateIncidents = options.autoCreateIncidents ?? true;
    this.autoResolveIncidents = options.autoResolveIncidents ?? true;
    this.refireResolvedAlerts = options.refireResolvedAlerts ?? true;
    this.drivers = options.drivers ?? createDefaultDriverRegistry();
    this.logger = options.logger ?? silentLogger();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Parse a raw webhook body and apply it.
   *
   * @param driver - Driver name, instance, or omitted for detection
   */
  processWebhook(payload: unknown, driver?: string | SourceDriver): ProcessingResult {
    const result = new ProcessingResult();

    let selected: SourceDriver | undefined;
    if (typeof driver === 'string') {
      try {
        selected = this.drivers.get(driver);
      } catch (error) {
        return result.reject(isAlertlineError(error) ? error.code : 'UNKNOWN_DRIVER', errorMessage(error));
      }
    } else {
      selected = driver ?? this.drivers.detect(payload);
    }

    if (!selected) {
      return result.reject('DRIVER_NOT_DETECTED', 'Could not detect driver for payload');
    }

    let parsed: NormalizedPayload;
    try {
      parsed = selected.parse(payload);
    } catch (error) {
      this.logger.warn({ driver: selected.name, error: errorMessage(error) }, 'Rejected webhook payload');
      return result.reject(isAlertlineError(error) ? error.code : 'INVALID_PAYLOAD', errorMessage(error));
    }

    return this.processPayload(parsed, result);
  }

  /**
   * Apply an already normalized payload
   */
  processPayload(parsed: NormalizedPayload, result: ProcessingResult = new ProcessingResult()): ProcessingResult {
    const now = this.now();

    const applyBatch = this.db.transaction(() => {
      for (const alert of parsed.alerts) {
        const tally = emptyCounts();
        const applyAlert = this.db.transaction(() => this.applyAlert(alert, parsed, tally, now));
        try {
          applyAlert();
          result.add(tally);
        } catch (error) {
          this.logger.warn(
            { fingerprint: alert.fingerprint, source: parsed.source, error: errorMessage(error) },
            'Alert processing failed',
          );
          result.errors.push(`${alert.fingerprint}: ${errorMessage(error)}`);
        }
      }
    });

    try {
      applyBatch();
    } catch (error) {
      this.logger.error({ source: parsed.source, error: errorMessage(error) }, 'Payload transaction failed');
      result.resetCounts();
      result.errors.push(
        new PersistenceError(`Payload from ${parsed.source} failed: ${errorMessage(error)}`, { cause: error }).message,
      );
      return result;
    }

    if (this.autoResolveIncidents) {
      try {
        result.incidentsResolved += this.resolveQuietIncidents(now);
      } catch (error) {
        this.logger.error({ error: errorMessage(error) }, 'Incident auto-resolution failed');
        result.errors.push(new PersistenceError(`Incident auto-resolution failed: ${errorMessage(error)}`).message);
      }
    }

    this.logger.info(
      {
        source: parsed.source,
        alerts: parsed.alerts.length,
        created: result.alertsCreated,
        updated: result.alertsUpdated,
        resolved: result.alertsResolved,
        refired: result.alertsRefired,
        errors: result.errors.length,
      },
      'Payload processed',
    );

    return result;
  }

  private applyAlert(alert: NormalizedAlert, payload: NormalizedPayload, tally: ProcessingCounts, now: Date): void {
    const existing = findAlert(this.db, alert.fingerprint, payload.source);

    if (!existing) {
      if (alert.status === 'resolved') {
        // Nothing to resolve
        return;
      }
      this.createAlert(alert, payload, tally, now);
      return;
    }

    const mutable = {
      severity: alert.severity,
      description: alert.description,
      annotations: alert.annotations,
      rawPayload: alert.rawPayload,
    };

    if (existing.status === 'firing') {
      if (alert.status === 'firing') {
        updateAlert(this.db, existing.id, mutable, now);
        if (existing.severity !== alert.severity) {
          insertHistory(
            this.db,
            {
              alertId: existing.id,
              event: 'severity_changed',
              oldStatus: existing.status,
              newStatus: existing.status,
              details: { oldSeverity: existing.severity, newSeverity: alert.severity },
            },
            now,
          );
        }
        tally.alertsUpdated++;
        return;
      }

      updateAlert(this.db, existing.id, { ...mutable, status: 'resolved', endedAt: alert.endedAt ?? now }, now);
      insertHistory(
        this.db,
        { alertId: existing.id, event: 'resolved', oldStatus: 'firing', newStatus: 'resolved' },
        now,
      );
      tally.alertsResolved++;
      this.logger.info({ fingerprint: existing.fingerprint, name: existing.name }, 'Alert resolved');
      return;
    }

    if (alert.status === 'firing' && this.refireResolvedAlerts) {
      updateAlert(this.db, existing.id, { ...mutable, status: 'firing', endedAt: null }, now);
      insertHistory(
        this.db,
        { alertId: existing.id, event: 'refired', oldStatus: 'resolved', newStatus: 'firing' },
        now,
      );
      tally.alertsRefired++;
      this.logger.info({ fingerprint: existing.fingerprint, name: existing.name }, 'Alert refired');

      if (this.autoCreateIncidents && opensIncident(alert.severity) && !this.hasActiveIncident(existing)) {
        this.attachIncident({ ...existing, severity: alert.severity, description: alert.description }, tally, now);
      }
      return;
    }

    updateAlert(this.db, existing.id, mutable, now);
    tally.alertsUpdated++;
  }

  private createAlert(alert: NormalizedAlert, payload: NormalizedPayload, tally: ProcessingCounts, now: Date): void {
    const created = insertAlert(
      this.db,
      {
        fingerprint: alert.fingerprint,
        source: payload.source,
        name: alert.name,
        status: 'firing',
        severity: alert.severity,
        description: alert.description,
        labels: alert.labels,
        annotations: alert.annotations,
        rawPayload: alert.rawPayload,
        groupingKey: groupingKeyFor(alert, payload),
        startedAt: alert.startedAt,
        endedAt: null,
      },
      now,
    );

    insertHistory(
      this.db,
      { alertId: created.id, event: 'created', newStatus: 'firing', details: { source: payload.source } },
      now,
    );
    tally.alertsCreated++;
    this.logger.info({ fingerprint: created.fingerprint, name: created.name, source: created.source }, 'Alert created');

    if (this.autoCreateIncidents && opensIncident(created.severity)) {
      this.attachIncident(created, tally, now);
    }
  }

  private hasActiveIncident(alert: PersistedAlert): boolean {
    if (alert.incidentId === null) return false;
    const incident = getIncident(this.db, alert.incidentId);
    return incident !== undefined && ACTIVE_INCIDENT_STATUSES.includes(incident.status);
  }

  /**
   * Join the active incident sharing the alert's grouping key, or open one
   */
  private attachIncident(alert: PersistedAlert, tally: ProcessingCounts, now: Date): void {
    const incident = findActiveIncidentByGroupingKey(this.db, alert.groupingKey);

    if (incident) {
      updateAlert(this.db, alert.id, { incidentId: incident.id }, now);
      if (SEVERITY_RANK[alert.severity] > SEVERITY_RANK[incident.severity]) {
        updateIncident(this.db, incident.id, { severity: alert.severity }, now);
      }
      tally.incidentsUpdated++;
      return;
    }

    const created = insertIncident(
      this.db,
      { title: alert.name, severity: alert.severity, description: alert.description },
      now,
    );
    updateAlert(this.db, alert.id, { incidentId: created.id }, now);
    tally.incidentsCreated++;
    this.logger.info({ incidentId: created.id, title: created.title }, 'Incident created');
  }

  /**
   * Resolve every open or acknowledged incident that has alerts but none firing
   *
   * @returns Number of incidents resolved
   */
  resolveQuietIncidents(now: Date = this.now()): number {
    const sweep = this.db.transaction(() => {
      let resolved = 0;
      for (const incident of listIncidents(this.db, { statuses: ACTIVE_INCIDENT_STATUSES })) {
        if (countFiringAlerts(this.db, incident.id) > 0) continue;
        if (listAlerts(this.db, { incidentId: incident.id, limit: 1 }).length === 0) continue;

        updateIncident(
          this.db,
          incident.id,
          { status: 'resolved', resolvedAt: now, summary: AUTO_RESOLVE_SUMMARY },
          now,
        );
        this.logger.info({ incidentId: incident.id, title: incident.title }, 'Incident auto-resolved');
        resolved++;
      }
      return resolved;
    });
    return sweep();
  }
}
