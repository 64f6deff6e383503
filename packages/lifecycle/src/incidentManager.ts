import {
  IncidentNotFoundError,
  InvalidTransitionError,
  asArray,
  silentLogger,
  type JsonObject,
  type Logger,
} from '@alertline/core';
import {
  ACTIVE_INCIDENT_STATUSES,
  countFiringAlerts,
  getIncident,
  listAlerts,
  listHistory,
  listIncidents,
  updateIncident,
  type AlertHistoryEntry,
  type Db,
  type Incident,
  type IncidentStatus,
  type PersistedAlert,
} from '@alertline/store';

export interface IncidentNote {
  text: string;
  author: string;
  timestamp: string;
}

export interface AlertWithHistory extends PersistedAlert {
  history: AlertHistoryEntry[];
}

export interface IncidentWithAlerts {
  incident: Incident;
  alerts: AlertWithHistory[];
}

/**
 * Operator-driven incident transitions
 *
 * open → acknowledged → resolved → closed; resolve is also allowed straight
 * from open, but only once none of the incident's alerts is firing. The
 * lifecycle engine's auto-resolution does not go through here.
 */
export class IncidentManager {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly db: Db,
    options: { logger?: Logger; now?: () => Date } = {},
  ) {
    this.logger = options.logger ?? silentLogger();
    this.now = options.now ?? (() => new Date());
  }

  acknowledge(incidentId: number, acknowledgedBy = ''): Incident {
    const incident = this.require(incidentId);
    this.assertStatus(incident, ACTIVE_INCIDENT_STATUSES, 'acknowledge');

    const now = this.now();
    updateIncident(
      this.db,
      incidentId,
      {
        status: 'acknowledged',
        acknowledgedAt: now,
        ...(acknowledgedBy ? { metadata: { ...incident.metadata, acknowledgedBy } } : {}),
      },
      now,
    );

    this.logger.info({ incidentId, acknowledgedBy }, 'Incident acknowledged');
    return this.require(incidentId);
  }

  resolve(incidentId: number, summary = '', resolvedBy = ''): Incident {
    const incident = this.require(incidentId);
    this.assertStatus(incident, ACTIVE_INCIDENT_STATUSES, 'resolve');

    const firing = countFiringAlerts(this.db, incidentId);
    if (firing > 0) {
      throw new InvalidTransitionError(
        `Cannot resolve incident ${incidentId} while ${firing} attached alert(s) are firing`,
      );
    }

    const now = this.now();
    updateIncident(
      this.db,
      incidentId,
      {
        status: 'resolved',
        resolvedAt: now,
        ...(summary ? { summary } : {}),
        ...(resolvedBy ? { metadata: { ...incident.metadata, resolvedBy } } : {}),
      },
      now,
    );

    this.logger.info({ incidentId, resolvedBy }, 'Incident resolved');
    return this.require(incidentId);
  }

  /**
   * Close a resolved incident
   */
  close(incidentId: number): Incident {
    const incident = this.require(incidentId);
    this.assertStatus(incident, ['resolved'], 'close');

    const now = this.now();
    updateIncident(this.db, incidentId, { status: 'closed', closedAt: now }, now);

    this.logger.info({ incidentId }, 'Incident closed');
    return this.require(incidentId);
  }

  addNote(incidentId: number, text: string, author = ''): Incident {
    const incident = this.require(incidentId);
    const now = this.now();

    const note: IncidentNote = { text, author, timestamp: now.toISOString() };
    const metadata: JsonObject = {
      ...incident.metadata,
      notes: [...asArray(incident.metadata['notes']), note],
    };
    updateIncident(this.db, incidentId, { metadata }, now);

    return this.require(incidentId);
  }

  getOpenIncidents(): Incident[] {
    return listIncidents(this.db, { statuses: ACTIVE_INCIDENT_STATUSES });
  }

  getIncidentWithAlerts(incidentId: number): IncidentWithAlerts {
    const incident = this.require(incidentId);
    const alerts = listAlerts(this.db, { incidentId }).map((alert) => ({
      ...alert,
      history: listHistory(this.db, alert.id),
    }));
    return { incident, alerts };
  }

  private require(incidentId: number): Incident {
    const incident = getIncident(this.db, incidentId);
    if (!incident) {
      throw new IncidentNotFoundError(incidentId);
    }
    return incident;
  }

  private assertStatus(incident: Incident, allowed: readonly IncidentStatus[], action: string): void {
    if (!allowed.includes(incident.status)) {
      throw new InvalidTransitionError(`Cannot ${action} incident ${incident.id} in status ${incident.status}`);
    }
  }
}
