import type { JsonObject } from './json.js';

export const ALERT_STATUSES = ['firing', 'resolved'] as const;
export type AlertStatus = (typeof ALERT_STATUSES)[number];

export const ALERT_SEVERITIES = ['critical', 'warning', 'info'] as const;
export type AlertSeverity = (typeof ALERT_SEVERITIES)[number];

/**
 * Ordinal used to pick the worse of two severities
 */
export const SEVERITY_RANK: Readonly<Record<AlertSeverity, number>> = {
  critical: 3,
  warning: 2,
  info: 1,
};

/**
 * Canonical alert produced by every source driver.
 *
 * Only {@link createNormalizedAlert} builds these, so `status` and `severity`
 * are always one of the enumerated values.
 */
export interface NormalizedAlert {
  /** Stable dedup key for one logical alert stream */
  readonly fingerprint: string;
  readonly name: string;
  readonly status: AlertStatus;
  readonly severity: AlertSeverity;
  readonly description: string;
  readonly labels: Readonly<Record<string, string>>;
  readonly annotations: Readonly<Record<string, string>>;
  readonly startedAt: Date;
  readonly endedAt: Date | null;
  /** Source payload fragment kept for audit */
  readonly rawPayload: JsonObject;
}

/**
 * Loose input accepted by {@link createNormalizedAlert}
 */
export interface NormalizedAlertInput {
  fingerprint: string;
  name: string;
  status?: string;
  severity?: string;
  description?: string;
  labels?: Record<string, string>;
  annotations?: Record<string, string>;
  startedAt?: Date;
  endedAt?: Date | null;
  rawPayload?: JsonObject;
}

/**
 * A parsed webhook delivery: ordered alerts plus passthrough metadata
 */
export interface NormalizedPayload {
  readonly alerts: readonly NormalizedAlert[];
  /** Name of the driver that produced it (or the source the payload names) */
  readonly source: string;
  readonly version: string;
  readonly groupKey: string;
  readonly receiver: string;
  readonly externalUrl: string;
  readonly rawPayload: JsonObject;
}

export function normalizeStatus(value: string | undefined): AlertStatus {
  const status = (value ?? '').trim().toLowerCase();
  return status === 'resolved' ? 'resolved' : 'firing';
}

export function normalizeSeverity(value: string | undefined): AlertSeverity {
  const severity = (value ?? '').trim().toLowerCase();
  return isAlertSeverity(severity) ? severity : 'warning';
}

export function isAlertSeverity(value: string): value is AlertSeverity {
  return ALERT_SEVERITIES.some((severity) => severity === value);
}

/**
 * Pick the higher-ranked severity
 */
export function worseSeverity(a: AlertSeverity, b: AlertSeverity): AlertSeverity {
  return SEVERITY_RANK[b] > SEVERITY_RANK[a] ? b : a;
}

export function createNormalizedAlert(input: NormalizedAlertInput): NormalizedAlert {
  return {
    fingerprint: input.fingerprint,
    name: input.name,
    status: normalizeStatus(input.status),
    severity: normalizeSeverity(input.severity),
    description: input.description ?? '',
    labels: { ...(input.labels ?? {}) },
    annotations: { ...(input.annotations ?? {}) },
    startedAt: input.startedAt ?? new Date(),
    endedAt: input.endedAt ?? null,
    rawPayload: input.rawPayload ?? {},
  };
}

export function createNormalizedPayload(
  source: string,
  alerts: readonly NormalizedAlert[],
  meta: Partial<Omit<NormalizedPayload, 'alerts' | 'source'>> = {},
): NormalizedPayload {
  return {
    alerts,
    source,
    version: meta.version ?? '',
    groupKey: meta.groupKey ?? '',
    receiver: meta.receiver ?? '',
    externalUrl: meta.externalUrl ?? '',
    rawPayload: meta.rawPayload ?? {},
  };
}
