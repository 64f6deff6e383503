import { createHash } from 'node:crypto';
import { hostname as osHostname } from 'node:os';
import {
  FINGERPRINT_LENGTH,
  createNormalizedAlert,
  createNormalizedPayload,
  errorMessage,
  silentLogger,
  toStringMap,
  type AlertSeverity,
  type Logger,
  type NormalizedAlert,
} from '@alertline/core';
import {
  createDefaultCheckerRegistry,
  runChecker,
  type CheckResult,
  type CheckStatus,
  type CheckerRegistry,
} from '@alertline/checkers';
import type { AlertLifecycleEngine } from './engine.js';
import { emptyCounts, type ProcessingCounts, type ProcessingResult } from './result.js';

export const CHECKER_ALERT_SOURCE = 'server-checkers';

const STATUS_TO_SEVERITY: Readonly<Record<CheckStatus, AlertSeverity>> = {
  critical: 'critical',
  warning: 'warning',
  unknown: 'warning',
  ok: 'info',
};

export interface CheckAlertBridgeOptions {
  checkers?: CheckerRegistry;
  /** Host label for produced alerts (default: this machine's hostname) */
  hostname?: string;
  logger?: Logger;
}

export interface CheckAlertResult extends ProcessingCounts {
  checksRun: number;
  errors: string[];
}

/**
 * Stable per-host fingerprint for a checker's alert stream
 */
export function checkerFingerprint(checkerName: string, hostname: string): string {
  return createHash('sha256').update(`${checkerName}:${hostname}`).digest('hex').slice(0, FINGERPRINT_LENGTH);
}

/**
 * Feeds health-check results through the lifecycle engine as alerts.
 *
 * A non-ok result fires the checker's alert for this host; an ok result
 * resolves it.
 */
export class CheckAlertBridge {
  readonly hostname: string;
  private readonly checkers: CheckerRegistry;
  private readonly logger: Logger;

  constructor(
    private readonly engine: AlertLifecycleEngine,
    options: CheckAlertBridgeOptions = {},
  ) {
    this.hostname = options.hostname ?? osHostname();
    this.checkers = options.checkers ?? createDefaultCheckerRegistry();
    this.logger = options.logger ?? silentLogger();
  }

  toAlert(result: CheckResult, labels: Record<string, string> = {}, now: Date = new Date()): NormalizedAlert {
    const alertLabels: Record<string, string> = {
      hostname: this.hostname,
      checker: result.checkerName,
      ...labels,
    };
    for (const [key, value] of Object.entries(result.metrics)) {
      if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        alertLabels[`metric_${key}`] = String(value);
      }
    }

    const resolved = result.status === 'ok';

    return createNormalizedAlert({
      fingerprint: checkerFingerprint(result.checkerName, this.hostname),
      name: `${result.checkerName.toUpperCase()} Check Alert`,
      status: resolved ? 'resolved' : 'firing',
      severity: STATUS_TO_SEVERITY[result.status],
      description: result.error ? `${result.message}\nError: ${result.error}` : result.message,
      labels: alertLabels,
      annotations: toStringMap(result.metrics),
      startedAt: now,
      endedAt: resolved ? now : null,
      rawPayload: {
        checker_name: result.checkerName,
        status: result.status,
        message: result.message,
        metrics: result.metrics,
        error: result.error ?? null,
      },
    });
  }

  processCheckResult(result: CheckResult, labels?: Record<string, string>): ProcessingResult {
    const alert = this.toAlert(result, labels);
    return this.engine.processPayload(createNormalizedPayload(CHECKER_ALERT_SOURCE, [alert]));
  }

  /**
   * Run checkers and turn each result into an alert
   *
   * @param names - Checkers to run; defaults to every enabled checker
   */
  async runChecksAndAlert(names?: readonly string[], traceId?: string): Promise<CheckAlertResult> {
    const summary: CheckAlertResult = { ...emptyCounts(), checksRun: 0, errors: [] };

    for (const name of names ?? this.checkers.getEnabledNames()) {
      let result: CheckResult;
      try {
        const checker = this.checkers.get(name);
        result = await runChecker(checker, {
          db: this.engine.db,
          hostname: this.hostname,
          logger: this.logger,
          ...(traceId ? { traceId } : {}),
        });
      } catch (error) {
        summary.errors.push(errorMessage(error));
        continue;
      }

      summary.checksRun++;
      const processed = this.processCheckResult(result);
      summary.alertsCreated += processed.alertsCreated;
      summary.alertsUpdated += processed.alertsUpdated;
      summary.alertsResolved += processed.alertsResolved;
      summary.alertsRefired += processed.alertsRefired;
      summary.incidentsCreated += processed.incidentsCreated;
      summary.incidentsUpdated += processed.incidentsUpdated;
      summary.incidentsResolved += processed.incidentsResolved;
      summary.errors.push(...processed.errors.map((message) => `${name}: ${message}`));
    }

    this.logger.info({ checksRun: summary.checksRun, errors: summary.errors.length }, 'Checks processed into alerts');
    return summary;
  }
}
