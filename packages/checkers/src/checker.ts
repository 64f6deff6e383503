import type { JsonObject } from '@alertline/core';
import type { CheckStatus } from '@alertline/store';

export type { CheckStatus } from '@alertline/store';

export const CHECK_STATUSES: readonly CheckStatus[] = ['ok', 'warning', 'critical', 'unknown'];

/**
 * Standardized result from a checker
 */
export interface CheckResult {
  status: CheckStatus;
  /** Human-readable description of the result */
  message: string;
  /** Measured values, e.g. `{ cpu_percent: 45.2 }` */
  metrics: JsonObject;
  checkerName: string;
  /** Set when the check itself failed */
  error?: string;
}

/**
 * Checker interface - all health checks implement this
 */
export interface Checker {
  readonly name: string;

  /**
   * Measure and classify. Implementations convert their own failures into
   * an `unknown` result, but callers must still expect a rejection.
   */
  check(): Promise<CheckResult>;
}

export interface ThresholdOptions {
  /** Value at which status becomes warning (default 70) */
  warningThreshold?: number;
  /** Value at which status becomes critical (default 90) */
  criticalThreshold?: number;
}

/**
 * Base class for percentage-style checkers
 */
export abstract class BaseChecker implements Checker {
  abstract readonly name: string;

  readonly warningThreshold: number;
  readonly criticalThreshold: number;

  constructor(options: ThresholdOptions = {}) {
    this.warningThreshold = options.warningThreshold ?? 70;
    this.criticalThreshold = options.criticalThreshold ?? 90;
  }

  abstract check(): Promise<CheckResult>;

  /**
   * Classify a measured value against the thresholds (inclusive)
   */
  determineStatus(value: number): CheckStatus {
    if (value >= this.criticalThreshold) return 'critical';
    if (value >= this.warningThreshold) return 'warning';
    return 'ok';
  }

  protected makeResult(status: CheckStatus, message: string, metrics: JsonObject = {}, error?: string): CheckResult {
    const result: CheckResult = { status, message, metrics, checkerName: this.name };
    if (error !== undefined) {
      result.error = error;
    }
    return result;
  }

  protected errorResult(error: string): CheckResult {
    return this.makeResult('unknown', `Check failed: ${error}`, {}, error);
  }
}

export function round(value: number, digits = 1): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
