import type { AlertlineErrorCode } from '@alertline/core';

export interface ProcessingCounts {
  alertsCreated: number;
  alertsUpdated: number;
  alertsResolved: number;
  alertsRefired: number;
  incidentsCreated: number;
  incidentsUpdated: number;
  incidentsResolved: number;
}

export function emptyCounts(): ProcessingCounts {
  return {
    alertsCreated: 0,
    alertsUpdated: 0,
    alertsResolved: 0,
    alertsRefired: 0,
    incidentsCreated: 0,
    incidentsUpdated: 0,
    incidentsResolved: 0,
  };
}

/**
 * Why a payload was turned away before any alert was processed
 */
export interface PayloadRejection {
  code: AlertlineErrorCode;
  message: string;
}

export interface ProcessingSummary extends ProcessingCounts {
  errors: string[];
  totalProcessed: number;
  hasErrors: boolean;
}

/**
 * Outcome of processing one webhook delivery
 */
export class ProcessingResult implements ProcessingCounts {
  alertsCreated = 0;
  alertsUpdated = 0;
  alertsResolved = 0;
  alertsRefired = 0;
  incidentsCreated = 0;
  incidentsUpdated = 0;
  incidentsResolved = 0;
  errors: string[] = [];
  rejection: PayloadRejection | null = null;

  get totalProcessed(): number {
    return this.alertsCreated + this.alertsUpdated + this.alertsResolved + this.alertsRefired;
  }

  get hasErrors(): boolean {
    return this.errors.length > 0;
  }

  add(counts: ProcessingCounts): void {
    this.alertsCreated += counts.alertsCreated;
    this.alertsUpdated += counts.alertsUpdated;
    this.alertsResolved += counts.alertsResolved;
    this.alertsRefired += counts.alertsRefired;
    this.incidentsCreated += counts.incidentsCreated;
    this.incidentsUpdated += counts.incidentsUpdated;
    this.incidentsResolved += counts.incidentsResolved;
  }

  /**
   * Zero every alert and incident count, keeping the errors
   */
  resetCounts(): void {
    this.alertsCreated = 0;
    this.alertsUpdated = 0;
    this.alertsResolved = 0;
    this.alertsRefired = 0;
    this.incidentsCreated = 0;
    this.incidentsUpdated = 0;
    this.incidentsResolved = 0;
  }

  reject(code: AlertlineErrorCode, message: string): this {
    this.rejection = { code, message };
    this.errors.push(message);
    return this;
  }

  toJSON(): ProcessingSummary {
    return {
      alertsCreated: this.alertsCreated,
      alertsUpdated: this.alertsUpdated,
      alertsResolved: this.alertsResolved,
      alertsRefired: this.alertsRefired,
      incidentsCreated: this.incidentsCreated,
      incidentsUpdated: this.incidentsUpdated,
      incidentsResolved: this.incidentsResolved,
      errors: [...this.errors],
      totalProcessed: this.totalProcessed,
      hasErrors: this.hasErrors,
    };
  }
}
