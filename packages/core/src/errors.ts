/**
 * Error codes surfaced in processing results and API responses
 */
export type AlertlineErrorCode =
  | 'INVALID_PAYLOAD'
  | 'UNKNOWN_DRIVER'
  | 'DRIVER_NOT_DETECTED'
  | 'UNKNOWN_CHECKER'
  | 'UNKNOWN_PROVIDER'
  | 'UNKNOWN_NOTIFY_DRIVER'
  | 'UNKNOWN_NODE_TYPE'
  | 'PROVIDER_TIMEOUT'
  | 'CHANNEL_DELIVERY_FAILED'
  | 'PERSISTENCE_FAILED'
  | 'INCIDENT_NOT_FOUND'
  | 'INVALID_TRANSITION'
  | 'INVALID_DEFINITION';

export class AlertlineError extends Error {
  readonly code: AlertlineErrorCode;

  constructor(code: AlertlineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A driver was asked to parse a payload its own `validate` rejects
 */
export class InvalidPayloadError extends AlertlineError {
  constructor(readonly driver: string, detail?: string) {
    super('INVALID_PAYLOAD', `Invalid ${driver} payload${detail ? `: ${detail}` : ''}`);
  }
}

/**
 * Name lookup in one of the registries failed
 */
export abstract class UnknownNameError extends AlertlineError {
  constructor(
    code: AlertlineErrorCode,
    kind: string,
    readonly requested: string,
    readonly available: readonly string[],
  ) {
    super(code, `Unknown ${kind}: ${requested}. Available: ${available.join(', ')}`);
  }
}

export class UnknownDriverError extends UnknownNameError {
  constructor(requested: string, available: readonly string[]) {
    super('UNKNOWN_DRIVER', 'driver', requested, available);
  }
}

export class UnknownCheckerError extends UnknownNameError {
  constructor(requested: string, available: readonly string[]) {
    super('UNKNOWN_CHECKER', 'checker', requested, available);
  }
}

export class UnknownProviderError extends UnknownNameError {
  constructor(requested: string, available: readonly string[]) {
    super('UNKNOWN_PROVIDER', 'provider', requested, available);
  }
}

export class UnknownNotifyDriverError extends UnknownNameError {
  constructor(requested: string, available: readonly string[]) {
    super('UNKNOWN_NOTIFY_DRIVER', 'notify driver', requested, available);
  }
}

export class UnknownNodeTypeError extends UnknownNameError {
  constructor(requested: string, available: readonly string[]) {
    super('UNKNOWN_NODE_TYPE', 'node type', requested, available);
  }
}

export class ProviderTimeoutError extends AlertlineError {
  constructor(readonly provider: string, readonly timeoutMs: number) {
    super('PROVIDER_TIMEOUT', `Provider ${provider} timed out after ${timeoutMs}ms`);
  }
}

export class ChannelDeliveryError extends AlertlineError {
  constructor(readonly channel: string, detail: string) {
    super('CHANNEL_DELIVERY_FAILED', `Delivery to ${channel} failed: ${detail}`);
  }
}

export class PersistenceError extends AlertlineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PERSISTENCE_FAILED', message, options);
  }
}

export class IncidentNotFoundError extends AlertlineError {
  constructor(readonly incidentId: number) {
    super('INCIDENT_NOT_FOUND', `Incident ${incidentId} not found`);
  }
}

export class InvalidTransitionError extends AlertlineError {
  constructor(message: string) {
    super('INVALID_TRANSITION', message);
  }
}

export function isAlertlineError(error: unknown): error is AlertlineError {
  return error instanceof AlertlineError;
}

/**
 * Message text of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
