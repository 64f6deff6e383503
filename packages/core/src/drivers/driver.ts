import { createHash } from 'node:crypto';
import type { NormalizedPayload } from '../alert.js';
import { InvalidPayloadError } from '../errors.js';
import { isRecord, type JsonObject } from '../json.js';

/**
 * Capability contract every alert source adapter implements
 */
export interface SourceDriver {
  /** Registry name, also used as the payload `source` */
  readonly name: string;

  /**
   * Pure shape check. Never throws, whatever the input.
   */
  validate(payload: unknown): boolean;

  /**
   * Map the payload into canonical alerts
   *
   * @throws InvalidPayloadError when `validate(payload)` is false
   */
  parse(payload: unknown): NormalizedPayload;

  /**
   * Stable digest of an alert name and its labels, independent of label order
   */
  generateFingerprint(labels: Readonly<Record<string, string>>, name: string): string;
}

/** Length of generated fingerprints in hex characters */
export const FINGERPRINT_LENGTH = 16;

/**
 * Default fingerprint: SHA-256 over the name and the key-sorted label pairs
 */
export function fingerprintOf(labels: Readonly<Record<string, string>>, name: string): string {
  const pairs = Object.entries(labels).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return createHash('sha256')
    .update(`${name}:${JSON.stringify(pairs)}`)
    .digest('hex')
    .slice(0, FINGERPRINT_LENGTH);
}

/**
 * Shared plumbing for concrete drivers.
 *
 * Subclasses implement `matches` (shape predicate over an object payload) and
 * `parseRecord`; this class handles the non-object and throwing cases so the
 * public `validate`/`parse` contract holds for every driver.
 */
export abstract class BaseSourceDriver implements SourceDriver {
  abstract readonly name: string;

  protected abstract matches(payload: JsonObject): boolean;

  protected abstract parseRecord(payload: JsonObject): NormalizedPayload;

  validate(payload: unknown): boolean {
    if (!isRecord(payload)) return false;
    try {
      return this.matches(payload);
    } catch {
      return false;
    }
  }

  parse(payload: unknown): NormalizedPayload {
    if (!isRecord(payload) || !this.validate(payload)) {
      throw new InvalidPayloadError(this.name);
    }
    return this.parseRecord(payload);
  }

  generateFingerprint(labels: Readonly<Record<string, string>>, name: string): string {
    return fingerprintOf(labels, name);
  }
}
