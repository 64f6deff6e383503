import { createHmac, randomBytes, timingSafeEqual } from 'node:crypto';

export const SIGNATURE_HEADER = 'X-Alertline-Signature';
export const DELIVERY_ID_HEADER = 'X-Alertline-Delivery-Id';

/**
 * HMAC-SHA256 over `timestamp.payload`, hex encoded.
 *
 * Binding the timestamp into the MAC lets receivers reject replays.
 */
export function generateSignature(payload: string, timestamp: number, secret: string): string {
  return createHmac('sha256', secret).update(`${timestamp}.${payload}`).digest('hex');
}

/**
 * Header value in the `t=<timestamp>,v1=<signature>` format
 */
export function formatSignatureHeader(payload: string, secret: string, timestamp = Math.floor(Date.now() / 1000)): string {
  return `t=${timestamp},v1=${generateSignature(payload, timestamp, secret)}`;
}

export interface SignatureCheck {
  valid: boolean;
  error?: string;
}

/**
 * Verify a `t=<timestamp>,v1=<signature>` header against the raw body
 *
 * @param maxAgeSeconds - Oldest accepted timestamp (default: 300)
 */
export function verifySignature(
  payload: string,
  header: string,
  secret: string,
  maxAgeSeconds = 300,
  nowSeconds = Math.floor(Date.now() / 1000),
): SignatureCheck {
  const parts = header.split(',');
  const timestampPart = parts.find((p) => p.startsWith('t='));
  const signaturePart = parts.find((p) => p.startsWith('v1='));

  if (!timestampPart || !signaturePart) {
    return { valid: false, error: 'Invalid signature header format' };
  }

  const timestamp = parseInt(timestampPart.slice(2), 10);
  const signature = signaturePart.slice(3);

  if (isNaN(timestamp)) {
    return { valid: false, error: 'Invalid timestamp in signature header' };
  }

  const age = nowSeconds - timestamp;
  if (age > maxAgeSeconds) {
    return { valid: false, error: `Timestamp too old: ${age}s > ${maxAgeSeconds}s` };
  }
  // 60s of clock skew
  if (age < -60) {
    return { valid: false, error: 'Timestamp in the future' };
  }

  const expected = Buffer.from(generateSignature(payload, timestamp, secret), 'utf8');
  const received = Buffer.from(signature, 'utf8');
  if (expected.length !== received.length || !timingSafeEqual(expected, received)) {
    return { valid: false, error: 'Signature mismatch' };
  }

  return { valid: true };
}

export function generateDeliveryId(): string {
  return `dlv_${Date.now()}_${randomBytes(8).toString('hex')}`;
}
