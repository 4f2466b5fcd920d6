import { createHmac, timingSafeEqual } from 'crypto';

/** `encryptedToken` for Zoom's endpoint.url_validation handshake, hex. */
export function zoomUrlValidationToken(secret: string, plainToken: string): string {
  return createHmac('sha256', secret).update(plainToken).digest('hex');
}

export function zoomWebhookSignature(secret: string, timestamp: string, rawBody: string): string {
  const hash = createHmac('sha256', secret).update(`v0:${timestamp}:${rawBody}`).digest('hex');
  return `v0=${hash}`;
}

export function isValidZoomWebhookSignature(
  secret: string,
  timestamp: string | undefined,
  rawBody: string,
  signature: string | undefined,
): boolean {
  if (!timestamp || !signature) return false;
  const a = Buffer.from(signature);
  const b = Buffer.from(zoomWebhookSignature(secret, timestamp, rawBody));
  return a.length === b.length && timingSafeEqual(a, b);
}
