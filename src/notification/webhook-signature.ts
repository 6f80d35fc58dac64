import { createHmac, timingSafeEqual } from 'node:crypto';

export const SIGNATURE_HEADER = 'X-Signature';
export const TIMESTAMP_HEADER = 'X-Timestamp';
export const KEY_ID_HEADER = 'X-Key-Id';

const SIGNATURE_PREFIX = 'sha256=';

/**
 * HMAC-SHA256 over `"<unix seconds>.<raw body>"`. Binding the timestamp lets
 * receivers reject replays outside their tolerance window.
 */
export function signWebhookPayload(
  secret: string,
  timestamp: number,
  rawBody: string,
): string {
  const digest = createHmac('sha256', secret)
    .update(`${timestamp}.${rawBody}`)
    .digest('hex');
  return `${SIGNATURE_PREFIX}${digest}`;
}

export interface VerifyOptions {
  toleranceSeconds?: number;
  nowSeconds?: number;
}

export function verifyWebhookSignature(
  secret: string,
  timestamp: number,
  rawBody: string,
  signature: string,
  options: VerifyOptions = {},
): boolean {
  const { toleranceSeconds = 300, nowSeconds = Math.floor(Date.now() / 1000) } =
    options;
  if (!Number.isInteger(timestamp)) {
    return false;
  }
  if (Math.abs(nowSeconds - timestamp) > toleranceSeconds) {
    return false;
  }

  const expected = Buffer.from(signWebhookPayload(secret, timestamp, rawBody));
  const presented = Buffer.from(signature);
  return (
    expected.length === presented.length && timingSafeEqual(expected, presented)
  );
}
