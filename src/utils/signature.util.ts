import crypto from 'crypto';

export const SIGNATURE_HEADER = 'x-frameio-signature';
export const TIMESTAMP_HEADER = 'x-frameio-request-timestamp';
export const SIGNATURE_VERSION = 'v0';

/** Maximum allowed clock skew between Frame.io and this server, in seconds. */
export const TIMESTAMP_TOLERANCE_SECONDS = 300;

export type HeaderBag = Record<string, string | string[] | undefined>;

function readHeader(headers: HeaderBag, name: string): string | undefined {
  const direct = headers[name];
  const value = direct !== undefined
    ? direct
    : Object.entries(headers).find(([key]) => key.toLowerCase() === name)?.[1];
  if (Array.isArray(value)) return value[0];
  return value;
}

function parseTimestamp(raw: string | undefined): number | null {
  if (raw === undefined || !/^\s*-?\d+\s*$/.test(raw)) return null;
  const timestamp = Number(raw.trim());
  return Number.isSafeInteger(timestamp) ? timestamp : null;
}

/**
 * Compute the `v0=<hex>` signature Frame.io sends for a request.
 */
export function signPayload(timestamp: number | string, body: Buffer | string, secret: string): string {
  const hmac = crypto.createHmac('sha256', secret);
  hmac.update(`${SIGNATURE_VERSION}:${timestamp}:`);
  hmac.update(body);
  return `${SIGNATURE_VERSION}=${hmac.digest('hex')}`;
}

/**
 * Verify the HMAC signature of an inbound request against the raw body.
 *
 * Never throws: missing headers, malformed timestamps, stale timestamps and
 * mismatched digests all yield `false`.
 */
export function verifySignature(
  headers: HeaderBag,
  rawBody: Buffer | string,
  secret: string,
  nowSeconds: number = Math.floor(Date.now() / 1000)
): boolean {
  const signature = readHeader(headers, SIGNATURE_HEADER);
  const timestamp = parseTimestamp(readHeader(headers, TIMESTAMP_HEADER));

  if (!signature || timestamp === null || !secret) {
    return false;
  }

  if (Math.abs(nowSeconds - timestamp) > TIMESTAMP_TOLERANCE_SECONDS) {
    return false;
  }

  const expected = Buffer.from(signPayload(timestamp, rawBody, secret), 'utf8');
  const received = Buffer.from(signature.trim(), 'utf8');

  if (expected.length !== received.length) {
    return false;
  }

  return crypto.timingSafeEqual(expected, received);
}
