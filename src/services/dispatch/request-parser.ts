import { z } from 'zod';
import { ActionEvent, WebhookEvent, actionEventSchema, webhookEventSchema } from '../../types/event.types';
import { BadRequestError, EventValidationError, SignatureVerificationError } from '../../utils/errors';
import { HeaderBag, TIMESTAMP_HEADER, verifySignature } from '../../utils/signature.util';

export interface ParsedEnvelope {
  type: string;
  /** Decoded body with the request timestamp merged in. */
  payload: Record<string, unknown>;
}

function headerValue(headers: HeaderBag, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Decode the raw body just far enough to route it.
 *
 * @throws BadRequestError for invalid JSON, a missing `type`, or a missing
 * or non-integer timestamp header.
 */
export function parseEnvelope(rawBody: Buffer, headers: HeaderBag): ParsedEnvelope {
  let decoded: unknown;
  try {
    decoded = JSON.parse(rawBody.toString('utf8'));
  } catch {
    throw new BadRequestError('Invalid JSON payload');
  }

  if (typeof decoded !== 'object' || decoded === null || Array.isArray(decoded)) {
    throw new BadRequestError('Payload must be a JSON object');
  }

  const payload: Record<string, unknown> = { ...decoded };
  const type = payload.type;
  if (typeof type !== 'string' || type.length === 0) {
    throw new BadRequestError("Missing 'type' in payload");
  }

  const rawTimestamp = headerValue(headers, TIMESTAMP_HEADER);
  if (rawTimestamp === undefined) {
    throw new BadRequestError(`Missing ${TIMESTAMP_HEADER} header`);
  }
  if (!/^\d+$/.test(rawTimestamp.trim())) {
    throw new BadRequestError(`Invalid ${TIMESTAMP_HEADER} header`);
  }

  payload.timestamp = Number(rawTimestamp.trim());
  return { type, payload };
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}

export function parseWebhookEvent(type: string, payload: Record<string, unknown>): WebhookEvent {
  const result = webhookEventSchema.safeParse(payload);
  if (!result.success) throw new EventValidationError(type, formatIssues(result.error));
  return result.data;
}

export function parseActionEvent(type: string, payload: Record<string, unknown>): ActionEvent {
  const result = actionEventSchema.safeParse(payload);
  if (!result.success) throw new EventValidationError(type, formatIssues(result.error));
  return result.data;
}

/**
 * @throws SignatureVerificationError when the signature does not match.
 */
export function assertSignature(headers: HeaderBag, rawBody: Buffer, secret: string): void {
  if (!verifySignature(headers, rawBody, secret)) {
    throw new SignatureVerificationError();
  }
}
