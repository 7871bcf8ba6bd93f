import crypto from 'node:crypto';

export const RESEND_SIGNATURE_HEADER = 'resend-signature';
export const DEFAULT_TOLERANCE_SECONDS = 300;
const SIGNATURE_VERSION = 'v1';

export type WebhookSignature = {
  timestamp: number;
  signatures: string[];
};

export type VerificationResult = { ok: true; timestamp: number } | { ok: false; reason: string };

export type SuppressionReason = 'bounce' | 'complaint';

/** A provider event that must stop further delivery to an address. */
export type SuppressionEvent = {
  email: string;
  reason: SuppressionReason;
  messageId?: string;
};

const SUPPRESSING_EVENTS: Record<string, SuppressionReason> = {
  bounced: 'bounce',
  complained: 'complaint',
  complaint: 'complaint',
};

/** Parses `t=<unix seconds>,v1=<hex>[,v1=<hex>...]`; several v1 entries are allowed during key rotation. */
export function parseSignatureHeader(headerValue: string | string[] | undefined): WebhookSignature | null {
  const raw = Array.isArray(headerValue) ? headerValue[0] : headerValue;
  if (!raw) return null;

  let timestamp: number | null = null;
  const signatures: string[] = [];
  for (const part of raw.split(',')) {
    const separator = part.indexOf('=');
    if (separator <= 0) continue;
    const key = part.slice(0, separator).trim();
    const value = part.slice(separator + 1).trim();
    if (key === 't' && /^\d+$/.test(value)) {
      timestamp = Number.parseInt(value, 10);
    } else if (key === SIGNATURE_VERSION && value) {
      signatures.push(value);
    }
  }

  if (timestamp === null || signatures.length === 0) return null;
  return { timestamp, signatures };
}

export function computeSignature(secret: string, timestamp: number, payload: string): string {
  return crypto.createHmac('sha256', secret).update(`${timestamp}.${payload}`).digest('hex');
}

export function createSignatureHeader(secret: string, timestamp: number, payload: string): string {
  return `t=${timestamp},${SIGNATURE_VERSION}=${computeSignature(secret, timestamp, payload)}`;
}

function safeEqual(expected: string, provided: string): boolean {
  const expectedBuffer = Buffer.from(expected, 'utf8');
  const providedBuffer = Buffer.from(provided, 'utf8');
  return expectedBuffer.length === providedBuffer.length && crypto.timingSafeEqual(expectedBuffer, providedBuffer);
}

export function verifyWebhookSignature(options: {
  secret: string;
  signatureHeader: string | string[] | undefined;
  payload: string;
  toleranceSeconds?: number;
  now?: number;
}): VerificationResult {
  const parsed = parseSignatureHeader(options.signatureHeader);
  if (!parsed) {
    return { ok: false, reason: 'missing signature header' };
  }

  const nowSeconds = Math.floor((options.now ?? Date.now()) / 1000);
  if (Math.abs(nowSeconds - parsed.timestamp) > (options.toleranceSeconds ?? DEFAULT_TOLERANCE_SECONDS)) {
    return { ok: false, reason: 'signature timestamp outside tolerance' };
  }

  const expected = computeSignature(options.secret, parsed.timestamp, options.payload);
  if (!parsed.signatures.some((candidate) => safeEqual(expected, candidate))) {
    return { ok: false, reason: 'signature mismatch' };
  }
  return { ok: true, timestamp: parsed.timestamp };
}

function readRecord(value: unknown): Record<string, unknown> | null {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : null;
}

function readFirstAddress(value: unknown): string | null {
  const candidate = Array.isArray(value) ? value[0] : value;
  if (typeof candidate !== 'string') return null;
  const trimmed = candidate.trim();
  return trimmed ? trimmed : null;
}

/**
 * Extracts the address to opt out from a bounce or complaint event.
 * Returns null for every other event type.
 */
export function readSuppressionEvent(payload: unknown): SuppressionEvent | null {
  const body = readRecord(payload);
  if (!body || typeof body.type !== 'string') return null;
  const reason = SUPPRESSING_EVENTS[body.type.toLowerCase().replace(/^email\./, '')];
  if (!reason) return null;

  const data = readRecord(body.data);
  const email = readFirstAddress(data?.to) ?? readFirstAddress(data?.email);
  if (!email) return null;

  const messageId = typeof data?.email_id === 'string' ? data.email_id : undefined;
  return messageId ? { email, reason, messageId } : { email, reason };
}
