import assert from 'node:assert/strict';
import test from 'node:test';

import {
  createSignatureHeader,
  parseSignatureHeader,
  readSuppressionEvent,
  verifyWebhookSignature,
} from './resend';

const SECRET = 'test-secret';
const PAYLOAD = '{"type":"email.bounced"}';
const TIMESTAMP_SECONDS = 1_700_000_000;
const NOW_MS = TIMESTAMP_SECONDS * 1000;

test('verifyWebhookSignature accepts a valid signature', () => {
  const header = createSignatureHeader(SECRET, TIMESTAMP_SECONDS, PAYLOAD);
  const result = verifyWebhookSignature({
    secret: SECRET,
    signatureHeader: header,
    payload: PAYLOAD,
    toleranceSeconds: 10,
    now: NOW_MS,
  });
  assert.deepEqual(result, { ok: true, timestamp: TIMESTAMP_SECONDS });
});

test('verifyWebhookSignature rejects a signature made with another secret', () => {
  const header = createSignatureHeader('wrong-secret', TIMESTAMP_SECONDS, PAYLOAD);
  const result = verifyWebhookSignature({ secret: SECRET, signatureHeader: header, payload: PAYLOAD, now: NOW_MS });
  assert.deepEqual(result, { ok: false, reason: 'signature mismatch' });
});

test('verifyWebhookSignature rejects an old timestamp', () => {
  const header = createSignatureHeader(SECRET, TIMESTAMP_SECONDS, PAYLOAD);
  const result = verifyWebhookSignature({
    secret: SECRET,
    signatureHeader: header,
    payload: PAYLOAD,
    toleranceSeconds: 0,
    now: NOW_MS + 60_000,
  });
  assert.deepEqual(result, { ok: false, reason: 'signature timestamp outside tolerance' });
});

test('verifyWebhookSignature accepts any of several v1 signatures', () => {
  const valid = createSignatureHeader(SECRET, TIMESTAMP_SECONDS, PAYLOAD).split(',')[1];
  const header = `t=${TIMESTAMP_SECONDS},v1=deadbeef,${valid}`;
  const result = verifyWebhookSignature({ secret: SECRET, signatureHeader: header, payload: PAYLOAD, now: NOW_MS });
  assert.equal(result.ok, true);
});

test('parseSignatureHeader requires a timestamp and a signature', () => {
  assert.equal(parseSignatureHeader(undefined), null);
  assert.equal(parseSignatureHeader('v1=abc'), null);
  assert.equal(parseSignatureHeader('t=12'), null);
  assert.deepEqual(parseSignatureHeader(['t=12, v1=abc']), { timestamp: 12, signatures: ['abc'] });
});

test('readSuppressionEvent maps bounces and complaints to an opt-out', () => {
  assert.deepEqual(
    readSuppressionEvent({ type: 'email.bounced', data: { email_id: 'em_1', to: ['Gone@Example.com'] } }),
    { email: 'Gone@Example.com', reason: 'bounce', messageId: 'em_1' },
  );
  assert.deepEqual(readSuppressionEvent({ type: 'email.complained', data: { to: 'angry@example.com' } }), {
    email: 'angry@example.com',
    reason: 'complaint',
  });
});

test('readSuppressionEvent ignores other events and malformed payloads', () => {
  assert.equal(readSuppressionEvent({ type: 'email.delivered', data: { to: ['a@example.com'] } }), null);
  assert.equal(readSuppressionEvent({ type: 'email.bounced', data: {} }), null);
  assert.equal(readSuppressionEvent('nope'), null);
});
