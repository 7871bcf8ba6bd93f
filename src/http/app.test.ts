import assert from 'node:assert/strict';
import { once } from 'node:events';
import test, { type TestContext } from 'node:test';

import { silentLogger } from '../logger';
import type { JobHandler, JobQueue, JobRequest } from '../queue/types';
import { InMemoryStore } from '../store/memory';
import { JobSubmitter } from '../submission';
import { createSignatureHeader, RESEND_SIGNATURE_HEADER } from '../webhooks/resend';
import { createApp } from './app';

const WEBHOOK_SECRET = 'test-secret';

class CapturingQueue implements JobQueue {
  readonly jobs: JobRequest[] = [];

  async enqueue(job: JobRequest): Promise<void> {
    this.jobs.push(job);
  }

  start(_handler: JobHandler): void {}

  async close(): Promise<void> {}
}

async function startServer(t: TestContext) {
  const store = new InMemoryStore();
  const queue = new CapturingQueue();
  const app = createApp({
    store,
    submitter: new JobSubmitter(store, queue),
    logger: silentLogger,
    webhookSecret: WEBHOOK_SECRET,
  });
  const server = app.listen(0, '127.0.0.1');
  await once(server, 'listening');
  t.after(() => {
    server.closeAllConnections();
    server.close();
  });
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('server is not listening on a TCP port');
  }
  const baseUrl = `http://127.0.0.1:${address.port}`;

  const request = async (method: string, path: string, body?: unknown, headers: Record<string, string> = {}) => {
    const response = await fetch(`${baseUrl}${path}`, {
      method,
      headers: { 'Content-Type': 'application/json', ...headers },
      body: body === undefined ? undefined : typeof body === 'string' ? body : JSON.stringify(body),
    });
    const text = await response.text();
    const isJson = response.headers.get('content-type')?.includes('application/json') ?? false;
    return { status: response.status, body: isJson ? JSON.parse(text) : null, text };
  };

  return { store, queue, request };
}

test('POST /campaigns creates a pending campaign and submits the linking job', async (t) => {
  const { queue, request } = await startServer(t);

  const response = await request('POST', '/campaigns', {
    title: 'Launch',
    message: 'We are live',
    recipientEmails: ['a@example.com', 'A@example.com'],
  });

  assert.equal(response.status, 201);
  assert.equal(response.body.id, 1);
  assert.equal(response.body.status, 'pending');
  assert.deepEqual(response.body.recipients, []);
  assert.deepEqual(queue.jobs, [{ kind: 'link', campaignId: 1, entries: ['a@example.com', 'A@example.com'] }]);
});

test('POST /campaigns rejects a request without a title', async (t) => {
  const { queue, request } = await startServer(t);

  const response = await request('POST', '/campaigns', { message: 'm', recipientEmails: [] });

  assert.equal(response.status, 400);
  assert.deepEqual(response.body, { error: { code: 'VALIDATION_ERROR', message: 'title is required' } });
  assert.equal(queue.jobs.length, 0);
});

test('malformed JSON bodies are rejected with 400', async (t) => {
  const { request } = await startServer(t);

  const response = await request('POST', '/campaigns', '{"title":');

  assert.equal(response.status, 400);
  assert.deepEqual(response.body, { error: { code: 'VALIDATION_ERROR', message: 'Malformed JSON body' } });
});

test('POST /campaigns/:id/send queues a dispatch job', async (t) => {
  const { store, queue, request } = await startServer(t);
  const campaign = await store.createCampaign({ title: 't', message: 'm' });

  const response = await request('POST', `/campaigns/${campaign.id}/send`);

  assert.equal(response.status, 202);
  assert.deepEqual(response.body, { status: 'queued', campaignId: campaign.id });
  assert.deepEqual(queue.jobs, [{ kind: 'dispatch', campaignId: campaign.id }]);
});

test('POST /campaigns/:id/send returns 404 for an unknown campaign', async (t) => {
  const { queue, request } = await startServer(t);

  const response = await request('POST', '/campaigns/99/send');

  assert.equal(response.status, 404);
  assert.deepEqual(response.body, { error: { code: 'NOT_FOUND', message: 'campaign 99 not found' } });
  assert.equal(queue.jobs.length, 0);
});

test('GET /campaigns/:id includes linked recipients', async (t) => {
  const { store, request } = await startServer(t);
  const campaign = await store.createCampaign({ title: 't', message: 'm' });
  const { recipient } = await store.upsertRecipient('a@example.com');
  await store.linkRecipientToCampaign(campaign.id, recipient.id);

  const response = await request('GET', `/campaigns/${campaign.id}`);

  assert.equal(response.status, 200);
  assert.equal(response.body.title, 't');
  assert.deepEqual(
    response.body.recipients.map((r: { email: string }) => r.email),
    ['a@example.com'],
  );
});

test('GET /campaigns/:id rejects a non-numeric id', async (t) => {
  const { request } = await startServer(t);

  const response = await request('GET', '/campaigns/abc');

  assert.equal(response.status, 400);
  assert.equal(response.body.error.code, 'VALIDATION_ERROR');
});

test('POST /recipients/opt-out requires a known recipient', async (t) => {
  const { store, request } = await startServer(t);

  const missing = await request('POST', '/recipients/opt-out', { email: 'nobody@example.com' });
  assert.equal(missing.status, 404);

  await store.upsertRecipient('known@example.com');
  const response = await request('POST', '/recipients/opt-out', { email: 'Known@Example.com', reason: 'moved' });

  assert.equal(response.status, 200);
  assert.equal(response.body.optOut, true);
  assert.equal(response.body.optOutReason, 'moved');
});

test('POST /recipients/opt-in restores a recipient', async (t) => {
  const { store, request } = await startServer(t);
  await store.upsertRecipient('back@example.com');
  await store.setRecipientOptOut('back@example.com', true);

  const response = await request('POST', '/recipients/opt-in', { email: 'back@example.com' });

  assert.equal(response.status, 200);
  assert.equal(response.body.optOut, false);
  assert.deepEqual(
    (await request('GET', '/recipients/active')).body.map((r: { email: string }) => r.email),
    ['back@example.com'],
  );
});

test('POST /recipients returns 201 for a new recipient and 200 for an existing one', async (t) => {
  const { request } = await startServer(t);

  const created = await request('POST', '/recipients', { email: 'new@example.com', name: 'New' });
  const again = await request('POST', '/recipients', { email: 'NEW@example.com' });

  assert.equal(created.status, 201);
  assert.equal(again.status, 200);
  assert.equal(again.body.id, created.body.id);
  assert.equal(again.body.name, 'New');
});

test('group routes assign active recipients and list members', async (t) => {
  const { store, request } = await startServer(t);
  await store.upsertRecipient('out@example.com');
  await store.setRecipientOptOut('out@example.com', true);

  const group = await request('POST', '/groups', { name: 'VIP', description: 'Best customers' });
  assert.equal(group.status, 201);

  const assigned = await request('PATCH', `/groups/${group.body.id}/recipients`, {
    recipientEmails: ['in@example.com', 'out@example.com'],
  });
  assert.equal(assigned.status, 200);
  assert.deepEqual(
    assigned.body.map((r: { email: string }) => r.email),
    ['in@example.com'],
  );

  const members = await request('GET', `/groups/${group.body.id}/recipients?activeOnly=false`);
  assert.deepEqual(
    members.body.map((r: { email: string }) => r.email),
    ['in@example.com'],
  );

  const renamed = await request('PATCH', `/groups/${group.body.id}`, { name: 'VIPs' });
  assert.equal(renamed.body.name, 'VIPs');
  assert.equal(renamed.body.description, 'Best customers');
});

test('GET /groups/:id/recipients returns 404 for an unknown group', async (t) => {
  const { request } = await startServer(t);

  const response = await request('GET', '/groups/5/recipients');

  assert.equal(response.status, 404);
  assert.deepEqual(response.body, { error: { code: 'NOT_FOUND', message: 'group 5 not found' } });
});

test('POST /webhooks/provider opts out a bounced recipient', async (t) => {
  const { store, request } = await startServer(t);
  await store.upsertRecipient('gone@example.com');
  const payload = JSON.stringify({ type: 'email.bounced', data: { to: ['Gone@Example.com'] } });
  const header = createSignatureHeader(WEBHOOK_SECRET, Math.floor(Date.now() / 1000), payload);

  const response = await request('POST', '/webhooks/provider', payload, { [RESEND_SIGNATURE_HEADER]: header });

  assert.equal(response.status, 204);
  const recipient = await store.findRecipientByEmail('gone@example.com');
  assert.equal(recipient?.optOut, true);
  assert.equal(recipient?.optOutReason, 'bounce');
});

test('POST /webhooks/provider acknowledges events for unknown recipients', async (t) => {
  const { request } = await startServer(t);
  const payload = JSON.stringify({ type: 'email.complained', data: { to: ['stranger@example.com'] } });
  const header = createSignatureHeader(WEBHOOK_SECRET, Math.floor(Date.now() / 1000), payload);

  const response = await request('POST', '/webhooks/provider', payload, { [RESEND_SIGNATURE_HEADER]: header });

  assert.equal(response.status, 204);
});

test('POST /webhooks/provider rejects an unsigned request', async (t) => {
  const { store, request } = await startServer(t);
  await store.upsertRecipient('gone@example.com');

  const response = await request('POST', '/webhooks/provider', {
    type: 'email.bounced',
    data: { to: ['gone@example.com'] },
  });

  assert.equal(response.status, 401);
  assert.equal(response.text, 'missing signature header');
  assert.equal((await store.findRecipientByEmail('gone@example.com'))?.optOut, false);
});
