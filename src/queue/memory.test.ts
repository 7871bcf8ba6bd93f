import assert from 'node:assert/strict';
import test from 'node:test';

import { silentLogger } from '../logger';
import { InProcessJobQueue } from './memory';
import type { JobContext, JobHandler, JobRequest, QueueSettings } from './types';

const SETTINGS: QueueSettings = { workers: 2, maxAttempts: 3, timeoutMs: 1_000, retryDelayMs: 1 };

type Call = { job: JobRequest; attempt: number };

function recordingHandler(run: (job: JobRequest, context: JobContext) => Promise<void>) {
  const calls: Call[] = [];
  const exhausted: Array<{ job: JobRequest; error: unknown }> = [];
  const handler: JobHandler = {
    async run(job, context) {
      calls.push({ job, attempt: context.attempt });
      await run(job, context);
    },
    async exhausted(job, error) {
      exhausted.push({ job, error });
    },
  };
  return { handler, calls, exhausted };
}

test('InProcessJobQueue delivers each job once when the handler succeeds', async () => {
  const queue = new InProcessJobQueue(SETTINGS, silentLogger);
  const { handler, calls } = recordingHandler(async () => undefined);
  queue.start(handler);

  await queue.enqueue({ kind: 'dispatch', campaignId: 1 });
  await queue.enqueue({ kind: 'dispatch', campaignId: 2 });
  await queue.onIdle();

  assert.deepEqual(
    calls.map((call) => [call.job.campaignId, call.attempt]),
    [
      [1, 1],
      [2, 1],
    ],
  );
  await queue.close();
});

test('InProcessJobQueue holds jobs until start is called', async () => {
  const queue = new InProcessJobQueue(SETTINGS, silentLogger);
  await queue.enqueue({ kind: 'dispatch', campaignId: 1 });
  assert.equal(queue.size, 1);

  const { handler, calls } = recordingHandler(async () => undefined);
  queue.start(handler);
  await queue.onIdle();

  assert.equal(calls.length, 1);
  await queue.close();
});

test('InProcessJobQueue redelivers a failed job until it succeeds', async () => {
  const queue = new InProcessJobQueue(SETTINGS, silentLogger);
  const { handler, calls, exhausted } = recordingHandler(async (_job, context) => {
    if (context.attempt < 3) throw new Error('store unavailable');
  });
  queue.start(handler);

  await queue.enqueue({ kind: 'link', campaignId: 4, entries: ['a@example.com'] });
  await queue.onIdle();

  assert.deepEqual(
    calls.map((call) => call.attempt),
    [1, 2, 3],
  );
  assert.equal(exhausted.length, 0);
  await queue.close();
});

test('InProcessJobQueue reports exhaustion after the last attempt', async () => {
  const queue = new InProcessJobQueue(SETTINGS, silentLogger);
  const { handler, calls, exhausted } = recordingHandler(async () => {
    throw new Error('store unavailable');
  });
  queue.start(handler);

  await queue.enqueue({ kind: 'dispatch', campaignId: 9 });
  await queue.onIdle();

  assert.equal(calls.length, 3);
  assert.equal(exhausted.length, 1);
  assert.deepEqual(exhausted[0].job, { kind: 'dispatch', campaignId: 9 });
  assert.equal(exhausted[0].error instanceof Error && exhausted[0].error.message, 'store unavailable');
  await queue.close();
});

test('InProcessJobQueue abandons an attempt that exceeds its budget and redelivers it', async () => {
  const queue = new InProcessJobQueue({ ...SETTINGS, timeoutMs: 20, maxAttempts: 2 }, silentLogger);
  const aborted: number[] = [];
  const { handler, calls } = recordingHandler(async (_job, context) => {
    if (context.attempt > 1) return;
    await new Promise<void>((resolve) => {
      context.signal.addEventListener('abort', () => {
        aborted.push(context.attempt);
        resolve();
      });
    });
  });
  queue.start(handler);

  await queue.enqueue({ kind: 'dispatch', campaignId: 3 });
  await queue.onIdle();

  assert.deepEqual(
    calls.map((call) => call.attempt),
    [1, 2],
  );
  assert.deepEqual(aborted, [1]);
  await queue.close();
});

test('InProcessJobQueue never runs two jobs for the same campaign at once', async () => {
  const queue = new InProcessJobQueue({ ...SETTINGS, workers: 4 }, silentLogger);
  const active = new Map<number, number>();
  let overlap = false;
  const order: string[] = [];
  const { handler } = recordingHandler(async (job) => {
    const running = (active.get(job.campaignId) ?? 0) + 1;
    active.set(job.campaignId, running);
    if (running > 1) overlap = true;
    order.push(`${job.kind}:${job.campaignId}`);
    await new Promise((resolve) => setTimeout(resolve, 5));
    active.set(job.campaignId, running - 1);
  });
  queue.start(handler);

  await queue.enqueue({ kind: 'link', campaignId: 1, entries: [] });
  await queue.enqueue({ kind: 'dispatch', campaignId: 1 });
  await queue.enqueue({ kind: 'link', campaignId: 2, entries: [] });
  await queue.onIdle();

  assert.equal(overlap, false);
  assert.deepEqual(order, ['link:1', 'link:2', 'dispatch:1']);
  await queue.close();
});

test('InProcessJobQueue rejects jobs after close', async () => {
  const queue = new InProcessJobQueue(SETTINGS, silentLogger);
  await queue.close();
  await assert.rejects(queue.enqueue({ kind: 'dispatch', campaignId: 1 }), {
    message: 'queue closed; cannot accept dispatch job for campaign 1',
  });
});
