import { Queue, Worker, type ConnectionOptions, type Job, type RedisOptions } from 'bullmq';

import { errorMessage } from '../errors';
import { withTimeout } from '../jobs/concurrency';
import type { Logger } from '../logger';
import {
  jobLabel,
  type JobHandler,
  type JobQueue,
  type JobRequest,
  type QueueSettings,
} from './types';

/** Queue name shared between the API (producer) and the workers (consumers). */
export const CAMPAIGN_JOBS_QUEUE = 'campaign-jobs';

const KEEP_COMPLETED_JOBS = 1000;
const KEEP_FAILED_JOBS = 5000;
const DEFAULT_REDIS_PORT = 6379;

export function redisConnectionFromUrl(redisUrl: string): RedisOptions {
  const url = new URL(redisUrl);
  const db = url.pathname.replace(/^\//, '');
  return {
    host: url.hostname,
    port: url.port ? Number.parseInt(url.port, 10) : DEFAULT_REDIS_PORT,
    username: url.username ? decodeURIComponent(url.username) : undefined,
    password: url.password ? decodeURIComponent(url.password) : undefined,
    db: db ? Number.parseInt(db, 10) : undefined,
    tls: url.protocol === 'rediss:' ? {} : undefined,
    // BullMQ workers block on Redis and require unlimited retries per request.
    maxRetriesPerRequest: null,
  };
}

/** JobQueue over BullMQ, for running producers and workers in separate processes. */
export class BullJobQueue implements JobQueue {
  private readonly queue: Queue<JobRequest>;
  private worker: Worker<JobRequest> | null = null;

  constructor(
    private readonly connection: ConnectionOptions,
    private readonly settings: QueueSettings,
    private readonly logger: Logger,
    private readonly name: string = CAMPAIGN_JOBS_QUEUE,
  ) {
    this.queue = new Queue<JobRequest>(name, { connection });
  }

  async enqueue(job: JobRequest): Promise<void> {
    await this.queue.add(job.kind, job, {
      attempts: this.settings.maxAttempts,
      backoff: { type: 'exponential', delay: this.settings.retryDelayMs },
      removeOnComplete: KEEP_COMPLETED_JOBS,
      removeOnFail: KEEP_FAILED_JOBS,
    });
  }

  start(handler: JobHandler): void {
    if (this.worker) {
      throw new Error('queue already started');
    }
    const { maxAttempts, timeoutMs, workers } = this.settings;
    const worker = new Worker<JobRequest>(
      this.name,
      async (job: Job<JobRequest>) => {
        await withTimeout(jobLabel(job.data), timeoutMs, (signal) =>
          handler.run(job.data, { attempt: job.attemptsMade + 1, maxAttempts, signal }),
        );
      },
      { connection: this.connection, concurrency: workers },
    );

    worker.on('failed', (job, error) => {
      if (!job || job.attemptsMade < maxAttempts) return;
      handler.exhausted(job.data, error).catch((exhaustedError: unknown) => {
        this.logger.error(`${jobLabel(job.data)} exhaustion handler failed: ${errorMessage(exhaustedError)}`);
      });
    });
    worker.on('error', (error) => {
      this.logger.error(`Queue worker error: ${errorMessage(error)}`);
    });
    this.worker = worker;
  }

  async close(): Promise<void> {
    await this.worker?.close();
    await this.queue.close();
  }
}
