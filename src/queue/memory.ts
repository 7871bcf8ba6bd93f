import { errorMessage } from '../errors';
import { withTimeout } from '../jobs/concurrency';
import type { Logger } from '../logger';
import {
  jobLabel,
  retryDelay,
  type JobHandler,
  type JobQueue,
  type JobRequest,
  type QueueSettings,
} from './types';

type Delivery = { job: JobRequest; attempt: number };

/**
 * Single-process queue backed by a worker pool.
 *
 * Jobs are taken in FIFO order, but a job waits while another job for the
 * same campaign is running. An attempt that throws or outlives
 * `timeoutMs` is redelivered after a backoff until `maxAttempts` is reached.
 */
export class InProcessJobQueue implements JobQueue {
  private readonly pending: Delivery[] = [];
  private readonly activeCampaigns = new Set<number>();
  private readonly retryTimers = new Set<NodeJS.Timeout>();
  private idleWaiters: Array<() => void> = [];
  private handler: JobHandler | null = null;
  private running = 0;
  private closed = false;

  constructor(
    private readonly settings: QueueSettings,
    private readonly logger: Logger,
  ) {}

  async enqueue(job: JobRequest): Promise<void> {
    if (this.closed) {
      throw new Error(`queue closed; cannot accept ${jobLabel(job)}`);
    }
    this.pending.push({ job, attempt: 1 });
    this.pump();
  }

  start(handler: JobHandler): void {
    if (this.handler) {
      throw new Error('queue already started');
    }
    this.handler = handler;
    this.pump();
  }

  /** Resolves once nothing is queued, running or waiting for redelivery. */
  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  get size(): number {
    return this.pending.length;
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const timer of this.retryTimers) {
      clearTimeout(timer);
    }
    this.retryTimers.clear();
    if (this.pending.length > 0) {
      this.logger.warn(`Closing queue with ${this.pending.length} undelivered jobs`);
      this.pending.length = 0;
    }
    if (this.running > 0) {
      await new Promise<void>((resolve) => {
        this.idleWaiters.push(resolve);
      });
    }
    this.notifyIdle();
  }

  private isIdle(): boolean {
    return this.pending.length === 0 && this.running === 0 && this.retryTimers.size === 0;
  }

  private notifyIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach((resolve) => resolve());
  }

  private pump(): void {
    const handler = this.handler;
    if (!handler || this.closed) return;
    while (this.running < this.settings.workers) {
      const index = this.pending.findIndex(
        (delivery) => !this.activeCampaigns.has(delivery.job.campaignId),
      );
      if (index === -1) return;
      const [delivery] = this.pending.splice(index, 1);
      void this.execute(handler, delivery);
    }
  }

  private async execute(handler: JobHandler, delivery: Delivery): Promise<void> {
    const { job, attempt } = delivery;
    const { maxAttempts, timeoutMs } = this.settings;
    this.running += 1;
    this.activeCampaigns.add(job.campaignId);
    try {
      await withTimeout(jobLabel(job), timeoutMs, (signal) =>
        handler.run(job, { attempt, maxAttempts, signal }),
      );
    } catch (error) {
      if (this.closed) {
        this.logger.warn(`${jobLabel(job)} interrupted by shutdown: ${errorMessage(error)}`);
      } else if (attempt < maxAttempts) {
        this.scheduleRedelivery({ job, attempt: attempt + 1 });
      } else {
        await this.giveUp(handler, job, error);
      }
    } finally {
      this.running -= 1;
      this.activeCampaigns.delete(job.campaignId);
      this.pump();
      this.notifyIdle();
    }
  }

  private scheduleRedelivery(delivery: Delivery): void {
    const delay = retryDelay(this.settings.retryDelayMs, delivery.attempt - 1);
    const timer = setTimeout(() => {
      this.retryTimers.delete(timer);
      if (!this.closed) {
        this.pending.push(delivery);
        this.pump();
      }
      this.notifyIdle();
    }, delay);
    this.retryTimers.add(timer);
  }

  private async giveUp(handler: JobHandler, job: JobRequest, error: unknown): Promise<void> {
    try {
      await handler.exhausted(job, error);
    } catch (exhaustedError) {
      this.logger.error(`${jobLabel(job)} exhaustion handler failed: ${errorMessage(exhaustedError)}`);
    }
  }
}
