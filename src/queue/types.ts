import type { RecipientEntry } from '../contracts/campaign';

export type LinkJob = { kind: 'link'; campaignId: number; entries: RecipientEntry[] };
export type DispatchJob = { kind: 'dispatch'; campaignId: number };
export type JobRequest = LinkJob | DispatchJob;

export interface JobContext {
  /** 1-based delivery attempt. */
  attempt: number;
  maxAttempts: number;
  /** Aborted when the worker abandons the run. */
  signal: AbortSignal;
}

/**
 * Consumer side of a queue. `run` may be called more than once for the same
 * job; a rejection asks for redelivery. `exhausted` is called once when no
 * attempts remain.
 */
export interface JobHandler {
  run(job: JobRequest, context: JobContext): Promise<void>;
  exhausted(job: JobRequest, error: unknown): Promise<void>;
}

/** At-least-once delivery of jobs to exactly one worker per attempt. */
export interface JobQueue {
  enqueue(job: JobRequest): Promise<void>;
  start(handler: JobHandler): void;
  close(): Promise<void>;
}

export interface QueueSettings {
  workers: number;
  maxAttempts: number;
  /** Wall-clock budget of a single attempt. */
  timeoutMs: number;
  /** Base delay before a redelivery; doubles per attempt. */
  retryDelayMs: number;
}

export function jobLabel(job: JobRequest): string {
  return `${job.kind} job for campaign ${job.campaignId}`;
}

export function retryDelay(baseMs: number, attempt: number): number {
  return baseMs * 2 ** Math.max(0, attempt - 1);
}
