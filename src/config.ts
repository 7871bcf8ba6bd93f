import type { QueueSettings } from './queue/types';
import type { DispatchSettings } from './jobs/dispatch';
import { DEFAULT_DISPATCH_CONCURRENCY, DEFAULT_SEND_TIMEOUT_MS } from './jobs/dispatch';

const DEFAULT_PORT = 8700;
const DEFAULT_WORKERS = 4;
const DEFAULT_MAX_ATTEMPTS = 5;
const DEFAULT_JOB_TIMEOUT_MS = 300_000;
const DEFAULT_RETRY_DELAY_MS = 1_000;

export interface AppConfig {
  port: number;
  bindHost: string;
  databaseUrl?: string;
  redisUrl?: string;
  emailProviderKey?: string;
  emailFrom?: string;
  webhookSecret?: string;
  queue: QueueSettings;
  dispatch: DispatchSettings;
}

type Env = Record<string, string | undefined>;

export function parsePort(portRaw: string | undefined, fallbackPort: number): number {
  if (!portRaw) return fallbackPort;
  const parsed = Number.parseInt(portRaw, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > 65535) {
    return fallbackPort;
  }
  return parsed;
}

/** Positive integer, or the fallback when missing or malformed. */
export function parsePositiveInt(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const parsed = Number(raw.trim());
  if (!Number.isSafeInteger(parsed) || parsed < 1) {
    return fallback;
  }
  return parsed;
}

function readOptional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const emailProviderKey = readOptional(env.EMAIL_PROVIDER_KEY);
  const emailFrom = readOptional(env.EMAIL_FROM);
  // Without provider credentials messages go to the log channel.
  const fallbackChannel = emailProviderKey && emailFrom ? 'email' : 'log';

  return {
    port: parsePort(env.PORT, DEFAULT_PORT),
    bindHost: readOptional(env.BIND_HOST) ?? readOptional(env.HOST) ?? '0.0.0.0',
    databaseUrl: readOptional(env.DATABASE_URL),
    redisUrl: readOptional(env.REDIS_URL),
    emailProviderKey,
    emailFrom,
    webhookSecret: readOptional(env.EMAIL_WEBHOOK_SECRET),
    queue: {
      workers: parsePositiveInt(env.JOB_WORKERS, DEFAULT_WORKERS),
      maxAttempts: parsePositiveInt(env.JOB_MAX_ATTEMPTS, DEFAULT_MAX_ATTEMPTS),
      timeoutMs: parsePositiveInt(env.JOB_TIMEOUT_MS, DEFAULT_JOB_TIMEOUT_MS),
      retryDelayMs: parsePositiveInt(env.JOB_RETRY_DELAY_MS, DEFAULT_RETRY_DELAY_MS),
    },
    dispatch: {
      channel: readOptional(env.DEFAULT_CHANNEL) ?? fallbackChannel,
      concurrency: parsePositiveInt(env.DISPATCH_CONCURRENCY, DEFAULT_DISPATCH_CONCURRENCY),
      sendTimeoutMs: parsePositiveInt(env.SEND_TIMEOUT_MS, DEFAULT_SEND_TIMEOUT_MS),
    },
  };
}
