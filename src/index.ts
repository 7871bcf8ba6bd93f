import dotenv from 'dotenv';
import { Pool } from 'pg';

import { loadConfig, type AppConfig } from './config';
import type { DataAccess } from './contracts/store';
import { errorMessage } from './errors';
import { createApp } from './http/app';
import { consoleLogger, type Logger } from './logger';
import { LogNotifier } from './notifiers/log';
import { NotifierRegistry } from './notifiers/registry';
import { ResendEmailNotifier } from './notifiers/resend';
import { BullJobQueue, redisConnectionFromUrl } from './queue/bullmq';
import { createJobHandler } from './queue/handler';
import { InProcessJobQueue } from './queue/memory';
import type { JobQueue } from './queue/types';
import { InMemoryStore } from './store/memory';
import { ensureSchema, PostgresStore } from './store/postgres';
import { JobSubmitter } from './submission';

dotenv.config();

type StoreHandle = { store: DataAccess; close: () => Promise<void> };

async function openStore(config: AppConfig, logger: Logger): Promise<StoreHandle> {
  if (!config.databaseUrl) {
    logger.warn('DATABASE_URL not set; using the in-memory store');
    return { store: new InMemoryStore(), close: async () => undefined };
  }
  const pool = new Pool({ connectionString: config.databaseUrl });
  pool.on('error', (error) => {
    logger.error(`Postgres pool error: ${error.message}`);
  });
  await ensureSchema(pool);
  return { store: PostgresStore.fromPool(pool), close: () => pool.end() };
}

function createNotifiers(config: AppConfig, logger: Logger): NotifierRegistry {
  const registry = new NotifierRegistry([new LogNotifier(logger)]);
  if (config.emailProviderKey && config.emailFrom) {
    registry.register(ResendEmailNotifier.fromApiKey(config.emailProviderKey, config.emailFrom));
  } else {
    logger.warn('EMAIL_PROVIDER_KEY and EMAIL_FROM not set; email channel disabled');
  }
  if (!registry.has(config.dispatch.channel)) {
    throw new Error(
      `DEFAULT_CHANNEL ${config.dispatch.channel} has no notifier (available: ${registry.channels().join(', ')})`,
    );
  }
  return registry;
}

function createQueue(config: AppConfig, logger: Logger): JobQueue {
  if (config.redisUrl) {
    return new BullJobQueue(redisConnectionFromUrl(config.redisUrl), config.queue, logger);
  }
  logger.warn('REDIS_URL not set; jobs run in this process');
  return new InProcessJobQueue(config.queue, logger);
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = consoleLogger;

  const { store, close: closeStore } = await openStore(config, logger);
  const notifiers = createNotifiers(config, logger);
  const queue = createQueue(config, logger);
  queue.start(createJobHandler({ store, logger, notifiers, settings: config.dispatch }));

  const app = createApp({
    store,
    submitter: new JobSubmitter(store, queue),
    logger,
    webhookSecret: config.webhookSecret,
  });

  const server = app.listen(config.port, config.bindHost, () => {
    logger.info(`campaign-dispatch listening on ${config.bindHost}:${config.port}`);
  });

  server.on('error', (error) => {
    logger.error(`campaign-dispatch failed to start: ${errorMessage(error)}`);
    process.exit(1);
  });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}; shutting down`);
    server.close();
    queue
      .close()
      .then(closeStore)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error(`Shutdown failed: ${errorMessage(error)}`);
        process.exit(1);
      });
  };
  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);
}

main().catch((error: unknown) => {
  consoleLogger.error(`campaign-dispatch failed to start: ${errorMessage(error)}`);
  process.exit(1);
});
