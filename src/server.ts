import { serve } from '@hono/node-server';
import { createApp } from '../worker/app';
import { loadConfig } from '../worker/config';
import { createServices } from '../worker/container';
import { closePgDb, getDb } from '../worker/db';
import { createMemoryRepository } from '../worker/db/memoryRepository';
import { createPgRepository, type Repository } from '../worker/db/repository';
import { createModelClient } from '../worker/llm/factory';
import { getLogger } from '../worker/logger';

const config = loadConfig();
const logger = getLogger({ level: config.logLevel, production: config.env === 'production' });

let repo: Repository;
if (config.databaseUrl) {
  repo = createPgRepository(getDb(config));
} else {
  logger.warn('DATABASE_URL is not set, using the in-memory store; data is lost on restart');
  repo = createMemoryRepository();
}

const client = createModelClient(config.llm);
const services = createServices({ config, repo, client, logger });
const app = createApp(services, logger);

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info('Server is running', {
    port: info.port,
    provider: client.provider,
    model: client.model,
    concurrency: config.workerConcurrency,
  });
});

let stopping = false;

const shutdown = async (signal: string) => {
  if (stopping) return;
  stopping = true;
  logger.info('Shutting down', { signal });
  server.close();
  try {
    await services.queue.close();
    await closePgDb();
    process.exit(0);
  } catch (error) {
    logger.error('Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  }
};

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));
