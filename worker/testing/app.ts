import { createApp } from '../app';
import { createServices } from '../container';
import { createMemoryRepository } from '../db/memoryRepository';
import { createSilentLogger } from '../logger';
import { createScriptedClient, noSleep, testConfig } from './fakes';

export const TEST_NOW = Date.parse('2026-10-18T12:00:00.000Z');

/** App over the in-memory store and a scripted model, for route tests. */
export const buildTestApp = (...steps: Parameters<typeof createScriptedClient>) => {
  const repo = createMemoryRepository();
  const logger = createSilentLogger();
  const { client, requests } = createScriptedClient(...steps);
  const services = createServices({
    config: testConfig,
    repo,
    client,
    logger,
    sleep: noSleep,
    now: () => TEST_NOW,
  });
  const app = createApp(services, logger);

  const post = (path: string, body: unknown) =>
    app.request(path, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });

  return { app, repo, services, requests, post };
};
