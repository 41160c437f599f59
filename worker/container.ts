import type { AppConfig } from './config';
import type { Repository } from './db/repository';
import type { Logger } from './logger';
import type { ModelClient } from './llm/types';
import { createRetryExecutor } from './llm/retry';
import { createCallLedger } from './llm/ledger';
import { createModelRunner } from './llm/modelRunner';
import { createJobQueue, type JobQueue } from './queue/jobQueue';
import { createJobHandler, type JobTargets } from './queue/handlers';
import { createFeedbackService, type FeedbackService } from './services/feedbackService';
import { createFeedbackProcessor, type FeedbackProcessor } from './services/feedbackProcessor';
import { createPlanningService, type PlanningService } from './services/planningService';
import { createDailyPlanService, type DailyPlanService } from './services/dailyPlanService';
import { createInboxService, type InboxService } from './services/inboxService';

export type Services = {
  queue: JobQueue;
  feedback: FeedbackService;
  feedbackProcessor: FeedbackProcessor;
  planning: PlanningService;
  daily: DailyPlanService;
  inbox: InboxService;
};

export type ServiceConfig = Pick<AppConfig, 'llm' | 'retry' | 'workerConcurrency' | 'autoPlanOnProjectCreate'>;

/** Wires the engine from one config object; the single construction point. */
export const createServices = (deps: {
  config: ServiceConfig;
  repo: Repository;
  client: ModelClient;
  logger: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}): Services => {
  const { config, repo, logger, now } = deps;
  const retryLog = logger.child({ component: 'retry' });

  const runner = createModelRunner({
    client: deps.client,
    retry: createRetryExecutor(config.retry, {
      sleep: deps.sleep,
      onFailedAttempt: ({ attempt, nextDelayMs }) => {
        if (nextDelayMs === null) retryLog.warn('Model call attempts exhausted', { attempt });
        else retryLog.info('Retrying model call', { attempt, delayMs: nextDelayMs });
      },
    }),
    ledger: createCallLedger(repo, logger, now),
    logger,
    clock: now,
  });

  let targets: JobTargets | null = null;
  const queue = createJobQueue({
    concurrency: config.workerConcurrency,
    logger,
    handle: createJobHandler(() => {
      if (!targets) throw new Error('Job targets are not wired yet');
      return targets;
    }),
  });

  const feedbackProcessor = createFeedbackProcessor({ repo, runner, llm: config.llm, logger, now });
  const planning = createPlanningService({ repo, runner, llm: config.llm, logger, now });
  const inbox = createInboxService({
    repo,
    runner,
    queue,
    llm: config.llm,
    autoPlanOnProjectCreate: config.autoPlanOnProjectCreate,
    logger,
    now,
  });
  targets = { feedbackProcessor, planning, inbox };

  return {
    queue,
    feedback: createFeedbackService({ repo, queue, logger, now }),
    feedbackProcessor,
    planning,
    daily: createDailyPlanService({ repo, logger, now }),
    inbox,
  };
};
