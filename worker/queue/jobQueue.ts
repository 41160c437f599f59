import type { Logger } from '../logger';

export type Job =
  | { type: 'process_feedback'; feedbackId: string }
  | { type: 'generate_plan'; projectId: string; userId: string | null; forceRegenerate: boolean }
  | { type: 'process_inbox'; inboxItemId: string };

export type JobType = Job['type'];

/** What producers see: fire-and-forget submission. */
export interface JobSink {
  enqueue(job: Job): void;
}

export type JobHandler = (job: Job) => Promise<void>;

export type JobQueueStats = {
  queued: number;
  active: number;
  processed: number;
  failed: number;
};

export type JobQueue = JobSink & {
  /** Resolves once nothing is queued or running. */
  onIdle(): Promise<void>;
  /** Stops accepting jobs and waits for the queued ones to finish. */
  close(): Promise<void>;
  stats(): JobQueueStats;
};

export class QueueClosedError extends Error {
  constructor() {
    super('Job queue is closed');
    this.name = 'QueueClosedError';
  }
}

/**
 * In-process worker pool. Up to `concurrency` jobs run at once, each to
 * completion; a failing job is logged and never stops the pool.
 */
export const createJobQueue = (options: { concurrency: number; handle: JobHandler; logger: Logger }): JobQueue => {
  const log = options.logger.child({ component: 'job-queue' });
  const concurrency = Math.max(1, options.concurrency);
  const pending: Job[] = [];
  let active = 0;
  let processed = 0;
  let failed = 0;
  let closed = false;
  let idleWaiters: Array<() => void> = [];

  const notifyIdle = () => {
    if (active > 0 || pending.length > 0) return;
    const waiters = idleWaiters;
    idleWaiters = [];
    waiters.forEach((resolve) => resolve());
  };

  const runJob = async (job: Job) => {
    try {
      await options.handle(job);
      processed += 1;
    } catch (error) {
      failed += 1;
      log.error('Job failed', { job, error: error instanceof Error ? error.message : String(error) });
    }
  };

  const pump = () => {
    while (active < concurrency && pending.length > 0) {
      const job = pending.shift();
      if (!job) break;
      active += 1;
      void runJob(job).finally(() => {
        active -= 1;
        pump();
        notifyIdle();
      });
    }
  };

  return {
    enqueue(job) {
      if (closed) throw new QueueClosedError();
      pending.push(job);
      log.debug('Job enqueued', { job, queued: pending.length });
      // defer so producers finish their own writes before the job starts
      queueMicrotask(pump);
    },

    onIdle() {
      if (active === 0 && pending.length === 0) return Promise.resolve();
      return new Promise<void>((resolve) => {
        idleWaiters.push(resolve);
      });
    },

    async close() {
      closed = true;
      await this.onIdle();
    },

    stats() {
      return { queued: pending.length, active, processed, failed };
    },
  };
};
