import type { FeedbackFilters, Repository } from '../db/repository';
import type { JobSink } from '../queue/jobQueue';
import type { Logger } from '../logger';
import type { AdjustmentRecord, FeedbackRecord } from './types';
import { ServiceError, notFound } from './errors';
import { now as defaultNow } from './utils';

export type SubmitFeedbackInput = {
  projectId: string;
  taskId?: string | null;
  userName?: string | null;
  feedbackText: string;
};

export type FeedbackWithAdjustments = FeedbackRecord & {
  adjustments: AdjustmentRecord[];
};

export type FeedbackService = ReturnType<typeof createFeedbackService>;

export const createFeedbackService = (deps: {
  repo: Repository;
  queue: JobSink;
  logger: Logger;
  now?: () => number;
}) => {
  const clock = deps.now ?? defaultNow;
  const log = deps.logger.child({ component: 'feedback-service' });

  /**
   * Validates references, stores the item as pending and queues processing.
   * Invalid input is rejected here so no model work is spent on it.
   */
  const submitFeedback = async (input: SubmitFeedbackInput): Promise<FeedbackRecord> => {
    const feedbackText = input.feedbackText.trim();
    if (!feedbackText) {
      throw new ServiceError('VALIDATION_ERROR', 'Feedback text is required.');
    }

    const project = await deps.repo.getProject(input.projectId);
    if (!project) throw notFound(`Project ${input.projectId} not found.`);

    if (input.taskId) {
      const task = await deps.repo.getTask(input.taskId);
      if (!task) throw notFound(`Task ${input.taskId} not found.`);
      if (task.projectId !== project.id) {
        throw new ServiceError('VALIDATION_ERROR', `Task ${task.id} does not belong to project ${project.id}.`);
      }
    }

    const record = await deps.repo.createFeedback({
      projectId: project.id,
      taskId: input.taskId ?? null,
      userName: input.userName ?? null,
      feedbackText,
      createdAt: clock(),
    });
    try {
      deps.queue.enqueue({ type: 'process_feedback', feedbackId: record.id });
    } catch (error) {
      log.error('Feedback could not be queued', {
        feedbackId: record.id,
        error: error instanceof Error ? error.message : String(error),
      });
      // a pending row must have a queued job
      if (await deps.repo.claimFeedback(record.id)) await deps.repo.failFeedback(record.id, clock());
      throw new ServiceError('UNAVAILABLE', 'Feedback processing is not accepting work, please resubmit later.');
    }
    log.info('Feedback submitted', { feedbackId: record.id, projectId: project.id, taskId: record.taskId });
    return record;
  };

  /** Adjustments are only exposed once the item has completed. */
  const getFeedback = async (id: string): Promise<FeedbackWithAdjustments> => {
    const record = await deps.repo.getFeedback(id);
    if (!record) throw notFound(`Feedback ${id} not found.`);
    const adjustments = record.status === 'completed' ? await deps.repo.listAdjustments(id) : [];
    return { ...record, adjustments };
  };

  const listFeedback = (filters: FeedbackFilters) => deps.repo.listFeedback(filters);

  return { submitFeedback, getFeedback, listFeedback };
};
