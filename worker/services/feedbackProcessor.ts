import type { Repository } from '../db/repository';
import type { LlmConfig } from '../config';
import type { Logger } from '../logger';
import type { ModelRunner } from '../llm/modelRunner';
import { parseReplanResult } from '../llm/parser';
import { REPLAN_SYSTEM_PROMPT, buildReplanPrompt } from './prompts';
import type { ReplanResult } from './types';
import { now as defaultNow } from './utils';

export type ProcessOutcome =
  | { status: 'skipped'; feedbackId: string }
  | { status: 'completed'; feedbackId: string; adjustmentCount: number }
  | { status: 'failed'; feedbackId: string; error: string };

export type FeedbackProcessor = ReturnType<typeof createFeedbackProcessor>;

/** Drops task references the model invented. */
const keepKnownTaskIds = (result: ReplanResult, taskIds: Set<string>): ReplanResult => ({
  summary: result.summary,
  adjustments: result.adjustments.map((item) =>
    item.taskId !== null && !taskIds.has(item.taskId) ? { ...item, taskId: null } : item
  ),
});

export const createFeedbackProcessor = (deps: {
  repo: Repository;
  runner: ModelRunner;
  llm: Pick<LlmConfig, 'maxTokens' | 'temperatures'>;
  logger: Logger;
  now?: () => number;
}) => {
  const clock = deps.now ?? defaultNow;
  const log = deps.logger.child({ component: 'feedback-processor' });

  const fail = async (feedbackId: string, error: string): Promise<ProcessOutcome> => {
    const moved = await deps.repo.failFeedback(feedbackId, clock());
    log.warn('Feedback processing failed', { feedbackId, error, transitioned: moved });
    return { status: 'failed', feedbackId, error };
  };

  /**
   * pending → processing → completed | failed. The claim is a conditional
   * write, so a second worker on the same id gets `skipped`.
   */
  const processFeedback = async (feedbackId: string): Promise<ProcessOutcome> => {
    const feedback = await deps.repo.claimFeedback(feedbackId);
    if (!feedback) {
      log.info('Feedback not claimable, skipping', { feedbackId });
      return { status: 'skipped', feedbackId };
    }
    log.info('Feedback claimed', { feedbackId, projectId: feedback.projectId });

    try {
      const project = await deps.repo.getProject(feedback.projectId);
      if (!project) return await fail(feedbackId, `Project ${feedback.projectId} not found`);

      const tasks = await deps.repo.listProjectTasks(project.id);
      const { value } = await deps.runner.run(
        {
          purpose: 'feedback_replan',
          userId: null,
          prompt: buildReplanPrompt(project, tasks, feedback),
          system: REPLAN_SYSTEM_PROMPT,
          temperature: deps.llm.temperatures.feedback,
          maxTokens: deps.llm.maxTokens,
          metadata: { feedbackId, projectId: project.id },
        },
        parseReplanResult
      );

      const result = keepKnownTaskIds(value, new Set(tasks.map((task) => task.id)));
      const created = await deps.repo.completeFeedback(feedbackId, result, clock());
      if (!created) {
        log.warn('Feedback left processing before completion', { feedbackId });
        return { status: 'skipped', feedbackId };
      }
      log.info('Feedback completed', { feedbackId, adjustments: created.length });
      return { status: 'completed', feedbackId, adjustmentCount: created.length };
    } catch (error) {
      return fail(feedbackId, error instanceof Error ? error.message : String(error));
    }
  };

  return { processFeedback };
};
