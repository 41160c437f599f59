import type { JobHandler } from './jobQueue';
import type { FeedbackProcessor } from '../services/feedbackProcessor';
import type { PlanningService } from '../services/planningService';
import type { InboxService } from '../services/inboxService';

export type JobTargets = {
  feedbackProcessor: Pick<FeedbackProcessor, 'processFeedback'>;
  planning: Pick<PlanningService, 'generatePlan'>;
  inbox: Pick<InboxService, 'processInboxItem'>;
};

/**
 * Routes queued jobs to their service. Targets are resolved per job so the
 * queue can be built before the services that enqueue into it.
 */
export const createJobHandler = (resolveTargets: () => JobTargets): JobHandler => async (job) => {
  const targets = resolveTargets();
  switch (job.type) {
    case 'process_feedback':
      await targets.feedbackProcessor.processFeedback(job.feedbackId);
      return;
    case 'generate_plan':
      await targets.planning.generatePlan(job.projectId, {
        forceRegenerate: job.forceRegenerate,
        userId: job.userId,
      });
      return;
    case 'process_inbox':
      await targets.inbox.processInboxItem(job.inboxItemId);
      return;
  }
};
