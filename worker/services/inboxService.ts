import type { Repository } from '../db/repository';
import type { LlmConfig } from '../config';
import type { Logger } from '../logger';
import type { ModelRunner } from '../llm/modelRunner';
import type { JobSink } from '../queue/jobQueue';
import { parseClassification } from '../llm/parser';
import { CLASSIFICATION_SYSTEM_PROMPT, buildClassificationPrompt } from './prompts';
import type { Classification, InboxItemRecord } from './types';
import { ServiceError, notFound } from './errors';
import { now as defaultNow } from './utils';

export type InboxOutcomeSummary =
  | { status: 'skipped'; inboxItemId: string }
  | { status: 'processed'; inboxItemId: string; action: Classification['action']; projectId: string | null; taskId: string | null }
  | { status: 'failed'; inboxItemId: string; error: string };

export type InboxService = ReturnType<typeof createInboxService>;

export const createInboxService = (deps: {
  repo: Repository;
  runner: ModelRunner;
  queue: JobSink;
  llm: Pick<LlmConfig, 'maxTokens' | 'temperatures'>;
  autoPlanOnProjectCreate: boolean;
  logger: Logger;
  now?: () => number;
}) => {
  const clock = deps.now ?? defaultNow;
  const log = deps.logger.child({ component: 'inbox-service' });

  const captureItem = async (input: { userId: string; content: string; tags?: string[] }): Promise<InboxItemRecord> => {
    const content = input.content.trim();
    if (!content) throw new ServiceError('VALIDATION_ERROR', 'Inbox content is required.');

    const item = await deps.repo.createInboxItem({
      userId: input.userId,
      content,
      tags: input.tags ?? [],
      createdAt: clock(),
    });
    try {
      deps.queue.enqueue({ type: 'process_inbox', inboxItemId: item.id });
    } catch (error) {
      log.error('Inbox item could not be queued', {
        inboxItemId: item.id,
        error: error instanceof Error ? error.message : String(error),
      });
      if (await deps.repo.claimInboxItem(item.id, clock())) {
        await deps.repo.finishInboxItem(item.id, {
          status: 'failed',
          classification: null,
          projectId: null,
          taskId: null,
          updatedAt: clock(),
        });
      }
      throw new ServiceError('UNAVAILABLE', 'Inbox processing is not accepting work, please resubmit later.');
    }
    log.info('Inbox item captured', { inboxItemId: item.id, userId: item.userId });
    return item;
  };

  const getInboxItem = async (id: string) => {
    const item = await deps.repo.getInboxItem(id);
    if (!item) throw notFound(`Inbox item ${id} not found.`);
    return item;
  };

  const requestPlan = (projectId: string, userId: string) => {
    if (!deps.autoPlanOnProjectCreate) return;
    try {
      deps.queue.enqueue({ type: 'generate_plan', projectId, userId, forceRegenerate: false });
    } catch (error) {
      log.warn('Could not queue plan generation for new project', { projectId, error: String(error) });
    }
  };

  const createProjectFor = async (item: InboxItemRecord, classification: Classification, fallbackName: string) => {
    const project = await deps.repo.createProject({
      name: classification.projectName ?? fallbackName,
      description: classification.projectDescription,
      ownerId: item.userId,
      createdAt: clock(),
    });
    log.info('Project created from inbox item', { inboxItemId: item.id, projectId: project.id });
    requestPlan(project.id, item.userId);
    return project;
  };

  const createTaskFor = (item: InboxItemRecord, classification: Classification, projectId: string) =>
    deps.repo.createTask({
      projectId,
      title: classification.taskTitle ?? 'Untitled Task',
      description: classification.taskDescription,
      priority: classification.taskPriority ?? 'medium',
      assigneeId: item.userId,
      createdAt: clock(),
    });

  const existingProjectId = async (classification: Classification) => {
    if (!classification.suggestedProjectId) return null;
    const project = await deps.repo.getProject(classification.suggestedProjectId);
    return project?.id ?? null;
  };

  /** Applies the classification; returns what was created. */
  const applyClassification = async (item: InboxItemRecord, classification: Classification) => {
    switch (classification.action) {
      case 'create_project': {
        const project = await createProjectFor(item, classification, 'Untitled Project');
        return { projectId: project.id, taskId: null };
      }
      case 'create_task': {
        const projectId = classification.projectName
          ? (await createProjectFor(item, classification, classification.projectName)).id
          : await existingProjectId(classification);
        if (!projectId) {
          log.warn('Classified as task without a project, nothing created', { inboxItemId: item.id });
          return { projectId: null, taskId: null };
        }
        const task = await createTaskFor(item, classification, projectId);
        return { projectId, taskId: task.id };
      }
      case 'attach_to_existing': {
        const projectId = await existingProjectId(classification);
        if (!projectId || !classification.taskTitle) return { projectId, taskId: null };
        const task = await createTaskFor(item, classification, projectId);
        return { projectId, taskId: task.id };
      }
      case 'no_action':
        return { projectId: null, taskId: null };
    }
  };

  const processInboxItem = async (inboxItemId: string): Promise<InboxOutcomeSummary> => {
    const item = await deps.repo.claimInboxItem(inboxItemId, clock());
    if (!item) {
      log.info('Inbox item not claimable, skipping', { inboxItemId });
      return { status: 'skipped', inboxItemId };
    }

    try {
      const { value: classification } = await deps.runner.run(
        {
          purpose: 'inbox_classification',
          userId: item.userId,
          prompt: buildClassificationPrompt(item.content, item.tags),
          system: CLASSIFICATION_SYSTEM_PROMPT,
          temperature: deps.llm.temperatures.classification,
          maxTokens: deps.llm.maxTokens,
          metadata: { inboxItemId },
        },
        parseClassification
      );
      const created = await applyClassification(item, classification);
      await deps.repo.finishInboxItem(inboxItemId, {
        status: 'processed',
        classification,
        projectId: created.projectId,
        taskId: created.taskId,
        updatedAt: clock(),
      });
      log.info('Inbox item processed', { inboxItemId, action: classification.action, ...created });
      return { status: 'processed', inboxItemId, action: classification.action, ...created };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      await deps.repo.finishInboxItem(inboxItemId, {
        status: 'failed',
        classification: null,
        projectId: null,
        taskId: null,
        updatedAt: clock(),
      });
      log.warn('Inbox item failed', { inboxItemId, error: message });
      return { status: 'failed', inboxItemId, error: message };
    }
  };

  return { captureItem, getInboxItem, processInboxItem };
};
