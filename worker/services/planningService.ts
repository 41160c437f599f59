import type { Repository } from '../db/repository';
import type { LlmConfig } from '../config';
import type { Logger } from '../logger';
import type { ModelRunner } from '../llm/modelRunner';
import { parsePlanContent } from '../llm/parser';
import { PLAN_SYSTEM_PROMPT, buildPlanPrompt } from './prompts';
import type { PlanVersionRecord } from './types';
import { notFound } from './errors';
import { now as defaultNow } from './utils';

export type GeneratePlanOptions = {
  forceRegenerate?: boolean;
  userId?: string | null;
};

export type GeneratePlanResult = {
  plan: PlanVersionRecord;
  /** True when an existing version was returned without a model call. */
  cached: boolean;
};

export type PlanningService = ReturnType<typeof createPlanningService>;

export const createPlanningService = (deps: {
  repo: Repository;
  runner: ModelRunner;
  llm: Pick<LlmConfig, 'maxTokens' | 'temperatures'>;
  logger: Logger;
  now?: () => number;
}) => {
  const clock = deps.now ?? defaultNow;
  const log = deps.logger.child({ component: 'planning-service' });
  // concurrent cache-eligible requests for one project share a single generation
  const inFlight = new Map<string, Promise<GeneratePlanResult>>();

  const createVersion = async (projectId: string, userId: string | null): Promise<GeneratePlanResult> => {
    const project = await deps.repo.getProject(projectId);
    if (!project) throw notFound(`Project ${projectId} not found.`);

    const tasks = await deps.repo.listProjectTasks(project.id);
    const { value } = await deps.runner.run(
      {
        purpose: 'project_plan',
        userId,
        prompt: buildPlanPrompt(project, tasks),
        system: PLAN_SYSTEM_PROMPT,
        temperature: deps.llm.temperatures.plan,
        maxTokens: deps.llm.maxTokens,
        metadata: { projectId: project.id },
      },
      parsePlanContent
    );

    const plan = await deps.repo.appendPlanVersion({
      projectId: project.id,
      content: value,
      createdBy: userId,
      createdAt: clock(),
    });
    log.info('Plan version created', { projectId: project.id, versionNumber: plan.versionNumber });
    return { plan, cached: false };
  };

  const generateFresh = async (projectId: string, userId: string | null): Promise<GeneratePlanResult> => {
    const latest = await deps.repo.getLatestPlanVersion(projectId);
    if (latest) {
      log.debug('Returning cached plan version', { projectId, versionNumber: latest.versionNumber });
      return { plan: latest, cached: true };
    }
    return createVersion(projectId, userId);
  };

  /**
   * Returns the latest version unless `forceRegenerate` is set; otherwise
   * appends version max + 1 from a fresh model call.
   */
  const generatePlan = async (projectId: string, options: GeneratePlanOptions = {}): Promise<GeneratePlanResult> => {
    const userId = options.userId ?? null;
    if (options.forceRegenerate) return createVersion(projectId, userId);

    const pending = inFlight.get(projectId);
    if (pending) return pending;
    const run = generateFresh(projectId, userId).finally(() => inFlight.delete(projectId));
    inFlight.set(projectId, run);
    return run;
  };

  const getLatestPlan = async (projectId: string) => {
    const project = await deps.repo.getProject(projectId);
    if (!project) throw notFound(`Project ${projectId} not found.`);
    const latest = await deps.repo.getLatestPlanVersion(projectId);
    if (!latest) throw notFound(`No plan has been generated for project ${projectId}.`);
    return latest;
  };

  const listPlanVersions = async (projectId: string) => {
    const project = await deps.repo.getProject(projectId);
    if (!project) throw notFound(`Project ${projectId} not found.`);
    return deps.repo.listPlanVersions(projectId);
  };

  return { generatePlan, getLatestPlan, listPlanVersions };
};
