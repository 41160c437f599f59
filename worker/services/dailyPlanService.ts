import type { DailySlot, Repository } from '../db/repository';
import type { Logger } from '../logger';
import type { DailySummaryRecord, TaskRecord } from './types';
import { ServiceError, notFound } from './errors';
import { formatSummaryText, markSummaryCompleted, selectTopTasks } from './taskScoring';
import { now as defaultNow, parseDateKey, toDateKey } from './utils';

export type DailyPlan = {
  userId: string;
  date: string;
  summaries: DailySummaryRecord[];
};

export type DailyPlanSummary = {
  date: string;
  total_tasks: number;
  completed_tasks: number;
  /** Percentage of slots completed, two decimals. */
  completion_rate: number;
  total_hours_worked: number;
  summaries: Array<{
    rank: number;
    task_id: string;
    summary_text: string;
    completed: boolean;
    hours_worked: number | null;
  }>;
};

export type DailyPlanService = ReturnType<typeof createDailyPlanService>;

const byRank = (rows: DailySummaryRecord[]) => [...rows].sort((a, b) => a.rank - b.rank);

export const createDailyPlanService = (deps: { repo: Repository; logger: Logger; now?: () => number }) => {
  const clock = deps.now ?? defaultNow;
  const log = deps.logger.child({ component: 'daily-plan' });

  const resolveDate = (date?: string | null) => {
    if (!date) return toDateKey(clock());
    const parsed = parseDateKey(date);
    if (!parsed) throw new ServiceError('VALIDATION_ERROR', `Invalid date "${date}", expected YYYY-MM-DD.`);
    return parsed;
  };

  const buildSlots = async (userId: string, date: string): Promise<DailySlot[]> => {
    const candidates = await deps.repo.listOpenTasksForUser(userId);
    return selectTopTasks(candidates, date).map(({ task }, index) => ({
      taskId: task.id,
      rank: index + 1,
      summaryText: formatSummaryText(task, index + 1, date),
    }));
  };

  /**
   * Top tasks for (user, date). Generated once and then served from the
   * store; `regenerate` replaces the stored set.
   */
  const generateDailyPlan = async (
    userId: string,
    date?: string | null,
    options: { regenerate?: boolean } = {}
  ): Promise<DailyPlan> => {
    const day = resolveDate(date);

    if (options.regenerate) {
      const slots = await buildSlots(userId, day);
      const rows = await deps.repo.replaceDailySummaries(userId, day, slots, clock());
      log.info('Daily plan regenerated', { userId, date: day, slots: rows.length });
      return { userId, date: day, summaries: byRank(rows) };
    }

    const existing = await deps.repo.listDailySummaries(userId, day);
    if (existing.length > 0) return { userId, date: day, summaries: byRank(existing) };

    const slots = await buildSlots(userId, day);
    const inserted = await deps.repo.insertDailySummaries(userId, day, slots, clock());
    if (inserted) {
      log.info('Daily plan generated', { userId, date: day, slots: slots.length });
    } else {
      log.info('Daily plan written concurrently, using stored set', { userId, date: day });
    }
    const stored = await deps.repo.listDailySummaries(userId, day);
    return { userId, date: day, summaries: byRank(stored) };
  };

  const getTodayPlan = (userId: string) => generateDailyPlan(userId, null);

  /**
   * Completes the task and its slot for the day. The remaining slots are
   * left as they are.
   */
  const markTaskComplete = async (
    taskId: string,
    userId: string,
    hoursWorked?: number | null,
    date?: string | null
  ): Promise<{ task: TaskRecord; summary: DailySummaryRecord | null }> => {
    if (hoursWorked !== undefined && hoursWorked !== null && (!Number.isFinite(hoursWorked) || hoursWorked < 0)) {
      throw new ServiceError('VALIDATION_ERROR', 'hours_worked must be a non-negative number.');
    }
    const day = resolveDate(date);
    const task = await deps.repo.getTask(taskId);
    if (!task) throw notFound(`Task ${taskId} not found.`);
    if (task.assigneeId !== userId) {
      throw new ServiceError('VALIDATION_ERROR', `Task ${taskId} is not assigned to user ${userId}.`);
    }

    const completed = await deps.repo.completeTask(taskId, clock());
    if (!completed) throw notFound(`Task ${taskId} not found.`);

    const slot = (await deps.repo.listDailySummaries(userId, day)).find((row) => row.taskId === taskId);
    const summary = slot
      ? await deps.repo.updateDailySummaryCompletion(userId, day, taskId, {
          hoursWorked: hoursWorked ?? slot.hoursWorked,
          summaryText: markSummaryCompleted(slot.summaryText),
        })
      : null;

    log.info('Task marked complete', { taskId, userId, date: day, slotUpdated: summary !== null });
    return { task: completed, summary };
  };

  const getPlanSummary = async (userId: string, date?: string | null): Promise<DailyPlanSummary> => {
    const day = resolveDate(date);
    const rows = byRank(await deps.repo.listDailySummaries(userId, day));
    const completedTasks = rows.filter((row) => row.completed).length;

    return {
      date: day,
      total_tasks: rows.length,
      completed_tasks: completedTasks,
      completion_rate: rows.length ? Math.round((completedTasks / rows.length) * 10000) / 100 : 0,
      total_hours_worked: rows.reduce((sum, row) => sum + (row.hoursWorked ?? 0), 0),
      summaries: rows.map((row) => ({
        rank: row.rank,
        task_id: row.taskId,
        summary_text: row.summaryText,
        completed: row.completed,
        hours_worked: row.hoursWorked,
      })),
    };
  };

  return { generateDailyPlan, getTodayPlan, markTaskComplete, getPlanSummary };
};
