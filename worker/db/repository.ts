import { and, asc, desc, eq, inArray, max } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import type { DrizzleDB } from './index';
import {
  adjustments,
  dailySummaries,
  feedback,
  inboxItems,
  llmCallLogs,
  planVersions,
  projects,
  tasks,
} from './schema';
import {
  toAdjustmentRecord,
  toDailySummaryRecord,
  toFeedbackRecord,
  toInboxItemRecord,
  toLlmCallRow,
  toPlanVersionRecord,
  toProjectRecord,
  toTaskRecord,
} from '../services/serializers';
import { generateId } from '../services/utils';
import type {
  AdjustmentDraft,
  AdjustmentRecord,
  Classification,
  DailySummaryRecord,
  FeedbackRecord,
  FeedbackStatus,
  InboxItemRecord,
  LlmCallRecord,
  PlanContent,
  PlanVersionRecord,
  PriorityLevel,
  ProjectRecord,
  TaskRecord,
} from '../services/types';

export type NewProject = {
  name: string;
  description?: string | null;
  ownerId?: string | null;
  createdAt: number;
};

export type NewTask = {
  projectId: string;
  title: string;
  description?: string | null;
  priority: PriorityLevel;
  estimatedHours?: number | null;
  dueDate?: string | null;
  assigneeId?: string | null;
  createdAt: number;
};

export type NewFeedback = {
  projectId: string;
  taskId: string | null;
  userName: string | null;
  feedbackText: string;
  createdAt: number;
};

export type FeedbackFilters = {
  projectId?: string;
  taskId?: string;
  status?: FeedbackStatus;
  limit?: number;
  offset?: number;
};

export type NewPlanVersion = {
  projectId: string;
  content: PlanContent;
  createdBy: string | null;
  createdAt: number;
};

export type DailySlot = {
  taskId: string;
  rank: number;
  summaryText: string;
};

export type InboxOutcome = {
  status: 'processed' | 'failed';
  classification: Classification | null;
  projectId: string | null;
  taskId: string | null;
  updatedAt: number;
};

/**
 * Persistence seam for the engine. Conditional transitions (`claim*`,
 * `completeFeedback`, `failFeedback`) are single compare-and-set writes so
 * concurrent workers in separate processes cannot both win.
 */
export interface Repository {
  getProject(id: string): Promise<ProjectRecord | null>;
  createProject(input: NewProject): Promise<ProjectRecord>;
  getTask(id: string): Promise<TaskRecord | null>;
  listProjectTasks(projectId: string): Promise<TaskRecord[]>;
  /** Tasks assigned to the user whose status is todo or in_progress. */
  listOpenTasksForUser(userId: string): Promise<TaskRecord[]>;
  createTask(input: NewTask): Promise<TaskRecord>;
  completeTask(id: string, completedAt: number): Promise<TaskRecord | null>;

  createFeedback(input: NewFeedback): Promise<FeedbackRecord>;
  getFeedback(id: string): Promise<FeedbackRecord | null>;
  listFeedback(filters: FeedbackFilters): Promise<FeedbackRecord[]>;
  /** pending → processing; null when the row is missing or already claimed. */
  claimFeedback(id: string): Promise<FeedbackRecord | null>;
  /**
   * processing → completed together with the adjustment rows, in one
   * transaction. Returns null and writes nothing unless the row is processing.
   */
  completeFeedback(
    id: string,
    result: { summary: string; adjustments: AdjustmentDraft[] },
    processedAt: number
  ): Promise<AdjustmentRecord[] | null>;
  /** processing → failed; false when the row was not processing. */
  failFeedback(id: string, processedAt: number): Promise<boolean>;
  listAdjustments(feedbackId: string): Promise<AdjustmentRecord[]>;

  getLatestPlanVersion(projectId: string): Promise<PlanVersionRecord | null>;
  listPlanVersions(projectId: string): Promise<PlanVersionRecord[]>;
  /** Inserts with version_number = current max + 1 (1 for the first). */
  appendPlanVersion(input: NewPlanVersion): Promise<PlanVersionRecord>;

  listDailySummaries(userId: string, date: string): Promise<DailySummaryRecord[]>;
  /**
   * Inserts the whole slot set or nothing. Returns false when another writer
   * already holds a slot for (user, date).
   */
  insertDailySummaries(userId: string, date: string, slots: DailySlot[], createdAt: number): Promise<boolean>;
  /** Drops the slot set for (user, date) and writes the new one atomically. */
  replaceDailySummaries(
    userId: string,
    date: string,
    slots: DailySlot[],
    createdAt: number
  ): Promise<DailySummaryRecord[]>;
  updateDailySummaryCompletion(
    userId: string,
    date: string,
    taskId: string,
    update: { hoursWorked: number | null; summaryText: string }
  ): Promise<DailySummaryRecord | null>;

  appendLlmCall(entry: Omit<LlmCallRecord, 'id'>): Promise<void>;

  createInboxItem(input: { userId: string; content: string; tags: string[]; createdAt: number }): Promise<InboxItemRecord>;
  getInboxItem(id: string): Promise<InboxItemRecord | null>;
  /** unprocessed → processing; null when missing or already claimed. */
  claimInboxItem(id: string, updatedAt: number): Promise<InboxItemRecord | null>;
  finishInboxItem(id: string, outcome: InboxOutcome): Promise<InboxItemRecord | null>;
}

const PG_UNIQUE_VIOLATION = '23505';

const hasCode = (value: unknown): value is { code: unknown } =>
  typeof value === 'object' && value !== null && 'code' in value;

export const isUniqueViolation = (error: unknown): boolean => {
  if (hasCode(error) && error.code === PG_UNIQUE_VIOLATION) return true;
  if (error instanceof Error && error.cause !== undefined) return isUniqueViolation(error.cause);
  return false;
};

const MAX_VERSION_ATTEMPTS = 3;

export const createPgRepository = (db: DrizzleDB): Repository => {
  const toSlotRows = (userId: string, date: string, slots: DailySlot[], createdAt: number) =>
    slots.map((slot) => ({
      id: generateId(),
      userId,
      date,
      taskId: slot.taskId,
      rank: slot.rank,
      summaryText: slot.summaryText,
      completed: false,
      hoursWorked: null,
      createdAt,
    }));

  return {
    async getProject(id) {
      const [row] = await db.select().from(projects).where(eq(projects.id, id)).limit(1);
      return row ? toProjectRecord(row) : null;
    },

    async createProject(input) {
      const record = {
        id: generateId(),
        name: input.name,
        description: input.description ?? null,
        status: 'active',
        ownerId: input.ownerId ?? null,
        createdAt: input.createdAt,
        updatedAt: input.createdAt,
      };
      await db.insert(projects).values(record);
      return toProjectRecord(record);
    },

    async getTask(id) {
      const [row] = await db.select().from(tasks).where(eq(tasks.id, id)).limit(1);
      return row ? toTaskRecord(row) : null;
    },

    async listProjectTasks(projectId) {
      const rows = await db
        .select()
        .from(tasks)
        .where(eq(tasks.projectId, projectId))
        .orderBy(asc(tasks.createdAt), asc(tasks.id));
      return rows.map(toTaskRecord);
    },

    async listOpenTasksForUser(userId) {
      const rows = await db
        .select()
        .from(tasks)
        .where(and(eq(tasks.assigneeId, userId), inArray(tasks.status, ['todo', 'in_progress'])));
      return rows.map(toTaskRecord);
    },

    async createTask(input) {
      const record = {
        id: generateId(),
        projectId: input.projectId,
        title: input.title,
        description: input.description ?? null,
        status: 'todo',
        priority: input.priority,
        estimatedHours: input.estimatedHours ?? null,
        dueDate: input.dueDate ?? null,
        assigneeId: input.assigneeId ?? null,
        createdAt: input.createdAt,
        completedAt: null,
        updatedAt: input.createdAt,
      };
      await db.insert(tasks).values(record);
      return toTaskRecord(record);
    },

    async completeTask(id, completedAt) {
      const [row] = await db
        .update(tasks)
        .set({ status: 'completed', completedAt, updatedAt: completedAt })
        .where(eq(tasks.id, id))
        .returning();
      return row ? toTaskRecord(row) : null;
    },

    async createFeedback(input) {
      const record = {
        id: generateId(),
        projectId: input.projectId,
        taskId: input.taskId,
        userName: input.userName,
        feedbackText: input.feedbackText,
        status: 'pending',
        summary: null,
        createdAt: input.createdAt,
        processedAt: null,
      };
      await db.insert(feedback).values(record);
      return toFeedbackRecord(record);
    },

    async getFeedback(id) {
      const [row] = await db.select().from(feedback).where(eq(feedback.id, id)).limit(1);
      return row ? toFeedbackRecord(row) : null;
    },

    async listFeedback(filters) {
      const clauses: SQL[] = [];
      if (filters.projectId) clauses.push(eq(feedback.projectId, filters.projectId));
      if (filters.taskId) clauses.push(eq(feedback.taskId, filters.taskId));
      if (filters.status) clauses.push(eq(feedback.status, filters.status));
      const rows = await db
        .select()
        .from(feedback)
        .where(clauses.length ? and(...clauses) : undefined)
        .orderBy(desc(feedback.createdAt))
        .limit(filters.limit ?? 100)
        .offset(filters.offset ?? 0);
      return rows.map(toFeedbackRecord);
    },

    async claimFeedback(id) {
      const [row] = await db
        .update(feedback)
        .set({ status: 'processing' })
        .where(and(eq(feedback.id, id), eq(feedback.status, 'pending')))
        .returning();
      return row ? toFeedbackRecord(row) : null;
    },

    async completeFeedback(id, result, processedAt) {
      return db.transaction(async (tx) => {
        const [claimed] = await tx
          .update(feedback)
          .set({ status: 'completed', summary: result.summary, processedAt })
          .where(and(eq(feedback.id, id), eq(feedback.status, 'processing')))
          .returning({ id: feedback.id });
        if (!claimed) return null;

        const rows = result.adjustments.map((draft) => ({
          id: generateId(),
          feedbackId: id,
          adjustmentType: draft.adjustmentType,
          taskId: draft.taskId,
          description: draft.description,
          originalValue: draft.originalValue,
          newValue: draft.newValue,
          reasoning: draft.reasoning,
          createdAt: processedAt,
        }));
        if (rows.length > 0) {
          await tx.insert(adjustments).values(rows);
        }
        return rows.map(toAdjustmentRecord);
      });
    },

    async failFeedback(id, processedAt) {
      const rows = await db
        .update(feedback)
        .set({ status: 'failed', processedAt })
        .where(and(eq(feedback.id, id), eq(feedback.status, 'processing')))
        .returning({ id: feedback.id });
      return rows.length > 0;
    },

    async listAdjustments(feedbackId) {
      const rows = await db
        .select()
        .from(adjustments)
        .where(eq(adjustments.feedbackId, feedbackId))
        .orderBy(asc(adjustments.createdAt), asc(adjustments.id));
      return rows.map(toAdjustmentRecord);
    },

    async getLatestPlanVersion(projectId) {
      const [row] = await db
        .select()
        .from(planVersions)
        .where(eq(planVersions.projectId, projectId))
        .orderBy(desc(planVersions.versionNumber))
        .limit(1);
      return row ? toPlanVersionRecord(row) : null;
    },

    async listPlanVersions(projectId) {
      const rows = await db
        .select()
        .from(planVersions)
        .where(eq(planVersions.projectId, projectId))
        .orderBy(asc(planVersions.versionNumber));
      return rows.map(toPlanVersionRecord);
    },

    async appendPlanVersion(input) {
      for (let attempt = 1; ; attempt += 1) {
        try {
          return await db.transaction(async (tx) => {
            const [current] = await tx
              .select({ value: max(planVersions.versionNumber) })
              .from(planVersions)
              .where(eq(planVersions.projectId, input.projectId));
            const record = {
              id: generateId(),
              projectId: input.projectId,
              versionNumber: (current?.value ?? 0) + 1,
              content: input.content,
              createdBy: input.createdBy,
              createdAt: input.createdAt,
            };
            await tx.insert(planVersions).values(record);
            return toPlanVersionRecord(record);
          });
        } catch (error) {
          // A concurrent writer took the same number; read the new max and retry.
          if (!isUniqueViolation(error) || attempt >= MAX_VERSION_ATTEMPTS) throw error;
        }
      }
    },

    async listDailySummaries(userId, date) {
      const rows = await db
        .select()
        .from(dailySummaries)
        .where(and(eq(dailySummaries.userId, userId), eq(dailySummaries.date, date)))
        .orderBy(asc(dailySummaries.rank));
      return rows.map(toDailySummaryRecord);
    },

    async insertDailySummaries(userId, date, slots, createdAt) {
      if (slots.length === 0) return true;
      try {
        await db.transaction(async (tx) => {
          await tx.insert(dailySummaries).values(toSlotRows(userId, date, slots, createdAt));
        });
        return true;
      } catch (error) {
        if (isUniqueViolation(error)) return false;
        throw error;
      }
    },

    async replaceDailySummaries(userId, date, slots, createdAt) {
      const rows = toSlotRows(userId, date, slots, createdAt);
      await db.transaction(async (tx) => {
        await tx
          .delete(dailySummaries)
          .where(and(eq(dailySummaries.userId, userId), eq(dailySummaries.date, date)));
        if (rows.length > 0) {
          await tx.insert(dailySummaries).values(rows);
        }
      });
      return rows.map(toDailySummaryRecord);
    },

    async updateDailySummaryCompletion(userId, date, taskId, update) {
      const [row] = await db
        .update(dailySummaries)
        .set({ completed: true, hoursWorked: update.hoursWorked, summaryText: update.summaryText })
        .where(
          and(
            eq(dailySummaries.userId, userId),
            eq(dailySummaries.date, date),
            eq(dailySummaries.taskId, taskId)
          )
        )
        .returning();
      return row ? toDailySummaryRecord(row) : null;
    },

    async appendLlmCall(entry) {
      await db.insert(llmCallLogs).values(toLlmCallRow({ ...entry, id: generateId() }));
    },

    async createInboxItem(input) {
      const record = {
        id: generateId(),
        userId: input.userId,
        content: input.content,
        tags: input.tags,
        status: 'unprocessed',
        classification: null,
        projectId: null,
        taskId: null,
        createdAt: input.createdAt,
        updatedAt: input.createdAt,
      };
      await db.insert(inboxItems).values(record);
      return toInboxItemRecord(record);
    },

    async getInboxItem(id) {
      const [row] = await db.select().from(inboxItems).where(eq(inboxItems.id, id)).limit(1);
      return row ? toInboxItemRecord(row) : null;
    },

    async claimInboxItem(id, updatedAt) {
      const [row] = await db
        .update(inboxItems)
        .set({ status: 'processing', updatedAt })
        .where(and(eq(inboxItems.id, id), eq(inboxItems.status, 'unprocessed')))
        .returning();
      return row ? toInboxItemRecord(row) : null;
    },

    async finishInboxItem(id, outcome) {
      const [row] = await db
        .update(inboxItems)
        .set({
          status: outcome.status,
          classification: outcome.classification,
          projectId: outcome.projectId,
          taskId: outcome.taskId,
          updatedAt: outcome.updatedAt,
        })
        .where(and(eq(inboxItems.id, id), eq(inboxItems.status, 'processing')))
        .returning();
      return row ? toInboxItemRecord(row) : null;
    },
  };
};
