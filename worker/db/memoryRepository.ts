import type { Repository } from './repository';
import { generateId } from '../services/utils';
import type {
  AdjustmentRecord,
  DailySummaryRecord,
  FeedbackRecord,
  InboxItemRecord,
  LlmCallRecord,
  PlanVersionRecord,
  ProjectRecord,
  TaskRecord,
} from '../services/types';

export type MemoryRepository = Repository & {
  /** Test/seed hooks that bypass the engine's write paths. */
  seedProject(project: Partial<ProjectRecord> & Pick<ProjectRecord, 'id' | 'name'>): ProjectRecord;
  seedTask(task: Partial<TaskRecord> & Pick<TaskRecord, 'id' | 'projectId' | 'title'>): TaskRecord;
  llmCalls(): LlmCallRecord[];
};

const slotKey = (userId: string, date: string) => `${userId}::${date}`;

/**
 * In-process store with the same conditional-write semantics as the
 * PostgreSQL repository. Every check-and-set runs without an intervening
 * await, so it is atomic on the event loop.
 */
export const createMemoryRepository = (): MemoryRepository => {
  const projects = new Map<string, ProjectRecord>();
  const tasks = new Map<string, TaskRecord>();
  const feedback = new Map<string, FeedbackRecord>();
  const adjustments: AdjustmentRecord[] = [];
  const planVersions: PlanVersionRecord[] = [];
  const dailySlots = new Map<string, DailySummaryRecord[]>();
  const calls: LlmCallRecord[] = [];
  const inbox = new Map<string, InboxItemRecord>();

  const copy = <T extends object>(value: T): T => ({ ...value });

  return {
    seedProject(project) {
      const record: ProjectRecord = {
        description: null,
        status: 'active',
        ownerId: null,
        createdAt: 0,
        updatedAt: 0,
        ...project,
      };
      projects.set(record.id, record);
      return copy(record);
    },

    seedTask(task) {
      const record: TaskRecord = {
        description: null,
        status: 'todo',
        priority: 'medium',
        estimatedHours: null,
        dueDate: null,
        assigneeId: null,
        createdAt: 0,
        completedAt: null,
        updatedAt: 0,
        ...task,
      };
      tasks.set(record.id, record);
      return copy(record);
    },

    llmCalls() {
      return calls.map(copy);
    },

    async getProject(id) {
      const found = projects.get(id);
      return found ? copy(found) : null;
    },

    async createProject(input) {
      const record: ProjectRecord = {
        id: generateId(),
        name: input.name,
        description: input.description ?? null,
        status: 'active',
        ownerId: input.ownerId ?? null,
        createdAt: input.createdAt,
        updatedAt: input.createdAt,
      };
      projects.set(record.id, record);
      return copy(record);
    },

    async getTask(id) {
      const found = tasks.get(id);
      return found ? copy(found) : null;
    },

    async listProjectTasks(projectId) {
      return [...tasks.values()]
        .filter((task) => task.projectId === projectId)
        .sort((a, b) => a.createdAt - b.createdAt || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
        .map(copy);
    },

    async listOpenTasksForUser(userId) {
      return [...tasks.values()]
        .filter((task) => task.assigneeId === userId && (task.status === 'todo' || task.status === 'in_progress'))
        .map(copy);
    },

    async createTask(input) {
      const record: TaskRecord = {
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
      tasks.set(record.id, record);
      return copy(record);
    },

    async completeTask(id, completedAt) {
      const found = tasks.get(id);
      if (!found) return null;
      const next: TaskRecord = { ...found, status: 'completed', completedAt, updatedAt: completedAt };
      tasks.set(id, next);
      return copy(next);
    },

    async createFeedback(input) {
      const record: FeedbackRecord = {
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
      feedback.set(record.id, record);
      return copy(record);
    },

    async getFeedback(id) {
      const found = feedback.get(id);
      return found ? copy(found) : null;
    },

    async listFeedback(filters) {
      const offset = filters.offset ?? 0;
      return [...feedback.values()]
        .filter((item) => !filters.projectId || item.projectId === filters.projectId)
        .filter((item) => !filters.taskId || item.taskId === filters.taskId)
        .filter((item) => !filters.status || item.status === filters.status)
        .sort((a, b) => b.createdAt - a.createdAt)
        .slice(offset, offset + (filters.limit ?? 100))
        .map(copy);
    },

    async claimFeedback(id) {
      const found = feedback.get(id);
      if (!found || found.status !== 'pending') return null;
      const next: FeedbackRecord = { ...found, status: 'processing' };
      feedback.set(id, next);
      return copy(next);
    },

    async completeFeedback(id, result, processedAt) {
      const found = feedback.get(id);
      if (!found || found.status !== 'processing') return null;
      const created = result.adjustments.map((draft) => ({
        ...draft,
        id: generateId(),
        feedbackId: id,
        createdAt: processedAt,
      }));
      adjustments.push(...created);
      feedback.set(id, { ...found, status: 'completed', summary: result.summary, processedAt });
      return created.map(copy);
    },

    async failFeedback(id, processedAt) {
      const found = feedback.get(id);
      if (!found || found.status !== 'processing') return false;
      feedback.set(id, { ...found, status: 'failed', processedAt });
      return true;
    },

    async listAdjustments(feedbackId) {
      return adjustments.filter((item) => item.feedbackId === feedbackId).map(copy);
    },

    async getLatestPlanVersion(projectId) {
      const versions = planVersions.filter((item) => item.projectId === projectId);
      if (versions.length === 0) return null;
      const latest = versions.reduce((best, item) => (item.versionNumber > best.versionNumber ? item : best));
      return copy(latest);
    },

    async listPlanVersions(projectId) {
      return planVersions
        .filter((item) => item.projectId === projectId)
        .sort((a, b) => a.versionNumber - b.versionNumber)
        .map(copy);
    },

    async appendPlanVersion(input) {
      const current = planVersions
        .filter((item) => item.projectId === input.projectId)
        .reduce((highest, item) => Math.max(highest, item.versionNumber), 0);
      const record: PlanVersionRecord = {
        id: generateId(),
        projectId: input.projectId,
        versionNumber: current + 1,
        content: input.content,
        createdBy: input.createdBy,
        createdAt: input.createdAt,
      };
      planVersions.push(record);
      return copy(record);
    },

    async listDailySummaries(userId, date) {
      return (dailySlots.get(slotKey(userId, date)) ?? []).map(copy);
    },

    async insertDailySummaries(userId, date, slots, createdAt) {
      const key = slotKey(userId, date);
      if (slots.length === 0) return true;
      if ((dailySlots.get(key) ?? []).length > 0) return false;
      dailySlots.set(
        key,
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
        }))
      );
      return true;
    },

    async replaceDailySummaries(userId, date, slots, createdAt) {
      const rows: DailySummaryRecord[] = slots.map((slot) => ({
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
      dailySlots.set(slotKey(userId, date), rows);
      return rows.map(copy);
    },

    async updateDailySummaryCompletion(userId, date, taskId, update) {
      const key = slotKey(userId, date);
      const rows = dailySlots.get(key) ?? [];
      const index = rows.findIndex((row) => row.taskId === taskId);
      if (index === -1) return null;
      const next: DailySummaryRecord = {
        ...rows[index],
        completed: true,
        hoursWorked: update.hoursWorked,
        summaryText: update.summaryText,
      };
      dailySlots.set(key, rows.map((row, position) => (position === index ? next : row)));
      return copy(next);
    },

    async appendLlmCall(entry) {
      calls.push({ ...entry, id: generateId() });
    },

    async createInboxItem(input) {
      const record: InboxItemRecord = {
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
      inbox.set(record.id, record);
      return copy(record);
    },

    async getInboxItem(id) {
      const found = inbox.get(id);
      return found ? copy(found) : null;
    },

    async claimInboxItem(id, updatedAt) {
      const found = inbox.get(id);
      if (!found || found.status !== 'unprocessed') return null;
      const next: InboxItemRecord = { ...found, status: 'processing', updatedAt };
      inbox.set(id, next);
      return copy(next);
    },

    async finishInboxItem(id, outcome) {
      const found = inbox.get(id);
      if (!found || found.status !== 'processing') return null;
      const next: InboxItemRecord = { ...found, ...outcome };
      inbox.set(id, next);
      return copy(next);
    },
  };
};
