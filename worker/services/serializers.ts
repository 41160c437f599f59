import {
  ADJUSTMENT_TYPES,
  FEEDBACK_STATUSES,
  INBOX_STATUSES,
  PROJECT_STATUSES,
  TASK_STATUSES,
  type AdjustmentRecord,
  type Classification,
  type DailySummaryRecord,
  type FeedbackRecord,
  type InboxItemRecord,
  type LlmCallRecord,
  type PlanContent,
  type PlanVersionRecord,
  type ProjectRecord,
  type TaskRecord,
} from './types';
import { normalizePriority } from './priority';

const pickEnum = <T extends string>(value: string, allowed: readonly T[], fallback: T): T =>
  allowed.find((item) => item === value) ?? fallback;

export const toProjectRecord = (row: {
  id: string;
  name: string;
  description: string | null;
  status: string;
  ownerId: string | null;
  createdAt: number;
  updatedAt: number;
}): ProjectRecord => ({
  id: row.id,
  name: row.name,
  description: row.description,
  status: pickEnum(row.status, PROJECT_STATUSES, 'active'),
  ownerId: row.ownerId,
  createdAt: row.createdAt,
  updatedAt: row.updatedAt,
});

export const toTaskRecord = (row: {
  id: string;
  projectId: string;
  title: string;
  description: string | null;
  status: string;
  priority: string;
  estimatedHours: number | null;
  dueDate: string | null;
  assigneeId: string | null;
  createdAt: number;
  completedAt: number | null;
  updatedAt: number;
}): TaskRecord => ({
  id: row.id,
  projectId: row.projectId,
  title: row.title,
  description: row.description,
  status: pickEnum(row.status, TASK_STATUSES, 'todo'),
  priority: normalizePriority(row.priority) ?? 'medium',
  estimatedHours: row.estimatedHours,
  dueDate: row.dueDate,
  assigneeId: row.assigneeId,
  createdAt: row.createdAt,
  completedAt: row.completedAt,
  updatedAt: row.updatedAt,
});

export const toFeedbackRecord = (row: {
  id: string;
  projectId: string;
  taskId: string | null;
  userName: string | null;
  feedbackText: string;
  status: string;
  summary: string | null;
  createdAt: number;
  processedAt: number | null;
}): FeedbackRecord => ({
  id: row.id,
  projectId: row.projectId,
  taskId: row.taskId,
  userName: row.userName,
  feedbackText: row.feedbackText,
  status: pickEnum(row.status, FEEDBACK_STATUSES, 'pending'),
  summary: row.summary,
  createdAt: row.createdAt,
  processedAt: row.processedAt,
});

export const toAdjustmentRecord = (row: {
  id: string;
  feedbackId: string;
  adjustmentType: string;
  taskId: string | null;
  description: string;
  originalValue: string | null;
  newValue: string | null;
  reasoning: string | null;
  createdAt: number;
}): AdjustmentRecord => ({
  id: row.id,
  feedbackId: row.feedbackId,
  adjustmentType: pickEnum(row.adjustmentType, ADJUSTMENT_TYPES, 'general'),
  taskId: row.taskId,
  description: row.description,
  originalValue: row.originalValue,
  newValue: row.newValue,
  reasoning: row.reasoning,
  createdAt: row.createdAt,
});

export const toPlanVersionRecord = (row: {
  id: string;
  projectId: string;
  versionNumber: number;
  content: PlanContent;
  createdBy: string | null;
  createdAt: number;
}): PlanVersionRecord => ({
  id: row.id,
  projectId: row.projectId,
  versionNumber: row.versionNumber,
  content: row.content,
  createdBy: row.createdBy,
  createdAt: row.createdAt,
});

export const toDailySummaryRecord = (row: {
  id: string;
  userId: string;
  date: string;
  taskId: string;
  rank: number;
  summaryText: string;
  completed: boolean;
  hoursWorked: number | null;
  createdAt: number;
}): DailySummaryRecord => ({ ...row });

export const toInboxItemRecord = (row: {
  id: string;
  userId: string;
  content: string;
  tags: string[] | null;
  status: string;
  classification: Classification | null;
  projectId: string | null;
  taskId: string | null;
  createdAt: number;
  updatedAt: number;
}): InboxItemRecord => ({
  id: row.id,
  userId: row.userId,
  content: row.content,
  tags: row.tags ?? [],
  status: pickEnum(row.status, INBOX_STATUSES, 'unprocessed'),
  classification: row.classification,
  projectId: row.projectId,
  taskId: row.taskId,
  createdAt: row.createdAt,
  updatedAt: row.updatedAt,
});

/** Row shape for llm_call_logs; durations are stored as whole milliseconds. */
export const toLlmCallRow = (entry: LlmCallRecord) => ({
  id: entry.id,
  userId: entry.userId,
  provider: entry.provider,
  model: entry.model,
  purpose: entry.purpose,
  attempt: entry.attempt,
  prompt: entry.prompt,
  response: entry.response,
  tokensUsed: entry.tokensUsed,
  durationMs: Math.round(entry.durationMs),
  status: entry.status,
  errorMessage: entry.errorMessage,
  metadata: entry.metadata,
  createdAt: entry.createdAt,
});
