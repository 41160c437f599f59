import { pgTable, text, bigint, boolean, integer, jsonb, real, uniqueIndex, index } from 'drizzle-orm/pg-core';
import type { Classification, PlanContent } from '../services/types';

export const projects = pgTable('projects', {
  id: text('id').primaryKey(),
  name: text('name').notNull(),
  description: text('description'),
  status: text('status').notNull().default('active'),
  ownerId: text('owner_id'),
  createdAt: bigint('created_at', { mode: 'number' }).notNull(),
  updatedAt: bigint('updated_at', { mode: 'number' }).notNull(),
});

export const tasks = pgTable(
  'tasks',
  {
    id: text('id').primaryKey(),
    projectId: text('project_id')
      .notNull()
      .references(() => projects.id, { onDelete: 'cascade' }),
    title: text('title').notNull(),
    description: text('description'),
    status: text('status').notNull().default('todo'),
    priority: text('priority').notNull().default('medium'),
    estimatedHours: real('estimated_hours'),
    dueDate: text('due_date'),
    assigneeId: text('assignee_id'),
    createdAt: bigint('created_at', { mode: 'number' }).notNull(),
    completedAt: bigint('completed_at', { mode: 'number' }),
    updatedAt: bigint('updated_at', { mode: 'number' }).notNull(),
  },
  (table) => ({
    projectIdx: index('tasks_project_idx').on(table.projectId),
    assigneeIdx: index('tasks_assignee_idx').on(table.assigneeId, table.status),
  })
);

export const feedback = pgTable(
  'feedback',
  {
    id: text('id').primaryKey(),
    projectId: text('project_id')
      .notNull()
      .references(() => projects.id, { onDelete: 'cascade' }),
    taskId: text('task_id').references(() => tasks.id, { onDelete: 'set null' }),
    userName: text('user_name'),
    feedbackText: text('feedback_text').notNull(),
    status: text('status').notNull().default('pending'),
    summary: text('summary'),
    createdAt: bigint('created_at', { mode: 'number' }).notNull(),
    processedAt: bigint('processed_at', { mode: 'number' }),
  },
  (table) => ({
    projectIdx: index('feedback_project_idx').on(table.projectId, table.status),
  })
);

export const adjustments = pgTable(
  'adjustments',
  {
    id: text('id').primaryKey(),
    feedbackId: text('feedback_id')
      .notNull()
      .references(() => feedback.id, { onDelete: 'cascade' }),
    adjustmentType: text('adjustment_type').notNull(),
    taskId: text('task_id'),
    description: text('description').notNull(),
    originalValue: text('original_value'),
    newValue: text('new_value'),
    reasoning: text('reasoning'),
    createdAt: bigint('created_at', { mode: 'number' }).notNull(),
  },
  (table) => ({
    feedbackIdx: index('adjustments_feedback_idx').on(table.feedbackId),
  })
);

export const planVersions = pgTable(
  'plan_versions',
  {
    id: text('id').primaryKey(),
    projectId: text('project_id')
      .notNull()
      .references(() => projects.id, { onDelete: 'cascade' }),
    versionNumber: integer('version_number').notNull(),
    content: jsonb('content').notNull().$type<PlanContent>(),
    createdBy: text('created_by'),
    createdAt: bigint('created_at', { mode: 'number' }).notNull(),
  },
  (table) => ({
    projectVersionIdx: uniqueIndex('plan_versions_project_version_idx').on(table.projectId, table.versionNumber),
  })
);

export const dailySummaries = pgTable(
  'daily_summaries',
  {
    id: text('id').primaryKey(),
    userId: text('user_id').notNull(),
    date: text('date').notNull(),
    taskId: text('task_id')
      .notNull()
      .references(() => tasks.id, { onDelete: 'cascade' }),
    rank: integer('rank').notNull(),
    summaryText: text('summary_text').notNull(),
    completed: boolean('completed').notNull().default(false),
    hoursWorked: real('hours_worked'),
    createdAt: bigint('created_at', { mode: 'number' }).notNull(),
  },
  (table) => ({
    slotIdx: uniqueIndex('daily_summaries_slot_idx').on(table.userId, table.date, table.rank),
  })
);

export const llmCallLogs = pgTable('llm_call_logs', {
  id: text('id').primaryKey(),
  userId: text('user_id'),
  provider: text('provider').notNull(),
  model: text('model').notNull(),
  purpose: text('purpose').notNull(),
  attempt: integer('attempt').notNull(),
  prompt: text('prompt').notNull(),
  response: text('response'),
  tokensUsed: integer('tokens_used'),
  durationMs: integer('duration_ms').notNull(),
  status: text('status').notNull(),
  errorMessage: text('error_message'),
  metadata: jsonb('metadata').$type<Record<string, unknown> | null>(),
  createdAt: bigint('created_at', { mode: 'number' }).notNull(),
});

export const inboxItems = pgTable('inbox_items', {
  id: text('id').primaryKey(),
  userId: text('user_id').notNull(),
  content: text('content').notNull(),
  tags: jsonb('tags').$type<string[]>(),
  status: text('status').notNull().default('unprocessed'),
  classification: jsonb('classification').$type<Classification | null>(),
  projectId: text('project_id'),
  taskId: text('task_id'),
  createdAt: bigint('created_at', { mode: 'number' }).notNull(),
  updatedAt: bigint('updated_at', { mode: 'number' }).notNull(),
});
