export const PROJECT_STATUSES = ['active', 'on_hold', 'completed', 'cancelled'] as const;
export const TASK_STATUSES = ['todo', 'in_progress', 'completed', 'blocked'] as const;
export const PRIORITY_LEVELS = ['low', 'medium', 'high', 'urgent'] as const;
export const FEEDBACK_STATUSES = ['pending', 'processing', 'completed', 'failed'] as const;
export const ADJUSTMENT_TYPES = [
  'task_priority',
  'task_description',
  'task_status',
  'new_task',
  'remove_task',
  'task_estimate',
  'general',
] as const;
export const INBOX_STATUSES = ['unprocessed', 'processing', 'processed', 'failed'] as const;
export const CLASSIFICATION_ACTIONS = ['create_project', 'create_task', 'attach_to_existing', 'no_action'] as const;

export type ProjectStatus = (typeof PROJECT_STATUSES)[number];
export type TaskStatus = (typeof TASK_STATUSES)[number];
export type PriorityLevel = (typeof PRIORITY_LEVELS)[number];
export type FeedbackStatus = (typeof FEEDBACK_STATUSES)[number];
export type AdjustmentType = (typeof ADJUSTMENT_TYPES)[number];
export type InboxStatus = (typeof INBOX_STATUSES)[number];
export type ClassificationAction = (typeof CLASSIFICATION_ACTIONS)[number];
export type LlmCallStatus = 'success' | 'error' | 'timeout';
export type ModelPurpose = 'feedback_replan' | 'project_plan' | 'inbox_classification';

export type ProjectRecord = {
  id: string;
  name: string;
  description: string | null;
  status: ProjectStatus;
  ownerId: string | null;
  createdAt: number;
  updatedAt: number;
};

export type TaskRecord = {
  id: string;
  projectId: string;
  title: string;
  description: string | null;
  status: TaskStatus;
  priority: PriorityLevel;
  estimatedHours: number | null;
  /** Calendar day, YYYY-MM-DD. */
  dueDate: string | null;
  assigneeId: string | null;
  createdAt: number;
  completedAt: number | null;
  updatedAt: number;
};

export type FeedbackRecord = {
  id: string;
  projectId: string;
  taskId: string | null;
  userName: string | null;
  feedbackText: string;
  status: FeedbackStatus;
  summary: string | null;
  createdAt: number;
  processedAt: number | null;
};

export type AdjustmentDraft = {
  adjustmentType: AdjustmentType;
  taskId: string | null;
  description: string;
  originalValue: string | null;
  newValue: string | null;
  reasoning: string | null;
};

export type AdjustmentRecord = AdjustmentDraft & {
  id: string;
  feedbackId: string;
  createdAt: number;
};

export type RoadmapStep = {
  step_number: number;
  title: string;
  description: string;
  estimated_duration: string;
  dependencies: number[];
};

export type Milestone = {
  title: string;
  target_date: string;
  deliverables: string[];
};

export type PlanContent = {
  summary: string;
  goals: string[];
  roadmap_steps: RoadmapStep[];
  milestones: Milestone[];
  risks: string[];
  next_steps: string[];
};

export type PlanVersionRecord = {
  id: string;
  projectId: string;
  versionNumber: number;
  content: PlanContent;
  createdBy: string | null;
  createdAt: number;
};

export type DailySummaryRecord = {
  id: string;
  userId: string;
  /** Calendar day, YYYY-MM-DD. */
  date: string;
  taskId: string;
  rank: number;
  summaryText: string;
  completed: boolean;
  hoursWorked: number | null;
  createdAt: number;
};

export type LlmCallRecord = {
  id: string;
  userId: string | null;
  provider: string;
  model: string;
  purpose: ModelPurpose;
  attempt: number;
  prompt: string;
  response: string | null;
  tokensUsed: number | null;
  durationMs: number;
  status: LlmCallStatus;
  errorMessage: string | null;
  metadata: Record<string, unknown> | null;
  createdAt: number;
};

export type Classification = {
  action: ClassificationAction;
  projectName: string | null;
  projectDescription: string | null;
  taskTitle: string | null;
  taskDescription: string | null;
  taskPriority: PriorityLevel | null;
  suggestedProjectId: string | null;
  reasoning: string | null;
};

export type InboxItemRecord = {
  id: string;
  userId: string;
  content: string;
  tags: string[];
  status: InboxStatus;
  classification: Classification | null;
  projectId: string | null;
  taskId: string | null;
  createdAt: number;
  updatedAt: number;
};

export type ReplanResult = {
  summary: string;
  adjustments: AdjustmentDraft[];
};
