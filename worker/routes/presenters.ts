import type { FeedbackWithAdjustments } from '../services/feedbackService';
import type { DailyPlan } from '../services/dailyPlanService';
import type {
  AdjustmentRecord,
  DailySummaryRecord,
  FeedbackRecord,
  InboxItemRecord,
  PlanVersionRecord,
  TaskRecord,
} from '../services/types';

// Wire format is snake_case throughout.

export const presentAdjustment = (item: AdjustmentRecord) => ({
  id: item.id,
  adjustment_type: item.adjustmentType,
  task_id: item.taskId,
  description: item.description,
  original_value: item.originalValue,
  new_value: item.newValue,
  reasoning: item.reasoning,
  created_at: item.createdAt,
});

export const presentFeedback = (item: FeedbackRecord) => ({
  id: item.id,
  project_id: item.projectId,
  task_id: item.taskId,
  user_name: item.userName,
  feedback_text: item.feedbackText,
  status: item.status,
  summary: item.summary,
  created_at: item.createdAt,
  processed_at: item.processedAt,
});

export const presentFeedbackResult = (item: FeedbackWithAdjustments) => ({
  ...presentFeedback(item),
  adjustments: item.adjustments.map(presentAdjustment),
});

export const presentPlanVersion = (plan: PlanVersionRecord) => ({
  id: plan.id,
  project_id: plan.projectId,
  version_number: plan.versionNumber,
  content: plan.content,
  created_by: plan.createdBy,
  created_at: plan.createdAt,
});

export const presentDailySummary = (row: DailySummaryRecord) => ({
  id: row.id,
  rank: row.rank,
  task_id: row.taskId,
  summary_text: row.summaryText,
  completed: row.completed,
  hours_worked: row.hoursWorked,
});

export const presentDailyPlan = (plan: DailyPlan) => ({
  user_id: plan.userId,
  date: plan.date,
  summaries: plan.summaries.map(presentDailySummary),
});

export const presentTask = (task: TaskRecord) => ({
  id: task.id,
  project_id: task.projectId,
  title: task.title,
  status: task.status,
  priority: task.priority,
  due_date: task.dueDate,
  assignee_id: task.assigneeId,
  completed_at: task.completedAt,
});

export const presentInboxItem = (item: InboxItemRecord) => ({
  id: item.id,
  user_id: item.userId,
  content: item.content,
  tags: item.tags,
  status: item.status,
  classification: item.classification && {
    action: item.classification.action,
    project_name: item.classification.projectName,
    project_description: item.classification.projectDescription,
    task_title: item.classification.taskTitle,
    task_description: item.classification.taskDescription,
    task_priority: item.classification.taskPriority,
    suggested_project_id: item.classification.suggestedProjectId,
    reasoning: item.classification.reasoning,
  },
  project_id: item.projectId,
  task_id: item.taskId,
  created_at: item.createdAt,
  updated_at: item.updatedAt,
});
