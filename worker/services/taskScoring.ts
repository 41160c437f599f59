import type { PriorityLevel, TaskRecord } from './types';
import { daysBetween, toDateKey } from './utils';

export const PRIORITY_POINTS: Record<PriorityLevel, number> = {
  urgent: 40,
  high: 30,
  medium: 20,
  low: 10,
};

const PRIORITY_MARKERS: Record<PriorityLevel, string> = {
  urgent: '🔥',
  high: '⚡',
  medium: '📌',
  low: '💡',
};

const IN_PROGRESS_BONUS = 15;
const STALE_AFTER_DAYS = 30;
const STALE_BONUS = 5;
export const DAILY_SLOT_LIMIT = 3;
const COMPLETED_SUFFIX = ' - ✅ COMPLETED';

const dueBonus = (daysUntilDue: number) => {
  if (daysUntilDue < 0) return 50;
  if (daysUntilDue === 0) return 40;
  if (daysUntilDue <= 3) return 30;
  if (daysUntilDue <= 7) return 20;
  if (daysUntilDue <= 14) return 10;
  return 0;
};

export type ScoredTask = {
  task: TaskRecord;
  score: number;
};

/** Deterministic priority score of a task as of the calendar day `asOf`. */
export const scoreTask = (task: TaskRecord, asOf: string) => {
  let score = PRIORITY_POINTS[task.priority];
  if (task.status === 'in_progress') score += IN_PROGRESS_BONUS;
  if (task.dueDate) score += dueBonus(daysBetween(asOf, task.dueDate));
  if (daysBetween(toDateKey(task.createdAt), asOf) >= STALE_AFTER_DAYS) score += STALE_BONUS;
  return score;
};

const isSchedulable = (task: TaskRecord) => task.status === 'todo' || task.status === 'in_progress';

const compareScored = (a: ScoredTask, b: ScoredTask) => {
  if (a.score !== b.score) return b.score - a.score;
  if (a.task.dueDate !== b.task.dueDate) {
    if (a.task.dueDate === null) return 1;
    if (b.task.dueDate === null) return -1;
    return a.task.dueDate < b.task.dueDate ? -1 : 1;
  }
  if (a.task.id === b.task.id) return 0;
  return a.task.id < b.task.id ? -1 : 1;
};

/**
 * Highest-scoring open tasks, best first. Ties break on earlier due date
 * (undated last) and then on id.
 */
export const selectTopTasks = (tasks: TaskRecord[], asOf: string, limit = DAILY_SLOT_LIMIT): ScoredTask[] =>
  tasks
    .filter(isSchedulable)
    .map((task) => ({ task, score: scoreTask(task, asOf) }))
    .sort(compareScored)
    .slice(0, Math.max(0, limit));

export const formatSummaryText = (task: TaskRecord, rank: number, asOf: string) => {
  let dueInfo = '';
  if (task.dueDate) {
    const days = daysBetween(asOf, task.dueDate);
    if (days < 0) dueInfo = ` (OVERDUE by ${Math.abs(days)} days)`;
    else if (days === 0) dueInfo = ' (DUE TODAY)';
    else if (days <= 3) dueInfo = ` (Due in ${days} days)`;
  }
  return `#${rank} ${PRIORITY_MARKERS[task.priority]} ${task.title}${dueInfo}`;
};

/** Appends the completion marker once; the rest of the text is kept as is. */
export const markSummaryCompleted = (summaryText: string) =>
  summaryText.endsWith(COMPLETED_SUFFIX) ? summaryText : `${summaryText}${COMPLETED_SUFFIX}`;
