import { describe, it, expect } from 'vitest';
import { toFeedbackRecord, toLlmCallRow, toTaskRecord } from './serializers';

const taskRow = {
  id: 't1',
  projectId: 'p1',
  title: 'Task',
  description: null,
  status: 'in_progress',
  priority: 'high',
  estimatedHours: 3,
  dueDate: '2026-10-20',
  assigneeId: 'u1',
  createdAt: 1,
  completedAt: null,
  updatedAt: 1,
};

describe('serializers', () => {
  it('parses task record fields', () => {
    const record = toTaskRecord(taskRow);

    expect(record.status).toBe('in_progress');
    expect(record.priority).toBe('high');
    expect(record.dueDate).toBe('2026-10-20');
  });

  it('maps numeric priorities and unknown statuses onto known values', () => {
    const record = toTaskRecord({ ...taskRow, status: 'archived', priority: '9' });

    expect(record.status).toBe('todo');
    expect(record.priority).toBe('urgent');
  });

  it('falls back to medium priority on unreadable values', () => {
    expect(toTaskRecord({ ...taskRow, priority: 'soonish' }).priority).toBe('medium');
  });

  it('keeps feedback status when recognised', () => {
    const record = toFeedbackRecord({
      id: 'f1',
      projectId: 'p1',
      taskId: null,
      userName: 'Ana',
      feedbackText: 'Too slow',
      status: 'processing',
      summary: null,
      createdAt: 1,
      processedAt: null,
    });

    expect(record.status).toBe('processing');
  });

  it('rounds ledger durations to whole milliseconds', () => {
    const row = toLlmCallRow({
      id: 'l1',
      userId: null,
      provider: 'openai',
      model: 'gpt-4o',
      purpose: 'project_plan',
      attempt: 1,
      prompt: 'p',
      response: null,
      tokensUsed: null,
      durationMs: 12.6,
      status: 'timeout',
      errorMessage: 'timed out',
      metadata: null,
      createdAt: 5,
    });

    expect(row.durationMs).toBe(13);
    expect(row.status).toBe('timeout');
  });
});
