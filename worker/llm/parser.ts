import { z } from 'zod';
import {
  ADJUSTMENT_TYPES,
  CLASSIFICATION_ACTIONS,
  type AdjustmentDraft,
  type Classification,
  type Milestone,
  type PlanContent,
  type ReplanResult,
  type RoadmapStep,
} from '../services/types';
import { normalizePriority } from '../services/priority';
import { truncate } from '../services/utils';

export class MalformedOutputError extends Error {
  code = 'MALFORMED_OUTPUT' as const;
  raw: string;

  constructor(message: string, raw: string) {
    super(message);
    this.name = 'MalformedOutputError';
    this.raw = raw;
  }
}

const OPENERS: Record<string, string> = { '{': '}', '[': ']' };

/** Index just past the bracket that closes the one at `start`, or -1. */
const findClosing = (text: string, start: number) => {
  const stack: string[] = [];
  let inString = false;
  let escaped = false;

  for (let index = start; index < text.length; index += 1) {
    const char = text[index];
    if (inString) {
      if (escaped) escaped = false;
      else if (char === '\\') escaped = true;
      else if (char === '"') inString = false;
      continue;
    }
    if (char === '"') {
      inString = true;
    } else if (char in OPENERS) {
      stack.push(OPENERS[char]);
    } else if (char === '}' || char === ']') {
      if (stack.pop() !== char) return -1;
      if (stack.length === 0) return index + 1;
    }
  }
  return -1;
};

/**
 * Scans free-form model output for the first balanced `{…}` or `[…]` that
 * parses as JSON and passes `accept`. Brackets inside string literals are
 * ignored, so prose, code fences and trailing commentary around the payload
 * are tolerated.
 */
export const extractJson = (
  text: string,
  accept: (value: unknown) => boolean = () => true
): { value: unknown } | null => {
  for (let start = 0; start < text.length; start += 1) {
    if (!(text[start] in OPENERS)) continue;
    const end = findClosing(text, start);
    if (end === -1) continue;
    let value: unknown;
    try {
      value = JSON.parse(text.slice(start, end));
    } catch {
      continue;
    }
    if (accept(value)) return { value };
  }
  return null;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const toText = (value: unknown): string | null => {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') return value.trim() === '' ? null : value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
};

const toInteger = (value: unknown): number | null => {
  const parsed = typeof value === 'string' ? Number(value.trim()) : value;
  return typeof parsed === 'number' && Number.isInteger(parsed) ? parsed : null;
};

const pick = <T extends string>(value: unknown, allowed: readonly T[], fallback: T): T => {
  const text = toText(value)?.toLowerCase();
  return allowed.find((item) => item === text) ?? fallback;
};

const text = z.unknown().transform(toText);
const textList = z
  .unknown()
  .transform((value) => (Array.isArray(value) ? value.map(toText).filter((item): item is string => item !== null) : []));
const integerList = z
  .unknown()
  .transform((value) => (Array.isArray(value) ? value.map(toInteger).filter((item): item is number => item !== null) : []));

const ensureText = (raw: string) => {
  const trimmed = raw.trim();
  if (!trimmed) throw new MalformedOutputError('Model returned an empty response', raw);
  return trimmed;
};

const adjustmentSchema = z
  .object({
    adjustment_type: z.unknown().transform((value) => pick(value, ADJUSTMENT_TYPES, 'general')),
    task_id: text,
    description: text,
    original_value: text,
    new_value: text,
    reasoning: text,
  })
  .transform(
    (item): AdjustmentDraft => ({
      adjustmentType: item.adjustment_type,
      taskId: item.task_id,
      description: item.description ?? item.new_value ?? item.reasoning ?? '',
      originalValue: item.original_value,
      newValue: item.new_value,
      reasoning: item.reasoning,
    })
  );

const generalAdjustment = (description: string): AdjustmentDraft => ({
  adjustmentType: 'general',
  taskId: null,
  description,
  originalValue: null,
  newValue: null,
  reasoning: null,
});

/**
 * Reads a `{ summary, adjustments[] }` payload. Output without a usable
 * adjustment list becomes one `general` adjustment carrying the text.
 */
export const parseReplanResult = (raw: string): ReplanResult => {
  const trimmed = ensureText(raw);
  const extracted = extractJson(trimmed, isRecord);
  const data = extracted && isRecord(extracted.value) ? extracted.value : null;

  if (!data) {
    return { summary: truncate(trimmed, 500), adjustments: [generalAdjustment(trimmed)] };
  }

  const summary = toText(data.summary) ?? '';
  if (!Array.isArray(data.adjustments)) {
    return { summary, adjustments: [generalAdjustment(summary || trimmed)] };
  }

  const adjustments = data.adjustments.flatMap((item): AdjustmentDraft[] => {
    if (typeof item === 'string' && item.trim()) return [generalAdjustment(item.trim())];
    const parsed = adjustmentSchema.safeParse(item);
    return parsed.success ? [parsed.data] : [];
  });

  return { summary, adjustments };
};

const roadmapStepSchema = z.object({
  step_number: z.unknown().transform(toInteger),
  title: text,
  description: text,
  estimated_duration: text,
  dependencies: integerList,
});

const milestoneSchema = z
  .object({
    title: text,
    target_date: text,
    deliverables: textList,
  })
  .transform(
    (item): Milestone => ({
      title: item.title ?? '',
      target_date: item.target_date ?? '',
      deliverables: item.deliverables,
    })
  );

const records = (value: unknown) => (Array.isArray(value) ? value.filter(isRecord) : []);

const emptyPlan = (summary: string): PlanContent => ({
  summary,
  goals: [],
  roadmap_steps: [],
  milestones: [],
  risks: [],
  next_steps: [],
});

/** Reads the plan wire schema; missing parts default to empty. */
export const parsePlanContent = (raw: string): PlanContent => {
  const trimmed = ensureText(raw);
  const extracted = extractJson(trimmed, isRecord);
  if (!extracted || !isRecord(extracted.value)) return emptyPlan(trimmed);
  const data = extracted.value;

  const roadmapSteps = records(data.roadmap_steps).map((item, index): RoadmapStep => {
    const step = roadmapStepSchema.parse(item);
    return {
      step_number: step.step_number ?? index + 1,
      title: step.title ?? '',
      description: step.description ?? '',
      estimated_duration: step.estimated_duration ?? '',
      dependencies: step.dependencies,
    };
  });

  return {
    summary: toText(data.summary) ?? '',
    goals: textList.parse(data.goals),
    roadmap_steps: roadmapSteps,
    milestones: records(data.milestones).map((item) => milestoneSchema.parse(item)),
    risks: textList.parse(data.risks),
    next_steps: textList.parse(data.next_steps),
  };
};

const noAction = (reasoning: string): Classification => ({
  action: 'no_action',
  projectName: null,
  projectDescription: null,
  taskTitle: null,
  taskDescription: null,
  taskPriority: null,
  suggestedProjectId: null,
  reasoning,
});

/** Reads an inbox classification; anything unreadable is `no_action`. */
export const parseClassification = (raw: string): Classification => {
  const trimmed = ensureText(raw);
  const extracted = extractJson(trimmed, isRecord);
  if (!extracted || !isRecord(extracted.value)) {
    return noAction('Model response was not valid JSON');
  }
  const data = extracted.value;

  return {
    action: pick(data.action, CLASSIFICATION_ACTIONS, 'no_action'),
    projectName: toText(data.project_name),
    projectDescription: toText(data.project_description),
    taskTitle: toText(data.task_title),
    taskDescription: toText(data.task_description),
    taskPriority: normalizePriority(data.task_priority),
    suggestedProjectId: toText(data.suggested_project_id ?? data.project_id),
    reasoning: toText(data.reasoning),
  };
};
