import { PRIORITY_LEVELS, type PriorityLevel } from './types';

/**
 * Tasks store priority as a level. Numeric input on the 0–10 scale maps onto
 * the nearest bucket: 0–2 low, 3–5 medium, 6–8 high, 9–10 urgent.
 */
export const priorityFromScale = (value: number): PriorityLevel => {
  const scaled = Math.round(Math.min(10, Math.max(0, value)));
  if (scaled >= 9) return 'urgent';
  if (scaled >= 6) return 'high';
  if (scaled >= 3) return 'medium';
  return 'low';
};

/** Representative point on the 0–10 scale for each level. */
export const PRIORITY_SCALE_VALUES: Record<PriorityLevel, number> = {
  low: 1,
  medium: 4,
  high: 7,
  urgent: 10,
};

const toPriorityLevel = (value: string) => PRIORITY_LEVELS.find((level) => level === value) ?? null;

export const normalizePriority = (value: unknown): PriorityLevel | null => {
  if (typeof value === 'number' && Number.isFinite(value)) return priorityFromScale(value);
  if (typeof value !== 'string') return null;
  const trimmed = value.trim().toLowerCase();
  const level = toPriorityLevel(trimmed);
  if (level) return level;
  if (trimmed === 'critical') return 'urgent';
  if (trimmed !== '' && !Number.isNaN(Number(trimmed))) return priorityFromScale(Number(trimmed));
  return null;
};
