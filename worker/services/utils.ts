const DAY_MS = 86_400_000;

export const generateId = () =>
  (typeof crypto !== 'undefined' && 'randomUUID' in crypto)
    ? crypto.randomUUID()
    : Math.random().toString(36).slice(2, 11);

export const now = () => Date.now();

export const sleep = (ms: number) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

/** Calendar day in UTC, formatted YYYY-MM-DD. */
export const toDateKey = (value: Date | number) => new Date(value).toISOString().slice(0, 10);

const isDateKey = (value: string) => /^\d{4}-\d{2}-\d{2}$/.test(value);

export const parseDateKey = (value: string): string | null => {
  if (!isDateKey(value)) return null;
  const parsed = Date.parse(`${value}T00:00:00.000Z`);
  if (Number.isNaN(parsed)) return null;
  return toDateKey(parsed) === value ? value : null;
};

/** Whole calendar days from `from` to `to`; negative when `to` is earlier. */
export const daysBetween = (from: string, to: string) => {
  const start = Date.parse(`${from}T00:00:00.000Z`);
  const end = Date.parse(`${to}T00:00:00.000Z`);
  return Math.round((end - start) / DAY_MS);
};

export const truncate = (value: string, max: number) =>
  value.length <= max ? value : `${value.slice(0, max - 1)}…`;
