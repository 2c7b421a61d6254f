export const Priority = {
  Low: 1,
  Medium: 2,
  High: 3,
  Critical: 4,
} as const;

export type Priority = (typeof Priority)[keyof typeof Priority];

export const PriorityName: Record<Priority, string> = {
  [Priority.Low]: 'Low',
  [Priority.Medium]: 'Medium',
  [Priority.High]: 'High',
  [Priority.Critical]: 'Critical',
};

const PRIORITY_VALUES: readonly number[] = Object.values(Priority);

export function isPriority(value: unknown): value is Priority {
  return typeof value === 'number' && PRIORITY_VALUES.includes(value);
}

/**
 * Parse a priority label into a Priority value.
 * Accepts the names (any case) and the p1..p4 shorthand, p1 being the most urgent.
 */
export function parsePriority(label: string): Priority | null {
  switch (label.trim().toLowerCase()) {
    case 'critical': case 'p1': return Priority.Critical;
    case 'high': case 'p2': return Priority.High;
    case 'medium': case 'p3': return Priority.Medium;
    case 'low': case 'p4': return Priority.Low;
    default: return null;
  }
}
