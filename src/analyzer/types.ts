/**
 * Priority constants, highest first.
 */
export const Priority = {
  HIGH: 'HIGH',
  MEDIUM: 'MEDIUM',
  LOW: 'LOW',
} as const;

export type Priority = typeof Priority[keyof typeof Priority];

export const PRIORITY_RANK: Record<Priority, number> = {
  HIGH: 3,
  MEDIUM: 2,
  LOW: 1,
};

export const PRIORITIES: readonly Priority[] = [Priority.HIGH, Priority.MEDIUM, Priority.LOW];

export function priorityMeetsThreshold(priority: Priority, minimum: Priority): boolean {
  return PRIORITY_RANK[priority] >= PRIORITY_RANK[minimum];
}

export function maxPriority(a: Priority, b: Priority): Priority {
  return PRIORITY_RANK[b] > PRIORITY_RANK[a] ? b : a;
}

export interface Issue {
  readonly category: string;
  readonly priority: Priority;
  /** "12", "10-22", "5,12,29" or "12,+3 more" */
  readonly impactedLines: string;
  readonly potentialImpact: string;
  readonly description: string;
}

/** One issue attributed to the file it was found in. */
export interface Finding {
  readonly file: string;
  readonly issue: Issue;
}

export type LineSpec = number | readonly [number, number] | Iterable<number>;

function isRange(spec: LineSpec): spec is readonly [number, number] {
  return Array.isArray(spec) && spec.length === 2 && typeof spec[0] === 'number' && typeof spec[1] === 'number';
}

/**
 * Render a line spec: a number as itself, a `[start, end]` pair as a range,
 * and any other collection as a sorted, de-duplicated comma list.
 */
export function formatLineSpec(spec: LineSpec): string {
  if (typeof spec === 'number') return String(spec);
  if (isRange(spec)) return `${spec[0]}-${spec[1]}`;
  const lines = [...new Set(spec)].sort((a, b) => a - b);
  return lines.join(',');
}
