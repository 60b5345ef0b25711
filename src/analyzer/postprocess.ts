import * as path from 'path';
import { PRIORITY_RANK, maxPriority, type Finding, type Priority } from './types';

const INTEGER = /^[+-]?\d+$/;

function toInt(text: string): number | null {
  const trimmed = text.trim();
  return INTEGER.test(trimmed) ? parseInt(trimmed, 10) : null;
}

/**
 * Expand an impacted-lines string such as "11-13,17" into line numbers.
 * Parts that are not a number or an ascending range are skipped.
 */
export function parseLines(spec: string): number[] {
  const lines: number[] = [];
  for (const raw of spec.split(',')) {
    const part = raw.trim();
    if (!part) continue;
    const dash = part.indexOf('-');
    if (dash === -1) {
      const n = toInt(part);
      if (n !== null) lines.push(n);
      continue;
    }
    const start = toInt(part.slice(0, dash));
    const end = toInt(part.slice(dash + 1));
    if (start === null || end === null || start > end) continue;
    for (let n = start; n <= end; n++) lines.push(n);
  }
  return lines;
}

/** [1, 2, 3, 7, 9, 10] gives "1-3,7,9-10". */
export function compressLines(nums: readonly number[]): string {
  const sorted = [...new Set(nums)].sort((a, b) => a - b);
  const first = sorted[0];
  if (first === undefined) return '';

  const runs: string[] = [];
  let start = first;
  let prev = first;
  const close = (): void => {
    runs.push(start === prev ? `${start}` : `${start}-${prev}`);
  };
  for (const n of sorted.slice(1)) {
    if (n === prev + 1) {
      prev = n;
      continue;
    }
    close();
    start = prev = n;
  }
  close();
  return runs.join(',');
}

/** Keep the first `max` entries of a comma list and count the rest. */
export function truncateLines(spec: string, max: number | undefined): string {
  if (!max || !spec.includes(',')) return spec;
  const parts = spec.split(',');
  if (parts.length <= max) return spec;
  return `${parts.slice(0, max).join(',')},+${parts.length - max} more`;
}

function collapseWhitespace(text: string): string {
  return text.split(/\s+/).filter(Boolean).join(' ');
}

interface MergeGroup {
  file: string;
  category: string;
  priority: Priority;
  lines: number[];
  impacts: string[];
  descriptions: string[];
}

/*
 * Fold findings that describe the same problem on different lines into one
 * row. Groups keep the order of their first member.
 */
export function mergeSameIssueAcrossLines(findings: readonly Finding[]): Finding[] {
  const groups = new Map<string, MergeGroup>();

  for (const { file, issue } of findings) {
    const key = JSON.stringify([
      file,
      issue.category,
      collapseWhitespace(issue.potentialImpact),
      collapseWhitespace(issue.description),
    ]);
    const group = groups.get(key);
    if (!group) {
      groups.set(key, {
        file,
        category: issue.category,
        priority: issue.priority,
        lines: parseLines(issue.impactedLines),
        impacts: [issue.potentialImpact],
        descriptions: [issue.description],
      });
      continue;
    }
    group.priority = maxPriority(group.priority, issue.priority);
    group.lines.push(...parseLines(issue.impactedLines));
    if (!group.impacts.includes(issue.potentialImpact)) group.impacts.push(issue.potentialImpact);
    if (!group.descriptions.includes(issue.description)) group.descriptions.push(issue.description);
  }

  return [...groups.values()].map((g) => ({
    file: g.file,
    issue: {
      category: g.category,
      priority: g.priority,
      impactedLines: compressLines(g.lines),
      potentialImpact: g.impacts.join(' | '),
      description: g.descriptions.join(' | '),
    },
  }));
}

function firstLine(spec: string): number {
  const head = spec.split(',', 1)[0] ?? '';
  return toInt(head.split('-', 1)[0] ?? '') ?? 0;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

/** Priority descending, then category, file base name and first line. */
export function sortFindings(findings: readonly Finding[]): Finding[] {
  return [...findings].sort(
    (a, b) =>
      PRIORITY_RANK[b.issue.priority] - PRIORITY_RANK[a.issue.priority] ||
      compareText(a.issue.category, b.issue.category) ||
      compareText(path.basename(a.file), path.basename(b.file)) ||
      firstLine(a.issue.impactedLines) - firstLine(b.issue.impactedLines)
  );
}

/** Highest priority among the findings, or undefined when there are none. */
export function worstPriority(findings: readonly Finding[]): Priority | undefined {
  let worst: Priority | undefined;
  for (const { issue } of findings) {
    worst = worst ? maxPriority(worst, issue.priority) : issue.priority;
  }
  return worst;
}
