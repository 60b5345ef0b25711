import * as path from 'path';
import { PRIORITIES, type Finding, type Priority } from '../analyzer/types';

const MAX_EXAMPLES = 10;
const RULE = '='.repeat(72);

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

/**
 * Short plain-text summary of one file's findings: totals, counts per
 * priority and category, and the first few findings as examples.
 */
export function formatSummaryLog(findings: readonly Finding[], filename: string): string {
  const byPriority: Record<Priority, number> = { HIGH: 0, MEDIUM: 0, LOW: 0 };
  const byCategory = new Map<string, number>();
  const examples: string[] = [];

  for (const { issue } of findings) {
    byPriority[issue.priority] += 1;
    byCategory.set(issue.category, (byCategory.get(issue.category) ?? 0) + 1);
    if (examples.length < MAX_EXAMPLES) {
      examples.push(`[${issue.priority}] ${issue.category} @ ${issue.impactedLines} :: ${issue.description}`);
    }
  }

  const lines = [
    `pyreview summary for ${path.basename(filename)}`,
    RULE,
    `Total issues: ${findings.length}`,
    `By priority: ${PRIORITIES.map((p) => `${p}=${byPriority[p]}`).join(', ')}`,
    'By category:',
  ];
  const categories = [...byCategory.entries()].sort(([a, x], [b, y]) => y - x || compareText(a, b));
  for (const [category, count] of categories) {
    lines.push(`  - ${category}: ${count}`);
  }
  if (examples.length > 0) {
    lines.push('', 'Examples:');
    for (const example of examples) lines.push(`  • ${example}`);
  }
  return lines.map((line) => `${line}\n`).join('');
}
