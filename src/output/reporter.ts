import chalk from 'chalk';
import stripAnsi from 'strip-ansi';
import path from 'path';
import { Priority, type Finding } from '../analyzer/types';

function priorityLabel(priority: Priority): string {
  switch (priority) {
    case Priority.HIGH:
      return chalk.red('high');
    case Priority.MEDIUM:
      return chalk.yellow('medium');
    case Priority.LOW:
      return chalk.blue('low');
  }
}

export function printFileHeader(fileRelPath: string): void {
  const absPath = path.resolve(process.cwd(), fileRelPath);
  // OSC 8 hyperlink
  const link = `\u001B]8;;file://${absPath}\u0007${fileRelPath}\u001B]8;;\u0007`;
  console.log(chalk.underline(link));
}

/** Wrap `text` into lines no wider than `width` visible columns. */
export function wrapWords(text: string, width: number): string[] {
  const lines: string[] = [];
  let current = '';
  for (const w of text.split(/\s+/).filter(Boolean)) {
    if (current && stripAnsi(current).length + 1 + w.length > width) {
      lines.push(current);
      current = w;
    } else {
      current = current ? `${current} ${w}` : w;
    }
  }
  if (current || lines.length === 0) lines.push(current);
  return lines;
}

export function printFindingRow(
  finding: Finding,
  opts: { locWidth?: number; priorityWidth?: number; messageWidth?: number } = {}
): void {
  // Columns: lines (fixed), priority (fixed), description (wrapped), category (unbounded)
  const locWidth = opts.locWidth ?? 9;
  const priorityWidth = opts.priorityWidth ?? 8;

  const termCols = process.stdout.columns || 100;
  const prefixOverhead = locWidth + priorityWidth + 4;
  const categoryColumnBuffer = 25;
  const messageWidth = opts.messageWidth ?? Math.max(40, termCols - prefixOverhead - categoryColumnBuffer);

  const { issue } = finding;
  const locCell = issue.impactedLines.padEnd(locWidth, ' ');
  const colored = priorityLabel(issue.priority);
  const pad = Math.max(0, priorityWidth - stripAnsi(colored).length);
  const prefix = `  ${locCell} ${colored}${' '.repeat(pad)}  `;
  const contPrefix = ' '.repeat(stripAnsi(prefix).length);

  const [first = '', ...rest] = wrapWords(issue.description, messageWidth);
  console.log(`${prefix}${first.padEnd(messageWidth, ' ')}  ${chalk.dim(issue.category)}`);
  for (const line of rest) {
    console.log(`${contPrefix}${line}`);
  }
}

export function printGlobalSummary(findings: readonly Finding[]): void {
  const count = (p: Priority): number => findings.filter((f) => f.issue.priority === p).length;
  const high = count(Priority.HIGH);
  const okMark = high === 0 ? chalk.green('✓') : chalk.red('✖');
  const total = findings.length === 1 ? '1 issue' : `${findings.length} issues`;
  const parts = [
    high > 0 ? chalk.red(`${high} high`) : chalk.green('0 high'),
    chalk.yellow(`${count(Priority.MEDIUM)} medium`),
    chalk.blue(`${count(Priority.LOW)} low`),
  ];
  console.log(`${okMark} ${total} (${parts.join(', ')}).`);
}
