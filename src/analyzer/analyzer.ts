import { readFileSync } from 'fs';
import { handleUnknownError } from '../errors/index';
import { debug, warn } from '../output/logger';
import { parseSource } from '../parser/tree-adapter';
import type { RuleSet } from '../rules/index';
import { mergeSameIssueAcrossLines, sortFindings, truncateLines } from './postprocess';
import { Priority, priorityMeetsThreshold, type Finding, type Issue } from './types';

export interface AnalyzeOptions {
  ruleSet: RuleSet;
  /** Findings below this priority are dropped */
  minPriority?: Priority | undefined;
  /** Longest comma list of impacted lines kept before truncation */
  maxLines?: number | undefined;
}

export interface AnalyzeFileOptions extends AnalyzeOptions {
  mergeIssues?: boolean | undefined;
}

/**
 * Parse once and run every rule of the set in order.
 * An unparsable source gives no findings.
 */
export function analyzeSource(filename: string, text: string, options: AnalyzeOptions): Issue[] {
  const tree = parseSource(text);
  if (!tree) debug(`${filename}: source did not parse; rules report nothing`);

  const minimum = options.minPriority ?? Priority.LOW;
  const issues: Issue[] = [];
  for (const rule of options.ruleSet.rules) {
    for (const issue of rule.check(filename, tree, text)) {
      if (!priorityMeetsThreshold(issue.priority, minimum)) continue;
      issues.push({ ...issue, impactedLines: truncateLines(issue.impactedLines, options.maxLines) });
    }
  }
  return issues;
}

/** Read a UTF-8 file and analyze it. A file that cannot be read gives no findings. */
export function runOnFile(filePath: string, options: AnalyzeOptions): Issue[] {
  let text: string;
  try {
    text = readFileSync(filePath, 'utf-8');
  } catch (e: unknown) {
    const err = handleUnknownError(e, `Reading ${filePath}`);
    warn(`Could not read ${filePath}: ${err.message}`);
    return [];
  }
  return analyzeSource(filePath, text, options);
}

/** Findings for one file, optionally merged across lines, always sorted. */
export function analyzeFile(filePath: string, options: AnalyzeFileOptions): Finding[] {
  const findings: Finding[] = runOnFile(filePath, options).map((issue) => ({ file: filePath, issue }));
  return sortFindings(options.mergeIssues ? mergeSameIssueAcrossLines(findings) : findings);
}
