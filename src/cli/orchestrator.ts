import { writeFileSync } from 'fs';
import { analyzeFile } from '../analyzer/analyzer';
import { worstPriority } from '../analyzer/postprocess';
import { priorityMeetsThreshold, type Finding } from '../analyzer/types';
import type { CliOptions } from '../schemas/cli-schemas';
import type { Config } from '../schemas/config-schemas';
import { EXIT_OK, EXIT_USAGE } from '../config/constants';
import { ProcessingError, handleUnknownError } from '../errors/index';
import { CsvFormatter } from '../output/csv-formatter';
import { JsonFormatter } from '../output/json-formatter';
import { formatSummaryLog } from '../output/log-formatter';
import { debug, log } from '../output/logger';
import { printFileHeader, printFindingRow, printGlobalSummary } from '../output/reporter';
import { createRuleSet } from '../rules/index';
import type { ReviewResult, ReviewSettings } from './types';

export function resolveSettings(cli: CliOptions, config: Config): ReviewSettings {
  return {
    out: cli.out,
    jsonOutput: cli.jsonOutput,
    log: cli.log,
    minPriority: cli.minPriority ?? config.minPriority,
    failOn: cli.failOn ?? config.failOn,
    maxLines: cli.maxLines ?? config.maxLines,
    mergeIssues: cli.mergeIssues ?? config.mergeIssues,
    maxComplexity: cli.maxComplexity ?? config.maxComplexity,
    maxFunctionLines: cli.maxFunctionLines ?? config.maxFunctionLines,
    quiet: cli.quiet,
  };
}

function writeReport(target: string, content: string, kind: string): void {
  try {
    writeFileSync(target, content, 'utf-8');
  } catch (e: unknown) {
    const err = handleUnknownError(e, `Writing ${kind} report`);
    throw new ProcessingError(`Failed to write ${kind} report to ${target}: ${err.message}`);
  }
  log(`Wrote ${kind} report to ${target}`);
}

export function writeReports(findings: readonly Finding[], filePath: string, settings: ReviewSettings): void {
  const csv = new CsvFormatter();
  findings.forEach((f) => csv.addFinding(f));
  writeReport(settings.out, csv.toCsv(), 'CSV');

  if (settings.jsonOutput) {
    const json = new JsonFormatter();
    findings.forEach((f) => json.addFinding(f));
    writeReport(settings.jsonOutput, json.toJson(), 'JSON');
  }
  if (settings.log) {
    writeReport(settings.log, formatSummaryLog(findings, filePath), 'log');
  }
}

/**
 * Analyze one file, write every requested report and work out the exit code
 * from the fail-on threshold.
 */
export function reviewFile(filePath: string, settings: ReviewSettings): ReviewResult {
  const ruleSet = createRuleSet({
    maxComplexity: settings.maxComplexity,
    maxFunctionLines: settings.maxFunctionLines,
  });
  const findings = analyzeFile(filePath, {
    ruleSet,
    minPriority: settings.minPriority,
    maxLines: settings.maxLines,
    mergeIssues: settings.mergeIssues,
  });
  const heuristic = ruleSet.rules.filter((r) => r.heuristic).length;
  debug(`${filePath}: ${findings.length} finding(s) from ${ruleSet.rules.length} rules (${heuristic} heuristic)`);

  writeReports(findings, filePath, settings);

  if (!settings.quiet) {
    printFileHeader(filePath);
    findings.forEach((f) => printFindingRow(f));
    printGlobalSummary(findings);
  }

  const worst = worstPriority(findings);
  const failed = settings.failOn !== undefined && worst !== undefined && priorityMeetsThreshold(worst, settings.failOn);
  return { findings, exitCode: failed ? EXIT_USAGE : EXIT_OK };
}
