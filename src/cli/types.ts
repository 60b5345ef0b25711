import type { Finding, Priority } from '../analyzer/types';

/** CLI flags merged over the config file. */
export interface ReviewSettings {
  out: string;
  jsonOutput: string | undefined;
  log: string | undefined;
  minPriority: Priority;
  failOn: Priority | undefined;
  maxLines: number | undefined;
  mergeIssues: boolean;
  maxComplexity: number;
  maxFunctionLines: number;
  quiet: boolean;
}

export interface ReviewResult {
  findings: Finding[];
  exitCode: number;
}
