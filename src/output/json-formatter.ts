import type { Finding, Priority } from '../analyzer/types';
import { describeFinding } from './csv-formatter';

export interface JsonFinding {
  file: string;
  category: string;
  priority: Priority;
  impacted_lines: string;
  potential_impact: string;
  description: string;
}

export class JsonFormatter {
  private readonly findings: JsonFinding[] = [];

  addFinding(finding: Finding): void {
    const { file, issue } = finding;
    this.findings.push({
      file,
      category: issue.category,
      priority: issue.priority,
      impacted_lines: issue.impactedLines,
      potential_impact: issue.potentialImpact,
      description: describeFinding(finding),
    });
  }

  toJson(): string {
    return JSON.stringify(this.findings, null, 2);
  }
}
