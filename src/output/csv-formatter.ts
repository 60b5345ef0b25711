import * as path from 'path';
import type { Finding } from '../analyzer/types';

export const CSV_HEADERS = [
  'category of issue',
  'priority of issue',
  'impacted lines',
  'potential impact',
  'description',
] as const;

const DELIMITER = ';';
const ROW_END = '\r\n';
const NEEDS_QUOTING = /[;"\r\n]/;

function csvField(value: string): string {
  if (!NEEDS_QUOTING.test(value)) return value;
  return `"${value.replace(/"/g, '""')}"`;
}

function csvRow(values: readonly string[]): string {
  return values.map(csvField).join(DELIMITER) + ROW_END;
}

/** Description as reported: prefixed with the base name of the analyzed file. */
export function describeFinding({ file, issue }: Finding): string {
  return `${path.basename(file)}: ${issue.description}`;
}

/*
 * Semicolon separated report, one row per finding.
 */
export class CsvFormatter {
  private readonly rows: string[][] = [];

  addFinding(finding: Finding): void {
    const { issue } = finding;
    this.rows.push([
      issue.category,
      issue.priority,
      issue.impactedLines,
      issue.potentialImpact,
      describeFinding(finding),
    ]);
  }

  toCsv(): string {
    return [CSV_HEADERS, ...this.rows].map(csvRow).join('');
  }
}
