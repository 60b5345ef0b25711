import type { Rule } from '../src/analyzer/rule.js';
import type { Issue } from '../src/analyzer/types.js';
import { parseSource } from '../src/parser/tree-adapter.js';

/**
 * Strip the first newline and the common leading indentation of a template
 * literal, so Python fixtures can be indented with the test code.
 */
export function py(strings: TemplateStringsArray, ...values: unknown[]): string {
    const raw = strings.reduce((acc, part, i) => acc + part + (i < values.length ? String(values[i]) : ''), '');
    const lines = raw.replace(/^\n/, '').split('\n');
    const indents = lines
        .filter((line) => line.trim().length > 0)
        .map((line) => line.length - line.trimStart().length);
    const common = indents.length > 0 ? Math.min(...indents) : 0;
    return lines.map((line) => line.slice(common)).join('\n');
}

/** Parse `source` and run a single rule over it. */
export function runRule(rule: Rule, source: string, filename = 'sample.py'): Issue[] {
    return rule.check(filename, parseSource(source), source);
}

/** `[line, description]` pairs, in the order the rule produced them. */
export function summarize(issues: readonly Issue[]): Array<[string, string]> {
    return issues.map((issue) => [issue.impactedLines, issue.description]);
}
