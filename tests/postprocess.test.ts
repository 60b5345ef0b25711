import { describe, it, expect } from 'vitest';
import {
  compressLines,
  mergeSameIssueAcrossLines,
  parseLines,
  sortFindings,
  truncateLines,
  worstPriority,
} from '../src/analyzer/postprocess.js';
import { Priority, formatLineSpec, type Finding, type Issue } from '../src/analyzer/types.js';

function issue(overrides: Partial<Issue> = {}): Issue {
  return {
    category: 'Style',
    priority: Priority.LOW,
    impactedLines: '1',
    potentialImpact: 'impact',
    description: 'desc',
    ...overrides,
  };
}

describe('line specs', () => {
  it('expands ranges and single lines', () => {
    expect(parseLines('1-3,7')).toEqual([1, 2, 3, 7]);
  });

  it('skips malformed and descending parts', () => {
    expect(parseLines('4,+3 more, 9-7 ,x, 10')).toEqual([4, 10]);
    expect(parseLines('')).toEqual([]);
  });

  it('compresses runs', () => {
    expect(compressLines([1, 2, 3, 7, 9, 10])).toBe('1-3,7,9-10');
    expect(compressLines([5, 3, 4, 3])).toBe('3-5');
    expect(compressLines([])).toBe('');
  });

  it('is idempotent through parse and compress', () => {
    for (const spec of ['1-3,7', '10,2,3,4', '5', '8-8,9', '1,+2 more']) {
      const once = compressLines(parseLines(spec));
      expect(compressLines(parseLines(once))).toBe(once);
    }
  });

  it('formats numbers, pairs and collections', () => {
    expect(formatLineSpec(12)).toBe('12');
    expect(formatLineSpec([10, 22])).toBe('10-22');
    expect(formatLineSpec([29, 5, 12, 5, 1])).toBe('1,5,12,29');
    expect(formatLineSpec(new Set([3, 1]))).toBe('1,3');
  });

  it('truncates long comma lists only', () => {
    expect(truncateLines('1,2,3,4,5', 2)).toBe('1,2,+3 more');
    expect(truncateLines('1,2', 2)).toBe('1,2');
    expect(truncateLines('10-40', 1)).toBe('10-40');
    expect(truncateLines('1,2,3', undefined)).toBe('1,2,3');
  });
});

describe('mergeSameIssueAcrossLines', () => {
  it('keeps the highest priority and unions the lines', () => {
    const merged = mergeSameIssueAcrossLines([
      { file: 'a.py', issue: issue({ impactedLines: '1', priority: Priority.LOW }) },
      { file: 'a.py', issue: issue({ impactedLines: '3', priority: Priority.HIGH }) },
    ]);
    expect(merged).toHaveLength(1);
    expect(merged[0]?.issue.priority).toBe(Priority.HIGH);
    expect(merged[0]?.issue.impactedLines).toBe('1,3');
  });

  it('normalizes whitespace in the key and keeps first-seen order', () => {
    const merged = mergeSameIssueAcrossLines([
      { file: 'a.py', issue: issue({ description: 'other', impactedLines: '9' }) },
      { file: 'a.py', issue: issue({ description: 'same  text', impactedLines: '2' }) },
      { file: 'a.py', issue: issue({ description: 'same text', impactedLines: '3-4' }) },
    ]);
    expect(merged.map((f) => [f.issue.description, f.issue.impactedLines])).toEqual([
      ['other', '9'],
      ['same  text | same text', '2-4'],
    ]);
  });

  it('does not merge across files or categories', () => {
    const merged = mergeSameIssueAcrossLines([
      { file: 'a.py', issue: issue() },
      { file: 'b.py', issue: issue() },
      { file: 'a.py', issue: issue({ category: 'Security' }) },
    ]);
    expect(merged).toHaveLength(3);
  });
});

describe('sortFindings', () => {
  it('orders by priority, category, base name and first line', () => {
    const findings: Finding[] = [
      { file: 'x/b.py', issue: issue({ category: 'Style', impactedLines: '4' }) },
      { file: 'a.py', issue: issue({ category: 'Style', impactedLines: '10-12' }) },
      { file: 'a.py', issue: issue({ category: 'Style', impactedLines: '2,+3 more' }) },
      { file: 'a.py', issue: issue({ category: 'Correctness', priority: Priority.MEDIUM }) },
      { file: 'a.py', issue: issue({ category: 'Zeta', priority: Priority.HIGH }) },
    ];
    const order = sortFindings(findings).map((f) => `${f.issue.category}:${f.file}:${f.issue.impactedLines}`);
    expect(order).toEqual([
      'Zeta:a.py:1',
      'Correctness:a.py:1',
      'Style:a.py:2,+3 more',
      'Style:a.py:10-12',
      'Style:x/b.py:4',
    ]);
  });

  it('is stable for equal keys', () => {
    const first = { file: 'a.py', issue: issue({ description: 'first' }) };
    const second = { file: 'a.py', issue: issue({ description: 'second' }) };
    expect(sortFindings([first, second]).map((f) => f.issue.description)).toEqual(['first', 'second']);
  });
});

describe('worstPriority', () => {
  it('returns the highest priority or undefined', () => {
    expect(worstPriority([])).toBeUndefined();
    expect(
      worstPriority([
        { file: 'a.py', issue: issue({ priority: Priority.MEDIUM }) },
        { file: 'a.py', issue: issue({ priority: Priority.LOW }) },
      ])
    ).toBe(Priority.MEDIUM);
  });
});
