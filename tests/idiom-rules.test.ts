import { describe, it, expect } from 'vitest';
import {
  DictAccessGuard,
  LenComparisons,
  NonPythonicLoops,
  PlatformSpecificPaths,
  TodoComments,
  UnsafeCSVParsing,
} from '../src/rules/idioms.js';
import { py, runRule, summarize } from './utils.js';

describe('NonPythonicLoops', () => {
  it('flags range(len(...)) and .keys() iteration', () => {
    const source = py`
      for i in range(len(items)):
          pass
      for k in d.keys():
          pass
      for item in items:
          pass
    `;
    expect(summarize(runRule(new NonPythonicLoops(), source))).toEqual([
      ['1', 'Use direct iteration or enumerate() instead of range(len(...)).'],
      ['3', 'Iterating dict.keys(); consider dict.items() if values are used.'],
    ]);
  });

  it('skips async for', () => {
    const source = py`
      async def f(x):
          async for i in range(len(x)):
              pass
    `;
    expect(runRule(new NonPythonicLoops(), source)).toEqual([]);
  });
});

describe('LenComparisons', () => {
  it('flags comparisons of len() with zero', () => {
    const source = py`
      if len(x) == 0:
          pass
      if len(x) == 3:
          pass
    `;
    expect(summarize(runRule(new LenComparisons(), source))).toEqual([
      ['1', 'Use "if x:" or "if not x:" instead of len(...) comparisons.'],
    ]);
  });
});

describe('UnsafeCSVParsing', () => {
  it('flags split on a delimiter character', () => {
    const source = py`
      parts = line.split(",")
      words = line.split(" ")
      tokens = line.split()
    `;
    expect(summarize(runRule(new UnsafeCSVParsing(), source))).toEqual([
      ['1', "Possible CSV parsing via split(','); prefer csv module."],
    ]);
  });
});

describe('DictAccessGuard', () => {
  it('flags subscripts on plain names only', () => {
    const source = py`
      value = config["key"]
      other = self.cache["key"]
    `;
    expect(summarize(runRule(new DictAccessGuard(), source))).toEqual([
      ['1', 'Key access on "config" without guard; prefer .get() or "in" checks or try/except.'],
    ]);
  });
});

describe('TodoComments', () => {
  it('flags TODO and FIXME markers in any case', () => {
    const source = py`
      x = 1  # todo: rename
      y = 2
      # FIXME later
    `;
    expect(runRule(new TodoComments(), source).map((i) => i.impactedLines)).toEqual(['1', '3']);
  });
});

describe('PlatformSpecificPaths', () => {
  it('flags drive letters', () => {
    const source = py`
      p = "C:\\\\data"
      u = "https://example.com/data"
    `;
    expect(summarize(runRule(new PlatformSpecificPaths(), source))).toEqual([
      ['1', 'Hardcoded path detected. Prefer pathlib.Path or os.path.join for portability.'],
    ]);
  });
});
