import { describe, it, expect } from 'vitest';
import { FileModeMismatch, OpenEncodingRule, OpenWithoutWith } from '../src/rules/resources.js';
import { py, runRule, summarize } from './utils.js';

describe('OpenWithoutWith', () => {
  it('flags open() outside a with statement', () => {
    const source = py`
      with open("a.txt", encoding="utf-8") as fh:
          data = fh.read()
      out = open("b.txt", "w")
    `;
    expect(summarize(runRule(new OpenWithoutWith(), source))).toEqual([
      ['3', "Use 'with open(...)' to ensure closure."],
    ]);
  });

  it('accepts open() under async with', () => {
    const source = py`
      async def load(store):
          async with store.open("key") as fh:
              return await fh.read()
    `;
    expect(runRule(new OpenWithoutWith(), source)).toEqual([]);
  });
});

describe('FileModeMismatch', () => {
  it('flags writes to read handles and reads from write handles', () => {
    const source = py`
      fh = open("a.txt")
      fh.write("x")
      with open("b.txt", "w") as out:
          out.read()
    `;
    expect(summarize(runRule(new FileModeMismatch(), source))).toEqual([
      ['2', 'File handle "fh" opened read-mode "r" but written to.'],
      ['4', 'File handle "out" opened write/append "w" but read from.'],
    ]);
  });

  it('takes the mode keyword into account', () => {
    const source = py`
      log = open("app.log", mode="a")
      log.write("x")
    `;
    expect(runRule(new FileModeMismatch(), source)).toEqual([]);
  });
});

describe('OpenEncodingRule', () => {
  it('flags text-mode opens without encoding', () => {
    const source = py`
      a = open("a.txt")
      b = open("b.bin", "rb")
      c = open("c.txt", "w", encoding="utf-8")
      d = open(path, mode)
    `;
    expect(summarize(runRule(new OpenEncodingRule(), source))).toEqual([
      ['1', "open() called for text mode without 'encoding='."],
      ['4', "open() called for text mode without 'encoding='."],
    ]);
  });
});
