import { describe, it, expect } from 'vitest';
import { CircularImportRule, ImportOrderRule, UnusedImports, WildcardImports } from '../src/rules/imports.js';
import { importParts } from '../src/parser/imports.js';
import { parseSource } from '../src/parser/tree-adapter.js';
import { namedChildren } from '../src/parser/syntax.js';
import { py, runRule, summarize } from './utils.js';

function firstStatementImport(source: string) {
  const tree = parseSource(source);
  const stmt = tree ? namedChildren(tree.root)[0] : undefined;
  return stmt ? importParts(stmt) : null;
}

describe('importParts', () => {
  it('reads relative from-imports', () => {
    expect(firstStatementImport('from ..pkg.sub import a as b, c\n')).toEqual({
      kind: 'from',
      module: 'pkg.sub',
      level: 2,
      names: [
        { name: 'a', alias: 'b' },
        { name: 'c', alias: undefined },
      ],
      wildcard: false,
    });
  });

  it('reads plain imports', () => {
    expect(firstStatementImport('import os.path, numpy as np\n')).toEqual({
      kind: 'import',
      module: null,
      level: 0,
      names: [
        { name: 'os.path', alias: undefined },
        { name: 'numpy', alias: 'np' },
      ],
      wildcard: false,
    });
  });
});

describe('UnusedImports', () => {
  it('reports bindings that are never loaded', () => {
    const source = py`
      from __future__ import annotations
      import os
      import sys as system
      from typing import List, Dict
      print(os.getcwd(), List)
    `;
    expect(summarize(runRule(new UnusedImports(), source))).toEqual([
      ['3', 'Imported "system" not used.'],
      ['4', 'Imported "Dict" not used.'],
    ]);
  });

  it('binds the first segment of a dotted import', () => {
    const source = py`
      import os.path
      print(os.sep)
    `;
    expect(runRule(new UnusedImports(), source)).toEqual([]);
  });
});

describe('WildcardImports', () => {
  it('names the source module', () => {
    const source = py`
      from os.path import *
      from . import *
    `;
    expect(summarize(runRule(new WildcardImports(), source))).toEqual([
      ['1', 'Wildcard import from "os.path". Prefer explicit imports.'],
      ['2', 'Wildcard import from "None". Prefer explicit imports.'],
    ]);
  });
});

describe('ImportOrderRule', () => {
  it('flags relative-first and unsorted blocks', () => {
    const source = py`
      from .local import helper
      import sys
      import os

      import abc
    `;
    expect(summarize(runRule(new ImportOrderRule(), source))).toEqual([
      ['1', 'Relative import appears before absolute imports; reorder.'],
      ['1', 'Import statements in this block are not alphabetically ordered.'],
    ]);
  });

  it('accepts sorted blocks', () => {
    const source = py`
      import abc
      import os
      from os import path
    `;
    expect(runRule(new ImportOrderRule(), source)).toEqual([]);
  });

  it('checks each block of consecutive lines on its own', () => {
    const source = py`
      import sys

      import os
      import json
    `;
    expect(summarize(runRule(new ImportOrderRule(), source))).toEqual([
      ['3', 'Import statements in this block are not alphabetically ordered.'],
    ]);
  });
});

describe('CircularImportRule', () => {
  it('flags imports hidden in functions or behind TYPE_CHECKING', () => {
    const source = py`
      from typing import TYPE_CHECKING
      if TYPE_CHECKING:
          from app.models import User
      else:
          from app.stubs import User
      def load():
          from .models import Item
          import app.models
          import json
          return Item
    `;
    expect(summarize(runRule(new CircularImportRule(), source))).toEqual([
      ['3', 'Import under TYPE_CHECKING likely indicates a type-only import to avoid cycles.'],
      ['7', 'Relative/inner import inside a function suggests a circular import workaround.'],
      ['8', 'Local-module import inside a function suggests a circular import workaround.'],
    ]);
  });

  it('accepts the attribute form of the flag', () => {
    const source = py`
      import typing
      if typing.TYPE_CHECKING:
          from models import User
    `;
    expect(runRule(new CircularImportRule(), source).map((i) => i.impactedLines)).toEqual(['3']);
  });
});
