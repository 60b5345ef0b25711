import { describe, it, expect } from 'vitest';
import { ParentIndex, VisitorRule, type VisitorTable } from '../src/analyzer/rule.js';
import { Priority } from '../src/analyzer/types.js';
import { parseSource } from '../src/parser/tree-adapter.js';
import { walk } from '../src/parser/syntax.js';
import { py, runRule } from './utils.js';

class CallReporter extends VisitorRule {
  readonly name = 'CallReporter';
  readonly category = 'Test';
  readonly priority = Priority.LOW;
  readonly impact = 'base impact';

  protected readonly visitors: VisitorTable = {
    call: (node, ctx) => ctx.report(node.startLine, node.text, { priority: Priority.HIGH }),
  };
}

describe('VisitorRule', () => {
  it('dispatches hooks in source order and applies overrides', () => {
    const source = py`
      a()
      def f():
          b(c())
    `;
    const issues = runRule(new CallReporter(), source);
    expect(issues.map((i) => [i.impactedLines, i.description])).toEqual([
      ['1', 'a()'],
      ['3', 'b(c())'],
      ['3', 'c()'],
    ]);
    expect(issues[0]?.priority).toBe(Priority.HIGH);
    expect(issues[0]?.potentialImpact).toBe('base impact');
    expect(issues[0]?.category).toBe('Test');
  });

  it('keeps no findings between runs', () => {
    const rule = new CallReporter();
    runRule(rule, 'a()\n');
    expect(runRule(rule, 'b()\n').map((i) => i.description)).toEqual(['b()']);
  });
});

describe('parseSource', () => {
  it('numbers nodes in pre-order', () => {
    const tree = parseSource('x = 1\n');
    expect(tree?.root.id).toBe(0);
    expect(tree?.root.type).toBe('module');
    const ids = tree ? [...walk(tree.root)].map((n) => n.id).sort((a, b) => a - b) : [];
    expect(ids).toEqual(Array.from({ length: tree?.nodeCount ?? 0 }, (_, i) => i));
  });

  it('rejects source with syntax errors', () => {
    expect(parseSource('if x\n    pass\n')).toBeNull();
  });
});

describe('ParentIndex', () => {
  it('walks ancestors up to the module', () => {
    const tree = parseSource('f(x)\n');
    if (!tree) throw new Error('expected a tree');
    const index = new ParentIndex(tree.root);
    const identifier = [...walk(tree.root)].find((n) => n.type === 'identifier' && n.text === 'x');
    if (!identifier) throw new Error('expected an identifier');
    expect([...index.ancestors(identifier)].map((n) => n.type)).toEqual([
      'argument_list',
      'call',
      'expression_statement',
      'module',
    ]);
    expect(index.parentOf(tree.root)).toBeUndefined();
  });
});
