import { VisitorRule, type VisitContext, type VisitorTable } from '../analyzer/rule';
import { Priority } from '../analyzer/types';
import type { PyNode } from '../parser/tree-adapter';
import { childOfType, definitionName, isAsync, lastCodeLine, walk } from '../parser/syntax';

const BRANCH_KINDS = new Set([
  'if_statement',
  'elif_clause',
  'for_statement',
  'while_statement',
  'try_statement',
  'with_statement',
  'conditional_expression',
  'for_in_clause',
  'match_statement',
]);

function booleanOperator(node: PyNode): string | undefined {
  return childOfType(node, 'and', 'or')?.type;
}

/**
 * Cyclomatic-style score: 1 plus one per branching construct in the subtree.
 * A chain such as `a and b and c` counts once.
 */
export function complexityOf(node: PyNode): number {
  let score = 1;
  for (const n of walk(node)) {
    if (BRANCH_KINDS.has(n.type)) score += 1;
    if (n.type !== 'boolean_operator') continue;
    score += 1;
    const op = booleanOperator(n);
    for (const child of n.children) {
      if (child.type === 'boolean_operator' && booleanOperator(child) === op) score -= 1;
    }
  }
  return score;
}

export function linesOf(node: PyNode): number {
  return lastCodeLine(node) - node.startLine + 1;
}

export interface ComplexityThresholds {
  maxComplexity: number;
  maxLines: number;
}

export class ComplexityRule extends VisitorRule {
  readonly name = 'ComplexityRule';
  readonly category = 'Maintainability';
  readonly priority = Priority.LOW;
  readonly impact = 'High complexity/size reduces readability and increases bug risk.';

  protected readonly visitors: VisitorTable = {
    function_definition: (node, ctx) => this.checkDefinition(node, ctx),
    class_definition: (node, ctx) => this.checkDefinition(node, ctx),
  };

  private readonly maxComplexity: number;
  private readonly maxLines: number;

  constructor({ maxComplexity, maxLines }: ComplexityThresholds = { maxComplexity: 10, maxLines: 50 }) {
    super();
    this.maxComplexity = maxComplexity;
    this.maxLines = maxLines;
  }

  private checkDefinition(node: PyNode, ctx: VisitContext): void {
    const complexity = complexityOf(node);
    const loc = linesOf(node);
    if (complexity <= this.maxComplexity && loc <= this.maxLines) return;

    let kind = 'Class';
    if (node.type === 'function_definition') kind = isAsync(node) ? 'Async function' : 'Function';
    ctx.report(
      node.startLine,
      `${kind} '${definitionName(node)}' too complex (C=${complexity}, LOC=${loc}); ` +
        `thresholds: C>${this.maxComplexity} or LOC>${this.maxLines}.`
    );
  }
}
