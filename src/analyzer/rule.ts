import type { PyNode, SourceTree } from '../parser/tree-adapter';
import { traverse } from '../parser/syntax';
import { formatLineSpec, type Issue, type LineSpec, type Priority } from './types';

export interface Rule {
  readonly name: string;
  readonly category: string;
  readonly priority: Priority;
  readonly impact: string;
  /** Best-effort check that accepts false positives */
  readonly heuristic: boolean;
  check(filename: string, tree: SourceTree | null, text: string): Issue[];
}

/*
 * Base for rules that inspect the whole file and return their issues.
 * Subclasses return [] when the tree is null.
 */
export abstract class BaseRule implements Rule {
  abstract readonly name: string;
  abstract readonly category: string;
  abstract readonly priority: Priority;
  abstract readonly impact: string;
  readonly heuristic: boolean = false;

  abstract check(filename: string, tree: SourceTree | null, text: string): Issue[];

  protected make(lines: LineSpec, description: string): Issue {
    return {
      category: this.category,
      priority: this.priority,
      impactedLines: formatLineSpec(lines),
      potentialImpact: this.impact,
      description,
    };
  }
}

/** Node id to parent lookup, built once per check. */
export class ParentIndex {
  private readonly parents = new Map<number, PyNode>();

  constructor(root: PyNode) {
    traverse(root, (node) => {
      for (const child of node.children) {
        this.parents.set(child.id, node);
      }
    });
  }

  parentOf(node: PyNode): PyNode | undefined {
    return this.parents.get(node.id);
  }

  *ancestors(node: PyNode): Generator<PyNode> {
    let current = this.parents.get(node.id);
    while (current) {
      yield current;
      current = this.parents.get(current.id);
    }
  }
}

export interface ReportOverrides {
  category?: string;
  priority?: Priority;
  impact?: string;
}

export interface VisitContext {
  readonly filename: string;
  readonly text: string;
  readonly tree: SourceTree;
  readonly parents: ParentIndex;
  report(lines: LineSpec, description: string, overrides?: ReportOverrides): void;
}

/** Node kinds a visitor rule may hook. */
export type VisitKind =
  | 'module'
  | 'function_definition'
  | 'class_definition'
  | 'expression_statement'
  | 'comparison_operator'
  | 'return_statement'
  | 'assignment'
  | 'call'
  | 'import_statement'
  | 'import_from_statement'
  | 'except_clause'
  | 'except_group_clause';

export type VisitHook = (node: PyNode, context: VisitContext) => void;

export type VisitorTable = { readonly [K in VisitKind]?: VisitHook };

function isVisitKind(kind: string, table: VisitorTable): kind is VisitKind {
  return Object.prototype.hasOwnProperty.call(table, kind);
}

/*
 * Base for rules written as per-kind hooks.
 * check() walks the tree once in pre-order and dispatches each node to the
 * hook registered for its kind. Issues go to an accumulator owned by that
 * call, so a rule instance keeps no state between files.
 */
export abstract class VisitorRule extends BaseRule {
  protected abstract readonly visitors: VisitorTable;

  check(filename: string, tree: SourceTree | null, text: string): Issue[] {
    if (!tree) return [];
    const issues: Issue[] = [];
    const context: VisitContext = {
      filename,
      text,
      tree,
      parents: new ParentIndex(tree.root),
      report: (lines, description, overrides = {}) => {
        issues.push({
          category: overrides.category ?? this.category,
          priority: overrides.priority ?? this.priority,
          impactedLines: formatLineSpec(lines),
          potentialImpact: overrides.impact ?? this.impact,
          description,
        });
      },
    };

    const table = this.visitors;
    traverse(tree.root, (node) => {
      if (!isVisitKind(node.type, table)) return;
      const hook = table[node.type];
      if (hook) hook(node, context);
    });
    return issues;
  }
}
