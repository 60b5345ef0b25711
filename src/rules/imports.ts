import { BaseRule, VisitorRule, type VisitContext, type VisitorTable } from '../analyzer/rule';
import { Priority, type Issue } from '../analyzer/types';
import { IMPORT_KINDS, bindingName, importParts, type ImportParts } from '../parser/imports';
import { scanNames } from '../parser/names';
import type { PyNode, SourceTree } from '../parser/tree-adapter';
import { attributeParts, firstNamed, namedChildren, unwrapParens, walk } from '../parser/syntax';

export class UnusedImports extends BaseRule {
  readonly name = 'UnusedImports';
  readonly category = 'Code Cleanliness';
  readonly priority = Priority.LOW;
  readonly impact = 'Dead code; slower imports; namespace clutter.';
  override readonly heuristic = true;

  check(_filename: string, tree: SourceTree | null): Issue[] {
    if (!tree) return [];
    const imported = new Map<string, number>();
    for (const node of walk(tree.root)) {
      const parts = importParts(node);
      if (!parts || parts.module === '__future__') continue;
      for (const name of parts.names) {
        const bound = bindingName(parts, name);
        imported.set(bound, Math.max(imported.get(bound) ?? 0, node.startLine));
      }
    }

    const used = new Set(
      scanNames(tree.root)
        .filter((ref) => ref.ctx === 'load')
        .map((ref) => ref.name)
    );
    const issues: Issue[] = [];
    for (const [name, line] of imported) {
      if (!used.has(name)) issues.push(this.make(line, `Imported "${name}" not used.`));
    }
    return issues;
  }
}

export class WildcardImports extends BaseRule {
  readonly name = 'WildcardImports';
  readonly category = 'Style/Maintainability';
  readonly priority = Priority.LOW;
  readonly impact = 'Polluted namespace; unclear origins.';
  override readonly heuristic = true;

  check(_filename: string, tree: SourceTree | null): Issue[] {
    if (!tree) return [];
    const issues: Issue[] = [];
    for (const node of walk(tree.root)) {
      const parts = importParts(node);
      if (!parts?.wildcard) continue;
      const module = parts.module ?? 'None';
      issues.push(this.make(node.startLine, `Wildcard import from "${module}". Prefer explicit imports.`));
    }
    return issues;
  }
}

function sortKeyNames(parts: ImportParts): string[] {
  if (parts.kind === 'import') return parts.names.map((n) => n.name);
  const base = '.'.repeat(parts.level) + (parts.module ?? '');
  return parts.names.map((n) => (base ? `${base}.${n.name}` : n.name));
}

function compareLower(a: string, b: string): number {
  const x = a.toLowerCase();
  const y = b.toLowerCase();
  if (x < y) return -1;
  return x > y ? 1 : 0;
}

interface ModuleImport {
  line: number;
  parts: ImportParts;
}

/*
 * Module-level imports only. Statements are keyed by start line, so of two
 * imports sharing a line the later one wins, and a block is a run of
 * imports on consecutive lines.
 */
export class ImportOrderRule extends VisitorRule {
  readonly name = 'ImportOrderRule';
  readonly category = 'Style/Maintainability';
  readonly priority = Priority.LOW;
  readonly impact = 'Consistent import ordering improves readability and reduces merge noise.';
  override readonly heuristic = true;

  protected readonly visitors: VisitorTable = {
    module: (node, ctx) => this.visitModule(node, ctx),
  };

  private visitModule(node: PyNode, ctx: VisitContext): void {
    const byLine = new Map<number, ImportParts>();
    for (const stmt of namedChildren(node)) {
      const parts = IMPORT_KINDS.has(stmt.type) ? importParts(stmt) : null;
      if (parts) byLine.set(stmt.startLine, parts);
    }
    const imports: ModuleImport[] = [...byLine.entries()]
      .sort(([a], [b]) => a - b)
      .map(([line, parts]) => ({ line, parts }));

    let seenAbsolute = false;
    for (const { line, parts } of imports) {
      if (parts.level > 0) {
        if (!seenAbsolute) ctx.report(line, 'Relative import appears before absolute imports; reorder.');
      } else {
        seenAbsolute = true;
      }
    }

    let block: ModuleImport[] = [];
    for (const entry of imports) {
      const prev = block[block.length - 1];
      if (prev && entry.line !== prev.line + 1) {
        this.checkBlock(block, ctx);
        block = [];
      }
      block.push(entry);
    }
    if (block.length > 0) this.checkBlock(block, ctx);
  }

  private checkBlock(block: readonly ModuleImport[], ctx: VisitContext): void {
    const first = block[0];
    if (!first) return;
    const names = block.flatMap(({ parts }) => sortKeyNames(parts));
    const sorted = [...names].sort(compareLower);
    if (names.some((name, i) => name !== sorted[i])) {
      ctx.report(first.line, 'Import statements in this block are not alphabetically ordered.');
    }
  }
}

const FUNCTION_KINDS = new Set(['function_definition']);

function isTypeCheckingFlag(condition: PyNode | undefined): boolean {
  if (!condition) return false;
  const test = unwrapParens(condition);
  if (test.type === 'identifier') return test.text === 'TYPE_CHECKING';
  return attributeParts(test)?.attr === 'TYPE_CHECKING';
}

/** Imports that look like workarounds for an import cycle. */
export class CircularImportRule extends VisitorRule {
  readonly name = 'CircularImportRule';
  readonly category = 'Maintainability';
  readonly priority = Priority.MEDIUM;
  readonly impact = 'Likely circular-import workaround; consider refactoring shared types or moving imports.';

  protected readonly visitors: VisitorTable = {
    import_statement: (node, ctx) => this.visitImport(node, ctx),
    import_from_statement: (node, ctx) => this.visitImportFrom(node, ctx),
  };

  private insideFunction(node: PyNode, ctx: VisitContext): boolean {
    for (const ancestor of ctx.parents.ancestors(node)) {
      if (FUNCTION_KINDS.has(ancestor.type)) return true;
    }
    return false;
  }

  /** True when the nearest enclosing `if` tests TYPE_CHECKING and `node` sits in its main branch. */
  private underTypeChecking(node: PyNode, ctx: VisitContext): boolean {
    let child = node;
    for (const ancestor of ctx.parents.ancestors(node)) {
      if (ancestor.type === 'if_statement') {
        return child.type === 'block' && isTypeCheckingFlag(firstNamed(ancestor));
      }
      child = ancestor;
    }
    return false;
  }

  private visitImport(node: PyNode, ctx: VisitContext): void {
    const parts = importParts(node);
    if (!parts || !this.insideFunction(node, ctx)) return;
    if (parts.names.some((n) => n.name.includes('.'))) {
      ctx.report(node.startLine, 'Local-module import inside a function suggests a circular import workaround.');
    }
  }

  private visitImportFrom(node: PyNode, ctx: VisitContext): void {
    const parts = importParts(node);
    if (!parts) return;
    const inner = parts.level > 0 || (parts.module ?? '').includes('.');
    if (inner && this.insideFunction(node, ctx)) {
      ctx.report(node.startLine, 'Relative/inner import inside a function suggests a circular import workaround.');
    }
    if (this.underTypeChecking(node, ctx)) {
      ctx.report(node.startLine, 'Import under TYPE_CHECKING likely indicates a type-only import to avoid cycles.');
    }
  }
}
