import { BaseRule, VisitorRule, type VisitContext, type VisitorTable } from '../analyzer/rule';
import { Priority, type Issue } from '../analyzer/types';
import type { PyNode, SourceTree } from '../parser/tree-adapter';
import {
  exceptParts,
  firstNamed,
  literalOf,
  namedAfterToken,
  namedChildren,
  unwrapParens,
  walk,
} from '../parser/syntax';

const HANDLER_KINDS = new Set(['except_clause', 'except_group_clause']);
const BROAD_EXCEPTIONS = new Set(['Exception', 'BaseException']);

export class BareOrBroadExcept extends BaseRule {
  readonly name = 'BareOrBroadExcept';
  readonly category = 'Error Handling';
  readonly priority = Priority.HIGH;
  readonly impact = 'Bugs hidden by catching everything; harder debugging.';

  check(_filename: string, tree: SourceTree | null, _text: string): Issue[] {
    if (!tree) return [];
    const issues: Issue[] = [];
    for (const node of walk(tree.root)) {
      if (!HANDLER_KINDS.has(node.type)) continue;
      const { type } = exceptParts(node);
      if (!type) {
        issues.push(this.make(node.startLine, 'Catch-all "except:" used. Catch specific exceptions.'));
        continue;
      }
      const caught = unwrapParens(type);
      const candidates = caught.type === 'tuple' ? namedChildren(caught) : [caught];
      for (const candidate of candidates) {
        if (candidate.type === 'identifier' && BROAD_EXCEPTIONS.has(candidate.text)) {
          issues.push(this.make(node.startLine, `Overly broad exception handler (${candidate.text}).`));
        }
      }
    }
    return issues;
  }
}

function isTrivialStatement(stmt: PyNode): boolean {
  if (stmt.type === 'pass_statement') return true;
  if (stmt.type !== 'expression_statement') return false;
  const parts = namedChildren(stmt);
  if (parts.length !== 1 || !parts[0]) return false;
  const lit = literalOf(parts[0]);
  return lit?.kind === 'ellipsis' || lit?.kind === 'str';
}

/** Handlers whose body only holds pass, ellipsis or string literals. */
export class EmptyExceptBodyRule extends VisitorRule {
  readonly name = 'EmptyExceptBodyRule';
  readonly category = 'Error Handling';
  readonly priority = Priority.HIGH;
  readonly impact = 'Silently ignoring errors hides failures and complicates debugging.';

  protected readonly visitors: VisitorTable = {
    except_clause: (node, ctx) => this.visitHandler(node, ctx),
    except_group_clause: (node, ctx) => this.visitHandler(node, ctx),
  };

  private visitHandler(node: PyNode, ctx: VisitContext): void {
    const { body } = exceptParts(node);
    const statements = body ? namedChildren(body) : [];
    if (statements.every(isTrivialStatement)) {
      ctx.report(
        node.startLine,
        "'except' body does nothing (pass/ellipsis/docstring). Avoid swallowing exceptions."
      );
    }
  }
}

/*
 * Raises directly inside a handler body that drop the active exception:
 * `raise X` without `from`, or `raise X from None`. A bare `raise` is fine.
 */
export class ExceptionChainingRule extends VisitorRule {
  readonly name = 'ExceptionChainingRule';
  readonly category = 'Error Handling';
  readonly priority = Priority.MEDIUM;
  readonly impact = 'Lost traceback/context makes debugging and triage harder.';

  protected readonly visitors: VisitorTable = {
    except_clause: (node, ctx) => this.visitHandler(node, ctx),
    except_group_clause: (node, ctx) => this.visitHandler(node, ctx),
  };

  private visitHandler(node: PyNode, ctx: VisitContext): void {
    const { body } = exceptParts(node);
    if (!body) return;
    for (const stmt of namedChildren(body)) {
      if (stmt.type !== 'raise_statement' || !firstNamed(stmt)) continue;
      const cause = namedAfterToken(stmt, 'from');
      if (!cause) {
        ctx.report(stmt.startLine, "New exception raised in 'except' without 'from' to preserve context.");
      } else if (literalOf(cause)?.kind === 'none') {
        ctx.report(
          stmt.startLine,
          "Exception raised 'from None' suppresses chaining; prefer 'from e' or bare re-raise."
        );
      }
    }
  }
}
