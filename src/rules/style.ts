import { BaseRule, VisitorRule, type VisitContext, type VisitorTable } from '../analyzer/rule';
import { Priority, type Issue } from '../analyzer/types';
import { parameterList, scanNames } from '../parser/names';
import type { PyNode, SourceTree } from '../parser/tree-adapter';
import {
  assignmentChain,
  attributeParts,
  callParts,
  childOfType,
  definitionName,
  docstringOf,
  firstNamed,
  isAsync,
  isCallToName,
  literalOf,
  unwrapParens,
  walk,
  type NumberLiteral,
} from '../parser/syntax';
import { PYTHON_BUILTINS } from './builtins';

/** Outermost assignments written as statements, annotated ones excluded. */
function* plainAssignments(root: PyNode): Generator<PyNode> {
  for (const node of walk(root)) {
    if (node.type !== 'expression_statement') continue;
    const assignment = firstNamed(node);
    if (assignment?.type === 'assignment' && !childOfType(assignment, 'type')) yield assignment;
  }
}

export class UnusedVariables extends BaseRule {
  readonly name = 'UnusedVariables';
  readonly category = 'Code Cleanliness';
  readonly priority = Priority.LOW;
  readonly impact = 'Possible mistakes; maintainability issues.';
  override readonly heuristic = true;

  check(_filename: string, tree: SourceTree | null): Issue[] {
    if (!tree) return [];
    const firstStore = new Map<string, number>();
    const used = new Set<string>();
    for (const ref of scanNames(tree.root)) {
      if (ref.ctx === 'load') {
        used.add(ref.name);
      } else if (ref.ctx === 'store') {
        const seen = firstStore.get(ref.name);
        if (seen === undefined || ref.node.startLine < seen) firstStore.set(ref.name, ref.node.startLine);
      }
    }

    const issues: Issue[] = [];
    for (const [name, line] of firstStore) {
      if (name.startsWith('_') || used.has(name)) continue;
      issues.push(this.make(line, `Variable "${name}" assigned but not used.`));
    }
    return issues;
  }
}

export class ShadowBuiltins extends BaseRule {
  readonly name = 'ShadowBuiltins';
  readonly category = 'Style';
  readonly priority = Priority.LOW;
  readonly impact = 'Confusion; possible bugs by clobbering built-ins.';
  override readonly heuristic = true;

  check(_filename: string, tree: SourceTree | null): Issue[] {
    if (!tree) return [];
    const issues: Issue[] = [];
    for (const fn of walk(tree.root)) {
      if (fn.type !== 'function_definition' || isAsync(fn)) continue;
      for (const param of parameterList(childOfType(fn, 'parameters'))) {
        if (param.kind === 'positional' && PYTHON_BUILTINS.has(param.name)) {
          issues.push(this.make(fn.startLine, `Parameter "${param.name}" shadows built-in.`));
        }
      }
    }
    for (const assignment of plainAssignments(tree.root)) {
      for (const target of assignmentChain(assignment).targets) {
        if (target.type === 'identifier' && PYTHON_BUILTINS.has(target.text)) {
          issues.push(this.make(assignment.startLine, `Variable "${target.text}" shadows built-in.`));
        }
      }
    }
    return issues;
  }
}

export class PrintStatements extends BaseRule {
  readonly name = 'PrintStatements';
  readonly category = 'Code Cleanliness';
  readonly priority = Priority.LOW;
  readonly impact = 'Prefer logging or returning values.';

  check(_filename: string, tree: SourceTree | null): Issue[] {
    if (!tree) return [];
    const issues: Issue[] = [];
    for (const node of walk(tree.root)) {
      const call = callParts(node);
      if (call && isCallToName(call, 'print')) {
        issues.push(this.make(node.startLine, 'print() used; consider logging or returning values instead.'));
      }
    }
    return issues;
  }
}

const LETTER = /\p{L}/u;

function looksLikeTemplate(s: string): boolean {
  if (!s.includes('{') || !s.includes('}') || s.includes('{{') || s.includes('}}')) return false;
  const inside = s.slice(s.indexOf('{') + 1, s.indexOf('}'));
  return LETTER.test(inside);
}

/*
 * An implicitly concatenated string is one literal; its pieces are not
 * checked on their own.
 */
export class FStringMissing extends BaseRule {
  readonly name = 'FStringMissing';
  readonly category = 'Style';
  readonly priority = Priority.LOW;
  readonly impact = 'String likely intended as f-string; confusing output.';
  override readonly heuristic = true;

  check(_filename: string, tree: SourceTree | null): Issue[] {
    if (!tree) return [];
    const formatted = new Set<number>();
    const pieces = new Set<number>();
    for (const node of walk(tree.root)) {
      if (node.type === 'concatenated_string') {
        for (const piece of node.children) pieces.add(piece.id);
      }
      const call = callParts(node);
      const parts = call ? attributeParts(unwrapParens(call.callee)) : null;
      if (parts?.attr === 'format') formatted.add(unwrapParens(parts.object).id);
    }

    const issues: Issue[] = [];
    for (const node of walk(tree.root)) {
      if (node.type !== 'string' && node.type !== 'concatenated_string') continue;
      if (pieces.has(node.id) || formatted.has(node.id)) continue;
      const lit = literalOf(node);
      if (lit?.kind === 'str' && looksLikeTemplate(lit.value)) {
        issues.push(
          this.make(node.startLine, 'String contains { } but is not an f-string (missing f-prefix or .format).')
        );
      }
    }
    return issues;
  }
}

const SNAKE_CASE = /^[a-z_][a-z0-9_]*$/;
const CAMEL_CASE = /^[A-Z][A-Za-z0-9]+$/;
const RECEIVER_NAMES = new Set(['self', 'cls']);

function isDunder(name: string): boolean {
  return name.startsWith('__') && name.endsWith('__');
}

/** At least one cased character and no lowercase ones. */
function isAllCaps(name: string): boolean {
  return name !== name.toLowerCase() && name === name.toUpperCase();
}

function hasUppercase(name: string): boolean {
  return /\p{Lu}/u.test(name);
}

export class NamingConventions extends BaseRule {
  readonly name = 'NamingConventions';
  readonly category = 'Style';
  readonly priority = Priority.LOW;
  readonly impact = 'Non-PEP8 naming hurts readability.';
  override readonly heuristic = true;

  check(_filename: string, tree: SourceTree | null): Issue[] {
    if (!tree) return [];
    const issues: Issue[] = [];
    for (const node of walk(tree.root)) {
      let params: PyNode | undefined;
      if (node.type === 'function_definition') {
        const name = definitionName(node);
        if (!isDunder(name) && !SNAKE_CASE.test(name)) {
          issues.push(this.make(node.startLine, `Function name "${name}" is not snake_case.`));
        }
        params = childOfType(node, 'parameters');
      } else if (node.type === 'class_definition') {
        const name = definitionName(node);
        if (!CAMEL_CASE.test(name)) {
          issues.push(this.make(node.startLine, `Class name "${name}" is not CamelCase.`));
        }
      } else if (node.type === 'lambda') {
        params = childOfType(node, 'lambda_parameters');
      }

      for (const param of parameterList(params)) {
        if (!RECEIVER_NAMES.has(param.name) && !SNAKE_CASE.test(param.name)) {
          issues.push(this.make(param.node.startLine, `Parameter name "${param.name}" is not snake_case.`));
        }
      }
    }

    for (const ref of scanNames(tree.root)) {
      if (ref.ctx !== 'store') continue;
      if (PYTHON_BUILTINS.has(ref.name)) {
        issues.push(this.make(ref.node.startLine, `Variable "${ref.name}" shadows built-in.`));
      }
      if (hasUppercase(ref.name) && !isAllCaps(ref.name)) {
        issues.push(this.make(ref.node.startLine, `Variable "${ref.name}" is not snake_case.`));
      }
    }
    return issues;
  }
}

const ALLOWED_NUMBERS = new Set([-1, 0, 1, 2]);

/** Float as Python prints it: shortest digits, exponent form outside 1e-4 <= |v| < 1e16. */
function floatRepr(value: number): string {
  if (Number.isNaN(value)) return 'nan';
  if (!Number.isFinite(value)) return value > 0 ? 'inf' : '-inf';
  const [mantissa = '', exponent = '0'] = value.toExponential().split('e');
  const exp = Number(exponent);
  if (exp < -4 || exp >= 16) {
    return `${mantissa}e${exp < 0 ? '-' : '+'}${String(Math.abs(exp)).padStart(2, '0')}`;
  }
  const fixed = String(value);
  return Number.isInteger(value) ? `${fixed}.0` : fixed;
}

function renderNumber(lit: NumberLiteral): string {
  return lit.kind === 'int' ? lit.digits : floatRepr(lit.value);
}

/*
 * Numeric literals inside comparisons, returns and assignments. A literal
 * nested in more than one checked construct is reported once per construct.
 */
export class MagicLiteralRule extends VisitorRule {
  readonly name = 'MagicLiteralRule';
  readonly category = 'Style';
  readonly priority = Priority.LOW;
  readonly impact = 'Unexplained literals obscure intent; prefer named constants.';
  override readonly heuristic = true;

  protected readonly visitors: VisitorTable = {
    comparison_operator: (node, ctx) => this.checkLiterals(node, ctx),
    return_statement: (node, ctx) => this.checkLiterals(node, ctx),
    assignment: (node, ctx) => this.visitAssignment(node, ctx),
  };

  private visitAssignment(node: PyNode, ctx: VisitContext): void {
    if (ctx.parents.parentOf(node)?.type === 'assignment') return;
    const chain = assignmentChain(node);
    if (chain.annotation) return;
    const constants = chain.targets.every((t) => t.type === 'identifier' && isAllCaps(t.text));
    if (!constants) this.checkLiterals(node, ctx);
  }

  private insideRange(node: PyNode, ctx: VisitContext): boolean {
    for (const ancestor of ctx.parents.ancestors(node)) {
      const call = callParts(ancestor);
      if (call && isCallToName(call, 'range')) return true;
    }
    return false;
  }

  private checkLiterals(node: PyNode, ctx: VisitContext): void {
    for (const child of walk(node)) {
      if (child.type !== 'integer' && child.type !== 'float') continue;
      const lit = literalOf(child);
      if (!lit || (lit.kind !== 'int' && lit.kind !== 'float')) continue;
      if (ALLOWED_NUMBERS.has(lit.value) || this.insideRange(child, ctx)) continue;
      ctx.report(
        child.startLine,
        `Magic literal '${renderNumber(lit)}' detected; use a named constant.`
      );
    }
  }
}

function hasDocstring(node: PyNode): boolean {
  const doc = docstringOf(node);
  return doc !== null && doc.trim() !== '';
}

export class MissingDocstringRule extends VisitorRule {
  readonly name = 'MissingDocstringRule';
  readonly category = 'Style/Maintainability';
  readonly priority = Priority.LOW;
  readonly impact = 'Missing docstrings hurt discoverability and maintenance.';

  protected readonly visitors: VisitorTable = {
    module: (node, ctx) => {
      if (!hasDocstring(node)) ctx.report(1, 'Module missing top-level docstring.');
    },
    function_definition: (node, ctx) => this.visitDefinition(node, ctx),
    class_definition: (node, ctx) => this.visitDefinition(node, ctx),
  };

  private visitDefinition(node: PyNode, ctx: VisitContext): void {
    const name = definitionName(node);
    if (name.startsWith('_') || hasDocstring(node)) return;
    let kind = 'class';
    if (node.type === 'function_definition') kind = isAsync(node) ? 'async function' : 'function';
    ctx.report(node.startLine, `Public ${kind} '${name}' missing docstring.`);
  }
}
