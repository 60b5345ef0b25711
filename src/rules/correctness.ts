import { BaseRule, VisitorRule, type VisitContext, type VisitorTable } from '../analyzer/rule';
import { Priority, type Issue } from '../analyzer/types';
import { parameterList } from '../parser/names';
import type { PyNode, SourceTree } from '../parser/tree-adapter';
import {
  callParts,
  calleeName,
  childOfType,
  comparisonParts,
  definitionName,
  inRanges,
  isCallToName,
  literalOf,
  mainGuardRanges,
  namedChildren,
  qualifiedCallee,
  splitLines,
  unwrapParens,
  walk,
  type Literal,
} from '../parser/syntax';

const DEFINITION_KINDS = new Set(['function_definition']);

export class AssertForRuntime extends BaseRule {
  readonly name = 'AssertForRuntime';
  readonly category = 'Correctness';
  readonly priority = Priority.MEDIUM;
  readonly impact = 'Asserts can be stripped with -O; critical checks may disappear.';

  check(_filename: string, tree: SourceTree | null): Issue[] {
    if (!tree) return [];
    const issues: Issue[] = [];
    for (const node of walk(tree.root)) {
      if (node.type === 'assert_statement') {
        issues.push(this.make(node.startLine, 'Avoid assert for runtime validation; raise exceptions instead.'));
      }
    }
    return issues;
  }
}

const MUTABLE_LITERALS = new Set(['list', 'dictionary', 'set']);
const MUTABLE_FACTORIES = new Set(['list', 'dict', 'set']);

function isMutableDefault(value: PyNode): boolean {
  const node = unwrapParens(value);
  if (MUTABLE_LITERALS.has(node.type)) return true;
  const call = callParts(node);
  return call !== null && isCallToName(call, MUTABLE_FACTORIES);
}

export class MutableDefaultArgs extends BaseRule {
  readonly name = 'MutableDefaultArgs';
  readonly category = 'Correctness';
  readonly priority = Priority.HIGH;
  readonly impact = 'Shared mutable state across calls; surprising behavior.';

  check(_filename: string, tree: SourceTree | null): Issue[] {
    if (!tree) return [];
    const issues: Issue[] = [];
    for (const fn of walk(tree.root)) {
      if (!DEFINITION_KINDS.has(fn.type)) continue;
      const name = definitionName(fn);
      const params = parameterList(childOfType(fn, 'parameters'));
      for (const param of params.filter((p) => p.kind === 'positional')) {
        if (param.defaultValue && isMutableDefault(param.defaultValue)) {
          issues.push(this.make(fn.startLine, `Mutable default in function "${name}".`));
        }
      }
      for (const param of params.filter((p) => p.kind === 'keyword-only')) {
        if (param.defaultValue && isMutableDefault(param.defaultValue)) {
          issues.push(this.make(fn.startLine, `Mutable keyword-only default in function "${name}".`));
        }
      }
    }
    return issues;
  }
}

function isBoolLiteral(lit: Literal | null): boolean {
  return lit?.kind === 'bool';
}

/** Literal other than None, as compared with `is`. */
function isValueLiteral(lit: Literal | null): boolean {
  return lit !== null && lit.kind !== 'none' && lit.kind !== 'bool' && lit.kind !== 'fstring';
}

export class IdentityVsEquality extends BaseRule {
  readonly name = 'IdentityVsEquality';
  readonly category = 'Correctness';
  readonly priority = Priority.MEDIUM;
  readonly impact = 'Wrong operator may yield incorrect logic.';
  override readonly heuristic = true;

  check(_filename: string, tree: SourceTree | null): Issue[] {
    if (!tree) return [];
    const issues: Issue[] = [];
    const IS_BOOL = 'Avoid using "is True/False" in comparisons.';
    const IS_VALUE = 'Use "==" for value comparison; reserve "is" for None.';
    const EQ_NONE = 'Use "is (not) None" for None checks.';

    for (const node of walk(tree.root)) {
      const cmp = comparisonParts(node);
      if (!cmp) continue;
      const left = literalOf(cmp.left);
      for (const { op, right } of cmp.pairs) {
        const comp = literalOf(right);
        if (op === 'is' || op === 'is not') {
          if (isBoolLiteral(comp)) issues.push(this.make(node.startLine, IS_BOOL));
          else if (isValueLiteral(comp)) issues.push(this.make(node.startLine, IS_VALUE));
          if (isBoolLiteral(left)) issues.push(this.make(node.startLine, IS_BOOL));
          else if (isValueLiteral(left)) issues.push(this.make(node.startLine, IS_VALUE));
        }
        if (op === '==' || op === '!=') {
          if (comp?.kind === 'none') issues.push(this.make(node.startLine, EQ_NONE));
          if (isBoolLiteral(comp)) {
            issues.push(this.make(node.startLine, 'Avoid == True/False; use the value directly.'));
          }
          if (left?.kind === 'none') issues.push(this.make(node.startLine, EQ_NONE));
        }
      }
    }
    return issues;
  }
}

const TYPE_COMPARISON_OPS = new Set(['==', '!=', 'is', 'is not']);

export class TypeCheckRule extends BaseRule {
  readonly name = 'TypeCheckRule';
  readonly category = 'Correctness';
  readonly priority = Priority.MEDIUM;
  readonly impact = 'type(x)==T is brittle; prefer isinstance().';

  check(_filename: string, tree: SourceTree | null): Issue[] {
    if (!tree) return [];
    const issues: Issue[] = [];
    for (const node of walk(tree.root)) {
      const cmp = comparisonParts(node);
      if (!cmp) continue;
      const call = callParts(unwrapParens(cmp.left));
      if (!call || !isCallToName(call, 'type')) continue;
      if (cmp.pairs.some((p) => TYPE_COMPARISON_OPS.has(p.op))) {
        issues.push(this.make(node.startLine, 'Use isinstance(x, T) instead of type(x) == T.'));
      }
    }
    return issues;
  }
}

const EXIT_BUILTINS = new Set(['exit', 'quit']);

export class ExitCallsInLibrary extends BaseRule {
  readonly name = 'ExitCallsInLibrary';
  readonly category = 'Correctness';
  readonly priority = Priority.HIGH;
  readonly impact = 'Premature interpreter exit; unusable as import.';
  override readonly heuristic = true;

  check(_filename: string, tree: SourceTree | null): Issue[] {
    if (!tree) return [];
    const issues: Issue[] = [];
    const mainBlocks = mainGuardRanges(tree.root);
    for (const node of walk(tree.root)) {
      const call = callParts(node);
      if (!call || inRanges(node.startLine, mainBlocks)) continue;
      if (isCallToName(call, EXIT_BUILTINS)) {
        issues.push(this.make(node.startLine, 'exit()/quit() in non-__main__ context; raise exception instead.'));
      }
      const qualified = qualifiedCallee(call);
      if (qualified && qualified[0] === 'sys' && qualified[1] === 'exit') {
        issues.push(this.make(node.startLine, 'sys.exit() in non-__main__ context; raise exception instead.'));
      }
    }
    return issues;
  }
}

const TOKEN_TYPE_COMPARISON = /\.type\s*==\s*\d+/;

/** Scans raw text, but only once the file has parsed. */
export class DangerousTokenMagicNumbers extends BaseRule {
  readonly name = 'DangerousTokenMagicNumbers';
  readonly category = 'Correctness';
  readonly priority = Priority.MEDIUM;
  readonly impact = 'Brittle parsing; unclear meaning.';
  override readonly heuristic = true;

  check(_filename: string, tree: SourceTree | null, text: string): Issue[] {
    if (!tree) return [];
    const issues: Issue[] = [];
    splitLines(text).forEach((line, i) => {
      if (TOKEN_TYPE_COMPARISON.test(line)) {
        issues.push(
          this.make(i + 1, 'Comparing token .type to numeric literal; prefer named constants from token module.')
        );
      }
    });
    return issues;
  }
}

function annotationAllowsNone(annotation: string): boolean {
  const s = annotation.replace(/ /g, '');
  return s.includes('None') || s.includes('Optional[') || (s.includes('Union[') && s.includes('None'));
}

export class ReturnAnnotationMismatch extends BaseRule {
  readonly name = 'ReturnAnnotationMismatch';
  readonly category = 'Correctness';
  readonly priority = Priority.MEDIUM;
  readonly impact = 'Return type may not match annotation.';
  override readonly heuristic = true;

  check(_filename: string, tree: SourceTree | null): Issue[] {
    if (!tree) return [];
    const issues: Issue[] = [];
    for (const fn of walk(tree.root)) {
      if (fn.type !== 'function_definition') continue;
      const returnType = childOfType(fn, 'type');
      if (!returnType) continue;
      const annotation = returnType.text.split(/\s+/).filter(Boolean).join(' ');
      const name = definitionName(fn);

      let returnsNone = false;
      let returnsValue = false;
      for (const sub of walk(fn)) {
        if (sub.type !== 'return_statement') continue;
        const value = namedChildren(sub)[0];
        if (!value || literalOf(value)?.kind === 'none') returnsNone = true;
        else returnsValue = true;
      }

      if (returnsNone && !annotationAllowsNone(annotation)) {
        issues.push(this.make(fn.startLine, `Function "${name}" returns None but annotation is ${annotation}.`));
      }
      if (returnsValue && (annotation === 'None' || annotation === 'NoneType')) {
        issues.push(this.make(fn.startLine, `Function "${name}" returns a value but annotation is ${annotation}.`));
      }
    }
    return issues;
  }
}

export class PotentialStringCastNeeded extends BaseRule {
  readonly name = 'Potential String Cast Needed';
  readonly category = 'Correctness';
  readonly priority = Priority.MEDIUM;
  readonly impact = 'TypeError/logic bug if value not str.';
  override readonly heuristic = true;

  check(_filename: string, tree: SourceTree | null): Issue[] {
    if (!tree) return [];
    const issues: Issue[] = [];
    for (const node of walk(tree.root)) {
      const cmp = comparisonParts(node);
      if (!cmp) continue;
      const call = callParts(unwrapParens(cmp.left));
      const arg = call?.args[0];
      if (!call || !arg || !isCallToName(call, 'len')) continue;

      const target = unwrapParens(arg);
      let argName: string | null = null;
      if (target.type === 'identifier') argName = target.text;
      else if (target.type === 'attribute') argName = namedChildren(target).pop()?.text ?? null;

      const comparesToSmallInt = cmp.pairs.some(({ right }) => {
        const lit = literalOf(right);
        return lit?.kind === 'int' && lit.value >= 2 && lit.value <= 64;
      });
      if (argName && comparesToSmallInt) {
        issues.push(
          this.make(
            node.startLine,
            `len(${argName}) compared to constant. Ensure "${argName}" is str (cast with str() upstream if needed).`
          )
        );
      }
    }
    return issues;
  }
}

const SUSPECT_PREFIXES = [
  'get',
  'find',
  'compute',
  'calc',
  'build',
  'create',
  'search',
  'match',
  'read',
  'load',
  'parse',
  'json',
] as const;

const SIDE_EFFECT_NAMES = new Set([
  'print',
  'write',
  'writelines',
  'append',
  'extend',
  'add',
  'update',
  'setdefault',
  'logger',
  'log',
  'info',
  'warning',
  'error',
  'debug',
  'critical',
]);

/** Calls used as statements whose name suggests a result worth keeping. */
export class IgnoredReturnValueRule extends VisitorRule {
  readonly name = 'IgnoredReturnValueRule';
  readonly category = 'Correctness';
  readonly priority = Priority.LOW;
  readonly impact = 'Ignoring return values can hide bugs and make code harder to reason about.';

  protected readonly visitors: VisitorTable = {
    expression_statement: (node, ctx) => this.visitExpression(node, ctx),
  };

  private visitExpression(node: PyNode, ctx: VisitContext): void {
    const parts = namedChildren(node);
    if (parts.length !== 1 || !parts[0]) return;
    const call = callParts(unwrapParens(parts[0]));
    const name = call ? calleeName(call) : null;
    if (!name) return;
    const low = name.toLowerCase();
    if (SUSPECT_PREFIXES.some((p) => low.startsWith(p)) && !SIDE_EFFECT_NAMES.has(low)) {
      ctx.report(node.startLine, `Return value from '${name}()' is ignored; assign or use it.`);
    }
  }
}
