import { BaseRule } from '../analyzer/rule';
import { Priority, type Issue } from '../analyzer/types';
import type { SourceTree } from '../parser/tree-adapter';
import {
  attributeParts,
  callParts,
  comparisonParts,
  firstNamed,
  isAsync,
  isCallToName,
  literalOf,
  namedAfterToken,
  splitLines,
  stringValue,
  unwrapParens,
  walk,
  type Literal,
} from '../parser/syntax';

export class NonPythonicLoops extends BaseRule {
  readonly name = 'NonPythonicLoops';
  readonly category = 'Style/Idioms';
  readonly priority = Priority.LOW;
  readonly impact = 'Harder to read; potential for index errors.';
  override readonly heuristic = true;

  check(_filename: string, tree: SourceTree | null): Issue[] {
    if (!tree) return [];
    const issues: Issue[] = [];
    for (const node of walk(tree.root)) {
      if (node.type !== 'for_statement' || isAsync(node)) continue;
      const iterable = namedAfterToken(node, 'in');
      const call = iterable ? callParts(unwrapParens(iterable)) : null;
      if (!call) continue;

      const inner = call.args.length === 1 && call.args[0] ? callParts(unwrapParens(call.args[0])) : null;
      if (isCallToName(call, 'range') && inner && isCallToName(inner, 'len')) {
        issues.push(this.make(node.startLine, 'Use direct iteration or enumerate() instead of range(len(...)).'));
      }
      if (attributeParts(unwrapParens(call.callee))?.attr === 'keys') {
        issues.push(this.make(node.startLine, 'Iterating dict.keys(); consider dict.items() if values are used.'));
      }
    }
    return issues;
  }
}

const ORDERING_OPS = new Set(['==', '!=', '>', '<', '>=', '<=']);

function isZeroLiteral(lit: Literal | null): boolean {
  if (!lit) return false;
  if (lit.kind === 'int' || lit.kind === 'float') return lit.value === 0;
  return lit.kind === 'bool' && !lit.value;
}

export class LenComparisons extends BaseRule {
  readonly name = 'LenComparisons';
  readonly category = 'Style/Idioms';
  readonly priority = Priority.LOW;
  readonly impact = 'Prefer truthiness checks for readability.';
  override readonly heuristic = true;

  check(_filename: string, tree: SourceTree | null): Issue[] {
    if (!tree) return [];
    const issues: Issue[] = [];
    for (const node of walk(tree.root)) {
      const cmp = comparisonParts(node);
      const pair = cmp?.pairs[0];
      if (!cmp || !pair || cmp.pairs.length !== 1) continue;
      const call = callParts(unwrapParens(cmp.left));
      if (!call || !isCallToName(call, 'len') || call.args.length !== 1) continue;
      if (ORDERING_OPS.has(pair.op) && isZeroLiteral(literalOf(pair.right))) {
        issues.push(this.make(node.startLine, 'Use "if x:" or "if not x:" instead of len(...) comparisons.'));
      }
    }
    return issues;
  }
}

const CSV_DELIMITERS = new Set([',', ';', '\t']);

export class UnsafeCSVParsing extends BaseRule {
  readonly name = 'UnsafeCSVParsing';
  readonly category = 'Robustness';
  readonly priority = Priority.MEDIUM;
  readonly impact = 'Delimiter-in-data breaks parsing; use csv module.';
  override readonly heuristic = true;

  check(_filename: string, tree: SourceTree | null): Issue[] {
    if (!tree) return [];
    const issues: Issue[] = [];
    for (const node of walk(tree.root)) {
      const call = callParts(node);
      if (!call || attributeParts(unwrapParens(call.callee))?.attr !== 'split') continue;
      const delimiter = stringValue(call.args[0]);
      if (delimiter !== null && CSV_DELIMITERS.has(delimiter)) {
        issues.push(this.make(node.startLine, `Possible CSV parsing via split('${delimiter}'); prefer csv module.`));
      }
    }
    return issues;
  }
}

export class DictAccessGuard extends BaseRule {
  readonly name = 'DictAccessGuard';
  readonly category = 'Robustness';
  readonly priority = Priority.MEDIUM;
  readonly impact = 'Possible KeyError on missing keys.';
  override readonly heuristic = true;

  check(_filename: string, tree: SourceTree | null): Issue[] {
    if (!tree) return [];
    const issues: Issue[] = [];
    for (const node of walk(tree.root)) {
      if (node.type !== 'subscript') continue;
      const value = firstNamed(node);
      if (value?.type !== 'identifier') continue;
      issues.push(
        this.make(
          node.startLine,
          `Key access on "${value.text}" without guard; prefer .get() or "in" checks or try/except.`
        )
      );
    }
    return issues;
  }
}

export class TodoComments extends BaseRule {
  readonly name = 'TodoComments';
  readonly category = 'Process';
  readonly priority = Priority.LOW;
  readonly impact = 'Outstanding work items; ensure tracking.';
  override readonly heuristic = true;

  check(_filename: string, tree: SourceTree | null, text: string): Issue[] {
    if (!tree) return [];
    const issues: Issue[] = [];
    splitLines(text).forEach((line, i) => {
      const upper = line.toUpperCase();
      if (upper.includes('TODO') || upper.includes('FIXME')) {
        issues.push(this.make(i + 1, 'Found TODO/FIXME. Confirm ticket/issue reference or resolve.'));
      }
    });
    return issues;
  }
}

const DRIVE_PATH = /[A-Za-z]:\\\\/;
const REPEATED_BACKSLASH = /\\{2,}/;

export class PlatformSpecificPaths extends BaseRule {
  readonly name = 'PlatformSpecificPaths';
  readonly category = 'Portability';
  readonly priority = Priority.MEDIUM;
  readonly impact = 'Path separators or drive letters may break on other OS.';
  override readonly heuristic = true;

  check(_filename: string, tree: SourceTree | null, text: string): Issue[] {
    if (!tree) return [];
    const issues: Issue[] = [];
    splitLines(text).forEach((line, i) => {
      const mixed = line.includes('\\') && line.includes('/');
      if (DRIVE_PATH.test(line) || mixed || REPEATED_BACKSLASH.test(line)) {
        issues.push(
          this.make(i + 1, 'Hardcoded path detected. Prefer pathlib.Path or os.path.join for portability.')
        );
      }
    });
    return issues;
  }
}
