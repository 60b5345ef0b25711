import { BaseRule, VisitorRule, type VisitContext, type VisitorTable } from '../analyzer/rule';
import { Priority, type Issue } from '../analyzer/types';
import type { PyNode, SourceTree } from '../parser/tree-adapter';
import {
  assignmentChain,
  attributeParts,
  callParts,
  childOfType,
  firstNamed,
  isCallToName,
  lastNamed,
  namedChildren,
  stringValue,
  unwrapParens,
  walk,
  type CallParts,
} from '../parser/syntax';

interface ScopedItem {
  /** Expression being acquired */
  value: PyNode;
  /** Bound name node after `as`, if any */
  alias: PyNode | undefined;
}

/** Items of a `with` statement, sync or async. */
function withItems(node: PyNode): ScopedItem[] {
  const clause = childOfType(node, 'with_clause');
  if (!clause) return [];
  const items: ScopedItem[] = [];
  for (const item of namedChildren(clause)) {
    if (item.type !== 'with_item') continue;
    const inner = firstNamed(item);
    if (!inner) continue;
    if (inner.type === 'as_pattern') {
      const value = firstNamed(inner);
      const target = lastNamed(inner);
      if (value) items.push({ value, alias: target ? (firstNamed(target) ?? target) : undefined });
    } else {
      items.push({ value: inner, alias: undefined });
    }
  }
  return items;
}

function isOpenCall(call: CallParts): boolean {
  const callee = unwrapParens(call.callee);
  if (callee.type === 'identifier') return callee.text === 'open';
  return attributeParts(callee)?.attr === 'open';
}

export class OpenWithoutWith extends BaseRule {
  readonly name = 'OpenWithoutWith';
  readonly category = 'Resource Management';
  readonly priority = Priority.MEDIUM;
  readonly impact = 'Resource leaks; file handles not closed on error.';

  check(_filename: string, tree: SourceTree | null): Issue[] {
    if (!tree) return [];
    const covered = new Set<number>();
    for (const node of walk(tree.root)) {
      if (node.type !== 'with_statement') continue;
      for (const { value } of withItems(node)) {
        const call = callParts(unwrapParens(value));
        if (call && isOpenCall(call)) covered.add(unwrapParens(value).id);
      }
    }

    const issues: Issue[] = [];
    for (const node of walk(tree.root)) {
      const call = callParts(node);
      if (call && isOpenCall(call) && !covered.has(node.id)) {
        issues.push(this.make(node.startLine, "Use 'with open(...)' to ensure closure."));
      }
    }
    return issues;
  }
}

/** Mode of an `open(...)` call when given as a string literal. */
function literalMode(call: CallParts, allowKeyword: boolean): string | null {
  let mode = stringValue(call.args[1]);
  if (allowKeyword) {
    const keyword = call.keywords.find((k) => k.name === 'mode');
    const fromKeyword = keyword ? stringValue(keyword.value) : null;
    if (fromKeyword !== null) mode = fromKeyword;
  }
  return mode;
}

const READ_METHODS = new Set(['read', 'readline', 'readlines']);
const WRITE_METHODS = new Set(['write', 'writelines']);

function pushLine(map: Map<string, number[]>, key: string, line: number): void {
  const lines = map.get(key);
  if (lines) lines.push(line);
  else map.set(key, [line]);
}

/*
 * Tracks handles bound by `v = open(...)` or `with open(...) as v` and the
 * read/write calls made on the same name anywhere in the file.
 */
export class FileModeMismatch extends BaseRule {
  readonly name = 'FileModeMismatch';
  readonly category = 'Resource Management';
  readonly priority = Priority.HIGH;
  readonly impact = 'Read/write mismatch likely bugs.';
  override readonly heuristic = true;

  check(_filename: string, tree: SourceTree | null): Issue[] {
    if (!tree) return [];
    const modes = new Map<string, string>();
    const reads = new Map<string, number[]>();
    const writes = new Map<string, number[]>();

    for (const node of walk(tree.root)) {
      if (node.type === 'expression_statement') {
        const assignment = firstNamed(node);
        if (assignment?.type !== 'assignment') continue;
        const chain = assignmentChain(assignment);
        const call = chain.value && !chain.annotation ? callParts(chain.value) : null;
        if (!call || !isCallToName(call, 'open')) continue;
        const mode = literalMode(call, true) || 'r';
        for (const target of chain.targets) {
          if (target.type === 'identifier') modes.set(target.text, mode);
        }
      } else if (node.type === 'with_statement') {
        for (const { value, alias } of withItems(node)) {
          const call = callParts(value);
          if (!call || !isCallToName(call, 'open')) continue;
          if (alias?.type === 'identifier') modes.set(alias.text, literalMode(call, true) || 'r');
        }
      } else if (node.type === 'call') {
        const call = callParts(node);
        const parts = call ? attributeParts(call.callee) : null;
        if (!parts || parts.object.type !== 'identifier') continue;
        const handle = parts.object.text;
        if (READ_METHODS.has(parts.attr)) pushLine(reads, handle, node.startLine);
        if (WRITE_METHODS.has(parts.attr)) pushLine(writes, handle, node.startLine);
      }
    }

    const issues: Issue[] = [];
    for (const [handle, mode] of modes) {
      const writtenAt = writes.get(handle)?.[0];
      const readAt = reads.get(handle)?.[0];
      if (mode.startsWith('r') && writtenAt !== undefined) {
        issues.push(this.make(writtenAt, `File handle "${handle}" opened read-mode "${mode}" but written to.`));
      }
      if ((mode.startsWith('w') || mode.startsWith('a')) && readAt !== undefined) {
        issues.push(this.make(readAt, `File handle "${handle}" opened write/append "${mode}" but read from.`));
      }
    }
    return issues;
  }
}

const TEXT_MODE_PREFIXES = ['r', 'w', 'a', 'x'];

/** Text-mode `open(...)` without an explicit `encoding=`. */
export class OpenEncodingRule extends VisitorRule {
  readonly name = 'OpenEncodingRule';
  readonly category = 'Robustness';
  readonly priority = Priority.LOW;
  readonly impact = 'Implicit platform encoding can cause subtle bugs across environments.';

  protected readonly visitors: VisitorTable = {
    call: (node, ctx) => this.visitCall(node, ctx),
  };

  private visitCall(node: PyNode, ctx: VisitContext): void {
    const call = callParts(node);
    if (!call || !isCallToName(call, 'open')) return;
    const hasEncoding = call.keywords.some((k) => k.name === 'encoding');
    const mode = literalMode(call, false);
    const textMode = mode === null || (TEXT_MODE_PREFIXES.some((p) => mode.startsWith(p)) && !mode.includes('b'));
    if (textMode && !hasEncoding) {
      ctx.report(node.startLine, "open() called for text mode without 'encoding='.");
    }
  }
}
