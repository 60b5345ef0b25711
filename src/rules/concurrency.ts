import { BaseRule, VisitorRule, type VisitContext, type VisitorTable } from '../analyzer/rule';
import { Priority, type Issue } from '../analyzer/types';
import { importParts } from '../parser/imports';
import { scanNames } from '../parser/names';
import type { PyNode, SourceTree } from '../parser/tree-adapter';
import {
  assignmentChain,
  attributeParts,
  blockOf,
  callParts,
  definitionName,
  firstNamed,
  inRanges,
  mainGuardRanges,
  namedChildren,
  unwrapParens,
  walk,
  walkSkipping,
  type CallParts,
  type LineRange,
} from '../parser/syntax';

type WorkerKind = 'Thread' | 'Process' | 'Pool';

/** Constructor as written at a call site: `module.Ctor(...)` or a bare imported name. */
interface ConstructorNames {
  /** Local names bound to the defining module, aliases included */
  readonly modules: Set<string>;
  /** Local names bound to the constructor itself */
  readonly direct: Set<string>;
}

const CONSTRUCTOR_SOURCES: Record<WorkerKind, string> = {
  Thread: 'threading',
  Process: 'multiprocessing',
  Pool: 'multiprocessing',
};

const WORKER_KINDS: readonly WorkerKind[] = ['Thread', 'Process', 'Pool'];

function collectConstructorNames(root: PyNode): Record<WorkerKind, ConstructorNames> {
  const names: Record<WorkerKind, ConstructorNames> = {
    Thread: { modules: new Set(['threading']), direct: new Set() },
    Process: { modules: new Set(['multiprocessing']), direct: new Set() },
    Pool: { modules: new Set(['multiprocessing']), direct: new Set() },
  };
  for (const node of walk(root)) {
    const parts = importParts(node);
    if (!parts) continue;
    for (const kind of WORKER_KINDS) {
      const source = CONSTRUCTOR_SOURCES[kind];
      for (const imported of parts.names) {
        if (parts.kind === 'import' && imported.name === source && imported.alias) {
          names[kind].modules.add(imported.alias);
        }
        if (parts.kind === 'from' && parts.level === 0 && parts.module === source && imported.name === kind) {
          names[kind].direct.add(imported.alias ?? imported.name);
        }
      }
    }
  }
  return names;
}

function constructs(call: CallParts, names: ConstructorNames, kind: WorkerKind): boolean {
  const callee = unwrapParens(call.callee);
  if (callee.type === 'identifier') return names.direct.has(callee.text);
  const parts = attributeParts(callee);
  return parts !== null && parts.attr === kind && parts.object.type === 'identifier' && names.modules.has(parts.object.text);
}

const FUNCTION_KINDS: ReadonlySet<string> = new Set(['function_definition']);

interface Lifecycle {
  readonly vars: Set<string>;
  readonly joined: Set<string>;
  /** First start() line per variable */
  readonly started: Map<string, number>;
}

function emptyLifecycle(): Lifecycle {
  return { vars: new Set(), joined: new Set(), started: new Map() };
}

/*
 * Thread and process lifecycles, tracked per scope: the module body and each
 * function body, with nested function bodies excluded from the enclosing
 * scope.
 */
export class ConcurrencyRule extends BaseRule {
  readonly name = 'ConcurrencyRule';
  readonly category = 'Concurrency';
  readonly priority = Priority.MEDIUM;
  readonly impact = 'Race conditions, zombie processes, or platform-specific hangs.';
  override readonly heuristic = true;

  check(_filename: string, tree: SourceTree | null): Issue[] {
    if (!tree) return [];
    const names = collectConstructorNames(tree.root);
    const mainBlocks = mainGuardRanges(tree.root);
    const issues: Issue[] = [];

    issues.push(...this.analyzeScope(tree.root, '<module>', names, mainBlocks));
    for (const fn of walk(tree.root)) {
      if (fn.type !== 'function_definition') continue;
      const body = blockOf(fn);
      if (body) issues.push(...this.analyzeScope(body, definitionName(fn), names, null));
    }
    return issues;
  }

  /** `mainBlocks` is given for the module scope only. */
  private analyzeScope(
    scope: PyNode,
    scopeName: string,
    names: Record<WorkerKind, ConstructorNames>,
    mainBlocks: readonly LineRange[] | null
  ): Issue[] {
    const nodes = [...walkSkipping(scope, FUNCTION_KINDS)].filter((n) => n === scope || !FUNCTION_KINDS.has(n.type));
    const threads = emptyLifecycle();
    const processes = emptyLifecycle();
    const issues: Issue[] = [];

    for (const node of nodes) {
      if (node.type !== 'expression_statement') continue;
      const assignment = firstNamed(node);
      if (assignment?.type !== 'assignment') continue;
      const chain = assignmentChain(assignment);
      const call = chain.value && !chain.annotation ? callParts(chain.value) : null;
      if (!call) continue;
      for (const target of chain.targets) {
        if (target.type !== 'identifier') continue;
        if (constructs(call, names.Thread, 'Thread')) threads.vars.add(target.text);
        if (constructs(call, names.Process, 'Process')) processes.vars.add(target.text);
      }
    }

    for (const node of nodes) {
      const call = callParts(node);
      if (!call) continue;
      const parts = attributeParts(unwrapParens(call.callee));
      if (parts) {
        const base = unwrapParens(parts.object);
        if (base.type === 'identifier') {
          this.track(threads, base.text, parts.attr, node.startLine);
          this.track(processes, base.text, parts.attr, node.startLine);
        }
        const inner = parts.attr === 'start' ? callParts(base) : null;
        if (inner && constructs(inner, names.Thread, 'Thread')) {
          issues.push(
            this.make(node.startLine, 'Thread started without a matching join(); ensure a join() in this code path.')
          );
        }
        if (inner && constructs(inner, names.Process, 'Process')) {
          issues.push(
            this.make(node.startLine, 'Process started without a matching join(); ensure a join() in this code path.')
          );
        }
      }

      const createsWorkers = constructs(call, names.Pool, 'Pool') || constructs(call, names.Process, 'Process');
      if (mainBlocks && createsWorkers && !inRanges(node.startLine, mainBlocks)) {
        issues.push(
          this.make(
            node.startLine,
            "multiprocessing object created at import time; protect with if __name__ == '__main__':"
          )
        );
      }
    }

    issues.push(...this.unjoined(threads, 'Thread', scopeName));
    issues.push(...this.unjoined(processes, 'Process', scopeName));
    return issues;
  }

  private track(lifecycle: Lifecycle, variable: string, method: string, line: number): void {
    if (!lifecycle.vars.has(variable)) return;
    if (method === 'start') {
      const first = lifecycle.started.get(variable);
      if (first === undefined || line < first) lifecycle.started.set(variable, line);
    } else if (method === 'join') {
      lifecycle.joined.add(variable);
    }
  }

  private unjoined(lifecycle: Lifecycle, label: string, scopeName: string): Issue[] {
    return [...lifecycle.started.keys()]
      .filter((v) => !lifecycle.joined.has(v))
      .sort()
      .map((v) => {
        const line = lifecycle.started.get(v) ?? 1;
        return this.make(line, `${label} "${v}" started but not joined in scope "${scopeName}".`);
      });
  }
}

const MUTABLE_LITERALS = new Set(['list', 'dictionary', 'set']);

/** Identifiers appearing anywhere in an assignment target, subscripts and attribute receivers included. */
function namesWritten(target: PyNode): string[] {
  return scanNames(target).map((ref) => ref.name);
}

/*
 * Module-level list, dict or set bindings that get written in a module that
 * also creates threads. One finding names every implicated global.
 */
export class ThreadSafetyRule extends VisitorRule {
  readonly name = 'ThreadSafetyRule';
  readonly category = 'Concurrency';
  readonly priority = Priority.MEDIUM;
  readonly impact = 'Shared mutable globals accessed by threads can cause races; use locks or confine state.';

  protected readonly visitors: VisitorTable = {
    module: (node, ctx) => this.visitModule(node, ctx),
  };

  private usesThreads(root: PyNode): boolean {
    for (const node of walk(root)) {
      const call = callParts(node);
      if (!call) continue;
      const callee = unwrapParens(call.callee);
      const name = callee.type === 'identifier' ? callee.text : attributeParts(callee)?.attr;
      if (name === 'Thread') return true;
    }
    return false;
  }

  private mutableGlobals(root: PyNode): Set<string> {
    const globals = new Set<string>();
    for (const stmt of namedChildren(root)) {
      if (stmt.type !== 'expression_statement') continue;
      const assignment = firstNamed(stmt);
      if (assignment?.type !== 'assignment') continue;
      const chain = assignmentChain(assignment);
      if (chain.annotation || !chain.value || !MUTABLE_LITERALS.has(chain.value.type)) continue;
      for (const target of chain.targets) {
        if (target.type === 'identifier') globals.add(target.text);
      }
    }
    return globals;
  }

  private visitModule(root: PyNode, ctx: VisitContext): void {
    if (!this.usesThreads(root)) return;
    const globals = this.mutableGlobals(root);
    if (globals.size === 0) return;

    const written = new Set<string>();
    const noteWrites = (target: PyNode): void => {
      for (const name of namesWritten(target)) {
        if (globals.has(name)) written.add(name);
      }
    };
    for (const node of walk(root)) {
      if (node.type === 'assignment') {
        const chain = assignmentChain(node);
        if (ctx.parents.parentOf(node)?.type !== 'assignment' && !chain.annotation) chain.targets.forEach(noteWrites);
      } else if (node.type === 'augmented_assignment') {
        const target = firstNamed(node);
        if (target) noteWrites(target);
      } else if (node.type === 'call') {
        const parts = callParts(node);
        const receiver = parts ? attributeParts(unwrapParens(parts.callee))?.object : undefined;
        if (receiver?.type === 'identifier' && globals.has(receiver.text)) written.add(receiver.text);
      }
    }
    if (written.size === 0) return;

    let line: number | undefined;
    for (const ref of scanNames(root)) {
      if (written.has(ref.name) && (line === undefined || ref.node.startLine < line)) line = ref.node.startLine;
    }
    const listed = [...written]
      .sort()
      .map((name) => `'${name}'`)
      .join(', ');
    ctx.report(line ?? 1, `Mutable globals [${listed}] written while using threads; use locks or avoid shared state.`);
  }
}
