import { BaseRule } from '../analyzer/rule';
import { Priority, type Issue } from '../analyzer/types';
import { importBindings, IMPORT_KINDS } from '../parser/imports';
import { parameterList, scanNames } from '../parser/names';
import type { PyNode, SourceTree } from '../parser/tree-adapter';
import { blockOf, childOfType, definitionName, exceptParts, walk } from '../parser/syntax';
import { PYTHON_BUILTINS } from './builtins';

const MODULE_DUNDERS = ['__name__', '__file__'];
const DEFINITION_KINDS = new Set(['function_definition', 'class_definition']);
const HANDLER_KINDS = new Set(['except_clause', 'except_group_clause']);
const PARAMETER_KINDS = new Set(['parameters', 'lambda_parameters']);

const FUNCTION_BODIES: ReadonlySet<string> = new Set(['function_definition']);
const ALL_BODIES: ReadonlySet<string> = new Set(['function_definition', 'class_definition']);

/**
 * Names a block of code makes available, gathered from the whole subtree
 * under `scope`: definitions, parameters, every stored name, `except ... as`
 * names and import bindings, on top of the builtins.
 */
function definedNames(scope: PyNode): Set<string> {
  const defined = new Set<string>([...PYTHON_BUILTINS, ...MODULE_DUNDERS]);
  for (const node of walk(scope)) {
    if (DEFINITION_KINDS.has(node.type)) {
      defined.add(definitionName(node));
    } else if (PARAMETER_KINDS.has(node.type)) {
      for (const param of parameterList(node)) defined.add(param.name);
    } else if (HANDLER_KINDS.has(node.type)) {
      const { name } = exceptParts(node);
      if (name) defined.add(name);
    } else if (IMPORT_KINDS.has(node.type)) {
      for (const name of importBindings(node)) defined.add(name);
    }
  }
  for (const ref of scanNames(scope)) {
    if (ref.ctx === 'store') defined.add(ref.name);
  }
  return defined;
}

/*
 * Two scope levels. The module pass checks top-level code without entering
 * function or class bodies. Each function body is then checked against its
 * own names, its parameters and the module's names; nested function bodies
 * are left to their own pass, so every load is examined exactly once.
 */
export class UndefinedNameRule extends BaseRule {
  readonly name = 'UndefinedNameRule';
  readonly category = 'Correctness';
  readonly priority = Priority.HIGH;
  readonly impact = 'Name used before definition/import.';
  override readonly heuristic = true;

  check(_filename: string, tree: SourceTree | null): Issue[] {
    if (!tree) return [];
    const issues: Issue[] = [];
    const moduleDefined = definedNames(tree.root);

    for (const ref of scanNames(tree.root, { skipBodiesOf: ALL_BODIES })) {
      if (ref.ctx === 'load' && !moduleDefined.has(ref.name)) {
        issues.push(this.undefinedAt(ref.node, ref.name));
      }
    }

    for (const fn of walk(tree.root)) {
      if (fn.type !== 'function_definition') continue;
      const body = blockOf(fn);
      if (!body) continue;
      const visible = definedNames(body);
      for (const name of moduleDefined) visible.add(name);
      for (const param of parameterList(childOfType(fn, 'parameters'))) visible.add(param.name);

      for (const ref of scanNames(body, { skipBodiesOf: FUNCTION_BODIES })) {
        if (ref.ctx === 'load' && !visible.has(ref.name)) {
          issues.push(this.undefinedAt(ref.node, ref.name));
        }
      }
    }
    return issues;
  }

  private undefinedAt(node: PyNode, name: string): Issue {
    return this.make(node.startLine, `Name "${name}" might be undefined in this scope.`);
  }
}
