import type { PyNode } from './tree-adapter';
import { SEQUENCE_TARGET_KINDS, childOfType, firstNamed, lastNamed, namedAfterToken, namedChildren } from './syntax';

export type NameContext = 'load' | 'store' | 'del';

export interface NameRef {
  readonly node: PyNode;
  readonly name: string;
  readonly ctx: NameContext;
}

export interface NameScanOptions {
  /** Definition kinds whose bodies are not entered */
  skipBodiesOf?: ReadonlySet<string>;
}

export type ParameterKind = 'positional' | 'vararg' | 'keyword-only' | 'kwarg';

export interface Parameter {
  readonly name: string;
  readonly kind: ParameterKind;
  readonly node: PyNode;
  readonly defaultValue: PyNode | undefined;
}

const OPAQUE_STATEMENTS = new Set([
  'import_statement',
  'import_from_statement',
  'future_import_statement',
  'global_statement',
  'nonlocal_statement',
  'type_alias_statement',
  'dotted_name',
]);

type ScanTask =
  | { readonly kind: 'load'; readonly node: PyNode }
  | { readonly kind: 'target'; readonly node: PyNode; readonly ctx: 'store' | 'del' };

function load(node: PyNode | undefined): ScanTask[] {
  return node ? [{ kind: 'load', node }] : [];
}

function bind(node: PyNode | undefined, ctx: 'store' | 'del' = 'store'): ScanTask[] {
  return node ? [{ kind: 'target', node, ctx }] : [];
}

/** Defaults and annotations of a parameter list; the names themselves are not occurrences. */
function parameterTasks(params: PyNode): ScanTask[] {
  const tasks: ScanTask[] = [];
  for (const param of namedChildren(params)) {
    if (param.type === 'default_parameter') {
      const value = lastNamed(param);
      if (value !== firstNamed(param)) tasks.push(...load(value));
    } else if (param.type === 'typed_parameter') {
      tasks.push(...load(childOfType(param, 'type')));
    } else if (param.type === 'typed_default_parameter') {
      const annotation = childOfType(param, 'type');
      const value = lastNamed(param);
      tasks.push(...load(annotation));
      if (value !== annotation) tasks.push(...load(value));
    }
  }
  return tasks;
}

/** Sub-tasks of a loaded node, in source order. */
function loadTasks(node: PyNode, skipBodies: ReadonlySet<string>): ScanTask[] {
  switch (node.type) {
    case 'attribute':
      return load(firstNamed(node));
    case 'keyword_argument': {
      const value = lastNamed(node);
      return value !== firstNamed(node) ? load(value) : [];
    }
    case 'function_definition':
    case 'class_definition': {
      const tasks: ScanTask[] = [];
      for (const child of node.children) {
        if (!child.isNamed || child.type === 'identifier' || child.type === 'comment') continue;
        if (child.type === 'parameters') tasks.push(...parameterTasks(child));
        else if (child.type !== 'block' || !skipBodies.has(node.type)) tasks.push(...load(child));
      }
      return tasks;
    }
    case 'lambda':
      return namedChildren(node).flatMap((child) =>
        child.type === 'lambda_parameters' ? parameterTasks(child) : load(child)
      );
    case 'assignment': {
      const right = namedAfterToken(node, '=');
      return [...bind(firstNamed(node)), ...load(childOfType(node, 'type')), ...load(right)];
    }
    case 'augmented_assignment': {
      const left = firstNamed(node);
      const right = lastNamed(node);
      return [...bind(left), ...(right !== left ? load(right) : [])];
    }
    case 'for_statement':
    case 'for_in_clause': {
      const left = firstNamed(node);
      return namedChildren(node).flatMap((child) => (child === left ? bind(child) : load(child)));
    }
    case 'as_pattern': {
      const [value, alias] = namedChildren(node);
      return [...load(value), ...bind(alias)];
    }
    case 'named_expression': {
      const name = firstNamed(node);
      const value = lastNamed(node);
      return [...bind(name), ...(value !== name ? load(value) : [])];
    }
    case 'except_clause':
    case 'except_group_clause': {
      const named = namedChildren(node);
      const first = named[0];
      const tasks: ScanTask[] = [];
      for (const child of named) {
        if (child.type === 'as_pattern') tasks.push(...load(firstNamed(child)));
        else if (child === first || child.type === 'block') tasks.push(...load(child));
      }
      return tasks;
    }
    case 'delete_statement':
      return namedChildren(node).flatMap((child) => bind(child, 'del'));
    case 'case_clause':
      return namedChildren(node).flatMap((child) => (child.type === 'case_pattern' ? [] : load(child)));
    default:
      return namedChildren(node).flatMap((child) => load(child));
  }
}

/**
 * Every identifier occurrence under `root` with its load/store/del role,
 * in source order.
 *
 * Definition names, parameter names, keyword-argument names, attribute
 * fields, import bindings, `except ... as` names and case patterns are not
 * name occurrences and are left out.
 */
export function scanNames(root: PyNode, options: NameScanOptions = {}): NameRef[] {
  const refs: NameRef[] = [];
  const skipBodies = options.skipBodiesOf ?? new Set<string>();
  const stack: ScanTask[] = load(root);

  while (stack.length > 0) {
    const task = stack.pop();
    if (!task) break;
    const { node } = task;
    let next: ScanTask[] = [];
    if (task.kind === 'target') {
      if (node.type === 'identifier') refs.push({ node, name: node.text, ctx: task.ctx });
      else if (SEQUENCE_TARGET_KINDS.has(node.type)) next = namedChildren(node).flatMap((child) => bind(child, task.ctx));
      else next = load(node);
    } else if (node.type === 'identifier') {
      refs.push({ node, name: node.text, ctx: 'load' });
    } else if (!OPAQUE_STATEMENTS.has(node.type)) {
      next = loadTasks(node, skipBodies);
    }
    for (let i = next.length - 1; i >= 0; i--) {
      const child = next[i];
      if (child) stack.push(child);
    }
  }
  return refs;
}

function splatName(node: PyNode): PyNode | undefined {
  return node.type === 'identifier' ? node : childOfType(node, 'identifier');
}

/** Declared parameters of a `parameters` or `lambda_parameters` node. */
export function parameterList(params: PyNode | undefined): Parameter[] {
  if (!params) return [];
  const out: Parameter[] = [];
  let afterStar = false;

  const add = (nameNode: PyNode | undefined, kind: ParameterKind, defaultValue?: PyNode): void => {
    if (!nameNode || nameNode.type !== 'identifier') return;
    out.push({ name: nameNode.text, kind, node: nameNode, defaultValue });
  };
  const plainKind = (): ParameterKind => (afterStar ? 'keyword-only' : 'positional');

  for (const param of namedChildren(params)) {
    switch (param.type) {
      case 'identifier':
        add(param, plainKind());
        break;
      case 'default_parameter':
      case 'typed_default_parameter': {
        const value = lastNamed(param);
        add(firstNamed(param), plainKind(), value);
        break;
      }
      case 'typed_parameter': {
        const inner = firstNamed(param);
        if (inner?.type === 'list_splat_pattern') {
          add(splatName(inner), 'vararg');
          afterStar = true;
        } else if (inner?.type === 'dictionary_splat_pattern') {
          add(splatName(inner), 'kwarg');
        } else {
          add(inner, plainKind());
        }
        break;
      }
      case 'list_splat_pattern':
        add(splatName(param), 'vararg');
        afterStar = true;
        break;
      case 'dictionary_splat_pattern':
        add(splatName(param), 'kwarg');
        break;
      case 'keyword_separator':
        afterStar = true;
        break;
      default:
        break;
    }
  }
  return out;
}
