import type { PyNode } from './tree-adapter';

/*
 * Structural helpers over PyNode.
 * Roles inside a node are resolved by child kind and by the anonymous tokens
 * around them (`=`, `in`, `from`), which keeps lookups independent of
 * grammar field tables.
 */

export function namedChildren(node: PyNode): PyNode[] {
  return node.children.filter((c) => c.isNamed && c.type !== 'comment');
}

export function firstNamed(node: PyNode): PyNode | undefined {
  return node.children.find((c) => c.isNamed && c.type !== 'comment');
}

export function lastNamed(node: PyNode): PyNode | undefined {
  const named = namedChildren(node);
  return named[named.length - 1];
}

export function childOfType(node: PyNode, ...types: string[]): PyNode | undefined {
  return node.children.find((c) => types.includes(c.type));
}

export function hasToken(node: PyNode, token: string): boolean {
  return node.children.some((c) => !c.isNamed && c.type === token);
}

/** First named child that follows the anonymous `token` child. */
export function namedAfterToken(node: PyNode, token: string): PyNode | undefined {
  let seen = false;
  for (const child of node.children) {
    if (!child.isNamed && child.type === token) {
      seen = true;
      continue;
    }
    if (seen && child.isNamed && child.type !== 'comment') return child;
  }
  return undefined;
}

/** Breadth-first walk over every node, root included. */
export function* walk(root: PyNode): Generator<PyNode> {
  const queue: PyNode[] = [root];
  for (let i = 0; i < queue.length; i++) {
    const node = queue[i];
    if (!node) continue;
    yield node;
    queue.push(...node.children);
  }
}

/** Breadth-first walk that yields but does not enter nodes of the `opaque` kinds below the root. */
export function* walkSkipping(root: PyNode, opaque: ReadonlySet<string>): Generator<PyNode> {
  const queue: PyNode[] = [root];
  for (let i = 0; i < queue.length; i++) {
    const node = queue[i];
    if (!node) continue;
    yield node;
    if (node !== root && opaque.has(node.type)) continue;
    queue.push(...node.children);
  }
}

/** Depth-first pre-order traversal, children in source order. */
export function traverse(root: PyNode, visit: (node: PyNode) => void): void {
  const stack: PyNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    visit(node);
    for (let i = node.children.length - 1; i >= 0; i--) {
      const child = node.children[i];
      if (child) stack.push(child);
    }
  }
}

/** Source lines without their terminators. */
export function splitLines(text: string): string[] {
  return text.split(/\r\n|\r|\n/);
}

export function unwrapParens(node: PyNode): PyNode {
  let current = node;
  while (current.type === 'parenthesized_expression') {
    const inner = firstNamed(current);
    if (!inner) break;
    current = inner;
  }
  return current;
}

export function isName(node: PyNode | undefined, name?: string): node is PyNode {
  return node !== undefined && node.type === 'identifier' && (name === undefined || node.text === name);
}

/** Last line holding code, ignoring trailing comments inside the node. */
export function lastCodeLine(node: PyNode): number {
  let current: PyNode | undefined = node;
  let line = node.endLine;
  while (current) {
    line = current.endLine;
    const children: readonly PyNode[] = current.children;
    current = undefined;
    for (let i = children.length - 1; i >= 0 && !current; i--) {
      const child = children[i];
      if (child && child.type !== 'comment') current = child;
    }
  }
  return line;
}

// ---------------------------------------------------------------------------
// Attributes and calls

export interface AttributeParts {
  object: PyNode;
  attr: string;
}

export function attributeParts(node: PyNode): AttributeParts | null {
  if (node.type !== 'attribute') return null;
  const object = firstNamed(node);
  const attr = lastNamed(node);
  if (!object || !attr || object === attr) return null;
  return { object, attr: attr.text };
}

export interface KeywordArg {
  name: string;
  value: PyNode;
}

export interface CallParts {
  callee: PyNode;
  args: PyNode[];
  keywords: KeywordArg[];
  /** Present once per `**mapping` argument */
  doubleStarred: number;
}

export function callParts(node: PyNode): CallParts | null {
  if (node.type !== 'call') return null;
  const callee = firstNamed(node);
  const argNode = lastNamed(node);
  if (!callee || !argNode || callee === argNode) return null;

  const parts: CallParts = { callee, args: [], keywords: [], doubleStarred: 0 };
  if (argNode.type === 'generator_expression') {
    parts.args.push(argNode);
    return parts;
  }
  for (const arg of namedChildren(argNode)) {
    if (arg.type === 'keyword_argument') {
      const name = firstNamed(arg);
      const value = lastNamed(arg);
      if (name && value && name !== value) {
        parts.keywords.push({ name: name.text, value });
      }
    } else if (arg.type === 'dictionary_splat') {
      parts.doubleStarred += 1;
    } else {
      parts.args.push(arg);
    }
  }
  return parts;
}

export function keywordValue(call: CallParts, name: string): PyNode | undefined {
  return call.keywords.find((k) => k.name === name)?.value;
}

/** `f(...)` gives "f", `a.b.f(...)` gives "f". */
export function calleeName(call: CallParts): string | null {
  const callee = unwrapParens(call.callee);
  if (callee.type === 'identifier') return callee.text;
  return attributeParts(callee)?.attr ?? null;
}

/** `mod.fn(...)` gives ["mod", "fn"] when the receiver is a plain name. */
export function qualifiedCallee(call: CallParts): [string, string] | null {
  const parts = attributeParts(unwrapParens(call.callee));
  if (!parts || parts.object.type !== 'identifier') return null;
  return [parts.object.text, parts.attr];
}

export function isCallToName(call: CallParts, names: ReadonlySet<string> | string): boolean {
  const callee = unwrapParens(call.callee);
  if (callee.type !== 'identifier') return false;
  return typeof names === 'string' ? callee.text === names : names.has(callee.text);
}

// ---------------------------------------------------------------------------
// Literals

export type Literal =
  | { kind: 'str'; value: string }
  | { kind: 'bytes' }
  | { kind: 'fstring' }
  | { kind: 'int'; value: number; digits: string }
  | { kind: 'float'; value: number }
  | { kind: 'complex' }
  | { kind: 'bool'; value: boolean }
  | { kind: 'none' }
  | { kind: 'ellipsis' };

const STRING_PREFIX = /^([A-Za-z]*)("""|'''|"|')/;

const SIMPLE_ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '\\': '\\',
  "'": "'",
  '"': '"',
  a: '\x07',
  b: '\b',
  f: '\f',
  v: '\v',
  '0': '\0',
};

function unescape(body: string): string {
  return body.replace(/\\(x[0-9a-fA-F]{2}|u[0-9a-fA-F]{4}|\n|.)/g, (match: string, esc: string) => {
    if (esc === '\n') return '';
    if (esc.length > 1) return String.fromCharCode(parseInt(esc.slice(1), 16));
    return SIMPLE_ESCAPES[esc] ?? match;
  });
}

function stringPiece(node: PyNode): Literal | null {
  const m = node.text.match(STRING_PREFIX);
  if (!m || m[1] === undefined || m[2] === undefined) return null;
  const prefix = m[1].toLowerCase();
  if (prefix.includes('f')) return { kind: 'fstring' };
  if (prefix.includes('b')) return { kind: 'bytes' };
  const quote = m[2];
  const body = node.text.slice(m[0].length, node.text.length - quote.length);
  return { kind: 'str', value: prefix.includes('r') ? body : unescape(body) };
}

function numberValue(text: string): number {
  const clean = text.replace(/_/g, '').toLowerCase();
  if (/^0[xob]/.test(clean)) {
    const radix = clean[1] === 'x' ? 16 : clean[1] === 'o' ? 8 : 2;
    return parseInt(clean.slice(2), radix);
  }
  return Number(clean.replace(/l$/, ''));
}

const INTEGER_FORMS = /^(0x[0-9a-f]+|0o[0-7]+|0b[01]+|[0-9]+)$/;

/** Exact decimal digits of an integer literal, beyond the range a double holds. */
function integerDigits(text: string): string {
  const clean = text.replace(/_/g, '').toLowerCase().replace(/l$/, '');
  return INTEGER_FORMS.test(clean) ? BigInt(clean).toString() : String(numberValue(text));
}

/** Constant value of a literal node, seeing through parentheses. */
export function literalOf(input: PyNode): Literal | null {
  const node = unwrapParens(input);
  switch (node.type) {
    case 'string':
      return stringPiece(node);
    case 'concatenated_string': {
      let value = '';
      for (const part of namedChildren(node)) {
        const piece = stringPiece(part);
        if (!piece) return null;
        if (piece.kind !== 'str') return piece;
        value += piece.value;
      }
      return { kind: 'str', value };
    }
    case 'integer':
      if (/[jJ]$/.test(node.text)) return { kind: 'complex' };
      return { kind: 'int', value: numberValue(node.text), digits: integerDigits(node.text) };
    case 'float':
      if (/[jJ]$/.test(node.text)) return { kind: 'complex' };
      return { kind: 'float', value: numberValue(node.text) };
    case 'true':
      return { kind: 'bool', value: true };
    case 'false':
      return { kind: 'bool', value: false };
    case 'none':
      return { kind: 'none' };
    case 'ellipsis':
      return { kind: 'ellipsis' };
    default:
      return null;
  }
}

export type NumberLiteral = Extract<Literal, { kind: 'int' | 'float' }>;

export function stringValue(node: PyNode | undefined): string | null {
  if (!node) return null;
  const lit = literalOf(node);
  return lit?.kind === 'str' ? lit.value : null;
}

// ---------------------------------------------------------------------------
// Statements

export interface ComparisonParts {
  left: PyNode;
  pairs: Array<{ op: string; right: PyNode }>;
}

export function comparisonParts(node: PyNode): ComparisonParts | null {
  if (node.type !== 'comparison_operator') return null;
  const operands = namedChildren(node);
  const left = operands[0];
  if (!left) return null;
  const pairs: ComparisonParts['pairs'] = [];
  for (let i = 1; i < operands.length; i++) {
    const prev = operands[i - 1];
    const right = operands[i];
    if (!prev || !right) continue;
    const between = node.text.slice(prev.endIndex - node.startIndex, right.startIndex - node.startIndex);
    const op = between.replace(/\\\r?\n/g, ' ').trim().split(/\s+/).join(' ');
    pairs.push({ op, right });
  }
  return { left, pairs };
}

/** Left-hand targets and final value of a (possibly chained) assignment. */
export interface AssignmentChain {
  targets: PyNode[];
  value: PyNode | undefined;
  annotation: PyNode | undefined;
}

export function assignmentChain(node: PyNode): AssignmentChain {
  const chain: AssignmentChain = { targets: [], value: undefined, annotation: childOfType(node, 'type') };
  let current: PyNode | undefined = node;
  while (current && current.type === 'assignment') {
    const left = firstNamed(current);
    if (left) chain.targets.push(left);
    const right = namedAfterToken(current, '=');
    if (right?.type === 'assignment') {
      current = right;
    } else {
      chain.value = right;
      current = undefined;
    }
  }
  return chain;
}

export const SEQUENCE_TARGET_KINDS: ReadonlySet<string> = new Set([
  'pattern_list',
  'tuple_pattern',
  'list_pattern',
  'tuple',
  'list',
  'expression_list',
  'parenthesized_expression',
  'list_splat_pattern',
  'list_splat',
  'as_pattern_target',
]);

/** Plain identifiers bound by an assignment target, unpacking sequences. */
export function namesFromTarget(target: PyNode): PyNode[] {
  const names: PyNode[] = [];
  const stack: PyNode[] = [target];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    if (node.type === 'identifier') {
      names.push(node);
    } else if (SEQUENCE_TARGET_KINDS.has(node.type)) {
      stack.push(...namedChildren(node).reverse());
    }
  }
  return names;
}

export function blockOf(node: PyNode): PyNode | undefined {
  return childOfType(node, 'block');
}

export function definitionName(node: PyNode): string {
  return childOfType(node, 'identifier')?.text ?? '';
}

export function isAsync(node: PyNode): boolean {
  return hasToken(node, 'async');
}

/** Statement list of a module or a definition body. */
export function statementsOf(node: PyNode): PyNode[] {
  if (node.type === 'module' || node.type === 'block') return namedChildren(node);
  const block = blockOf(node);
  return block ? namedChildren(block) : [];
}

export function docstringOf(node: PyNode): string | null {
  const first = statementsOf(node)[0];
  if (!first || first.type !== 'expression_statement') return null;
  const parts = namedChildren(first);
  if (parts.length !== 1 || !parts[0]) return null;
  return stringValue(parts[0]);
}

export interface ExceptParts {
  type: PyNode | undefined;
  name: string | undefined;
  body: PyNode | undefined;
}

export function exceptParts(node: PyNode): ExceptParts {
  const named = namedChildren(node);
  const body = named.find((c) => c.type === 'block');
  const head = named.filter((c) => c !== body);
  const first = head[0];
  if (first?.type === 'as_pattern') {
    const alias = lastNamed(first);
    const aliasName = alias ? namesFromTarget(alias)[0]?.text : undefined;
    return { type: firstNamed(first), name: aliasName, body };
  }
  return { type: first, name: head[1]?.type === 'identifier' ? head[1].text : undefined, body };
}

/** `if __name__ == "__main__":` */
export function isMainGuard(node: PyNode): boolean {
  if (node.type !== 'if_statement') return false;
  const condition = firstNamed(node);
  if (!condition) return false;
  const cmp = comparisonParts(unwrapParens(condition));
  if (!cmp || !isName(unwrapParens(cmp.left), '__name__')) return false;
  const first = cmp.pairs[0];
  return first !== undefined && first.op === '==' && stringValue(first.right) === '__main__';
}

export type LineRange = readonly [number, number];

/** Line ranges covered by main-guard blocks anywhere in the tree. */
export function mainGuardRanges(root: PyNode): LineRange[] {
  const ranges: LineRange[] = [];
  for (const node of walk(root)) {
    if (!isMainGuard(node)) continue;
    let last = node.startLine;
    for (const inner of walk(node)) {
      if (inner.type !== 'comment' && inner.startLine > last) last = inner.startLine;
    }
    ranges.push([node.startLine, last]);
  }
  return ranges;
}

export function inRanges(line: number, ranges: readonly LineRange[]): boolean {
  return ranges.some(([start, end]) => line >= start && line <= end);
}
