import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';

/**
 * Immutable syntax node detached from the native tree.
 *
 * Ids are assigned in pre-order and are unique within one parse, so rules can
 * key bookkeeping on `id` instead of on wrapper identity.
 */
export interface PyNode {
  readonly id: number;
  readonly type: string;
  readonly isNamed: boolean;
  readonly text: string;
  /** 1-based line of the first character */
  readonly startLine: number;
  /** 1-based line of the last character */
  readonly endLine: number;
  readonly startIndex: number;
  readonly endIndex: number;
  readonly children: readonly PyNode[];
}

export interface SourceTree {
  readonly root: PyNode;
  readonly nodeCount: number;
}

// Grammar productions that only exist for Python 2 source
const LEGACY_ONLY_KINDS = new Set(['print_statement', 'exec_statement']);

let sharedParser: Parser | undefined;

function getParser(): Parser {
  if (!sharedParser) {
    sharedParser = new Parser();
    sharedParser.setLanguage(Python);
  }
  return sharedParser;
}

interface BuildState {
  nextId: number;
  broken: boolean;
}

/** A node whose children are still being collected. */
interface OpenNode {
  readonly id: number;
  readonly type: string;
  readonly isNamed: boolean;
  readonly startIndex: number;
  readonly endIndex: number;
  readonly start: Parser.Point;
  readonly end: Parser.Point;
  readonly children: PyNode[];
}

function openNode(cursor: Parser.TreeCursor, state: BuildState): OpenNode {
  const type = cursor.nodeType;
  if (type === 'ERROR' || LEGACY_ONLY_KINDS.has(type)) {
    state.broken = true;
  }
  return {
    id: state.nextId++,
    type,
    isNamed: cursor.nodeIsNamed,
    startIndex: cursor.startIndex,
    endIndex: cursor.endIndex,
    start: cursor.startPosition,
    end: cursor.endPosition,
    children: [],
  };
}

function closeNode(open: OpenNode, source: string, state: BuildState): PyNode {
  const { id, type, isNamed, startIndex, endIndex, start, end, children } = open;

  // A zero-width leaf is a token the parser inserted to recover from an error
  if (id !== 0 && children.length === 0 && startIndex === endIndex) {
    state.broken = true;
  }

  const startLine = start.row + 1;
  let endLine = end.row + 1;
  if (end.column === 0 && endLine > startLine) {
    endLine -= 1;
  }

  return {
    id,
    type,
    isNamed,
    text: source.slice(startIndex, endIndex),
    startLine,
    endLine,
    startIndex,
    endIndex,
    children,
  };
}

/** Pre-order walk of the cursor, keeping open ancestors on an explicit stack. */
function buildTree(cursor: Parser.TreeCursor, source: string, state: BuildState): PyNode {
  const stack: OpenNode[] = [openNode(cursor, state)];
  let root: PyNode | undefined;

  while (!root) {
    if (cursor.gotoFirstChild()) {
      stack.push(openNode(cursor, state));
      continue;
    }
    let open = stack.pop();
    while (open) {
      const node = closeNode(open, source, state);
      const parent = stack[stack.length - 1];
      if (!parent) {
        root = node;
        break;
      }
      parent.children.push(node);
      if (cursor.gotoNextSibling()) {
        stack.push(openNode(cursor, state));
        break;
      }
      cursor.gotoParent();
      open = stack.pop();
    }
  }
  return root;
}

/**
 * Parse Python source into a detached tree.
 * Returns null when the source does not parse cleanly.
 */
export function parseSource(source: string): SourceTree | null {
  let tree: Parser.Tree;
  try {
    tree = getParser().parse(source, undefined, { bufferSize: Math.max(source.length * 2, 1024) });
  } catch {
    return null;
  }

  const state: BuildState = { nextId: 0, broken: false };
  const root = buildTree(tree.walk(), source, state);
  if (state.broken) {
    return null;
  }
  return { root, nodeCount: state.nextId };
}
