import type { PyNode } from './tree-adapter';
import { childOfType, firstNamed, lastNamed, namedChildren } from './syntax';

export const IMPORT_KINDS: ReadonlySet<string> = new Set([
  'import_statement',
  'import_from_statement',
  'future_import_statement',
]);

export interface ImportedName {
  /** Dotted path as written, e.g. "os.path" */
  readonly name: string;
  readonly alias: string | undefined;
}

export interface ImportParts {
  readonly kind: 'import' | 'from';
  /** Source module of a from-import without its leading dots; null for `from . import x` */
  readonly module: string | null;
  /** Number of leading dots of a relative from-import */
  readonly level: number;
  readonly names: readonly ImportedName[];
  readonly wildcard: boolean;
}

function dottedText(node: PyNode): string {
  if (node.type !== 'dotted_name') return node.text;
  return namedChildren(node)
    .map((part) => part.text)
    .join('.');
}

function importedName(node: PyNode): ImportedName | null {
  if (node.type === 'dotted_name') return { name: dottedText(node), alias: undefined };
  if (node.type !== 'aliased_import') return null;
  const name = firstNamed(node);
  const alias = lastNamed(node);
  if (!name || !alias || name === alias) return null;
  return { name: dottedText(name), alias: alias.text };
}

/** Names listed after the `import` keyword. */
function namesAfterImportKeyword(node: PyNode): ImportedName[] {
  const names: ImportedName[] = [];
  let seen = false;
  for (const child of node.children) {
    if (!child.isNamed && child.type === 'import') {
      seen = true;
      continue;
    }
    if (!seen) continue;
    const imported = importedName(child);
    if (imported) names.push(imported);
  }
  return names;
}

export function importParts(node: PyNode): ImportParts | null {
  switch (node.type) {
    case 'import_statement':
      return { kind: 'import', module: null, level: 0, names: namesAfterImportKeyword(node), wildcard: false };
    case 'future_import_statement':
      return { kind: 'from', module: '__future__', level: 0, names: namesAfterImportKeyword(node), wildcard: false };
    case 'import_from_statement': {
      const source = firstNamed(node);
      if (!source) return null;
      let module: string | null = null;
      let level = 0;
      if (source.type === 'relative_import') {
        level = (childOfType(source, 'import_prefix')?.text ?? '').replace(/[^.]/g, '').length;
        const dotted = childOfType(source, 'dotted_name');
        module = dotted ? dottedText(dotted) : null;
      } else {
        module = dottedText(source);
      }
      return {
        kind: 'from',
        module,
        level,
        names: namesAfterImportKeyword(node),
        wildcard: childOfType(node, 'wildcard_import') !== undefined,
      };
    }
    default:
      return null;
  }
}

/** Local name an import introduces: `import a.b` binds "a", `from m import x as y` binds "y". */
export function bindingName(parts: ImportParts, imported: ImportedName): string {
  if (imported.alias) return imported.alias;
  return parts.kind === 'import' ? (imported.name.split('.')[0] ?? imported.name) : imported.name;
}

/** Every local name bound by an import statement. */
export function importBindings(node: PyNode): string[] {
  const parts = importParts(node);
  if (!parts) return [];
  return parts.names.map((imported) => bindingName(parts, imported));
}
