/**
 * Import statement extraction
 */

import type { FromImport, ImportedName, NakedImport } from '../types/index.js';
import type { SyntaxNode } from '../parser/syntax.js';

function importedName(node: SyntaxNode): ImportedName | null {
  if (node.type === 'dotted_name') {
    return { name: node.text, alias: null };
  }
  if (node.type === 'aliased_import') {
    return {
      name: node.childForFieldName('name')?.text ?? '',
      alias: node.childForFieldName('alias')?.text ?? null,
    };
  }
  return null;
}

/**
 * `import a.b, c as d` gives one NakedImport per module
 */
export function extractImport(node: SyntaxNode): NakedImport[] {
  const imports: NakedImport[] = [];

  for (const child of node.namedChildren) {
    const imported = importedName(child);
    if (imported) {
      imports.push({ kind: 'import', module: imported.name, alias: imported.alias });
    }
  }

  return imports;
}

/**
 * `from ..pkg import a, b as c`, `from . import x`, `from __future__ import y`
 */
export function extractFromImport(node: SyntaxNode): FromImport {
  let module: string | null = null;
  let relative = 0;
  let moduleStart = -1;

  if (node.type === 'future_import_statement') {
    module = '__future__';
  } else {
    const moduleNode = node.childForFieldName('module_name');
    if (moduleNode) {
      moduleStart = moduleNode.startIndex;
      if (moduleNode.type === 'relative_import') {
        const match = moduleNode.text.match(/^(\.+)\s*(.*)$/);
        relative = match?.[1]?.length ?? 0;
        module = match?.[2] || null;
      } else {
        module = moduleNode.text;
      }
    }
  }

  const names: ImportedName[] = [];
  let wildcard = false;

  for (const child of node.namedChildren) {
    // the module name is a dotted_name too
    if (child.startIndex === moduleStart) continue;

    if (child.type === 'wildcard_import') {
      wildcard = true;
      continue;
    }
    const imported = importedName(child);
    if (imported) names.push(imported);
  }

  return { kind: 'from', module, names, relative, wildcard };
}
