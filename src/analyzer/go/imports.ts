import { lastPathSegment } from '../registry.js';
import type { ImportTable } from '../types.js';
import { GoNodes, getChildrenOfType, type SyntaxNode } from './syntax.js';

/** Map every import alias of a parsed file to its import path */
export function buildImportTable(root: SyntaxNode, filePath: string): ImportTable {
  const table: ImportTable = { filePath, aliases: new Map(), dotImports: [] };

  for (const decl of getChildrenOfType(root, GoNodes.IMPORT_DECLARATION)) {
    const specList = decl.children.find((c) => c.type === GoNodes.IMPORT_SPEC_LIST);
    const specs = specList
      ? getChildrenOfType(specList, GoNodes.IMPORT_SPEC)
      : getChildrenOfType(decl, GoNodes.IMPORT_SPEC);

    for (const spec of specs) {
      addImportSpec(table, spec);
    }
  }

  return table;
}

function addImportSpec(table: ImportTable, spec: SyntaxNode): void {
  const pathNode = spec.childForFieldName('path');
  if (!pathNode) return;
  const importPath = unquote(pathNode.text);

  const nameNode = spec.childForFieldName('name');
  const alias = nameNode ? nameNode.text : lastPathSegment(importPath);

  if (alias === '_') return;
  if (alias === '.') {
    table.dotImports.push(importPath);
    return;
  }
  table.aliases.set(alias, importPath);
}

/** Strip the quotes of an interpreted or raw string literal */
function unquote(literal: string): string {
  if (literal.length >= 2 && (literal[0] === '"' || literal[0] === '`')) {
    return literal.slice(1, -1);
  }
  return literal;
}
