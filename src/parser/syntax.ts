/**
 * Structural view of a tree-sitter node, as far as the extractors use it
 */

export interface SyntaxNode {
  type: string;
  text: string;
  startIndex: number;
  startPosition: { row: number; column: number };
  endPosition: { row: number; column: number };
  /** Zero-width token the parser inserted to recover */
  isMissing: boolean;
  hasError: boolean;
  children: SyntaxNode[];
  namedChildren: SyntaxNode[];
  childForFieldName(name: string): SyntaxNode | null;
}

/**
 * Named children that are statements, i.e. without interleaved comments
 */
export function statements(node: SyntaxNode): SyntaxNode[] {
  return node.namedChildren.filter(child => child.type !== 'comment');
}

/**
 * First ERROR or MISSING node of a tree in document order
 */
export function findErrorNode(node: SyntaxNode): SyntaxNode | null {
  if (node.type === 'ERROR' || node.isMissing) return node;
  if (!node.hasError) return null;

  for (const child of node.children) {
    const found = findErrorNode(child);
    if (found) return found;
  }
  return node;
}

/**
 * Source text with line breaks and their surrounding indentation folded
 * into single spaces
 */
export function oneLine(text: string): string {
  return text.replace(/\s*\n\s*/g, ' ').trim();
}
