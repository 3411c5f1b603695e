/**
 * Python parser using tree-sitter
 */

import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';

import { SourceParseError } from '../types/index.js';
import { findErrorNode, type SyntaxNode } from './syntax.js';

export class PythonParser {
  private parser: Parser;

  constructor() {
    this.parser = new Parser();
    this.parser.setLanguage(Python as unknown as Parser.Language);
  }

  get extensions(): string[] {
    return ['py', 'pyi'];
  }

  canParse(filePath: string): boolean {
    const ext = filePath.split('.').pop()?.toLowerCase() ?? '';
    return this.extensions.includes(ext);
  }

  /**
   * Parse source text into the root `module` node.
   *
   * Throws SourceParseError when the grammar could not make sense of the
   * text; a tree holding ERROR or MISSING nodes is never handed to the extractors.
   */
  parseSource(content: string): SyntaxNode {
    let root: SyntaxNode;
    try {
      const tree = this.parser.parse(content);
      root = tree.rootNode as unknown as SyntaxNode;
    } catch (error) {
      throw new SourceParseError(error instanceof Error ? error.message : String(error));
    }

    const errorNode = findErrorNode(root);
    if (errorNode) {
      const line = errorNode.startPosition.row + 1;
      const column = errorNode.startPosition.column + 1;
      throw new SourceParseError(`Syntax error at line ${line}, column ${column}`, line, column);
    }

    return root;
  }
}

// Shared parser instance; creating one loads the native grammar
let defaultParser: PythonParser | null = null;

export function getDefaultParser(): PythonParser {
  if (!defaultParser) {
    defaultParser = new PythonParser();
  }
  return defaultParser;
}

export function resetParser(): void {
  defaultParser = null;
}
