/**
 * Parser exports
 */

export { PythonParser, getDefaultParser, resetParser } from './python.js';
export { statements, findErrorNode, oneLine, type SyntaxNode } from './syntax.js';
