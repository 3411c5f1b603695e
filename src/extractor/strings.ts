/**
 * String literals and docstrings
 */

import { statements, type SyntaxNode } from '../parser/syntax.js';

const STRING_LITERAL = /^([rRuUbBfF]*)("""|'''|"|')([\s\S]*)\2$/;

const ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '\\': '\\',
  "'": "'",
  '"': '"',
  '\n': '',
};

/**
 * Value of a single string literal, quotes and prefix removed.
 * Returns null for anything that is not a plain string token.
 */
export function stringValue(node: SyntaxNode): string | null {
  if (node.type === 'concatenated_string') {
    const parts = node.namedChildren.map(stringValue);
    return parts.every(p => p !== null) ? parts.join('') : null;
  }
  if (node.type !== 'string') return null;

  const match = node.text.match(STRING_LITERAL);
  if (!match) return null;

  const prefix = (match[1] ?? '').toLowerCase();
  const body = match[3] ?? '';
  if (prefix.includes('r')) return body;

  return body.replace(/\\([ntr\\'"\n])/g, (_, ch: string) => ESCAPES[ch] ?? ch);
}

/**
 * Strip the indentation a docstring inherits from its position in the
 * source, along with leading and trailing blank lines.
 */
export function cleanDocstring(raw: string): string {
  const lines = raw.replace(/\t/g, '        ').split('\n');

  let margin = Infinity;
  for (const line of lines.slice(1)) {
    const content = line.trimStart();
    if (content) {
      margin = Math.min(margin, line.length - content.length);
    }
  }

  const cleaned = lines.map((line, i) => {
    if (i === 0) return line.trim();
    return (margin === Infinity ? line : line.slice(margin)).trimEnd();
  });

  while (cleaned.length > 0 && cleaned[0] === '') cleaned.shift();
  while (cleaned.length > 0 && cleaned[cleaned.length - 1] === '') cleaned.pop();

  return cleaned.join('\n');
}

/**
 * f-strings and bytes never document anything
 */
function isTextLiteral(node: SyntaxNode): boolean {
  if (node.type === 'concatenated_string') return node.namedChildren.every(isTextLiteral);
  return /^[rRuU]*["']/.test(node.text);
}

/**
 * String expression of a statement, if the statement is nothing else
 */
export function bareString(statement: SyntaxNode): string | null {
  if (statement.type !== 'expression_statement') return null;

  const exprs = statement.namedChildren;
  const expr = exprs[0];
  if (exprs.length !== 1 || !expr || !isTextLiteral(expr)) return null;

  return stringValue(expr);
}

/**
 * Docstring of a module, class or function body: its first statement, when
 * that is a bare string literal
 */
export function extractDocstring(body: SyntaxNode | null): string | null {
  if (!body) return null;

  const first = statements(body)[0];
  if (!first) return null;

  const value = bareString(first);
  if (value === null) return null;

  const cleaned = cleanDocstring(value);
  return cleaned || null;
}
