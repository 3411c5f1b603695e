/**
 * Assignment extraction: module variables, type aliases, class fields and
 * the `__all__` export list
 */

import type { FieldDecl, TypeAliasDecl, VariableDecl } from '../types/index.js';
import type { SyntaxNode } from '../parser/syntax.js';
import { stringValue } from './strings.js';

export const EXPORT_LIST_NAME = '__all__';

const SEQUENCE_NODES = new Set(['list', 'tuple', 'expression_list', 'parenthesized_expression']);
const TYPE_ALIAS_ANNOTATIONS = new Set(['TypeAlias', 'typing.TypeAlias', 'typing_extensions.TypeAlias']);

export type AssignmentResult =
  | { kind: 'variable'; decl: VariableDecl }
  | { kind: 'alias'; decl: TypeAliasDecl }
  | { kind: 'exports'; names: string[]; extend: boolean }
  | { kind: 'none' };

/**
 * Right-hand side of `a = b = value` is the innermost value
 */
function assignedValue(node: SyntaxNode): SyntaxNode | null {
  let right = node.childForFieldName('right');
  while (right?.type === 'assignment') {
    right = right.childForFieldName('right');
  }
  return right;
}

/**
 * String names of a list or tuple literal. Null when the value is anything
 * else, or holds anything but plain strings.
 */
export function exportNames(value: SyntaxNode | null): string[] | null {
  if (!value || !SEQUENCE_NODES.has(value.type)) return null;

  const names: string[] = [];
  for (const item of value.namedChildren) {
    if (item.type === 'comment') continue;
    if (SEQUENCE_NODES.has(item.type)) {
      const nested = exportNames(item);
      if (!nested) return null;
      names.push(...nested);
      continue;
    }
    const name = stringValue(item);
    if (name === null) return null;
    names.push(name);
  }
  return names;
}

/**
 * Classify an `assignment` or `augmented_assignment` at module scope
 */
export function extractModuleAssignment(node: SyntaxNode): AssignmentResult {
  const left = node.childForFieldName('left');
  // tuple unpacking and attribute targets declare nothing
  if (!left || left.type !== 'identifier') return { kind: 'none' };

  const name = left.text;
  const value = assignedValue(node);

  if (name === EXPORT_LIST_NAME) {
    if (node.type === 'augmented_assignment' && node.childForFieldName('operator')?.text !== '+=') {
      return { kind: 'none' };
    }
    const names = exportNames(value);
    // a computed __all__ cannot be read without running the module
    if (!names) return { kind: 'none' };
    return { kind: 'exports', names, extend: node.type === 'augmented_assignment' };
  }

  if (node.type === 'augmented_assignment') return { kind: 'none' };

  const type = node.childForFieldName('type')?.text ?? null;
  if (type && TYPE_ALIAS_ANNOTATIONS.has(type) && value) {
    return { kind: 'alias', decl: { kind: 'alias', name, type: value.text, docstring: null } };
  }

  if (!value && !type) return { kind: 'none' };

  return {
    kind: 'variable',
    decl: { kind: 'variable', name, value: value?.text ?? null, type, docstring: null },
  };
}

/**
 * PEP 695 `type Name = ...`
 */
export function extractTypeAliasStatement(node: SyntaxNode): TypeAliasDecl | null {
  const left = node.childForFieldName('left');
  const right = node.childForFieldName('right');
  if (!left || !right) return null;

  return { kind: 'alias', name: left.text, type: right.text, docstring: null };
}

/**
 * Annotated assignment in a class body; unannotated ones are not fields
 */
export function extractClassField(node: SyntaxNode): FieldDecl | null {
  if (node.type !== 'assignment') return null;

  const left = node.childForFieldName('left');
  const type = node.childForFieldName('type');
  if (!left || left.type !== 'identifier' || !type) return null;

  return {
    name: left.text,
    type: type.text,
    default: assignedValue(node)?.text ?? null,
    docstring: null,
  };
}
