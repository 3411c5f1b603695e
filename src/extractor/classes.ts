/**
 * Class extraction
 */

import type { ClassDecl, FieldDecl, FunctionDecl } from '../types/index.js';
import { statements, type SyntaxNode } from '../parser/syntax.js';
import { extractClassField } from './assignments.js';
import { decoratorNames, extractFunction, isFunctionNode } from './functions.js';
import { bareString, cleanDocstring, extractDocstring } from './strings.js';

interface ClassScope {
  methods: FunctionDecl[];
  fields: FieldDecl[];
  /** Field a following string statement documents */
  lastField: FieldDecl | null;
}

type ClassBodyHandler = (node: SyntaxNode, scope: ClassScope) => void;

function addMethod(node: SyntaxNode, decorated: SyntaxNode | null, scope: ClassScope): void {
  const method = extractFunction(node, decorated);
  if (method) scope.methods.push(method);
}

const classBodyHandlers: Record<string, ClassBodyHandler> = {
  function_definition: (node, scope) => addMethod(node, null, scope),
  async_function_definition: (node, scope) => addMethod(node, null, scope),
  decorated_definition: (node, scope) => {
    const definition = node.childForFieldName('definition');
    if (definition && isFunctionNode(definition)) {
      addMethod(definition, node, scope);
    }
  },
  expression_statement: (node, scope) => {
    const docstring = bareString(node);
    if (docstring !== null) {
      if (scope.lastField) scope.lastField.docstring = cleanDocstring(docstring) || null;
      return;
    }

    const expr = node.namedChildren[0];
    const field = expr ? extractClassField(expr) : null;
    if (field) {
      scope.fields.push(field);
      scope.lastField = field;
    }
  },
};

/**
 * Base class expressions as written, keyword arguments such as
 * `metaclass=` excluded
 */
function extractBases(node: SyntaxNode): string[] {
  const superclasses = node.childForFieldName('superclasses');
  if (!superclasses) return [];

  return superclasses.namedChildren
    .filter(arg => arg.type !== 'keyword_argument' && arg.type !== 'comment')
    .map(arg => arg.text);
}

/**
 * Build a ClassDecl from a `class_definition` node
 */
export function extractClass(node: SyntaxNode, decorated: SyntaxNode | null = null): ClassDecl | null {
  const name = node.childForFieldName('name')?.text;
  if (!name) return null;

  const body = node.childForFieldName('body');
  const docstring = extractDocstring(body);
  const scope: ClassScope = { methods: [], fields: [], lastField: null };

  // the docstring is the first statement; skip it so it documents no field
  const members = body ? statements(body).slice(docstring === null ? 0 : 1) : [];
  for (const stmt of members) {
    const lastField = scope.lastField;
    classBodyHandlers[stmt.type]?.(stmt, scope);
    if (scope.lastField === lastField) scope.lastField = null;
  }

  return {
    kind: 'class',
    name,
    bases: extractBases(node),
    methods: scope.methods,
    fields: scope.fields,
    docstring,
    decorators: decoratorNames(decorated),
  };
}
