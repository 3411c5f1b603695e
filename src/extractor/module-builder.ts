/**
 * Module builder: one pass over a module's syntax tree, dispatching each
 * statement to the extractor for its node kind. Statements nested in
 * module-level `if`, `try` and `with` blocks count as module scope.
 */

import type {
  ClassDecl,
  Declaration,
  FunctionDecl,
  ImportDecl,
  ModuleDecl,
  TypeAliasDecl,
  VariableDecl,
} from '../types/index.js';
import { localName } from '../types/index.js';
import { statements, type SyntaxNode } from '../parser/syntax.js';
import { extractModuleAssignment, extractTypeAliasStatement } from './assignments.js';
import { extractClass } from './classes.js';
import { extractFunction, isFunctionNode } from './functions.js';
import { extractFromImport, extractImport } from './imports.js';
import { bareString, cleanDocstring, extractDocstring } from './strings.js';

interface ModuleScope {
  classes: ClassDecl[];
  functions: FunctionDecl[];
  variables: VariableDecl[];
  aliases: TypeAliasDecl[];
  imports: ImportDecl[];
  allExports: string[];
  /** Declaration a following string statement documents */
  lastDocumentable: VariableDecl | TypeAliasDecl | null;
}

type StatementHandler = (node: SyntaxNode, scope: ModuleScope) => void;

function addDefinition(definition: SyntaxNode, decorated: SyntaxNode | null, scope: ModuleScope): void {
  if (definition.type === 'class_definition') {
    const cls = extractClass(definition, decorated);
    if (cls) scope.classes.push(cls);
  } else if (isFunctionNode(definition)) {
    const fn = extractFunction(definition, decorated);
    if (fn) scope.functions.push(fn);
  }
}

function addAssignment(node: SyntaxNode, scope: ModuleScope): void {
  const result = extractModuleAssignment(node);

  switch (result.kind) {
    case 'exports':
      scope.allExports = result.extend ? [...scope.allExports, ...result.names] : result.names;
      break;
    case 'variable':
      scope.variables.push(result.decl);
      scope.lastDocumentable = result.decl;
      break;
    case 'alias':
      scope.aliases.push(result.decl);
      scope.lastDocumentable = result.decl;
      break;
    case 'none':
      break;
  }

  // `a = b = value` binds every target in the chain
  const right = node.childForFieldName('right');
  if (node.type === 'assignment' && right?.type === 'assignment') {
    addAssignment(right, scope);
  }
}

/** Clauses of `if` and `try` statements that carry a block */
const BLOCK_CLAUSES = new Set(['elif_clause', 'else_clause', 'except_clause', 'except_group_clause', 'finally_clause']);

function visitBlocks(node: SyntaxNode, scope: ModuleScope): void {
  for (const child of node.namedChildren) {
    if (child.type === 'block') {
      visitStatements(statements(child), scope);
    } else if (BLOCK_CLAUSES.has(child.type)) {
      visitBlocks(child, scope);
    }
  }
  // a string after the whole statement documents nothing inside it
  scope.lastDocumentable = null;
}

const statementHandlers: Record<string, StatementHandler> = {
  class_definition: (node, scope) => addDefinition(node, null, scope),
  function_definition: (node, scope) => addDefinition(node, null, scope),
  async_function_definition: (node, scope) => addDefinition(node, null, scope),
  decorated_definition: (node, scope) => {
    const definition = node.childForFieldName('definition');
    if (definition) addDefinition(definition, node, scope);
  },
  expression_statement: (node, scope) => {
    const docstring = bareString(node);
    if (docstring !== null) {
      if (scope.lastDocumentable) scope.lastDocumentable.docstring = cleanDocstring(docstring) || null;
      return;
    }

    const expr = node.namedChildren[0];
    if (expr && (expr.type === 'assignment' || expr.type === 'augmented_assignment')) {
      addAssignment(expr, scope);
    }
  },
  type_alias_statement: (node, scope) => {
    const alias = extractTypeAliasStatement(node);
    if (alias) {
      scope.aliases.push(alias);
      scope.lastDocumentable = alias;
    }
  },
  import_statement: (node, scope) => {
    scope.imports.push(...extractImport(node));
  },
  import_from_statement: (node, scope) => {
    scope.imports.push(extractFromImport(node));
  },
  future_import_statement: (node, scope) => {
    scope.imports.push(extractFromImport(node));
  },
  if_statement: visitBlocks,
  try_statement: visitBlocks,
  with_statement: visitBlocks,
};

function visitStatements(nodes: SyntaxNode[], scope: ModuleScope): void {
  for (const stmt of nodes) {
    const previous = scope.lastDocumentable;
    // unknown statement kinds are skipped
    statementHandlers[stmt.type]?.(stmt, scope);
    if (scope.lastDocumentable === previous) scope.lastDocumentable = null;
  }
}

/**
 * Build the declaration model of one module from its `module` node.
 * Re-exports are left unresolved.
 */
export function buildModule(root: SyntaxNode, moduleName: string): ModuleDecl {
  const docstring = extractDocstring(root);
  const scope: ModuleScope = {
    classes: [],
    functions: [],
    variables: [],
    aliases: [],
    imports: [],
    allExports: [],
    lastDocumentable: null,
  };

  visitStatements(statements(root).slice(docstring === null ? 0 : 1), scope);

  return {
    name: moduleName,
    docstring,
    classes: scope.classes,
    functions: scope.functions,
    variables: scope.variables,
    aliases: scope.aliases,
    imports: scope.imports,
    allExports: scope.allExports,
  };
}

/**
 * Declaration made directly in the module body
 */
export function findDeclaration(module: ModuleDecl, name: string): Declaration | null {
  return (
    module.classes.find(c => c.name === name) ??
    module.functions.find(f => f.name === name) ??
    module.variables.find(v => v.name === name) ??
    module.aliases.find(a => a.name === name) ??
    null
  );
}

/**
 * Declaration or import that binds `name` in the module
 */
export function resolveExport(module: ModuleDecl, name: string): Declaration | ImportDecl | null {
  const declaration = findDeclaration(module, name);
  if (declaration) return declaration;

  return module.imports.find(imp => importBinds(imp, name)) ?? null;
}

export type ImportTarget =
  | { kind: 'symbol'; module: string; name: string }
  | { kind: 'module'; module: string };

function importBinds(imp: ImportDecl, name: string): boolean {
  if (imp.kind === 'from') {
    return imp.names.some(n => localName(n) === name);
  }
  return name === (imp.alias ?? imp.module.split('.')[0]);
}

/**
 * Absolute name of the module a from-import reads from. Relative levels
 * count from the importing module, so `.x` in `pkg.__init__` and in
 * `pkg.a` both mean `pkg.x`.
 */
export function importSource(importer: string, imp: ImportDecl): string {
  if (imp.kind === 'import' || imp.relative === 0) {
    return imp.module ?? '';
  }

  const parts = importer.split('.').slice(0, -imp.relative);
  if (imp.module) parts.push(imp.module);
  return parts.join('.');
}

/**
 * Where an imported name comes from: the source module and the name it
 * has there, or the module object for a plain import
 */
export function resolveImport(module: ModuleDecl, name: string): ImportTarget | null {
  for (const imp of module.imports) {
    if (!importBinds(imp, name)) continue;

    if (imp.kind === 'import') {
      return { kind: 'module', module: imp.alias ? imp.module : name };
    }

    const imported = imp.names.find(n => localName(n) === name);
    if (imported) {
      return { kind: 'symbol', module: importSource(module.name, imp), name: imported.name };
    }
  }
  return null;
}
