/**
 * Declaration model for a scanned Python module
 *
 * Types, defaults and values are kept as the literal source text of the
 * expression. Nothing here is ever evaluated.
 */

export interface ArgDecl {
  name: string;
  type: string | null;
  default: string | null;
}

export interface FunctionDecl {
  kind: 'function';
  name: string;
  args: ArgDecl[];
  /** `*args`, without the star */
  vararg: ArgDecl | null;
  kwonlyargs: ArgDecl[];
  /** `**kwargs`, without the stars */
  kwarg: ArgDecl | null;
  returns: string | null;
  docstring: string | null;
  decorators: string[];
  isAsync: boolean;
}

export interface FieldDecl {
  name: string;
  type: string;
  default: string | null;
  docstring: string | null;
}

export interface ClassDecl {
  kind: 'class';
  name: string;
  bases: string[];
  methods: FunctionDecl[];
  fields: FieldDecl[];
  docstring: string | null;
  decorators: string[];
}

export interface VariableDecl {
  kind: 'variable';
  name: string;
  value: string | null;
  /** Annotation of an annotated module-level assignment */
  type: string | null;
  docstring: string | null;
}

export interface TypeAliasDecl {
  kind: 'alias';
  name: string;
  type: string;
  docstring: string | null;
}

export type Declaration = ClassDecl | FunctionDecl | VariableDecl | TypeAliasDecl;
export type DeclarationKind = Declaration['kind'];

export interface ImportedName {
  name: string;
  alias: string | null;
}

export interface NakedImport {
  kind: 'import';
  module: string;
  alias: string | null;
}

export interface FromImport {
  kind: 'from';
  /** Null for `from . import x` */
  module: string | null;
  names: ImportedName[];
  /** Number of leading dots, 0 for an absolute import */
  relative: number;
  wildcard: boolean;
}

export type ImportDecl = NakedImport | FromImport;

export interface ModuleDecl {
  /** Dotted name, `pkg.__init__` for a package initializer */
  name: string;
  docstring: string | null;
  classes: ClassDecl[];
  functions: FunctionDecl[];
  variables: VariableDecl[];
  aliases: TypeAliasDecl[];
  imports: ImportDecl[];
  /** Names listed in `__all__`; empty when the module declares none */
  allExports: string[];
}

export type ModuleMap = ReadonlyMap<string, ModuleDecl>;

/**
 * Name under which an imported symbol is visible in the importing module
 */
export function localName(imported: ImportedName): string {
  return imported.alias ?? imported.name;
}
