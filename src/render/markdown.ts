/**
 * Markdown rendering of a resolved module
 *
 * Output depends only on the module model and its resolved exports, so
 * rendering the same view twice yields identical text.
 */

import type {
  ArgDecl,
  ClassDecl,
  Declaration,
  FieldDecl,
  FunctionDecl,
  ImportDecl,
  TypeAliasDecl,
  VariableDecl,
} from '../types/index.js';
import type { ResolvedExport, ResolvedModule } from '../resolver/index.js';
import { parseDocstring, parseSignature, toSignature, type DocAttribute, type Signature } from '../docstrings/index.js';
import { oneLine } from '../parser/syntax.js';
import { displayName } from '../generator/paths.js';

export interface RenderOptions {
  /** Render underscore-prefixed names too */
  includePrivate?: boolean;
}

/** Signatures wider than this are broken one parameter per line */
export const MAX_SIGNATURE_WIDTH = 80;

const BODY_OPEN = '<div style="padding-left: 20px;">';
const BODY_CLOSE = '</div>';

/** Dunder methods listed alongside public ones */
const VISIBLE_DUNDERS = new Set(['__init__', '__call__']);

type ReexportedExport = Extract<ResolvedExport, { status: 'reexported' }>;

/**
 * A declaration placed in a module's document; `origin` is set when it was
 * pulled in from another module
 */
interface Placed<D extends Declaration> {
  decl: D;
  origin: string | null;
  exportedAs: string;
}

// ============================================================================
// Text helpers
// ============================================================================

/**
 * Inline code span; text holding a backtick gets a double-backtick fence
 */
export function inlineCode(text: string): string {
  const flat = oneLine(text);
  return flat.includes('`') ? `\`\` ${flat} \`\`` : `\`${flat}\``;
}

function isVisibleName(name: string, options: RenderOptions): boolean {
  return options.includePrivate === true || !name.startsWith('_');
}

function isVisibleMethod(name: string, options: RenderOptions): boolean {
  return isVisibleName(name, options) || VISIBLE_DUNDERS.has(name);
}

function formatArg(arg: ArgDecl): string {
  const type = arg.type ? `: ${oneLine(arg.type)}` : '';
  if (!arg.default) return `${arg.name}${type}`;
  return arg.type ? `${arg.name}${type} = ${oneLine(arg.default)}` : `${arg.name}=${oneLine(arg.default)}`;
}

function originNote(placed: Placed<Declaration>): string | null {
  if (!placed.origin) return null;
  const source = inlineCode(`${placed.origin}.${placed.decl.name}`);
  return placed.exportedAs === placed.decl.name
    ? `_Re-exported from ${source}._`
    : `_Re-exported from ${source} as ${inlineCode(placed.exportedAs)}._`;
}

// ============================================================================
// Functions and methods
// ============================================================================

/**
 * Positional parameters shown in the signature; a method's bound first
 * parameter is dropped
 */
function shownArgs(fn: FunctionDecl, isMethod: boolean): ArgDecl[] {
  const first = fn.args[0];
  if (
    isMethod &&
    first &&
    (first.name === 'self' || first.name === 'cls') &&
    !fn.decorators.includes('staticmethod')
  ) {
    return fn.args.slice(1);
  }
  return fn.args;
}

export function renderSignature(fn: FunctionDecl, isMethod = false): string {
  const params = shownArgs(fn, isMethod).map(formatArg);
  if (fn.vararg) {
    params.push(`*${formatArg(fn.vararg)}`);
  } else if (fn.kwonlyargs.length > 0) {
    params.push('*');
  }
  params.push(...fn.kwonlyargs.map(formatArg));
  if (fn.kwarg) params.push(`**${formatArg(fn.kwarg)}`);

  const returns = fn.returns ? ` -> ${oneLine(fn.returns)}` : '';
  const head = fn.isAsync ? `async ${fn.name}` : fn.name;
  let line = `${head}(${params.join(', ')})${returns}`;
  if (line.length > MAX_SIGNATURE_WIDTH && params.length > 0) {
    line = `${head}(\n    ${params.join(',\n    ')},\n)${returns}`;
  }
  return ['```python', line, '```'].join('\n');
}

function renderArguments(fn: FunctionDecl, isMethod: boolean, signatures: Signature[]): string | null {
  const documented: Array<{ arg: ArgDecl; label: string }> = [
    ...shownArgs(fn, isMethod).map(arg => ({ arg, label: arg.name })),
    ...(fn.vararg ? [{ arg: fn.vararg, label: `*${fn.vararg.name}` }] : []),
    ...fn.kwonlyargs.map(arg => ({ arg, label: arg.name })),
    ...(fn.kwarg ? [{ arg: fn.kwarg, label: `**${fn.kwarg.name}` }] : []),
  ];
  if (documented.length === 0) return null;

  const items = documented.map(({ arg, label }) => {
    const doc = signatures.map(s => s.args.get(arg.name)).find(d => d !== undefined);
    const type = arg.type ?? doc?.type ?? null;
    const defaultValue = arg.default ?? doc?.default ?? null;

    let item = `- ${inlineCode(type ? `${label} (${type})` : label)}`;
    if (doc?.description) item += `: ${doc.description}`;
    if (defaultValue) item += ` (default: ${inlineCode(defaultValue)})`;
    return item;
  });
  return `**Arguments**:\n\n${items.join('\n')}`;
}

function renderReturns(fn: FunctionDecl, signature: Signature): string | null {
  const type = fn.returns ?? signature.returns?.type ?? null;
  const description = signature.returns?.description ?? '';
  if (!type && !description) return null;

  const parts = [type ? inlineCode(type) : '', description].filter(part => part !== '');
  return `**Returns**: ${parts.join(' - ')}`;
}

function renderRaises(signature: Signature): string | null {
  if (signature.raises.length === 0) return null;
  const items = signature.raises.map(r =>
    r.description ? `- ${inlineCode(r.type)}: ${r.description}` : `- ${inlineCode(r.type)}`
  );
  return `**Raises**:\n\n${items.join('\n')}`;
}

/**
 * @param extra - a second docstring consulted for argument descriptions,
 *   used for `__init__` with the class docstring
 */
export function renderFunction(
  fn: FunctionDecl,
  options: { isMethod?: boolean; extra?: Signature; note?: string | null } = {}
): string {
  const isMethod = options.isMethod ?? false;
  const signature = parseSignature(fn.docstring);
  const lookups = options.extra ? [signature, options.extra] : [signature];

  const sections: Array<string | null> = [
    renderSignature(fn, isMethod),
    BODY_OPEN,
    options.note ?? null,
    renderArguments(fn, isMethod, lookups),
    renderReturns(fn, signature),
    renderRaises(signature),
    signature.docstring || null,
    BODY_CLOSE,
  ];
  return sections.filter((s): s is string => s !== null).join('\n\n');
}

// ============================================================================
// Classes
// ============================================================================

function renderField(field: FieldDecl, attribute: DocAttribute | undefined): string {
  let item = `- ${inlineCode(field.name)}: ${inlineCode(field.type)}`;
  if (field.default) item += ` = ${inlineCode(field.default)}`;
  const description = field.docstring ?? attribute?.description ?? '';
  if (description) item += ` - ${oneLine(description)}`;
  return item;
}

function renderDocumentedAttribute(attribute: DocAttribute): string {
  let item = `- ${inlineCode(attribute.name)}`;
  if (attribute.type) item += `: ${inlineCode(attribute.type)}`;
  if (attribute.description) item += ` - ${attribute.description}`;
  return item;
}

export function renderClass(cls: ClassDecl, options: RenderOptions & { note?: string | null } = {}): string {
  const parsed = parseDocstring(cls.docstring ?? '');
  const classSignature = toSignature(parsed);
  const heading = cls.bases.length > 0 ? `class ${cls.name}(${cls.bases.join(', ')})` : `class ${cls.name}`;

  const sections: string[] = [`### ${inlineCode(heading)}`, BODY_OPEN];
  if (options.note) sections.push(options.note);
  if (classSignature.docstring) sections.push(classSignature.docstring);

  const attributes = new Map(parsed.attributes.map(a => [a.name, a]));
  const fields = cls.fields.filter(f => isVisibleName(f.name, options));
  const declared = new Set(cls.fields.map(f => f.name));
  const fieldItems = [
    ...fields.map(f => renderField(f, attributes.get(f.name))),
    ...parsed.attributes
      .filter(a => !declared.has(a.name) && isVisibleName(a.name, options))
      .map(renderDocumentedAttribute),
  ];
  if (fieldItems.length > 0) {
    sections.push(`#### Fields\n\n${fieldItems.join('\n')}`);
  }

  const methods = cls.methods.filter(m => isVisibleMethod(m.name, options));
  if (methods.length > 0) {
    sections.push('#### Methods');
    for (const method of methods) {
      sections.push(
        renderFunction(method, {
          isMethod: true,
          extra: method.name === '__init__' ? classSignature : undefined,
        })
      );
    }
  }

  sections.push(BODY_CLOSE);
  return sections.join('\n\n');
}

// ============================================================================
// Variables, aliases, imports
// ============================================================================

export function renderVariable(variable: VariableDecl): string {
  let item = `- ${inlineCode(variable.name)}`;
  if (variable.type) item += `: ${inlineCode(variable.type)}`;
  if (variable.value) item += ` = ${inlineCode(variable.value)}`;
  if (variable.docstring) item += ` - ${oneLine(variable.docstring)}`;
  return item;
}

export function renderAlias(alias: TypeAliasDecl): string {
  let item = `- ${inlineCode(`type ${alias.name} = ${alias.type}`)}`;
  if (alias.docstring) item += ` - ${oneLine(alias.docstring)}`;
  return item;
}

export function importText(imp: ImportDecl): string {
  if (imp.kind === 'import') {
    return imp.alias ? `import ${imp.module} as ${imp.alias}` : `import ${imp.module}`;
  }
  const source = `${'.'.repeat(imp.relative)}${imp.module ?? ''}`;
  const names = imp.wildcard
    ? '*'
    : imp.names.map(n => (n.alias ? `${n.name} as ${n.alias}` : n.name)).join(', ');
  return `from ${source} import ${names}`;
}

function renderPlaced(placed: Placed<Declaration>, options: RenderOptions): string {
  const note = originNote(placed);
  const { decl } = placed;
  switch (decl.kind) {
    case 'class':
      return renderClass(decl, { ...options, note });
    case 'function':
      return renderFunction(decl, { note });
    case 'variable':
      return note ? `${renderVariable(decl)} ${note}` : renderVariable(decl);
    case 'alias':
      return note ? `${renderAlias(decl)} ${note}` : renderAlias(decl);
  }
}

// ============================================================================
// Module
// ============================================================================

function place<D extends Declaration>(
  own: D[],
  reexported: ReexportedExport[],
  isKind: (decl: Declaration) => decl is D,
  options: RenderOptions
): Array<Placed<D>> {
  const local = own
    .filter(decl => isVisibleName(decl.name, options))
    .map(decl => ({ decl, origin: null, exportedAs: decl.name }));
  const inlined = reexported.flatMap(entry => {
    const decl = entry.declaration;
    return isKind(decl) ? [{ decl, origin: entry.origin, exportedAs: entry.name }] : [];
  });
  return [...local, ...inlined];
}

const isClass = (decl: Declaration): decl is ClassDecl => decl.kind === 'class';
const isFunction = (decl: Declaration): decl is FunctionDecl => decl.kind === 'function';
const isVariable = (decl: Declaration): decl is VariableDecl => decl.kind === 'variable';
const isAlias = (decl: Declaration): decl is TypeAliasDecl => decl.kind === 'alias';

function unresolvedItem(entry: Extract<ResolvedExport, { status: 'unresolved' }>): string {
  const reason = entry.reason === 'cycle' ? 'cyclic re-export' : 'unresolved';
  return `- ${inlineCode(entry.name)} _(${reason})_`;
}

/**
 * Render one module document
 *
 * Sections appear in a fixed order and are omitted when empty: docstring,
 * Classes, Functions, Variables, Type Aliases, Imports, then exports that
 * could not be traced.
 */
export function renderModule(view: ResolvedModule, options: RenderOptions = {}): string {
  const { module } = view;
  const reexported = view.exports.filter((e): e is ReexportedExport => e.status === 'reexported');

  const title = module.name.endsWith('.__init__') || module.name === '__init__'
    ? `# package ${inlineCode(displayName(module.name))}`
    : `# module ${inlineCode(module.name)}`;
  const sections: string[] = [title];
  if (module.docstring) sections.push(module.docstring);

  const block = (heading: string, items: string[], separator: string): void => {
    if (items.length > 0) sections.push(`## ${heading}`, items.join(separator));
  };

  const render = (placed: Placed<Declaration>): string => renderPlaced(placed, options);
  block('Classes', place(module.classes, reexported, isClass, options).map(render), '\n\n');
  block('Functions', place(module.functions, reexported, isFunction, options).map(render), '\n\n');
  block('Variables', place(module.variables, reexported, isVariable, options).map(render), '\n');
  block('Type Aliases', place(module.aliases, reexported, isAlias, options).map(render), '\n');
  block('Imports', module.imports.map(imp => `- ${inlineCode(importText(imp))}`), '\n');
  block(
    'Unresolved Exports',
    view.exports.flatMap(e => (e.status === 'unresolved' ? [unresolvedItem(e)] : [])),
    '\n'
  );

  return `${sections.join('\n\n')}\n`;
}
