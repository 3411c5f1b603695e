/**
 * Function and method extraction
 */

import type { ArgDecl, FunctionDecl } from '../types/index.js';
import type { SyntaxNode } from '../parser/syntax.js';
import { extractDocstring } from './strings.js';

interface ParameterState {
  args: ArgDecl[];
  kwonlyargs: ArgDecl[];
  vararg: ArgDecl | null;
  kwarg: ArgDecl | null;
  keywordOnly: boolean;
}

type ParameterHandler = (param: SyntaxNode, state: ParameterState) => void;

function fieldText(node: SyntaxNode, field: string): string | null {
  return node.childForFieldName(field)?.text ?? null;
}

function pushArg(state: ParameterState, arg: ArgDecl): void {
  (state.keywordOnly ? state.kwonlyargs : state.args).push(arg);
}

/**
 * `*args` / `**kwargs`, bare or annotated
 */
function splat(pattern: SyntaxNode, type: string | null, state: ParameterState): void {
  const arg: ArgDecl = { name: pattern.namedChildren[0]?.text ?? '', type, default: null };

  if (pattern.type === 'list_splat_pattern') {
    state.vararg = arg;
    state.keywordOnly = true;
  } else {
    state.kwarg = arg;
  }
}

const parameterHandlers: Record<string, ParameterHandler> = {
  identifier: (param, state) => {
    pushArg(state, { name: param.text, type: null, default: null });
  },
  typed_parameter: (param, state) => {
    const target = param.namedChildren[0];
    if (!target) return;

    const type = fieldText(param, 'type');
    if (target.type === 'list_splat_pattern' || target.type === 'dictionary_splat_pattern') {
      splat(target, type, state);
    } else {
      pushArg(state, { name: target.text, type, default: null });
    }
  },
  default_parameter: (param, state) => {
    pushArg(state, {
      name: fieldText(param, 'name') ?? '',
      type: null,
      default: fieldText(param, 'value'),
    });
  },
  typed_default_parameter: (param, state) => {
    pushArg(state, {
      name: fieldText(param, 'name') ?? '',
      type: fieldText(param, 'type'),
      default: fieldText(param, 'value'),
    });
  },
  list_splat_pattern: (param, state) => splat(param, null, state),
  dictionary_splat_pattern: (param, state) => splat(param, null, state),
  keyword_separator: (_param, state) => {
    state.keywordOnly = true;
  },
};

function extractParameters(funcNode: SyntaxNode): ParameterState {
  const state: ParameterState = {
    args: [],
    kwonlyargs: [],
    vararg: null,
    kwarg: null,
    keywordOnly: false,
  };

  const paramsNode = funcNode.childForFieldName('parameters');
  for (const param of paramsNode?.namedChildren ?? []) {
    // positional_separator, comments and tuple patterns carry nothing to document
    parameterHandlers[param.type]?.(param, state);
  }

  return state;
}

/**
 * Decorator expressions without the leading `@`
 */
export function decoratorNames(decorated: SyntaxNode | null): string[] {
  if (!decorated) return [];

  return decorated.namedChildren
    .filter(child => child.type === 'decorator')
    .map(decorator => decorator.namedChildren[0]?.text ?? decorator.text.replace(/^@\s*/, ''));
}

/**
 * Build a FunctionDecl from a `function_definition` node. Nested
 * definitions in the body are not visited.
 */
export function extractFunction(node: SyntaxNode, decorated: SyntaxNode | null = null): FunctionDecl | null {
  const name = fieldText(node, 'name');
  if (!name) return null;

  const { args, kwonlyargs, vararg, kwarg } = extractParameters(node);

  return {
    kind: 'function',
    name,
    args,
    vararg,
    kwonlyargs,
    kwarg,
    returns: fieldText(node, 'return_type'),
    docstring: extractDocstring(node.childForFieldName('body')),
    decorators: decoratorNames(decorated),
    isAsync: node.type === 'async_function_definition' || node.children.some(c => c.type === 'async'),
  };
}

export function isFunctionNode(node: SyntaxNode): boolean {
  return node.type === 'function_definition' || node.type === 'async_function_definition';
}
