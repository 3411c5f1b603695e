/**
 * Re-export resolution across the scanned modules
 *
 * A name listed in `__all__` but only imported into the module is traced
 * through the from-import chain to the module that declares it. Each step
 * is recorded in a visited set, so a chain that loops back on itself ends
 * with a cycle diagnostic instead of running forever.
 */

import type { Declaration, Diagnostic, ModuleDecl, ModuleMap } from '../types/index.js';
import { findDeclaration, importSource, resolveImport, type ImportTarget } from '../extractor/module-builder.js';

export type ResolvedExport =
  | { status: 'local'; name: string }
  | { status: 'reexported'; name: string; origin: string; originName: string; declaration: Declaration }
  | { status: 'module'; name: string; module: string }
  | { status: 'unresolved'; name: string; reason: 'unresolved' | 'cycle'; message: string };

export interface ResolvedModule {
  module: ModuleDecl;
  exports: ResolvedExport[];
  diagnostics: Diagnostic[];
}

export interface NameResolution {
  export: ResolvedExport;
  diagnostic: Diagnostic | null;
}

/**
 * A module by dotted name; a package is found by its own name too
 */
export function lookupModule(modules: ModuleMap, name: string): ModuleDecl | undefined {
  return modules.get(name) ?? modules.get(`${name}.__init__`);
}

/**
 * `from .x import *` makes every name of `x` a candidate
 */
function wildcardTarget(modules: ModuleMap, module: ModuleDecl, name: string): ImportTarget | null {
  for (const imp of module.imports) {
    if (imp.kind !== 'from' || !imp.wildcard) continue;

    const source = lookupModule(modules, importSource(module.name, imp));
    if (source && (findDeclaration(source, name) || resolveImport(source, name))) {
      return { kind: 'symbol', module: source.name, name };
    }
  }
  return null;
}

function unresolved(root: ModuleDecl, name: string, message: string): NameResolution {
  return {
    export: { status: 'unresolved', name, reason: 'unresolved', message },
    diagnostic: { code: 'UNRESOLVED_EXPORT', severity: 'warning', module: root.name, name, message },
  };
}

/**
 * Follow one exported name of `root` to its declaring module
 */
export function resolveName(modules: ModuleMap, root: ModuleDecl, name: string): NameResolution {
  const visited = new Set<string>();
  let current = root;
  let currentName = name;

  for (;;) {
    const key = `${current.name}:${currentName}`;
    if (visited.has(key)) {
      const message = `Re-export chain for '${name}' loops back to ${current.name}.${currentName}`;
      return {
        export: { status: 'unresolved', name, reason: 'cycle', message },
        diagnostic: { code: 'CYCLE_DETECTED', severity: 'warning', module: root.name, name, message },
      };
    }
    visited.add(key);

    const declaration = findDeclaration(current, currentName);
    if (declaration) {
      if (current === root) {
        return { export: { status: 'local', name }, diagnostic: null };
      }
      return {
        export: { status: 'reexported', name, origin: current.name, originName: currentName, declaration },
        diagnostic: null,
      };
    }

    const target = resolveImport(current, currentName) ?? wildcardTarget(modules, current, currentName);
    if (!target) {
      return unresolved(root, name, `'${currentName}' is neither declared nor imported in ${current.name}`);
    }

    if (target.kind === 'module') {
      return { export: { status: 'module', name, module: target.module }, diagnostic: null };
    }

    const next = lookupModule(modules, target.module);
    if (!next || !findDeclaration(next, target.name)) {
      const submodule = lookupModule(modules, `${target.module}.${target.name}`);
      if (submodule) {
        return { export: { status: 'module', name, module: submodule.name }, diagnostic: null };
      }
    }

    if (!next) {
      return unresolved(root, name, `Module '${target.module}' is not part of the scanned sources`);
    }

    if (next === current && target.name === currentName) {
      return {
        export: { status: 'local', name },
        diagnostic: {
          code: 'SELF_REEXPORT',
          severity: 'debug',
          module: root.name,
          name,
          message: `'${currentName}' is re-exported from ${current.name} itself`,
        },
      };
    }

    current = next;
    currentName = target.name;
  }
}

/**
 * Resolve the export surface of every module. Modules without `__all__`
 * come back with no exports and are rendered from their own declarations
 * only.
 */
export function resolveExports(modules: ModuleMap): Map<string, ResolvedModule> {
  const resolved = new Map<string, ResolvedModule>();

  for (const [name, module] of modules) {
    const exports: ResolvedExport[] = [];
    const diagnostics: Diagnostic[] = [];

    for (const exported of new Set(module.allExports)) {
      const result = resolveName(modules, module, exported);
      exports.push(result.export);
      if (result.diagnostic) diagnostics.push(result.diagnostic);
    }

    resolved.set(name, { module, exports, diagnostics });
  }

  return resolved;
}
