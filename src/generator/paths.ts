/**
 * Mapping between source file paths, dotted module names and document paths
 */

import path from 'node:path';

const INIT_SUFFIX = '.__init__';

/**
 * The scanned directory itself is the root package
 */
export function rootModuleName(rootDir: string): string {
  return path.basename(path.resolve(rootDir));
}

/**
 * `root/sub/a.py` -> `root.sub.a`; an initializer keeps its `__init__`
 * segment (`root.sub.__init__`)
 */
export function pathToModuleName(rootDir: string, filePath: string): string {
  const relative = path.relative(path.resolve(rootDir), path.resolve(rootDir, filePath));
  const segments = relative.split(path.sep).filter(segment => segment !== '' && segment !== '.');
  const last = segments.pop() ?? '';
  segments.push(last.replace(/\.pyi?$/, ''));
  return [rootModuleName(rootDir), ...segments].join('.');
}

export function isPackageInit(moduleName: string): boolean {
  return moduleName.endsWith(INIT_SUFFIX);
}

/**
 * Module name as readers know it: `pkg.__init__` -> `pkg`
 */
export function displayName(moduleName: string): string {
  return isPackageInit(moduleName) ? moduleName.slice(0, -INIT_SUFFIX.length) : moduleName;
}

/**
 * Document path relative to the output directory, always `/`-separated
 */
export function docPathFor(moduleName: string): string {
  return `${displayName(moduleName).split('.').join('/')}.md`;
}

/**
 * A segment with a leading underscore marks a private module; dunder
 * segments such as `__main__` do not
 */
export function isPrivateModule(moduleName: string): boolean {
  return displayName(moduleName)
    .split('.')
    .some(segment => segment.startsWith('_') && !(segment.startsWith('__') && segment.endsWith('__')));
}
