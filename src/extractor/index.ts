/**
 * Extractor exports
 */

export {
  buildModule,
  findDeclaration,
  resolveExport,
  resolveImport,
  importSource,
  type ImportTarget,
} from './module-builder.js';
export { extractClass } from './classes.js';
export { extractFunction, decoratorNames } from './functions.js';
export { extractImport, extractFromImport } from './imports.js';
export { extractModuleAssignment, extractClassField, exportNames, EXPORT_LIST_NAME } from './assignments.js';
export { cleanDocstring, extractDocstring, stringValue } from './strings.js';
