/**
 * pydocbook - Markdown API reference for Python packages
 *
 * Parses a package with tree-sitter, resolves names re-exported through
 * `__all__`, and renders one Markdown document per module plus an mdBook
 * `SUMMARY.md`.
 */

// Types
export * from './types/index.js';

// Parser
export { PythonParser, getDefaultParser, resetParser, type SyntaxNode } from './parser/index.js';

// Module model
export { buildModule, findDeclaration, resolveExport, resolveImport, type ImportTarget } from './extractor/index.js';

// Re-exports
export { resolveExports, resolveName, type ResolvedExport, type ResolvedModule } from './resolver/index.js';

// Docstrings
export { parseDocstring, parseSignature, type ParsedDocstring, type Signature } from './docstrings/index.js';

// Rendering
export { renderModule, renderSummary, type RenderOptions } from './render/index.js';

// Generator
export {
  DocGenerator,
  pathToModuleName,
  rootModuleName,
  docPathFor,
  type GeneratorConfig,
  type GenerateResult,
} from './generator/index.js';

// Config
export {
  configSchema,
  loadConfig,
  getDefaultConfig,
  findConfig,
  loadConfigOrDefault,
  type Config,
} from './config/index.js';
