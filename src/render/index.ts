/**
 * Renderer exports
 */

export {
  renderModule,
  renderClass,
  renderFunction,
  renderSignature,
  renderVariable,
  renderAlias,
  importText,
  inlineCode,
  MAX_SIGNATURE_WIDTH,
  type RenderOptions,
} from './markdown.js';
export { renderSummary, renderToc, DEFAULT_SUMMARY_MARKER } from './summary.js';
