/**
 * Resolver exports
 */

export {
  resolveExports,
  resolveName,
  lookupModule,
  type ResolvedExport,
  type ResolvedModule,
  type NameResolution,
} from './reexports.js';
