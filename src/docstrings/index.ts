/**
 * Docstring exports
 */

export {
  parseDocstring,
  parseSignature,
  toSignature,
  fieldKind,
  type FieldKind,
  type DocParam,
  type DocReturns,
  type DocRaises,
  type DocAttribute,
  type ParsedDocstring,
  type Signature,
} from './parser.js';
