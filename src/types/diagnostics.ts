/**
 * Diagnostics collected during a run and reported at the end of it
 */

export type DiagnosticCode =
  | 'PARSE_ERROR'
  | 'FILE_TOO_LARGE'
  | 'UNRESOLVED_EXPORT'
  | 'CYCLE_DETECTED'
  | 'SELF_REEXPORT';

export type DiagnosticSeverity = 'error' | 'warning' | 'debug';

export interface Diagnostic {
  code: DiagnosticCode;
  severity: DiagnosticSeverity;
  /** Module name, or the file path when no module could be built */
  module: string;
  name?: string;
  message: string;
}

/**
 * Invalid or incomplete configuration; fatal before any file is read
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Source text that tree-sitter could not parse cleanly
 */
export class SourceParseError extends Error {
  constructor(
    message: string,
    readonly line?: number,
    readonly column?: number
  ) {
    super(message);
    this.name = 'SourceParseError';
  }
}

export function isReportable(diagnostic: Diagnostic): boolean {
  return diagnostic.severity !== 'debug';
}
