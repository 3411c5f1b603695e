/**
 * Console output for the CLI
 */

import type { Diagnostic } from '../types/index.js';

// ANSI colors for terminal output
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
};

export function log(message: string): void {
  console.log(message);
}

export function logSuccess(message: string): void {
  console.log(`${colors.green}✓${colors.reset} ${message}`);
}

export function logWarning(message: string): void {
  console.log(`${colors.yellow}⚠${colors.reset} ${message}`);
}

export function logError(message: string): void {
  console.error(`${colors.red}✗${colors.reset} ${message}`);
}

export function logInfo(message: string): void {
  console.log(`${colors.blue}ℹ${colors.reset} ${message}`);
}

export function logDebug(message: string): void {
  console.log(`${colors.dim}${message}${colors.reset}`);
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
  const subject = diagnostic.name ? `${diagnostic.module}.${diagnostic.name}` : diagnostic.module;
  return `${subject}: ${diagnostic.message} [${diagnostic.code}]`;
}

/**
 * Print collected diagnostics; debug ones only in verbose mode
 */
export function reportDiagnostics(diagnostics: Diagnostic[], verbose: boolean): void {
  for (const diagnostic of diagnostics) {
    switch (diagnostic.severity) {
      case 'error':
        logError(formatDiagnostic(diagnostic));
        break;
      case 'warning':
        logWarning(formatDiagnostic(diagnostic));
        break;
      case 'debug':
        if (verbose) logDebug(formatDiagnostic(diagnostic));
        break;
    }
  }
}
