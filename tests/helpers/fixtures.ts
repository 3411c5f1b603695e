/**
 * Test fixture utilities
 */

import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';
import { fileURLToPath } from 'node:url';

import { getDefaultParser } from '../../src/parser/index.js';
import { buildModule } from '../../src/extractor/index.js';
import type { ModuleDecl } from '../../src/types/index.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Get the absolute path to a fixture file
 */
export function getFixturePath(...parts: string[]): string {
  return path.join(__dirname, '../fixtures', ...parts);
}

/**
 * Parse Python source and build it into a module
 */
export function moduleFromSource(source: string, moduleName = 'pkg.mod'): ModuleDecl {
  return buildModule(getDefaultParser().parseSource(source), moduleName);
}

/**
 * Build several modules at once, keyed by module name
 */
export function modulesFromSources(sources: Record<string, string>): Map<string, ModuleDecl> {
  return new Map(Object.entries(sources).map(([name, source]) => [name, moduleFromSource(source, name)]));
}

/**
 * Strip the common indentation of a template literal and its leading newline
 */
export function dedent(text: string): string {
  const lines = text.replace(/^\n/, '').split('\n');
  const indents = lines.filter(line => line.trim() !== '').map(line => line.match(/^ */)?.[0].length ?? 0);
  const margin = indents.length > 0 ? Math.min(...indents) : 0;
  return lines.map(line => line.slice(margin)).join('\n');
}

export interface TempProjectResult {
  rootDir: string;
  cleanup: () => void;
  addFile: (relativePath: string, content: string) => string;
  getFilePath: (relativePath: string) => string;
}

/**
 * Create a temporary project directory with files
 */
export function createTempProject(files: Record<string, string> = {}): TempProjectResult {
  const rootDir = path.join(os.tmpdir(), `pydocbook-project-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  fs.mkdirSync(rootDir, { recursive: true });

  const addFile = (relativePath: string, content: string): string => {
    const filePath = path.join(rootDir, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
    return filePath;
  };

  for (const [relativePath, content] of Object.entries(files)) {
    addFile(relativePath, content);
  }

  const cleanup = () => {
    fs.rmSync(rootDir, { recursive: true, force: true });
  };

  const getFilePath = (relativePath: string): string => {
    return path.join(rootDir, relativePath);
  };

  return { rootDir, cleanup, addFile, getFilePath };
}

/**
 * Sample config file contents
 */
export const VALID_CONFIG = {
  rootDir: 'src/pkg',
  outputDir: 'book/api',
  include: ['**/*.py'],
  includePrivate: true,
};
