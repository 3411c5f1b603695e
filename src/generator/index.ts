/**
 * Documentation generation pipeline
 *
 * Stages run strictly in order: every file is parsed and built into a
 * module first, re-exports are resolved over the complete set, and only
 * then are documents rendered and written.
 */

import fs from 'node:fs';
import path from 'node:path';
import fg from 'fast-glob';

import { ConfigError, SourceParseError, type Diagnostic, type ModuleDecl } from '../types/index.js';
import { getDefaultParser } from '../parser/index.js';
import { buildModule } from '../extractor/index.js';
import { resolveExports, type ResolvedModule } from '../resolver/index.js';
import { renderModule, renderSummary, DEFAULT_SUMMARY_MARKER } from '../render/index.js';
import { DEFAULT_EXCLUDE } from '../config/schema.js';
import { displayName, docPathFor, isPrivateModule, pathToModuleName } from './paths.js';

export {
  rootModuleName,
  pathToModuleName,
  displayName,
  docPathFor,
  isPackageInit,
  isPrivateModule,
} from './paths.js';

export interface GeneratorConfig {
  rootDir: string;
  outputDir: string;
  include?: string[];
  exclude?: string[];
  summaryTemplateFile?: string;
  summaryFile?: string;
  summaryMarker?: string;
  includePrivate?: boolean;
  /** Bytes; 0 = unlimited */
  maxFileSize?: number;
  /** Called with a line per processed file and written document */
  onProgress?: (message: string) => void;
}

export interface BuildResult {
  modules: Map<string, ModuleDecl>;
  diagnostics: Diagnostic[];
}

export interface GenerateResult {
  totalFiles: number;
  modules: number;
  /** Written documents, relative to the output directory */
  written: string[];
  summaryPath: string;
  diagnostics: Diagnostic[];
  durationMs: number;
}

const DEFAULT_MAX_FILE_SIZE = 1024 * 1024;

export class DocGenerator {
  private config: Required<Omit<GeneratorConfig, 'summaryTemplateFile' | 'onProgress'>> &
    Pick<GeneratorConfig, 'summaryTemplateFile' | 'onProgress'>;

  constructor(config: GeneratorConfig) {
    this.config = {
      ...config,
      rootDir: path.resolve(config.rootDir),
      outputDir: path.resolve(config.outputDir),
      include: config.include && config.include.length > 0 ? config.include : ['**/*.py'],
      exclude: config.exclude ?? DEFAULT_EXCLUDE,
      summaryFile: config.summaryFile ?? 'SUMMARY.md',
      summaryMarker: config.summaryMarker ?? DEFAULT_SUMMARY_MARKER,
      includePrivate: config.includePrivate ?? false,
      maxFileSize: config.maxFileSize ?? DEFAULT_MAX_FILE_SIZE,
    };
  }

  private progress(message: string): void {
    this.config.onProgress?.(message);
  }

  /**
   * Source files under the root, sorted so module order does not depend on
   * the file system
   */
  async scan(): Promise<string[]> {
    const { rootDir } = this.config;
    if (!fs.existsSync(rootDir) || !fs.statSync(rootDir).isDirectory()) {
      throw new ConfigError(`Root directory not found: ${rootDir}`);
    }

    const files = await fg(this.config.include, {
      cwd: rootDir,
      ignore: this.config.exclude,
      absolute: true,
      onlyFiles: true,
    });
    return files.sort();
  }

  /**
   * Parse and build every file. A file that cannot be parsed is left out
   * of the module map and reported.
   */
  async buildModules(files: string[]): Promise<BuildResult> {
    const { rootDir, maxFileSize } = this.config;
    const parser = getDefaultParser();
    const modules = new Map<string, ModuleDecl>();
    const diagnostics: Diagnostic[] = [];

    for (const filePath of files) {
      const relativePath = path.relative(rootDir, filePath);
      const moduleName = pathToModuleName(rootDir, filePath);
      // `a.py` sorts before `a.pyi`; the first file of a module wins
      if (modules.has(moduleName)) continue;

      const stats = await fs.promises.stat(filePath);
      if (maxFileSize > 0 && stats.size > maxFileSize) {
        diagnostics.push({
          code: 'FILE_TOO_LARGE',
          severity: 'warning',
          module: moduleName,
          message: `${relativePath}: ${stats.size} bytes exceeds the ${maxFileSize} byte limit`,
        });
        continue;
      }

      const content = await fs.promises.readFile(filePath, 'utf-8');

      try {
        const root = parser.parseSource(content);
        modules.set(moduleName, buildModule(root, moduleName));
        this.progress(`Parsed ${relativePath} as ${moduleName}`);
      } catch (error) {
        if (!(error instanceof SourceParseError)) throw error;
        diagnostics.push({
          code: 'PARSE_ERROR',
          severity: 'error',
          module: moduleName,
          message: `${relativePath}: ${error.message}`,
        });
      }
    }

    return { modules, diagnostics };
  }

  /**
   * Rendered documents keyed by their path relative to the output
   * directory. Private modules are skipped unless configured otherwise.
   */
  renderDocuments(resolved: ReadonlyMap<string, ResolvedModule>): Map<string, { name: string; text: string }> {
    const documents = new Map<string, { name: string; text: string }>();
    const options = { includePrivate: this.config.includePrivate };

    for (const [name, view] of resolved) {
      if (!this.config.includePrivate && isPrivateModule(name)) continue;
      documents.set(docPathFor(name), { name: displayName(name), text: renderModule(view, options) });
    }

    return documents;
  }

  private async readSummaryTemplate(): Promise<string | null> {
    const { summaryTemplateFile } = this.config;
    if (!summaryTemplateFile) return null;

    const templatePath = path.resolve(summaryTemplateFile);
    if (!fs.existsSync(templatePath)) {
      throw new ConfigError(`Summary template not found: ${templatePath}`);
    }
    return fs.promises.readFile(templatePath, 'utf-8');
  }

  async generate(): Promise<GenerateResult> {
    const startTime = Date.now();
    const { outputDir } = this.config;

    // Configuration problems surface before any file is read
    const template = await this.readSummaryTemplate();
    const files = await this.scan();

    const { modules, diagnostics } = await this.buildModules(files);
    const resolved = resolveExports(modules);
    for (const view of resolved.values()) {
      diagnostics.push(...view.diagnostics);
    }

    const documents = this.renderDocuments(resolved);

    await fs.promises.mkdir(outputDir, { recursive: true });
    const written: string[] = [];
    const entries = new Map<string, string>();

    for (const [docPath, document] of documents) {
      const target = path.join(outputDir, ...docPath.split('/'));
      await fs.promises.mkdir(path.dirname(target), { recursive: true });
      await fs.promises.writeFile(target, document.text, 'utf-8');
      written.push(docPath);
      entries.set(document.name, docPath);
      this.progress(`Wrote ${docPath}`);
    }

    const summaryPath = path.join(outputDir, this.config.summaryFile);
    await fs.promises.mkdir(path.dirname(summaryPath), { recursive: true });
    await fs.promises.writeFile(summaryPath, renderSummary(entries, template, this.config.summaryMarker), 'utf-8');

    return {
      totalFiles: files.length,
      modules: modules.size,
      written,
      summaryPath,
      diagnostics,
      durationMs: Date.now() - startTime,
    };
  }
}
