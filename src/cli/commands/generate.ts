/**
 * generate command - write the Markdown API reference for a package
 */

import { Command } from 'commander';
import path from 'node:path';
import { DocGenerator } from '../../generator/index.js';
import { loadConfig, loadConfigOrDefault } from '../../config/loader.js';
import { ConfigError, isReportable, type Diagnostic } from '../../types/index.js';
import { log, logDebug, logError, logInfo, logSuccess, reportDiagnostics } from '../reporter.js';

export interface GenerateOptions {
  config?: string;
  summaryTemplateFile?: string;
  includePrivate?: boolean;
  verbose?: boolean;
}

/**
 * Warnings and errors only fail a verbose run; a normal run still succeeds
 * once the documents are written
 */
export function exitCodeFor(diagnostics: Diagnostic[], verbose: boolean): number {
  return verbose && diagnostics.some(isReportable) ? 1 : 0;
}

export async function runGenerate(
  rootArg: string | undefined,
  outputArg: string | undefined,
  options: GenerateOptions
): Promise<number> {
  try {
    const config = options.config
      ? await loadConfig(options.config)
      : await loadConfigOrDefault(rootArg ?? process.cwd());

    const verbose = options.verbose ?? config.verbose;
    const rootDir = rootArg ? path.resolve(rootArg) : config.rootDir;
    const outputDir = outputArg ? path.resolve(outputArg) : config.outputDir;

    if (!rootDir) {
      throw new ConfigError('Missing root directory: pass it as the first argument or set rootDir in a config file');
    }
    if (!outputDir) {
      throw new ConfigError('Missing output directory: pass it as the second argument or set outputDir in a config file');
    }

    const generator = new DocGenerator({
      rootDir,
      outputDir,
      include: config.include,
      exclude: config.exclude,
      summaryTemplateFile: options.summaryTemplateFile
        ? path.resolve(options.summaryTemplateFile)
        : config.summaryTemplateFile,
      summaryFile: config.summaryFile,
      summaryMarker: config.summaryMarker,
      includePrivate: options.includePrivate ?? config.includePrivate,
      maxFileSize: config.maxFileSize,
      onProgress: verbose ? logDebug : undefined,
    });

    log(`Generating API reference for ${rootDir}...\n`);

    const result = await generator.generate();

    reportDiagnostics(result.diagnostics, verbose);

    logSuccess(`Documented ${result.modules} of ${result.totalFiles} files`);
    logInfo(`Documents: ${result.written.length} in ${outputDir}`);
    logInfo(`Summary:   ${result.summaryPath}`);
    logInfo(`Duration:  ${result.durationMs}ms`);

    return exitCodeFor(result.diagnostics, verbose);
  } catch (error) {
    logError(error instanceof Error ? error.message : String(error));
    return 1;
  }
}

export const generateCommand = new Command('generate')
  .description('Generate Markdown API reference pages from a Python package')
  .argument('[rootDir]', 'Package directory to document')
  .argument('[outputDir]', 'Directory the Markdown files are written to')
  .option('--summary-template-file <path>', 'Summary template; its {{toc}} marker is replaced by the module list')
  .option('-c, --config <path>', 'Path to config file')
  .option('--include-private', 'Also document underscore-prefixed modules and names')
  .option('-v, --verbose', 'Show progress and debug diagnostics; fail on any warning')
  .action(async (rootDir: string | undefined, outputDir: string | undefined, options: GenerateOptions) => {
    const exitCode = await runGenerate(rootDir, outputDir, options);
    if (exitCode !== 0) {
      process.exit(exitCode);
    }
  });
