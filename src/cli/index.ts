#!/usr/bin/env node

/**
 * pydocbook CLI
 */

import { Command } from 'commander';
import { generateCommand } from './commands/generate.js';

const program = new Command();

program
  .name('pydocbook')
  .description('pydocbook - Markdown API reference for Python packages, laid out for mdBook')
  .version('0.1.0');

program.addCommand(generateCommand, { isDefault: true });

await program.parseAsync(process.argv);
