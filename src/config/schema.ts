/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

export const DEFAULT_EXCLUDE = [
  '**/__pycache__/**',
  '**/.venv/**',
  '**/venv/**',
  '**/build/**',
  '**/dist/**',
  '**/.git/**',
  '**/node_modules/**',
];

export const configSchema = z.object({
  /** Directory scanned for modules; its name is the root package */
  rootDir: z.string().min(1).optional(),
  outputDir: z.string().min(1).optional(),
  /** Template for the summary; the marker is replaced by the module list */
  summaryTemplateFile: z.string().min(1).optional(),
  summaryFile: z.string().min(1).default('SUMMARY.md'),
  summaryMarker: z.string().min(1).default('{{toc}}'),
  include: z.array(z.string()).default(['**/*.py']),
  exclude: z.array(z.string()).default(DEFAULT_EXCLUDE),
  includePrivate: z.boolean().default(false),
  maxFileSize: z.number().int().min(0).default(1024 * 1024), // 1MB default, 0 = unlimited
  verbose: z.boolean().default(false),
});

export type Config = z.infer<typeof configSchema>;
export type ConfigInput = z.input<typeof configSchema>;
