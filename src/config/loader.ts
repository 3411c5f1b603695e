/**
 * Configuration file loader
 *
 * Looks for `pydocbook.config.json`, `.pydocbookrc.json` or a
 * `[tool.pydocbook]` table in `pyproject.toml`. Relative paths in a config
 * file are taken from the directory holding it.
 */

import fs from 'node:fs';
import path from 'node:path';
import * as TOML from '@iarna/toml';
import { configSchema, type Config } from './schema.js';
import { ConfigError } from '../types/index.js';

const CONFIG_NAMES = ['pydocbook.config.json', '.pydocbookrc.json'];
const PYPROJECT = 'pyproject.toml';
const TOOL_KEY = 'pydocbook';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * `root-dir` -> `rootDir`, the spelling pyproject tables tend to use
 */
function camelizeKeys(table: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(table).map(([key, value]) => [key.replace(/-([a-z])/g, (_, c: string) => c.toUpperCase()), value])
  );
}

function validate(raw: unknown, source: string): Config {
  const result = configSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.errors.map(e => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new ConfigError(`Invalid configuration in ${source}:\n${errors}`);
  }

  return result.data;
}

function resolvePaths(config: Config, baseDir: string): Config {
  const resolve = (value: string | undefined): string | undefined =>
    value === undefined ? undefined : path.resolve(baseDir, value);

  return {
    ...config,
    rootDir: resolve(config.rootDir),
    outputDir: resolve(config.outputDir),
    summaryTemplateFile: resolve(config.summaryTemplateFile),
  };
}

/**
 * The `[tool.pydocbook]` table of a pyproject file, or null when it has none
 */
async function readPyprojectTable(pyprojectPath: string): Promise<Record<string, unknown> | null> {
  const content = await fs.promises.readFile(pyprojectPath, 'utf-8');

  let parsed: TOML.JsonMap;
  try {
    parsed = TOML.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid TOML in ${pyprojectPath}: ${reason}`);
  }

  const tool = parsed['tool'];
  if (!isRecord(tool)) return null;
  const table = tool[TOOL_KEY];
  return isRecord(table) ? camelizeKeys(table) : null;
}

export async function loadConfig(configPath: string): Promise<Config> {
  const absolutePath = path.resolve(configPath);

  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  const baseDir = path.dirname(absolutePath);

  if (path.basename(absolutePath) === PYPROJECT) {
    const table = await readPyprojectTable(absolutePath);
    if (!table) {
      throw new ConfigError(`No [tool.${TOOL_KEY}] table in ${absolutePath}`);
    }
    return resolvePaths(validate(table, absolutePath), baseDir);
  }

  const content = await fs.promises.readFile(absolutePath, 'utf-8');

  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(content);
  } catch {
    throw new ConfigError(`Invalid JSON in config file: ${absolutePath}`);
  }

  return resolvePaths(validate(rawConfig, absolutePath), baseDir);
}

export function getDefaultConfig(): Config {
  return configSchema.parse({});
}

export async function findConfig(startDir: string): Promise<Config | null> {
  let currentDir = path.resolve(startDir);
  const root = path.parse(currentDir).root;

  while (currentDir !== root) {
    for (const configName of CONFIG_NAMES) {
      const configPath = path.join(currentDir, configName);
      if (fs.existsSync(configPath)) {
        return loadConfig(configPath);
      }
    }

    const pyprojectPath = path.join(currentDir, PYPROJECT);
    if (fs.existsSync(pyprojectPath)) {
      const table = await readPyprojectTable(pyprojectPath);
      if (table) {
        return resolvePaths(validate(table, pyprojectPath), currentDir);
      }
    }

    currentDir = path.dirname(currentDir);
  }

  return null;
}

export async function loadConfigOrDefault(startDir: string): Promise<Config> {
  const config = await findConfig(startDir);
  return config ?? getDefaultConfig();
}
