/**
 * Config module exports
 */

export { configSchema, DEFAULT_EXCLUDE, type Config, type ConfigInput } from './schema.js';

export {
  loadConfig,
  getDefaultConfig,
  findConfig,
  loadConfigOrDefault,
} from './loader.js';
