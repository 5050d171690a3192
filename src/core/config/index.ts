/**
 * Tool configuration exports barrel file.
 */
export { ConfigSchema, ConfigObjectSchema, LogLevelSchema } from './schema.js';
export type { Config } from './schema.js';
export {
  DEFAULT_CONFIG_FILENAME,
  getDefaultConfig,
  loadConfig,
  bundledTemplatesDir,
  resolveTemplatesRoot,
} from './loader.js';
export type { LoadedConfig } from './loader.js';
