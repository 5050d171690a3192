/**
 * Tool configuration loading.
 */
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigSchema, type Config } from './schema.js';
import { loadStructuredWithSchema } from '../../utils/yaml.js';
import { fileExists } from '../../utils/file-system.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

export const DEFAULT_CONFIG_FILENAME = 'stampkit.config.yaml';

export interface LoadedConfig {
  config: Config;
  /** Absolute path of the file read, or null when defaults were used */
  path: string | null;
}

/**
 * Default configuration values.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load the configuration for a working directory.
 *
 * Without an explicit path, a missing `stampkit.config.yaml` yields defaults.
 * An explicit path that does not exist is an error.
 */
export async function loadConfig(cwd: string, configPath?: string): Promise<LoadedConfig> {
  const fullPath = path.resolve(cwd, configPath ?? DEFAULT_CONFIG_FILENAME);

  if (!(await fileExists(fullPath))) {
    if (configPath) {
      throw new ConfigError(ErrorCodes.CONFIG_PARSE, `Config file not found: ${fullPath}`, {
        path: fullPath,
      });
    }
    return { config: getDefaultConfig(), path: null };
  }

  return { config: await loadStructuredWithSchema(fullPath, ConfigSchema), path: fullPath };
}

/**
 * Templates shipped with the package.
 */
export function bundledTemplatesDir(): string {
  return fileURLToPath(new URL('../../../templates', import.meta.url));
}

/**
 * Templates root for a loaded configuration.
 * An explicit override wins, then `templates_dir`, then the bundled templates.
 */
export function resolveTemplatesRoot(loaded: LoadedConfig, cwd: string, override?: string): string {
  if (override) {
    return path.resolve(cwd, override);
  }
  if (loaded.config.templates_dir) {
    const base = loaded.path ? path.dirname(loaded.path) : cwd;
    return path.resolve(base, loaded.config.templates_dir);
  }
  return bundledTemplatesDir();
}
