/**
 * Shared CLI plumbing: configuration, templates root, variables and error output.
 */
import { loadConfig, resolveTemplatesRoot, type Config } from '../core/config/index.js';
import type { VariableValue } from '../core/environment/index.js';
import { ConfigError, ErrorCodes, StampkitError, errorMessage } from '../utils/errors.js';
import { logger as log } from '../utils/logger.js';

export const VERBOSE_ENV = 'STAMPKIT_VERBOSE';

export interface GlobalOptions {
  config?: string;
  templates?: string;
  verbose?: boolean;
}

export interface CliContext {
  cwd: string;
  config: Config;
  templatesRoot: string;
}

/**
 * Load configuration, pick the templates root and set the log level.
 */
export async function loadCliContext(cwd: string, options: GlobalOptions): Promise<CliContext> {
  const loaded = await loadConfig(cwd, options.config);
  const verbose = options.verbose === true || process.env[VERBOSE_ENV] === '1';
  log.setLevel(verbose ? 'debug' : loaded.config.log_level);

  return {
    cwd,
    config: loaded.config,
    templatesRoot: resolveTemplatesRoot(loaded, cwd, options.templates),
  };
}

/**
 * Commander collector for repeatable `--var key=value` options.
 */
export function collectVariable(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Parse `key=value` pairs. `true` and `false` become booleans.
 * @throws ConfigError for entries without a key or `=`
 */
export function parseVariables(entries: readonly string[]): Record<string, VariableValue> {
  const variables: Record<string, VariableValue> = {};
  for (const entry of entries) {
    const separator = entry.indexOf('=');
    const key = separator === -1 ? '' : entry.slice(0, separator).trim();
    if (key === '') {
      throw new ConfigError(ErrorCodes.CONFIG_INVALID, `Invalid --var '${entry}': expected key=value`, {
        entry,
      });
    }
    const raw = entry.slice(separator + 1);
    variables[key] = raw === 'true' ? true : raw === 'false' ? false : raw;
  }
  return variables;
}

/**
 * One-line description of a failure for the terminal.
 */
export function describeError(error: unknown): string {
  if (error instanceof StampkitError) {
    return `${error.name} [${error.code}]: ${error.message}`;
  }
  return errorMessage(error);
}
