/**
 * Zod schema for the tool configuration file (stampkit.config.yaml).
 */
import { z } from 'zod';
import { LOG_LEVEL_NAMES } from '../../utils/logger.js';

/**
 * Treat a missing or empty document as an empty object so defaults apply.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

export const LogLevelSchema = z.enum(LOG_LEVEL_NAMES);

export const ConfigObjectSchema = z.object({
  /** Templates root; relative paths resolve against the config file's directory */
  templates_dir: z.string().min(1).optional(),
  /** Template the CLI falls back to when the requested one is not found */
  default_template: z.string().min(1).default('minimal'),
  /** Extra extensions rendered as text, with leading dot */
  extra_text_extensions: z
    .array(z.string().regex(/^\.[^./\\]+$/, 'expected an extension such as ".hbs"'))
    .default([]),
  /** Manifest dependencies are declared against when a descriptor names none */
  manifest: z.string().min(1).default('Cargo.toml'),
  log_level: LogLevelSchema.default('info'),
});

export const ConfigSchema = withDefaults(ConfigObjectSchema);

export type Config = z.infer<typeof ConfigObjectSchema>;
