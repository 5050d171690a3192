/**
 * Tests for config schema zod validation.
 */
import { describe, it, expect } from 'vitest';
import { ConfigSchema, LogLevelSchema } from '../../../../src/core/config/index.js';

describe('ConfigSchema', () => {
  it('should apply defaults to an empty or missing document', () => {
    const defaults = {
      default_template: 'minimal',
      extra_text_extensions: [],
      manifest: 'Cargo.toml',
      log_level: 'info',
    };

    expect(ConfigSchema.parse({})).toEqual(defaults);
    expect(ConfigSchema.parse(null)).toEqual(defaults);
    expect(ConfigSchema.parse(undefined)).toEqual(defaults);
  });

  it('should accept every field', () => {
    const config = ConfigSchema.parse({
      templates_dir: 'templates',
      default_template: 'library',
      extra_text_extensions: ['.hbs', '.tera'],
      manifest: 'pyproject.toml',
      log_level: 'debug',
    });

    expect(config.extra_text_extensions).toEqual(['.hbs', '.tera']);
    expect(config.manifest).toBe('pyproject.toml');
  });

  it('should reject extensions without a leading dot or with separators', () => {
    expect(ConfigSchema.safeParse({ extra_text_extensions: ['hbs'] }).success).toBe(false);
    expect(ConfigSchema.safeParse({ extra_text_extensions: ['.a/b'] }).success).toBe(false);
    expect(ConfigSchema.safeParse({ extra_text_extensions: ['.tar.gz'] }).success).toBe(false);
  });

  it('should reject empty strings and unknown log levels', () => {
    expect(ConfigSchema.safeParse({ templates_dir: '' }).success).toBe(false);
    expect(ConfigSchema.safeParse({ default_template: '' }).success).toBe(false);
    expect(LogLevelSchema.safeParse('trace').success).toBe(false);
    expect(LogLevelSchema.safeParse('silent').success).toBe(true);
  });
});
