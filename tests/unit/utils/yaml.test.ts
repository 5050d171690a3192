/**
 * Tests for YAML and JSON utility functions.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { z } from 'zod';
import {
  formatZodError,
  loadStructuredWithSchema,
  parseJson,
  parseYaml,
  validateWithSchema,
} from '../../../src/utils/yaml.js';
import { ConfigError, ErrorCodes } from '../../../src/utils/errors.js';

const Schema = z.object({
  name: z.string(),
  count: z.number().default(1),
});

describe('parseYaml', () => {
  it('should parse valid YAML', () => {
    expect(parseYaml('name: test\nitems:\n  - one\n  - two\n')).toEqual({
      name: 'test',
      items: ['one', 'two'],
    });
  });

  it('should return null for an empty document', () => {
    expect(parseYaml('')).toBeNull();
  });

  it('should throw ConfigError for invalid YAML', () => {
    expect(() => parseYaml('key: [unclosed')).toThrow(ConfigError);
  });
});

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('parseJson', () => {
  it('should parse valid JSON', () => {
    expect(parseJson('{"next_steps": ["cd demo"]}')).toEqual({ next_steps: ['cd demo'] });
  });

  it('should throw CONFIG_PARSE for invalid JSON', () => {
    expect(() => parseJson('{ nope')).toThrow(ConfigError);
    expect(thrownBy(() => parseJson('{ nope'))).toMatchObject({ code: ErrorCodes.CONFIG_PARSE });
  });
});

describe('validateWithSchema', () => {
  it('should apply schema defaults', () => {
    expect(validateWithSchema({ name: 'demo' }, Schema)).toEqual({ name: 'demo', count: 1 });
  });

  it('should throw CONFIG_INVALID naming the failing field', () => {
    expect(() => validateWithSchema({ name: 42 }, Schema)).toThrow(ConfigError);
    const error = thrownBy(() => validateWithSchema({ name: 42 }, Schema));
    expect(error).toMatchObject({ code: ErrorCodes.CONFIG_INVALID });
    expect(String(error)).toContain('name:');
  });
});

describe('formatZodError', () => {
  it('should join issues with their paths', () => {
    const result = z.object({ a: z.string(), b: z.number() }).safeParse({ a: 1, b: 'x' });
    if (result.success) {
      throw new Error('should not validate');
    }

    const formatted = formatZodError(result.error);

    expect(formatted.split('; ')).toHaveLength(2);
    expect(formatted).toContain('a: ');
    expect(formatted).toContain('b: ');
  });
});

describe('loadStructuredWithSchema', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'stampkit-yaml-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should read .json files as JSON', async () => {
    const file = join(tempDir, 'template.json');
    await writeFile(file, '{"name": "json"}');

    expect(await loadStructuredWithSchema(file, Schema)).toEqual({ name: 'json', count: 1 });
  });

  it('should read other files as YAML', async () => {
    const file = join(tempDir, 'template.yaml');
    await writeFile(file, 'name: yaml\ncount: 2\n');

    expect(await loadStructuredWithSchema(file, Schema)).toEqual({ name: 'yaml', count: 2 });
  });

  it('should add the file path to validation errors', async () => {
    const file = join(tempDir, 'template.json');
    await writeFile(file, '{"count": 2}');

    await expect(loadStructuredWithSchema(file, Schema)).rejects.toThrow(`(file: ${file})`);
  });

  it('should throw CONFIG_PARSE when the file cannot be read', async () => {
    await expect(loadStructuredWithSchema(join(tempDir, 'missing.json'), Schema)).rejects.toMatchObject({
      code: ErrorCodes.CONFIG_PARSE,
    });
  });
});
