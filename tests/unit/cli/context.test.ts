/**
 * Tests for shared CLI plumbing.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as path from 'node:path';
import {
  VERBOSE_ENV,
  collectVariable,
  describeError,
  loadCliContext,
  parseVariables,
} from '../../../src/cli/context.js';
import { bundledTemplatesDir } from '../../../src/core/config/index.js';
import { ConfigError, ErrorCodes, TemplateNotFoundError } from '../../../src/utils/errors.js';
import { logger } from '../../../src/utils/logger.js';
import { makeTempDir, removeTempDir, writeTree } from '../../helpers/tree.js';

describe('cli context', () => {
  describe('loadCliContext', () => {
    let cwd: string;

    beforeEach(async () => {
      cwd = await makeTempDir('cli');
    });

    afterEach(async () => {
      vi.unstubAllEnvs();
      logger.setLevel('info');
      await removeTempDir(cwd);
    });

    it('should use defaults and the bundled templates without a config file', async () => {
      vi.stubEnv(VERBOSE_ENV, '');

      const context = await loadCliContext(cwd, {});

      expect(context.cwd).toBe(cwd);
      expect(context.config.default_template).toBe('minimal');
      expect(context.templatesRoot).toBe(bundledTemplatesDir());
      expect(logger.getLevel()).toBe('info');
    });

    it('should take the log level and templates root from the config file', async () => {
      vi.stubEnv(VERBOSE_ENV, '');
      await writeTree(cwd, { 'stampkit.config.yaml': 'log_level: warn\ntemplates_dir: tpl\n' });

      const context = await loadCliContext(cwd, {});

      expect(context.templatesRoot).toBe(path.join(cwd, 'tpl'));
      expect(logger.getLevel()).toBe('warn');
    });

    it('should switch to debug with --verbose', async () => {
      await loadCliContext(cwd, { verbose: true, templates: 'mine' });

      expect(logger.getLevel()).toBe('debug');
    });

    it('should switch to debug through the environment', async () => {
      vi.stubEnv(VERBOSE_ENV, '1');

      await loadCliContext(cwd, {});

      expect(logger.getLevel()).toBe('debug');
    });
  });

  describe('collectVariable', () => {
    it('should append to the previous values', () => {
      expect(collectVariable('a=1', ['b=2'])).toEqual(['b=2', 'a=1']);
    });
  });

  describe('parseVariables', () => {
    it('should split at the first equals sign and convert booleans', () => {
      expect(parseVariables(['db=postgres', 'serde=true', 'lto=false', 'url=a=b', 'empty='])).toEqual({
        db: 'postgres',
        serde: true,
        lto: false,
        url: 'a=b',
        empty: '',
      });
    });

    it('should reject entries without a key', () => {
      expect(() => parseVariables(['=x'])).toThrow(ConfigError);
      expect(() => parseVariables(['novalue'])).toThrow("Invalid --var 'novalue': expected key=value");
    });
  });

  describe('describeError', () => {
    it('should include the name and code of stampkit errors', () => {
      expect(describeError(new TemplateNotFoundError('web'))).toBe(
        "TemplateNotFoundError [NOT_FOUND]: Template 'web' not found"
      );
      expect(describeError(new ConfigError(ErrorCodes.CONFIG_INVALID, 'bad'))).toBe(
        'ConfigError [CONFIG_INVALID]: bad'
      );
    });

    it('should fall back to the message of other errors', () => {
      expect(describeError(new Error('boom'))).toBe('boom');
      expect(describeError('nope')).toBe('Unknown error');
    });
  });
});
