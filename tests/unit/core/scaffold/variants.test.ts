/**
 * Tests for variant selection helpers.
 */
import { describe, it, expect } from 'vitest';
import {
  excludedVariantDirectories,
  isUnderAny,
  selectVariants,
  variantDirectory,
} from '../../../../src/core/scaffold/index.js';
import { DescriptorSchema } from '../../../../src/core/descriptor/index.js';
import { buildEnvironment } from '../../../../src/core/environment/index.js';

const { variants } = DescriptorSchema.parse({
  variants: [
    { variable: 'mcu', root: 'boards', values: ['rp2040', 'esp32'] },
    { variable: 'runtime', values: ['tokio', 'async-std'] },
  ],
});

describe('variants', () => {
  it('should select only variants whose variable is set', () => {
    const selections = selectVariants(variants, buildEnvironment('demo', { mcu: 'esp32' }));

    expect(selections).toHaveLength(1);
    expect(selections[0].selected).toBe('esp32');
    expect(selections[0].variant.variable).toBe('mcu');
  });

  it('should join the variant root and value', () => {
    expect(variantDirectory(variants[0], 'rp2040')).toBe('boards/rp2040');
    expect(variantDirectory(variants[1], 'tokio')).toBe('tokio');
  });

  it('should exclude the directories of values that were not selected', () => {
    const selections = selectVariants(variants, buildEnvironment('demo', { mcu: 'rp2040', runtime: 'tokio' }));

    expect(excludedVariantDirectories(selections)).toEqual(['boards/esp32', 'async-std']);
  });

  it('should exclude every value when the selection matches none', () => {
    const selections = selectVariants(variants, buildEnvironment('demo', { mcu: 'avr' }));

    expect(excludedVariantDirectories(selections)).toEqual(['boards/rp2040', 'boards/esp32']);
  });

  describe('isUnderAny', () => {
    it('should match the directory itself and paths below it', () => {
      expect(isUnderAny('boards/esp32', ['boards/esp32'])).toBe(true);
      expect(isUnderAny('boards/esp32/src/main.rs', ['boards/esp32'])).toBe(true);
      expect(isUnderAny('./boards/esp32/memory.x', ['boards/esp32'])).toBe(true);
    });

    it('should not match sibling prefixes', () => {
      expect(isUnderAny('boards/esp32-c3/main.rs', ['boards/esp32'])).toBe(false);
      expect(isUnderAny('src/main.rs', ['boards/esp32'])).toBe(false);
    });
  });
});
