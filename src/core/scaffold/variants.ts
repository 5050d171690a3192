/**
 * Mutually exclusive variant directories.
 *
 * A variant names a variable and the sibling directories (one per value) that
 * hold the alternative implementations. Only variants whose variable is set
 * take part; the rest are left untouched.
 */
import * as path from 'node:path';
import type { Environment } from '../environment/index.js';
import type { Variant } from '../descriptor/index.js';

export interface VariantSelection {
  variant: Variant;
  /** String value of the variant's variable */
  selected: string;
}

/**
 * Variants whose variable is present in the environment.
 */
export function selectVariants(variants: readonly Variant[], env: Environment): VariantSelection[] {
  const selections: VariantSelection[] = [];
  for (const variant of variants) {
    const selected = env.getString(variant.variable);
    if (selected !== undefined) {
      selections.push({ variant, selected });
    }
  }
  return selections;
}

/**
 * Directory of one variant value, relative to the template root, `/`-separated.
 */
export function variantDirectory(variant: Variant, value: string): string {
  return variant.root ? path.posix.join(variant.root, value) : value;
}

/**
 * Template-relative directories of the values that were not selected.
 */
export function excludedVariantDirectories(selections: readonly VariantSelection[]): string[] {
  const excluded: string[] = [];
  for (const { variant, selected } of selections) {
    for (const value of variant.values) {
      if (value !== selected) {
        excluded.push(variantDirectory(variant, value));
      }
    }
  }
  return excluded;
}

/**
 * Check whether a `/`-separated relative path is one of the directories or lies
 * under one.
 */
export function isUnderAny(relativePath: string, directories: readonly string[]): boolean {
  const normalized = path.posix.normalize(relativePath);
  return directories.some((dir) => {
    const prefix = path.posix.normalize(dir);
    return normalized === prefix || normalized.startsWith(`${prefix}/`);
  });
}
