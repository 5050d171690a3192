/**
 * Tests for string utility functions.
 */
import { describe, it, expect } from 'vitest';
import { toKebabCase, toPascalCase, toSnakeCase, truncateString } from '../../../src/utils/string.js';

describe('toPascalCase', () => {
  it('should capitalize each run and drop separators', () => {
    expect(toPascalCase('My-Cool App')).toBe('MyCoolApp');
  });

  it('should treat underscores and dots as separators', () => {
    expect(toPascalCase('my_cool.app')).toBe('MyCoolApp');
  });

  it('should keep the rest of each run as written', () => {
    expect(toPascalCase('myHTTP-server')).toBe('MyHTTPServer');
  });

  it('should keep digits inside runs', () => {
    expect(toPascalCase('rp2040-blinky')).toBe('Rp2040Blinky');
  });

  it('should return an empty string for separators only', () => {
    expect(toPascalCase('--_ ')).toBe('');
  });
});

describe('toSnakeCase', () => {
  it('should replace hyphens with underscores', () => {
    expect(toSnakeCase('My-Cool App')).toBe('My_Cool App');
  });

  it('should leave underscores alone', () => {
    expect(toSnakeCase('already_snake')).toBe('already_snake');
  });
});

describe('toKebabCase', () => {
  it('should replace underscores with hyphens', () => {
    expect(toKebabCase('my_cool_app')).toBe('my-cool-app');
  });

  it('should leave spaces and case alone', () => {
    expect(toKebabCase('My-Cool App')).toBe('My-Cool App');
  });
});

describe('truncateString', () => {
  it('should truncate long string and add ellipsis', () => {
    const result = truncateString('Hello, World!', 10);
    expect(result).toBe('Hello, ...');
    expect(result).toHaveLength(10);
  });

  it('should return original string when exactly maxLen', () => {
    expect(truncateString('Hello', 5)).toBe('Hello');
  });

  it('should cut without ellipsis when maxLen is 3 or less', () => {
    expect(truncateString('Hello', 3)).toBe('Hel');
  });

  it('should return empty string for negative maxLen', () => {
    expect(truncateString('Hello', -1)).toBe('');
  });
});
