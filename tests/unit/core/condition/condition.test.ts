/**
 * Tests for the condition evaluator.
 */
import { describe, it, expect } from 'vitest';
import {
  evaluateCondition,
  formatCondition,
  parseCondition,
  tryParseCondition,
} from '../../../../src/core/condition/index.js';
import { Environment } from '../../../../src/core/environment/index.js';
import { ConfigError, ErrorCodes } from '../../../../src/utils/errors.js';

describe('tryParseCondition', () => {
  it('should parse single-quoted equality', () => {
    expect(tryParseCondition("db == 'postgres'")).toEqual({ lhs: 'db', op: '==', rhs: 'postgres' });
  });

  it('should parse double-quoted inequality', () => {
    expect(tryParseCondition('db != "none"')).toEqual({ lhs: 'db', op: '!=', rhs: 'none' });
  });

  it('should accept unquoted literals and trim whitespace', () => {
    expect(tryParseCondition('  serde   ==   true  ')).toEqual({ lhs: 'serde', op: '==', rhs: 'true' });
  });

  it('should keep mismatched quotes', () => {
    expect(tryParseCondition(`db == 'postgres"`)).toEqual({ lhs: 'db', op: '==', rhs: `'postgres"` });
  });

  it('should use the first operator in the expression', () => {
    expect(tryParseCondition("a != 'x == y'")).toEqual({ lhs: 'a', op: '!=', rhs: 'x == y' });
  });

  it('should reject expressions without an operator', () => {
    expect(tryParseCondition('db')).toBeNull();
    expect(tryParseCondition("db = 'x'")).toBeNull();
  });

  it('should reject an empty or malformed identifier', () => {
    expect(tryParseCondition("== 'x'")).toBeNull();
    expect(tryParseCondition("a && b == 'x'")).toBeNull();
  });
});

describe('parseCondition', () => {
  it('should throw CONDITION_INVALID for malformed expressions', () => {
    expect(() => parseCondition('db')).toThrow(ConfigError);
    try {
      parseCondition('db');
    } catch (error) {
      expect(error).toMatchObject({ code: ErrorCodes.CONDITION_INVALID });
    }
  });
});

describe('evaluateCondition', () => {
  const env = new Environment({ db: 'postgres', serde: true, port: 3000 });

  it('should compare string values', () => {
    expect(evaluateCondition("db == 'postgres'", env)).toBe(true);
    expect(evaluateCondition("db == 'mysql'", env)).toBe(false);
    expect(evaluateCondition("db != 'mysql'", env)).toBe(true);
  });

  it('should compare the string form of booleans and numbers', () => {
    expect(evaluateCondition("serde == 'true'", env)).toBe(true);
    expect(evaluateCondition('port == 3000', env)).toBe(true);
  });

  it('should be false for a missing variable with either operator', () => {
    expect(evaluateCondition("feature_x == 'on'", env)).toBe(false);
    expect(evaluateCondition("feature_x != 'on'", env)).toBe(false);
  });

  it('should be false for an unparseable string', () => {
    expect(evaluateCondition('nonsense', env)).toBe(false);
  });

  it('should accept an already parsed condition', () => {
    expect(evaluateCondition({ lhs: 'db', op: '!=', rhs: 'postgres' }, env)).toBe(false);
  });
});

describe('formatCondition', () => {
  it('should render the canonical form', () => {
    expect(formatCondition(parseCondition('db=="postgres"'))).toBe("db == 'postgres'");
  });
});
