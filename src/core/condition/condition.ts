/**
 * Condition evaluator.
 *
 * Grammar: `<ident> <op> <literal>` with `op` in `==` / `!=`. The literal may be
 * single-quoted, double-quoted or bare. There are no compound expressions.
 */
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import type { Environment } from '../environment/index.js';

export type ConditionOperator = '==' | '!=';

export interface Condition {
  lhs: string;
  op: ConditionOperator;
  rhs: string;
}

const IDENTIFIER = /^[A-Za-z_][\w.-]*$/;

/**
 * Parse a condition string, or return null when it is not in the grammar.
 */
export function tryParseCondition(expr: string): Condition | null {
  const eq = expr.indexOf('==');
  const ne = expr.indexOf('!=');

  let index: number;
  let op: ConditionOperator;
  if (eq === -1 && ne === -1) {
    return null;
  } else if (ne === -1 || (eq !== -1 && eq < ne)) {
    index = eq;
    op = '==';
  } else {
    index = ne;
    op = '!=';
  }

  const lhs = expr.slice(0, index).trim();
  const rhs = stripQuotes(expr.slice(index + 2).trim());

  if (!IDENTIFIER.test(lhs)) {
    return null;
  }

  return { lhs, op, rhs };
}

/**
 * Parse a condition string.
 * @throws ConfigError when the expression is not in the grammar
 */
export function parseCondition(expr: string): Condition {
  const condition = tryParseCondition(expr);
  if (!condition) {
    throw new ConfigError(
      ErrorCodes.CONDITION_INVALID,
      `Invalid condition '${expr}': expected "<variable> == '<value>'" or "<variable> != '<value>'"`,
      { expression: expr }
    );
  }
  return condition;
}

/**
 * Evaluate a condition against an environment.
 *
 * A variable missing from the environment makes the whole condition false,
 * for both operators. Unparseable strings are false as well.
 */
export function evaluateCondition(condition: Condition | string, env: Environment): boolean {
  const parsed = typeof condition === 'string' ? tryParseCondition(condition) : condition;
  if (!parsed) {
    return false;
  }

  const actual = env.getString(parsed.lhs);
  if (actual === undefined) {
    return false;
  }

  return parsed.op === '==' ? actual === parsed.rhs : actual !== parsed.rhs;
}

/**
 * Render a condition back to its canonical string form.
 */
export function formatCondition(condition: Condition): string {
  return `${condition.lhs} ${condition.op} '${condition.rhs}'`;
}

function stripQuotes(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    const last = value[value.length - 1];
    if ((first === "'" || first === '"') && first === last) {
      return value.slice(1, -1);
    }
  }
  return value;
}
