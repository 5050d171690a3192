/**
 * Condition evaluator exports barrel file.
 */
export {
  parseCondition,
  tryParseCondition,
  evaluateCondition,
  formatCondition,
} from './condition.js';
export type { Condition, ConditionOperator } from './condition.js';
