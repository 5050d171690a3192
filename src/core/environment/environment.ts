/**
 * Variable environment for one scaffolding run.
 *
 * Built once per apply from the project name, resolved option answers and
 * caller overrides, then shared read-only by every condition and render pass.
 */
import { toKebabCase, toPascalCase, toSnakeCase } from '../../utils/string.js';

export type VariableValue = string | boolean | number;

export type VariableMap = Readonly<Record<string, VariableValue>>;

/**
 * Immutable variable lookup.
 */
export class Environment {
  private readonly values: ReadonlyMap<string, VariableValue>;

  constructor(values: Record<string, VariableValue>) {
    this.values = new Map(Object.entries(values));
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  get(name: string): VariableValue | undefined {
    return this.values.get(name);
  }

  /**
   * String form of a variable, or undefined when absent.
   */
  getString(name: string): string | undefined {
    const value = this.values.get(name);
    return value === undefined ? undefined : String(value);
  }

  get projectName(): string {
    return this.getString('project_name') ?? '';
  }

  /**
   * All string forms held by the environment, in insertion order.
   */
  stringValues(): string[] {
    return Array.from(this.values.values(), (value) => String(value));
  }

  entries(): Array<[string, VariableValue]> {
    return Array.from(this.values.entries());
  }

  toRecord(): Record<string, VariableValue> {
    return Object.fromEntries(this.values);
  }
}

/**
 * Names always derived from the project name.
 */
export function deriveProjectNames(projectName: string): Record<string, string> {
  return {
    project_name: projectName,
    project_name_pascal_case: toPascalCase(projectName),
    project_name_snake_case: toSnakeCase(projectName),
    project_name_kebab_case: toKebabCase(projectName),
  };
}

/**
 * Build the environment for one apply.
 *
 * Precedence, lowest first: derived project names, resolved option answers,
 * caller overrides.
 */
export function buildEnvironment(
  projectName: string,
  overrides: VariableMap = {},
  resolved: VariableMap = {}
): Environment {
  return new Environment({
    ...deriveProjectNames(projectName),
    ...resolved,
    ...overrides,
  });
}
