/**
 * Resolution of descriptor-declared options.
 *
 * Caller-supplied variables always win: an option is only resolved when the
 * caller did not provide a value for it.
 */
import { buildEnvironment, type Environment, type VariableMap, type VariableValue } from './environment.js';
import type { TemplateOption } from '../descriptor/index.js';

export interface OptionResolver {
  resolve(option: TemplateOption, env: Environment): Promise<VariableValue>;
}

/**
 * Value an option takes without asking anyone.
 *
 * - select: the default when it is one of the choices, else the first choice
 * - input: the default, else the empty string
 * - boolean: the default, else false
 */
export function defaultOptionValue(option: TemplateOption): VariableValue {
  switch (option.type) {
    case 'select': {
      const choices = option.options ?? [];
      const preferred = option.default === undefined ? undefined : String(option.default);
      if (preferred !== undefined && choices.includes(preferred)) {
        return preferred;
      }
      return choices[0] ?? '';
    }
    case 'boolean':
      return option.default === true || option.default === 'true';
    case 'input':
    default:
      return option.default === undefined ? '' : String(option.default);
  }
}

/**
 * Non-interactive resolver answering every option with its default.
 */
export class DefaultOptionResolver implements OptionResolver {
  async resolve(option: TemplateOption): Promise<VariableValue> {
    return defaultOptionValue(option);
  }
}

/**
 * Resolve every option the caller did not supply, in declaration order.
 * Each resolver call sees the answers given before it.
 */
export async function resolveOptions(
  options: readonly TemplateOption[],
  projectName: string,
  variables: VariableMap,
  resolver: OptionResolver
): Promise<Record<string, VariableValue>> {
  const resolved: Record<string, VariableValue> = {};
  const isSet = (record: VariableMap, name: string): boolean =>
    Object.prototype.hasOwnProperty.call(record, name);

  for (const option of options) {
    if (isSet(variables, option.name) || isSet(resolved, option.name)) {
      continue;
    }
    const env = buildEnvironment(projectName, variables, resolved);
    resolved[option.name] = await resolver.resolve(option, env);
  }

  return resolved;
}
