/**
 * Variable environment exports barrel file.
 */
export { Environment, buildEnvironment, deriveProjectNames } from './environment.js';
export type { VariableValue, VariableMap } from './environment.js';
export { DefaultOptionResolver, defaultOptionValue, resolveOptions } from './options.js';
export type { OptionResolver } from './options.js';
