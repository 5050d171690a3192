/**
 * Post-apply hook exports barrel file.
 */
export { HookRegistry } from './registry.js';
export type { PostApplyHook, PostApplyContext } from './registry.js';
export { TEMPLATE_KINDS, isTemplateKind, resolveTemplateKind } from './kinds.js';
