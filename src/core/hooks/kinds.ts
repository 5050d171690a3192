/**
 * Template kinds: the closed set of categories post-apply hooks dispatch on.
 */
import { TemplateKindSchema, type TemplateDescriptor, type TemplateKind } from '../descriptor/index.js';

export const TEMPLATE_KINDS: readonly TemplateKind[] = TemplateKindSchema.options;

export function isTemplateKind(value: string): value is TemplateKind {
  return TEMPLATE_KINDS.some((kind) => kind === value);
}

/**
 * The descriptor's declared kind, else the template's category directory when
 * it names a kind, else `generic`.
 */
export function resolveTemplateKind(
  descriptor: Pick<TemplateDescriptor, 'kind'> | undefined,
  category: string
): TemplateKind {
  if (descriptor?.kind) {
    return descriptor.kind;
  }
  return isTemplateKind(category) ? category : 'generic';
}
