/**
 * Template descriptor exports barrel file.
 */
export {
  DESCRIPTOR_FILENAMES,
  isDescriptorFilename,
  findDescriptorFile,
  loadDescriptor,
  findNestedTemplates,
} from './loader.js';
export type { LoadedDescriptor } from './loader.js';
export { DescriptorSchema, TemplateKindSchema } from './schema.js';
export type {
  TemplateDescriptor,
  TemplateKind,
  FileEntry,
  ConditionalGroup,
  TemplateOption,
  OptionType,
  DependencySpec,
  NextSteps,
  Redirect,
  Variant,
} from './schema.js';
