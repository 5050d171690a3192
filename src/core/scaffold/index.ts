/**
 * Scaffold engine exports barrel file.
 */
export { ScaffoldEngine, MAX_REDIRECT_DEPTH, DEFAULT_MANIFEST } from './engine.js';
export { selectVariants, variantDirectory, excludedVariantDirectories, isUnderAny } from './variants.js';
export type { VariantSelection } from './variants.js';
export type {
  ScaffoldEngineOptions,
  ApplyRequest,
  ApplyResult,
  OperationOrigin,
  SourceKind,
  PlannedOperation,
  TargetConflict,
  PreparedTemplate,
  ScaffoldPlan,
  TemplateDescription,
} from './types.js';
