/**
 * Type definitions for the scaffold engine.
 */
import type { Environment, OptionResolver, VariableMap, VariableValue } from '../environment/index.js';
import type { TemplateDescriptor, TemplateKind } from '../descriptor/index.js';
import type { TemplateLocation } from '../locator/index.js';
import type { HookRegistry } from '../hooks/index.js';
import type { DependencyRequest, ManifestEditor } from '../manifest/index.js';
import type { Logger } from '../../utils/logger.js';

/**
 * Options for constructing a ScaffoldEngine.
 */
export interface ScaffoldEngineOptions {
  /** Directory holding the templates */
  templatesRoot: string;
  /** Answers descriptor options the caller did not supply (defaults when omitted) */
  resolver?: OptionResolver;
  /** Receives dependency and workspace-member requests */
  manifestEditor?: ManifestEditor;
  /** Post-apply hooks by template kind */
  hooks?: HookRegistry;
  logger?: Logger;
  /** Additional extensions rendered as text (with leading dot) */
  extraTextExtensions?: readonly string[];
  /** Manifest file dependencies are declared against when a descriptor names none */
  defaultManifest?: string;
}

/**
 * One apply call.
 */
export interface ApplyRequest {
  /** Template name, possibly namespaced (`server/axum`) */
  templateName: string;
  /** Destination directory; created when missing */
  targetDir: string;
  projectName: string;
  /** Caller variables; always win over option answers */
  variables?: VariableMap;
  /** Leave unsupplied options unresolved instead of asking the resolver */
  skipOptionPrompts?: boolean;
  /** Register the target directory as a member of this workspace */
  workspaceRoot?: string;
}

/**
 * Where a planned operation came from.
 */
export type OperationOrigin = 'files' | 'conditional_files' | 'fallback';

/**
 * What the source of a planned operation is on disk.
 */
export type SourceKind = 'file' | 'directory' | 'missing';

export interface PlannedOperation {
  /** Absolute source path */
  source: string;
  /** Source relative to the template directory, `/`-separated */
  relativeSource: string;
  /** Target as declared, before rendering */
  declaredTarget: string;
  /** Rendered target relative to the destination, `/`-separated */
  target: string;
  origin: OperationOrigin;
  sourceKind: SourceKind;
  /** Canonical form of the condition or group guard that admitted the entry */
  condition?: string;
}

/**
 * Several operations writing the same target. The last one applied wins.
 */
export interface TargetConflict {
  target: string;
  sources: string[];
}

/**
 * A template resolved for one apply: located, loaded, redirected and with its
 * environment built.
 */
export interface PreparedTemplate {
  location: TemplateLocation;
  descriptor: TemplateDescriptor;
  kind: TemplateKind;
  env: Environment;
  /** Template names visited, first requested to last applied */
  redirects: string[];
  /** Absolute destination directory */
  targetDir: string;
}

export interface ScaffoldPlan {
  templateName: string;
  templateDir: string;
  targetDir: string;
  kind: TemplateKind;
  redirects: string[];
  operations: PlannedOperation[];
  conflicts: TargetConflict[];
  variables: Record<string, VariableValue>;
}

export interface ApplyResult {
  /** Template actually applied, relative to the templates root */
  templateName: string;
  templateDir: string;
  targetDir: string;
  kind: TemplateKind;
  redirects: string[];
  /** Absolute paths written and still present after variant cleanup, in first-write order */
  written: string[];
  /** Absolute paths removed by variant cleanup */
  removed: string[];
  conflicts: TargetConflict[];
  dependencies: DependencyRequest[];
  nextSteps: string[];
  /** Final environment */
  variables: Record<string, VariableValue>;
}

export interface TemplateDescription {
  location: TemplateLocation;
  descriptor: TemplateDescriptor;
  kind: TemplateKind;
}
