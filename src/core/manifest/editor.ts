/**
 * Manifest-editing collaborator contract.
 *
 * The engine only declares what a generated project depends on; editing the
 * manifest file is left to an implementation of ManifestEditor.
 */
import type { Environment } from '../environment/index.js';
import type { DependencySpec, TemplateDescriptor } from '../descriptor/index.js';

export interface DependencyRequest {
  /** Absolute path of the manifest to edit */
  manifestPath: string;
  name: string;
  version: string;
  features: string[];
}

export interface WorkspaceMemberRequest {
  /** Absolute workspace root */
  workspaceRoot: string;
  /** Member path relative to the workspace root, `/`-separated */
  memberPath: string;
}

export interface ManifestEditor {
  addDependency(request: DependencyRequest): Promise<void>;
  addWorkspaceMember(request: WorkspaceMemberRequest): Promise<void>;
}

/** Dependency set key that always applies */
export const DEFAULT_DEPENDENCY_KEY = 'default';

/** Version used when a dependency declares none */
export const ANY_VERSION = '*';

function normalizeSpec(spec: DependencySpec): { version: string; features: string[] } {
  if (typeof spec === 'string') {
    return { version: spec, features: [] };
  }
  return { version: spec.version ?? ANY_VERSION, features: [...spec.features] };
}

/**
 * Dependency requests a descriptor declares for an environment.
 *
 * The `default` set applies first, then every set keyed by a value present in
 * the environment, in declaration order. A later declaration of the same name
 * replaces an earlier one.
 */
export function collectDependencies(
  descriptor: Pick<TemplateDescriptor, 'dependencies'>,
  env: Environment,
  manifestPath: string
): DependencyRequest[] {
  const sets = descriptor.dependencies;
  if (!sets) {
    return [];
  }

  const values = new Set(env.stringValues());
  const applicable = Object.entries(sets).filter(([key]) => key !== DEFAULT_DEPENDENCY_KEY && values.has(key));
  const defaults = sets[DEFAULT_DEPENDENCY_KEY];
  if (defaults) {
    applicable.unshift([DEFAULT_DEPENDENCY_KEY, defaults]);
  }

  const byName = new Map<string, DependencyRequest>();
  for (const [, set] of applicable) {
    for (const [name, spec] of Object.entries(set)) {
      byName.set(name, { manifestPath, name, ...normalizeSpec(spec) });
    }
  }
  return Array.from(byName.values());
}

/**
 * Editor that records requests without touching the file system.
 */
export class RecordingManifestEditor implements ManifestEditor {
  readonly dependencies: DependencyRequest[] = [];
  readonly workspaceMembers: WorkspaceMemberRequest[] = [];

  async addDependency(request: DependencyRequest): Promise<void> {
    this.dependencies.push(request);
  }

  async addWorkspaceMember(request: WorkspaceMemberRequest): Promise<void> {
    this.workspaceMembers.push(request);
  }
}
