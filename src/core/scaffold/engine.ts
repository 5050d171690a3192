/**
 * Scaffold engine: materializes a template into a destination directory.
 *
 * One apply runs these steps in order:
 * 1. Locate the template and load its descriptor
 * 2. Follow redirects until a template applies itself
 * 3. Build the variable environment (caller variables win over option answers)
 * 4. Plan and render file entries and conditional groups, or the whole
 *    template directory when the descriptor lists no files
 * 5. Clean up variant directories that were not selected
 * 6. Hand dependencies and workspace membership to the manifest editor
 * 7. Run post-apply hooks and resolve next steps
 *
 * Steps 1 to 3 never touch the destination. A failure from step 4 on leaves
 * whatever was already written in place; re-applying overwrites it.
 */
import * as path from 'node:path';
import {
  DefaultOptionResolver,
  buildEnvironment,
  resolveOptions,
  type OptionResolver,
  type VariableValue,
} from '../environment/index.js';
import { evaluateCondition, formatCondition } from '../condition/index.js';
import {
  findNestedTemplates,
  isDescriptorFilename,
  loadDescriptor,
  type FileEntry,
  type TemplateDescriptor,
} from '../descriptor/index.js';
import { listTemplates, locateTemplate, type TemplateSummary } from '../locator/index.js';
import { renderFile, renderTargetPath, renderTree, type RenderOptions, type RenderedFile } from '../render/index.js';
import { HookRegistry, resolveTemplateKind } from '../hooks/index.js';
import { collectDependencies, type DependencyRequest, type ManifestEditor } from '../manifest/index.js';
import { resolveNextSteps } from '../next-steps/index.js';
import {
  excludedVariantDirectories,
  isUnderAny,
  selectVariants,
  variantDirectory,
  type VariantSelection,
} from './variants.js';
import type {
  ApplyRequest,
  ApplyResult,
  OperationOrigin,
  PlannedOperation,
  PreparedTemplate,
  ScaffoldEngineOptions,
  ScaffoldPlan,
  SourceKind,
  TargetConflict,
  TemplateDescription,
} from './types.js';
import {
  ensureDir,
  fileExists,
  isDirectory,
  isEmptyDirectory,
  isFile,
  isWithin,
  removePath,
  toPosixPath,
} from '../../utils/file-system.js';
import { ErrorCodes, RedirectLoopError, SecurityError } from '../../utils/errors.js';
import { logger as rootLogger, type Logger } from '../../utils/logger.js';

/** Longest redirect chain followed before giving up */
export const MAX_REDIRECT_DEPTH = 16;

/** Manifest dependencies are declared against when neither descriptor nor caller names one */
export const DEFAULT_MANIFEST = 'Cargo.toml';

/**
 * Scaffold engine over one templates root.
 */
export class ScaffoldEngine {
  private readonly templatesRoot: string;
  private readonly resolver: OptionResolver;
  private readonly manifestEditor?: ManifestEditor;
  private readonly hooks: HookRegistry;
  private readonly log: Logger;
  private readonly extraTextExtensions: readonly string[];
  private readonly defaultManifest: string;

  constructor(options: ScaffoldEngineOptions) {
    this.templatesRoot = path.resolve(options.templatesRoot);
    this.resolver = options.resolver ?? new DefaultOptionResolver();
    this.manifestEditor = options.manifestEditor;
    this.hooks = options.hooks ?? new HookRegistry();
    this.log = options.logger ?? rootLogger.child('scaffold');
    this.extraTextExtensions = options.extraTextExtensions ?? [];
    this.defaultManifest = options.defaultManifest ?? DEFAULT_MANIFEST;
  }

  /**
   * Every template under the root.
   */
  async list(): Promise<TemplateSummary[]> {
    return listTemplates(this.templatesRoot);
  }

  /**
   * Locate and load one template without following its redirect.
   */
  async describe(templateName: string): Promise<TemplateDescription> {
    const location = await locateTemplate(this.templatesRoot, templateName);
    const { descriptor } = await loadDescriptor(location.dir);
    return { location, descriptor, kind: resolveTemplateKind(descriptor, location.category) };
  }

  /**
   * Locate, load and redirect, then build the environment. Read-only.
   *
   * @throws TemplateNotFoundError, ConfigError, RedirectLoopError
   */
  async prepare(request: ApplyRequest): Promise<PreparedTemplate> {
    const variables: Record<string, VariableValue> = { ...request.variables };
    const redirects: string[] = [];
    const visited = new Set<string>();
    let name = request.templateName;

    for (;;) {
      const location = await locateTemplate(this.templatesRoot, name);
      redirects.push(name);
      if (visited.has(location.dir) || redirects.length > MAX_REDIRECT_DEPTH) {
        throw new RedirectLoopError(redirects);
      }
      visited.add(location.dir);

      const { descriptor } = await loadDescriptor(location.dir);
      this.log.debug(`Loaded template ${location.relativePath}`);

      const next = await this.redirectTarget(descriptor, request, variables);
      if (next === null) {
        const resolved = request.skipOptionPrompts
          ? {}
          : await resolveOptions(descriptor.options, request.projectName, variables, this.resolver);

        return {
          location,
          descriptor,
          kind: resolveTemplateKind(descriptor, location.category),
          env: buildEnvironment(request.projectName, variables, resolved),
          redirects,
          targetDir: path.resolve(request.targetDir),
        };
      }

      this.log.debug(`Redirecting ${name} -> ${next}`);
      name = next;
    }
  }

  /**
   * Everything apply would write, without writing it.
   */
  async plan(request: ApplyRequest): Promise<ScaffoldPlan> {
    const prepared = await this.prepare(request);
    const { operations, conflicts } = await this.planOperations(prepared);

    return {
      templateName: prepared.location.relativePath,
      templateDir: prepared.location.dir,
      targetDir: prepared.targetDir,
      kind: prepared.kind,
      redirects: prepared.redirects,
      operations,
      conflicts,
      variables: prepared.env.toRecord(),
    };
  }

  /**
   * Materialize a template into the request's target directory.
   */
  async apply(request: ApplyRequest): Promise<ApplyResult> {
    const prepared = await this.prepare(request);
    const { location, descriptor, env, kind, targetDir } = prepared;
    const memberPath = request.workspaceRoot
      ? workspaceMemberPath(request.workspaceRoot, targetDir)
      : undefined;

    const { operations, conflicts } = await this.planOperations(prepared);
    const selections = selectVariants(descriptor.variants, env);
    const excluded = excludedVariantDirectories(selections);

    await ensureDir(targetDir);

    const written: string[] = [];
    for (const operation of operations) {
      const files = await this.execute(prepared, operation, excluded);
      written.push(...files.map((file) => file.target));
    }
    this.log.debug(`Rendered ${written.length} file(s) into ${targetDir}`);

    const removed = await this.cleanupVariants(prepared, selections, written);
    const produced = await existingFiles(written);
    const dependencies = await this.declareDependencies(prepared);

    if (request.workspaceRoot && memberPath !== undefined) {
      await this.manifestEditor?.addWorkspaceMember({
        workspaceRoot: path.resolve(request.workspaceRoot),
        memberPath,
      });
    }

    const hookCount = await this.hooks.run({
      targetDir,
      templateName: location.relativePath,
      kind,
      env,
    });
    if (hookCount > 0) {
      this.log.debug(`Ran ${hookCount} post-apply hook(s) for '${kind}'`);
    }

    const nextSteps = await resolveNextSteps(descriptor, targetDir, env, this.log);

    return {
      templateName: location.relativePath,
      templateDir: location.dir,
      targetDir,
      kind,
      redirects: prepared.redirects,
      written: produced,
      removed,
      conflicts,
      dependencies,
      nextSteps,
      variables: env.toRecord(),
    };
  }

  /**
   * Template a redirect points at for the current variables, or null.
   * A redirect variable that is also a declared option is resolved first.
   */
  private async redirectTarget(
    descriptor: TemplateDescriptor,
    request: ApplyRequest,
    variables: Record<string, VariableValue>
  ): Promise<string | null> {
    const redirect = descriptor.redirect;
    if (!redirect) {
      return null;
    }

    let env = buildEnvironment(request.projectName, variables);
    if (!env.has(redirect.variable) && !request.skipOptionPrompts) {
      const option = descriptor.options.find((candidate) => candidate.name === redirect.variable);
      if (option) {
        variables[option.name] = await this.resolver.resolve(option, env);
        env = buildEnvironment(request.projectName, variables);
      }
    }

    const value = env.getString(redirect.variable);
    if (value === undefined) {
      return null;
    }
    return Object.prototype.hasOwnProperty.call(redirect.templates, value)
      ? (redirect.templates[value] ?? null)
      : null;
  }

  private async planOperations(
    prepared: PreparedTemplate
  ): Promise<{ operations: PlannedOperation[]; conflicts: TargetConflict[] }> {
    const { descriptor, env, location } = prepared;

    if (descriptor.files === undefined && descriptor.conditional_files === undefined) {
      return {
        operations: [
          {
            source: location.dir,
            relativeSource: '.',
            declaredTarget: '.',
            target: '.',
            origin: 'fallback',
            sourceKind: 'directory',
          },
        ],
        conflicts: [],
      };
    }

    const excluded = excludedVariantDirectories(selectVariants(descriptor.variants, env));
    const operations: PlannedOperation[] = [];

    for (const entry of descriptor.files ?? []) {
      if (entry.condition && !evaluateCondition(entry.condition, env)) {
        this.log.debug(`Skipping ${entry.source}: ${formatCondition(entry.condition)} is false`);
        continue;
      }
      const guard = entry.condition ? formatCondition(entry.condition) : undefined;
      const operation = await this.planEntry(prepared, entry, 'files', excluded, guard);
      if (operation) operations.push(operation);
    }

    for (const group of descriptor.conditional_files ?? []) {
      if (!evaluateCondition(group.when, env)) {
        this.log.debug(`Skipping group: ${formatCondition(group.when)} is false`);
        continue;
      }
      for (const entry of group.files) {
        if (entry.condition && !evaluateCondition(entry.condition, env)) {
          continue;
        }
        const operation = await this.planEntry(
          prepared,
          entry,
          'conditional_files',
          excluded,
          formatCondition(group.when)
        );
        if (operation) operations.push(operation);
      }
    }

    return { operations, conflicts: this.findConflicts(operations) };
  }

  private async planEntry(
    prepared: PreparedTemplate,
    entry: FileEntry,
    origin: OperationOrigin,
    excluded: readonly string[],
    condition: string | undefined
  ): Promise<PlannedOperation | null> {
    const { location, env, targetDir } = prepared;
    const source = path.resolve(location.dir, entry.source);
    if (!isWithin(location.dir, source)) {
      throw new SecurityError(
        ErrorCodes.PATH_TRAVERSAL,
        `Source path escapes the template directory: ${entry.source}`,
        { source: entry.source, templateDir: location.dir }
      );
    }

    const absoluteTarget = path.resolve(targetDir, renderTargetPath(entry.target, env));
    if (!isWithin(targetDir, absoluteTarget)) {
      throw new SecurityError(
        ErrorCodes.PATH_TRAVERSAL,
        `Target path escapes the destination: ${entry.target}`,
        { target: entry.target, destinationRoot: targetDir }
      );
    }

    const relativeSource = toPosixPath(path.relative(location.dir, source)) || '.';
    const target = toPosixPath(path.relative(targetDir, absoluteTarget)) || '.';

    if (source === location.descriptorPath || isDescriptorFilename(path.basename(absoluteTarget))) {
      this.log.debug(`Skipping descriptor entry ${entry.source}`);
      return null;
    }
    if (isUnderAny(relativeSource, excluded)) {
      this.log.debug(`Skipping ${entry.source}: belongs to a variant that was not selected`);
      return null;
    }

    return {
      source,
      relativeSource,
      declaredTarget: entry.target,
      target,
      origin,
      sourceKind: await sourceKindOf(source),
      ...(condition === undefined ? {} : { condition }),
    };
  }

  private findConflicts(operations: readonly PlannedOperation[]): TargetConflict[] {
    const byTarget = new Map<string, string[]>();
    for (const operation of operations) {
      const sources = byTarget.get(operation.target) ?? [];
      sources.push(operation.relativeSource);
      byTarget.set(operation.target, sources);
    }

    const conflicts: TargetConflict[] = [];
    for (const [target, sources] of byTarget) {
      if (sources.length > 1) {
        conflicts.push({ target, sources });
        this.log.warn(
          `${sources.length} entries write ${target}; the last applied (${sources[sources.length - 1]}) wins`
        );
      }
    }
    return conflicts;
  }

  private renderOptions(targetDir: string): RenderOptions {
    return { destinationRoot: targetDir, extraTextExtensions: this.extraTextExtensions };
  }

  private async execute(
    prepared: PreparedTemplate,
    operation: PlannedOperation,
    excluded: readonly string[]
  ): Promise<RenderedFile[]> {
    const { env, targetDir } = prepared;
    const options = this.renderOptions(targetDir);

    switch (operation.sourceKind) {
      case 'directory': {
        // Sub-templates are applied through redirects, never copied
        const skipped =
          operation.origin === 'fallback'
            ? [...excluded, ...(await findNestedTemplates(prepared.location.dir))]
            : excluded;
        return renderTree(operation.source, path.resolve(targetDir, operation.target), env, {
          ...options,
          exclude: (relativePath) => {
            const templatePath =
              operation.relativeSource === '.'
                ? relativePath
                : path.posix.join(operation.relativeSource, relativePath);
            return (
              isDescriptorFilename(path.posix.basename(templatePath)) || isUnderAny(templatePath, skipped)
            );
          },
        });
      }
      case 'file':
      case 'missing':
        return [await renderFile(operation.source, operation.declaredTarget, env, options)];
    }
  }

  private async cleanupVariants(
    prepared: PreparedTemplate,
    selections: readonly VariantSelection[],
    written: string[]
  ): Promise<string[]> {
    const { location, env, targetDir } = prepared;
    const removed: string[] = [];

    for (const { variant, selected } of selections) {
      for (const superseded of variant.remove) {
        await this.removeOutput(prepared, superseded, removed);
      }

      const promoted = variant.promote && variant.values.includes(selected);
      if (promoted) {
        const files = await renderTree(
          path.join(location.dir, variantDirectory(variant, selected)),
          targetDir,
          env,
          { ...this.renderOptions(targetDir), required: false }
        );
        written.push(...files.map((file) => file.target));
        this.log.debug(`Promoted variant ${variant.variable}=${selected} (${files.length} file(s))`);
      }

      for (const value of variant.values) {
        if (value === selected && !promoted) continue;
        await this.removeOutput(prepared, variantDirectory(variant, value), removed);
      }

      if (variant.root) {
        const rootDir = this.outputPath(prepared, variant.root);
        if ((await isDirectory(rootDir)) && (await isEmptyDirectory(rootDir))) {
          await removePath(rootDir);
          removed.push(rootDir);
        }
      }
    }

    return removed;
  }

  /**
   * Absolute output path of a destination-relative path, rendered.
   * @throws SecurityError when it is the destination itself or lies outside it
   */
  private outputPath(prepared: PreparedTemplate, relativePath: string): string {
    const { env, targetDir } = prepared;
    const absolute = path.resolve(targetDir, renderTargetPath(relativePath, env));
    if (absolute === targetDir || !isWithin(targetDir, absolute)) {
      throw new SecurityError(
        ErrorCodes.PATH_TRAVERSAL,
        `Cleanup path must lie inside the destination: ${relativePath}`,
        { path: relativePath, destinationRoot: targetDir }
      );
    }
    return absolute;
  }

  private async removeOutput(prepared: PreparedTemplate, relativePath: string, removed: string[]): Promise<void> {
    const absolute = this.outputPath(prepared, relativePath);
    if (await fileExists(absolute)) {
      await removePath(absolute);
      removed.push(absolute);
      this.log.debug(`Removed ${relativePath}`);
    }
  }

  private async declareDependencies(prepared: PreparedTemplate): Promise<DependencyRequest[]> {
    const { descriptor, env, targetDir } = prepared;
    const manifestPath = path.join(targetDir, descriptor.manifest ?? this.defaultManifest);
    const requests = collectDependencies(descriptor, env, manifestPath);

    for (const request of requests) {
      await this.manifestEditor?.addDependency(request);
    }
    if (requests.length > 0 && !this.manifestEditor) {
      this.log.debug(`No manifest editor; ${requests.length} dependency request(s) not applied`);
    }
    return requests;
  }
}

/**
 * Paths still on disk, each once, in first-write order.
 */
async function existingFiles(paths: readonly string[]): Promise<string[]> {
  const present: string[] = [];
  for (const file of new Set(paths)) {
    if (await isFile(file)) present.push(file);
  }
  return present;
}

async function sourceKindOf(source: string): Promise<SourceKind> {
  if (await isFile(source)) return 'file';
  if (await isDirectory(source)) return 'directory';
  return 'missing';
}

/**
 * Target directory relative to a workspace root, `/`-separated.
 * @throws SecurityError when the target lies outside the workspace
 */
function workspaceMemberPath(workspaceRoot: string, targetDir: string): string {
  const root = path.resolve(workspaceRoot);
  if (!isWithin(root, targetDir) || root === targetDir) {
    throw new SecurityError(
      ErrorCodes.PATH_TRAVERSAL,
      `Target directory is not inside the workspace: ${targetDir}`,
      { workspaceRoot: root, targetDir }
    );
  }
  return toPosixPath(path.relative(root, targetDir));
}
