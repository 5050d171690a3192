/**
 * Post-apply hook registry.
 *
 * Template-specific patching (compatibility rewrites of generated sources and
 * the like) lives outside the engine. Callers register hooks per template kind;
 * the engine runs the hooks registered for the applied template's kind, in
 * registration order, after all files are written.
 */
import type { Environment } from '../environment/index.js';
import type { TemplateKind } from '../descriptor/index.js';
import { ErrorCodes, RenderError, StampkitError, errorMessage } from '../../utils/errors.js';

export interface PostApplyContext {
  /** Absolute destination directory */
  targetDir: string;
  /** Template actually applied (after redirects) */
  templateName: string;
  kind: TemplateKind;
  env: Environment;
}

export type PostApplyHook = (context: PostApplyContext) => Promise<void> | void;

export class HookRegistry {
  private readonly hooks = new Map<TemplateKind, PostApplyHook[]>();

  /**
   * Register a hook for a template kind. Returns the registry for chaining.
   */
  register(kind: TemplateKind, hook: PostApplyHook): this {
    const list = this.hooks.get(kind) ?? [];
    list.push(hook);
    this.hooks.set(kind, list);
    return this;
  }

  hooksFor(kind: TemplateKind): readonly PostApplyHook[] {
    return this.hooks.get(kind) ?? [];
  }

  /**
   * Run every hook registered for the context's kind.
   * @returns number of hooks run
   * @throws RenderError (HOOK_FAILED) wrapping the first failure
   */
  async run(context: PostApplyContext): Promise<number> {
    const hooks = this.hooksFor(context.kind);
    for (const [index, hook] of hooks.entries()) {
      try {
        await hook(context);
      } catch (error) {
        throw new RenderError(
          ErrorCodes.HOOK_FAILED,
          `Post-apply hook ${index + 1} for '${context.kind}' templates failed: ${errorMessage(error)}`,
          {
            kind: context.kind,
            templateName: context.templateName,
            cause: error instanceof StampkitError ? error.toJSON() : errorMessage(error),
          }
        );
      }
    }
    return hooks.length;
  }
}
