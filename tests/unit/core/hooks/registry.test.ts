/**
 * Tests for the post-apply hook registry.
 */
import { describe, it, expect, vi } from 'vitest';
import { HookRegistry, type PostApplyContext } from '../../../../src/core/hooks/index.js';
import { buildEnvironment } from '../../../../src/core/environment/index.js';
import { ErrorCodes, RenderError } from '../../../../src/utils/errors.js';

function context(kind: PostApplyContext['kind']): PostApplyContext {
  return { targetDir: '/tmp/demo', templateName: 'embedded', kind, env: buildEnvironment('demo') };
}

describe('HookRegistry', () => {
  it('should run nothing when no hook is registered', async () => {
    const registry = new HookRegistry();

    expect(await registry.run(context('embedded'))).toBe(0);
    expect(registry.hooksFor('embedded')).toEqual([]);
  });

  it('should run hooks for the matching kind in registration order', async () => {
    const calls: string[] = [];
    const registry = new HookRegistry()
      .register('embedded', () => {
        calls.push('first');
      })
      .register('server', () => {
        calls.push('server');
      })
      .register('embedded', async () => {
        calls.push('second');
      });

    const count = await registry.run(context('embedded'));

    expect(count).toBe(2);
    expect(calls).toEqual(['first', 'second']);
  });

  it('should pass the context to each hook', async () => {
    const hook = vi.fn();
    const registry = new HookRegistry().register('library', hook);
    const ctx = context('library');

    await registry.run(ctx);

    expect(hook).toHaveBeenCalledWith(ctx);
  });

  it('should wrap a failing hook in a HOOK_FAILED error and stop', async () => {
    const later = vi.fn();
    const registry = new HookRegistry()
      .register('server', () => {
        throw new Error('patch failed');
      })
      .register('server', later);

    const error = await registry.run(context('server')).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RenderError);
    expect(error).toMatchObject({
      code: ErrorCodes.HOOK_FAILED,
      message: "Post-apply hook 1 for 'server' templates failed: patch failed",
    });
    expect(later).not.toHaveBeenCalled();
  });
});
