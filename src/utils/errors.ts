/**
 * Error types and codes for stampkit.
 * All errors raised by the engine extend StampkitError and carry a code.
 */

/**
 * Base error class for all stampkit errors.
 */
export class StampkitError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'StampkitError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * A template name did not resolve to a directory with a descriptor.
 */
export class TemplateNotFoundError extends StampkitError {
  constructor(public readonly templateName: string, details?: Record<string, unknown>) {
    super(ErrorCodes.NOT_FOUND, `Template '${templateName}' not found`, { templateName, ...details });
    this.name = 'TemplateNotFoundError';
  }
}

/**
 * Configuration errors (descriptor or tool config present but unusable).
 */
export class ConfigError extends StampkitError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * An explicitly declared source artifact is missing from the template.
 */
export class SourceMissingError extends StampkitError {
  constructor(public readonly sourcePath: string, details?: Record<string, unknown>) {
    super(ErrorCodes.SOURCE_MISSING, `Source file does not exist: ${sourcePath}`, { sourcePath, ...details });
    this.name = 'SourceMissingError';
  }
}

/**
 * Substitution or I/O failure while producing output.
 */
export class RenderError extends StampkitError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'RenderError';
  }
}

/**
 * A chain of descriptor redirects that does not terminate.
 */
export class RedirectLoopError extends StampkitError {
  constructor(public readonly chain: string[]) {
    super(ErrorCodes.REDIRECT_LOOP, `Template redirect loop: ${chain.join(' -> ')}`, { chain });
    this.name = 'RedirectLoopError';
  }
}

/**
 * Security errors (path traversal out of a templates root or destination).
 */
export class SecurityError extends StampkitError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SecurityError';
  }
}

export const ErrorCodes = {
  // Locator
  NOT_FOUND: 'NOT_FOUND',

  // Descriptor and tool configuration
  CONFIG_PARSE: 'CONFIG_PARSE',
  CONFIG_INVALID: 'CONFIG_INVALID',
  CONDITION_INVALID: 'CONDITION_INVALID',

  // Materialization
  SOURCE_MISSING: 'SOURCE_MISSING',
  RENDER_FAILED: 'RENDER_FAILED',
  HOOK_FAILED: 'HOOK_FAILED',
  REDIRECT_LOOP: 'REDIRECT_LOOP',

  // Security
  PATH_TRAVERSAL: 'PATH_TRAVERSAL',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Extract a message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
