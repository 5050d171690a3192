/**
 * YAML and JSON parsing utilities with zod validation.
 */
import { parse } from 'yaml';
import { z } from 'zod';
import { ConfigError, ErrorCodes, errorMessage } from './errors.js';
import { readFile } from './file-system.js';

/**
 * Parse YAML content into an object.
 */
export function parseYaml(content: string): unknown {
  try {
    return parse(content);
  } catch (error) {
    throw new ConfigError(
      ErrorCodes.CONFIG_PARSE,
      `Failed to parse YAML: ${errorMessage(error)}`,
      { error: errorMessage(error) }
    );
  }
}

/**
 * Parse JSON content.
 */
export function parseJson(content: string): unknown {
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new ConfigError(
      ErrorCodes.CONFIG_PARSE,
      `Failed to parse JSON: ${errorMessage(error)}`,
      { error: errorMessage(error) }
    );
  }
}

/**
 * Validate already-parsed data with a zod schema.
 */
export function validateWithSchema<T extends z.ZodTypeAny>(data: unknown, schema: T): z.infer<T> {
  const result = schema.safeParse(data);

  if (!result.success) {
    throw new ConfigError(
      ErrorCodes.CONFIG_INVALID,
      `Validation failed: ${formatZodError(result.error)}`,
      { errors: result.error.issues }
    );
  }

  return result.data;
}

/**
 * Load and validate a structured data file. `.json` files are parsed as JSON,
 * anything else as YAML.
 */
export async function loadStructuredWithSchema<T extends z.ZodTypeAny>(
  filePath: string,
  schema: T
): Promise<z.infer<T>> {
  let content: string;
  try {
    content = await readFile(filePath);
  } catch (error) {
    throw new ConfigError(
      ErrorCodes.CONFIG_PARSE,
      `Failed to read file: ${filePath}`,
      { filePath, error: errorMessage(error) }
    );
  }

  try {
    const data = filePath.endsWith('.json') ? parseJson(content) : parseYaml(content);
    return validateWithSchema(data, schema);
  } catch (error) {
    if (error instanceof ConfigError) {
      // Re-throw with file path context
      throw new ConfigError(
        error.code,
        `${error.message} (file: ${filePath})`,
        { ...error.details, filePath }
      );
    }
    throw error;
  }
}

/**
 * Format zod errors into a readable string.
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((e) => {
      const path = e.path.join('.');
      return path ? `${path}: ${e.message}` : e.message;
    })
    .join('; ');
}
