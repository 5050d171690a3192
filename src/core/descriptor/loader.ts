/**
 * Descriptor loading.
 */
import * as path from 'node:path';
import { DescriptorSchema, type TemplateDescriptor } from './schema.js';
import { loadStructuredWithSchema } from '../../utils/yaml.js';
import { globFiles, isDirectory, isFile } from '../../utils/file-system.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

/** Descriptor file names, in lookup order. */
export const DESCRIPTOR_FILENAMES = ['template.json', 'template.yaml', 'template.yml'] as const;

export interface LoadedDescriptor {
  descriptor: TemplateDescriptor;
  /** Absolute path of the descriptor file */
  path: string;
}

/**
 * Check whether a file name is one of the descriptor names.
 */
export function isDescriptorFilename(fileName: string): boolean {
  return DESCRIPTOR_FILENAMES.some((name) => name === fileName);
}

/**
 * Find the descriptor file of a template directory.
 */
export async function findDescriptorFile(templateDir: string): Promise<string | null> {
  for (const name of DESCRIPTOR_FILENAMES) {
    const candidate = path.join(templateDir, name);
    if (await isFile(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Load and validate the descriptor of a template directory.
 */
export async function loadDescriptor(templateDir: string): Promise<LoadedDescriptor> {
  const descriptorPath = await findDescriptorFile(templateDir);

  if (!descriptorPath) {
    throw new ConfigError(
      ErrorCodes.CONFIG_PARSE,
      `No template descriptor in ${templateDir} (looked for ${DESCRIPTOR_FILENAMES.join(', ')})`,
      { templateDir }
    );
  }

  const descriptor = await loadStructuredWithSchema(descriptorPath, DescriptorSchema);
  return { descriptor, path: descriptorPath };
}

/**
 * Directories below a template directory that carry their own descriptor,
 * relative to it and `/`-separated.
 */
export async function findNestedTemplates(templateDir: string): Promise<string[]> {
  if (!(await isDirectory(templateDir))) {
    return [];
  }
  const descriptorFiles = await globFiles(
    DESCRIPTOR_FILENAMES.map((fileName) => `*/**/${fileName}`),
    { cwd: templateDir, absolute: false, dot: true, ignore: ['**/node_modules/**', '**/.git/**'] }
  );
  return Array.from(new Set(descriptorFiles.map((file) => path.posix.dirname(file)))).sort();
}
