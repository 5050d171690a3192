/**
 * Template locator.
 *
 * Resolution order (first directory carrying a descriptor wins):
 * 1. Direct child `root/name`
 * 2. Namespaced path `root/category/sub` when the name contains a separator
 * 3. For each immediate subdirectory D of root: `D/name`, then any child of D
 *    whose basename equals the trailing segment of the name
 */
import * as path from 'node:path';
import { findDescriptorFile, loadDescriptor, DESCRIPTOR_FILENAMES } from '../descriptor/index.js';
import { resolveTemplateKind } from '../hooks/kinds.js';
import type { TemplateKind } from '../descriptor/index.js';
import { globFiles, isDirectory, listSubdirectories, toPosixPath } from '../../utils/file-system.js';
import { ErrorCodes, SecurityError, TemplateNotFoundError, errorMessage } from '../../utils/errors.js';

export interface TemplateLocation {
  /** Name as requested */
  name: string;
  /** Absolute template directory */
  dir: string;
  /** Absolute descriptor path */
  descriptorPath: string;
  /** Template directory relative to the templates root, `/`-separated */
  relativePath: string;
  /** First segment of relativePath */
  category: string;
}

export interface TemplateSummary {
  name: string;
  dir: string;
  description?: string;
  kind: TemplateKind;
  /** Set when the descriptor exists but does not load */
  error?: string;
}

/**
 * Split and validate a template name.
 * @throws SecurityError for absolute names or `..` segments
 */
function nameSegments(name: string): string[] {
  const normalized = name.replace(/\\/g, '/');
  if (path.isAbsolute(name) || normalized.startsWith('/')) {
    throw new SecurityError(ErrorCodes.PATH_TRAVERSAL, `Template name must be relative: ${name}`, { name });
  }
  const segments = normalized.split('/').filter((segment) => segment !== '' && segment !== '.');
  if (segments.includes('..')) {
    throw new SecurityError(ErrorCodes.PATH_TRAVERSAL, `Template name escapes the templates root: ${name}`, { name });
  }
  return segments;
}

async function candidate(root: string, name: string, dir: string): Promise<TemplateLocation | null> {
  if (!(await isDirectory(dir))) {
    return null;
  }
  const descriptorPath = await findDescriptorFile(dir);
  if (!descriptorPath) {
    return null;
  }
  const relativePath = toPosixPath(path.relative(root, dir));
  return {
    name,
    dir,
    descriptorPath,
    relativePath,
    category: relativePath.split('/')[0] ?? relativePath,
  };
}

/**
 * Locate a template directory by name.
 * @throws TemplateNotFoundError when no candidate carries a descriptor
 */
export async function locateTemplate(root: string, name: string): Promise<TemplateLocation> {
  const templatesRoot = path.resolve(root);
  const segments = nameSegments(name);

  if (segments.length === 0) {
    throw new TemplateNotFoundError(name, { root: templatesRoot });
  }

  const trailing = segments[segments.length - 1];

  // 1. direct child
  if (segments.length === 1) {
    const direct = await candidate(templatesRoot, name, path.join(templatesRoot, trailing));
    if (direct) return direct;
  }

  // 2. namespaced path
  if (segments.length > 1) {
    const nested = await candidate(templatesRoot, name, path.join(templatesRoot, ...segments));
    if (nested) return nested;
  }

  // 3. search one and two levels down
  for (const dirName of await listSubdirectories(templatesRoot)) {
    const categoryDir = path.join(templatesRoot, dirName);

    const inside = await candidate(templatesRoot, name, path.join(categoryDir, ...segments));
    if (inside) return inside;

    for (const childName of await listSubdirectories(categoryDir)) {
      if (childName !== trailing) continue;
      const deeper = await candidate(templatesRoot, name, path.join(categoryDir, childName));
      if (deeper) return deeper;
    }
  }

  throw new TemplateNotFoundError(name, { root: templatesRoot });
}

/**
 * List every template under a root, up to three directory levels deep.
 */
export async function listTemplates(root: string): Promise<TemplateSummary[]> {
  const templatesRoot = path.resolve(root);
  const descriptorFiles = await globFiles(
    DESCRIPTOR_FILENAMES.map((fileName) => `**/${fileName}`),
    { cwd: templatesRoot, deep: 4, ignore: ['**/node_modules/**'] }
  );

  const dirs = Array.from(new Set(descriptorFiles.map((file) => path.dirname(file))))
    .filter((dir) => dir !== templatesRoot)
    .sort();

  const summaries: TemplateSummary[] = [];
  for (const dir of dirs) {
    const name = toPosixPath(path.relative(templatesRoot, dir));
    const category = name.split('/')[0] ?? name;
    try {
      const { descriptor } = await loadDescriptor(dir);
      summaries.push({
        name,
        dir,
        description: descriptor.description,
        kind: resolveTemplateKind(descriptor, category),
      });
    } catch (error) {
      summaries.push({
        name,
        dir,
        kind: resolveTemplateKind(undefined, category),
        error: errorMessage(error),
      });
    }
  }

  return summaries;
}
