/**
 * Renderer: writes template artifacts to the destination.
 *
 * Each file is either template-processed (text read, blocks and placeholders
 * resolved, written as UTF-8) or copied verbatim as bytes. Existing targets
 * are overwritten.
 */
import * as path from 'node:path';
import type { Environment } from '../environment/index.js';
import { TEMPLATE_MARKER, renderTargetPath, renderText } from './placeholders.js';
import {
  copyFile,
  globFiles,
  isDirectory,
  isFile,
  isWithin,
  makeExecutable,
  readFile,
  readHead,
  writeFile,
} from '../../utils/file-system.js';
import {
  ErrorCodes,
  RenderError,
  SecurityError,
  SourceMissingError,
  errorMessage,
} from '../../utils/errors.js';

/** Extensions rendered as text */
export const TEXT_EXTENSIONS: readonly string[] = [
  '.rs', '.toml', '.md', '.txt', '.html', '.htm', '.css', '.scss', '.json', '.yml', '.yaml',
  '.xml', '.js', '.mjs', '.cjs', '.ts', '.tsx', '.jsx', '.py', '.go', '.sh', '.bash', '.env',
  '.ini', '.cfg', '.conf', '.sql', '.svg', '.csv', '.x', '.ld',
];

/** Extension-less or dotfile names rendered as text */
export const TEXT_FILENAMES: readonly string[] = [
  'Cargo.toml', 'Cargo.lock', 'Dockerfile', 'Makefile', 'README', 'LICENSE',
  '.gitignore', '.dockerignore', '.editorconfig', '.env.example',
];

/** Extensions that receive the executable bit */
export const SCRIPT_EXTENSIONS: readonly string[] = ['.sh', '.bash', '.zsh'];

/** Directories never copied from a template tree */
export const IGNORED_DIRECTORIES: readonly string[] = ['.git', 'node_modules', 'target'];

export interface RenderOptions {
  /**
   * Root that relative targets are resolved against. Rendered targets must stay
   * inside it.
   */
  destinationRoot?: string;
  /** Additional extensions treated as text (with leading dot) */
  extraTextExtensions?: readonly string[];
}

export interface RenderTreeOptions extends RenderOptions {
  /** Skip files by their `/`-separated path relative to the source directory */
  exclude?: (relativePath: string) => boolean;
  /**
   * When false, a missing source directory renders nothing instead of failing.
   * Defaults to true.
   */
  required?: boolean;
}

export interface RenderedFile {
  /** Absolute source path */
  source: string;
  /** Absolute, final target path */
  target: string;
  mode: 'rendered' | 'copied';
  executable: boolean;
}

/**
 * Decide whether a file is template-processed, from its name.
 */
export function isTemplateProcessed(fileName: string, extraTextExtensions: readonly string[] = []): boolean {
  const base = path.basename(fileName);
  if (base.endsWith(TEMPLATE_MARKER)) {
    return true;
  }
  if (TEXT_FILENAMES.includes(base)) {
    return true;
  }
  const ext = path.extname(base).toLowerCase();
  return ext !== '' && (TEXT_EXTENSIONS.includes(ext) || extraTextExtensions.includes(ext));
}

function isScriptName(fileName: string): boolean {
  return SCRIPT_EXTENSIONS.includes(path.extname(fileName).toLowerCase());
}

function resolveTarget(target: string, options: RenderOptions): string {
  if (!options.destinationRoot) {
    return path.resolve(target);
  }
  const resolved = path.resolve(options.destinationRoot, target);
  if (!isWithin(options.destinationRoot, resolved)) {
    throw new SecurityError(
      ErrorCodes.PATH_TRAVERSAL,
      `Target path escapes the destination: ${target}`,
      { target, destinationRoot: options.destinationRoot }
    );
  }
  return resolved;
}

/**
 * Write one artifact to an already-final target path.
 */
async function writeArtifact(
  source: string,
  target: string,
  env: Environment,
  options: RenderOptions
): Promise<RenderedFile> {
  const processed =
    isTemplateProcessed(source, options.extraTextExtensions) ||
    isTemplateProcessed(target, options.extraTextExtensions);

  try {
    let startsWithShebang: boolean;
    if (processed) {
      const rendered = renderText(await readFile(source), env);
      await writeFile(target, rendered);
      startsWithShebang = rendered.startsWith('#!');
    } else {
      await copyFile(source, target);
      const head = await readHead(source, 2);
      startsWithShebang = head.length >= 2 && head[0] === 0x23 && head[1] === 0x21;
    }

    const executable = isScriptName(target) || startsWithShebang;
    if (executable) {
      await makeExecutable(target);
    }

    return { source, target, mode: processed ? 'rendered' : 'copied', executable };
  } catch (error) {
    throw new RenderError(
      ErrorCodes.RENDER_FAILED,
      `Failed to write ${target}: ${errorMessage(error)}`,
      { source, target }
    );
  }
}

/**
 * Render one file. The target path is rendered with the same placeholder rule
 * as content, and a trailing template marker is dropped from its file name.
 *
 * @throws SourceMissingError when the source is not a file
 */
export async function renderFile(
  source: string,
  target: string,
  env: Environment,
  options: RenderOptions = {}
): Promise<RenderedFile> {
  if (!(await isFile(source))) {
    throw new SourceMissingError(source);
  }
  const finalTarget = resolveTarget(renderTargetPath(target, env), options);
  return writeArtifact(source, finalTarget, env, options);
}

/**
 * Render every file under a directory into a target directory, rendering each
 * relative path on the way.
 */
export async function renderTree(
  sourceDir: string,
  targetDir: string,
  env: Environment,
  options: RenderTreeOptions = {}
): Promise<RenderedFile[]> {
  if (!(await isDirectory(sourceDir))) {
    if (options.required === false) {
      return [];
    }
    throw new SourceMissingError(sourceDir);
  }

  const root = path.resolve(targetDir);
  const boundary = options.destinationRoot ?? root;
  const relativeFiles = await globFiles('**/*', {
    cwd: sourceDir,
    dot: true,
    absolute: false,
    ignore: IGNORED_DIRECTORIES.map((dir) => `**/${dir}/**`),
  });

  const written: RenderedFile[] = [];
  for (const relativePath of relativeFiles) {
    if (options.exclude?.(relativePath)) {
      continue;
    }

    const target = path.join(root, renderTargetPath(relativePath, env));
    if (!isWithin(boundary, target)) {
      throw new SecurityError(
        ErrorCodes.PATH_TRAVERSAL,
        `Target path escapes the destination: ${relativePath}`,
        { relativePath, destinationRoot: boundary }
      );
    }

    written.push(await writeArtifact(path.join(sourceDir, relativePath), target, env, options));
  }

  return written;
}
