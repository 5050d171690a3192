/**
 * File system operations - reading, writing, copying and walking trees.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import fg from 'fast-glob';

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Read at most `length` bytes from the start of a file.
 */
export async function readHead(filePath: string, length: number): Promise<Buffer> {
  const handle = await fs.promises.open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await handle.read(buffer, 0, length, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

/**
 * Write content to a file, creating parent directories.
 */
export async function writeFile(filePath: string, content: string | Uint8Array): Promise<void> {
  await ensureDir(path.dirname(filePath));
  if (typeof content === 'string') {
    await fs.promises.writeFile(filePath, content, 'utf-8');
  } else {
    await fs.promises.writeFile(filePath, content);
  }
}

/**
 * Byte-for-byte copy, creating parent directories.
 */
export async function copyFile(source: string, target: string): Promise<void> {
  await ensureDir(path.dirname(target));
  await fs.promises.copyFile(source, target);
}

/**
 * Check if a file or directory exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* file not found */ }
  return false;
}

/**
 * Check if a path is a directory.
 */
export async function isDirectory(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isDirectory();
  } catch { /* path not found or not accessible */ }
  return false;
}

/**
 * Check if a path is a regular file.
 */
export async function isFile(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isFile();
  } catch { /* path not found or not accessible */ }
  return false;
}

/**
 * Ensure a directory exists, creating it if necessary.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.promises.mkdir(dirPath, { recursive: true });
}

/**
 * Remove a file or directory tree. Missing paths are ignored.
 */
export async function removePath(targetPath: string): Promise<void> {
  await fs.promises.rm(targetPath, { recursive: true, force: true });
}

/**
 * Names of the immediate subdirectories of a directory, sorted.
 * A missing directory has no subdirectories.
 */
export async function listSubdirectories(dirPath: string): Promise<string[]> {
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(dirPath, { withFileTypes: true });
  } catch {
    return [];
  }
  return entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();
}

/**
 * Check whether a directory has no entries.
 */
export async function isEmptyDirectory(dirPath: string): Promise<boolean> {
  const entries = await fs.promises.readdir(dirPath);
  return entries.length === 0;
}

/**
 * Find files matching glob patterns.
 */
export async function globFiles(
  patterns: string | string[],
  options: {
    cwd?: string;
    ignore?: string[];
    absolute?: boolean;
    dot?: boolean;
    deep?: number;
  } = {}
): Promise<string[]> {
  const files = await fg(patterns, {
    cwd: options.cwd || process.cwd(),
    ignore: options.ignore || ['**/node_modules/**', '**/dist/**'],
    absolute: options.absolute ?? true,
    dot: options.dot ?? false,
    deep: options.deep,
    onlyFiles: true,
  });
  return files.sort();
}

/**
 * Add execute permission bits for user, group and others.
 * No-op on platforms without POSIX permissions.
 */
export async function makeExecutable(filePath: string): Promise<void> {
  if (process.platform === 'win32') {
    return;
  }
  const stat = await fs.promises.stat(filePath);
  await fs.promises.chmod(filePath, stat.mode | 0o111);
}

/**
 * Check whether `child` is `parent` or lies inside it.
 */
export function isWithin(parent: string, child: string): boolean {
  const relative = path.relative(path.resolve(parent), path.resolve(child));
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

/**
 * Convert a path to forward-slash form.
 */
export function toPosixPath(filePath: string): string {
  return filePath.split(path.sep).join('/');
}
