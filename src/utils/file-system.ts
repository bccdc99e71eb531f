/**
 * File system operations - reading and globbing.
 */
import * as fs from 'node:fs';
import fg from 'fast-glob';

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a path is a directory.
 */
export async function isDirectory(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isDirectory();
  } catch {
    return false;
  }
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
    deep?: number;
  } = {}
): Promise<string[]> {
  const files = await fg(patterns, {
    cwd: options.cwd ?? process.cwd(),
    ignore: options.ignore ?? ['**/node_modules/**', '**/.git/**'],
    absolute: options.absolute ?? false,
    deep: options.deep,
    onlyFiles: true,
  });
  // fast-glob returns in traversal order
  return files.sort();
}
