import { promises as fs, constants as fsConstants } from 'fs';
import { basename, dirname } from 'path';
import { parse as parseJsonc, type ParseError, printParseErrorCode } from 'jsonc-parser';
import { isJunk } from 'junk';
import { logger } from './logger.js';
import { FileSystemError } from './errors.js';

/**
 * File system utilities with proper error handling
 */

function errorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Check if a file or directory exists
 */
export async function exists(path: string): Promise<boolean> {
  try {
    await fs.access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a path is a directory
 */
export async function isDirectory(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Recursively create directories
 */
export async function ensureDir(path: string): Promise<void> {
  try {
    await fs.mkdir(path, { recursive: true });
    logger.debug(`Directory located or created: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to locate or create directory: ${path}`, { path, error });
  }
}

/**
 * Read a file as text
 */
export async function readTextFile(path: string, encoding: BufferEncoding = 'utf8'): Promise<string> {
  try {
    return await fs.readFile(path, encoding);
  } catch (error) {
    throw new FileSystemError(`Failed to read file: ${path}`, { path, error });
  }
}

/**
 * Read a file as text, or null when it does not exist
 */
export async function readTextFileIfExists(path: string): Promise<string | null> {
  try {
    return await fs.readFile(path, 'utf8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return null;
    }
    throw new FileSystemError(`Failed to read file: ${path}`, { path, error });
  }
}

/**
 * Write text to a file
 */
export async function writeTextFile(path: string, content: string, encoding: BufferEncoding = 'utf8'): Promise<void> {
  try {
    await ensureDir(dirname(path));
    await fs.writeFile(path, content, encoding);
    logger.debug(`Wrote file: ${path}`);
  } catch (error) {
    if (error instanceof FileSystemError) {
      throw error;
    }
    throw new FileSystemError(`Failed to write file: ${path}`, { path, error });
  }
}

/**
 * Write text to a file only when its content differs, keeping the mtime of
 * unchanged files. Returns true when the file was written.
 */
export async function writeTextFileIfChanged(path: string, content: string): Promise<boolean> {
  const current = await readTextFileIfExists(path);
  if (current === content) {
    logger.debug(`Unchanged: ${path}`);
    return false;
  }
  await writeTextFile(path, content);
  return true;
}

/**
 * Remove a file or directory recursively
 */
export async function remove(path: string): Promise<void> {
  try {
    await fs.rm(path, { recursive: true, force: true });
    logger.debug(`Removed: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to remove: ${path}`, { path, error });
  }
}

/**
 * List directories in a directory (non-recursive)
 */
export async function listDirectories(dirPath: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .filter(entry => entry.isDirectory())
      .map(entry => entry.name);
  } catch (error) {
    throw new FileSystemError(`Failed to list directories in directory: ${dirPath}`, { dirPath, error });
  }
}

/**
 * List files in a directory (non-recursive)
 */
export async function listFiles(dirPath: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .filter(entry => entry.isFile())
      .map(entry => entry.name);
  } catch (error) {
    throw new FileSystemError(`Failed to list files in directory: ${dirPath}`, { dirPath, error });
  }
}

/**
 * Copy a directory tree, skipping junk files like .DS_Store and Thumbs.db
 */
export async function copyDirectory(src: string, dest: string): Promise<void> {
  try {
    await fs.cp(src, dest, {
      recursive: true,
      filter: (source: string) => !isJunk(basename(source))
    });
    logger.debug(`Copied directory: ${src} -> ${dest}`);
  } catch (error) {
    throw new FileSystemError(`Failed to copy directory: ${src} -> ${dest}`, { src, dest, error });
  }
}

/**
 * Read a JSON or JSONC file (comments and trailing commas allowed)
 */
export async function readJsoncFile(path: string): Promise<unknown> {
  const content = await readTextFile(path);
  const errors: ParseError[] = [];
  const parsed: unknown = parseJsonc(content, errors, { allowTrailingComma: true });
  if (errors.length > 0) {
    const first = errors[0];
    throw new FileSystemError(`Failed to parse ${path}: ${printParseErrorCode(first.error)} at offset ${first.offset}`, {
      path
    });
  }
  return parsed;
}
