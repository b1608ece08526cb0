import { promises as fs, constants as fsConstants } from 'fs';
import { join, dirname, basename, resolve, relative, isAbsolute, sep } from 'path';
import { parse as parseJsonc, printParseErrorCode, type ParseError } from 'jsonc-parser';
import { isJunk } from 'junk';
import { logger } from './logger.js';
import { FileSystemError } from './errors.js';
import { isRecord } from './records.js';

/**
 * File system utilities with proper error handling
 */

function errorCode(error: unknown): string | undefined {
  return isRecord(error) && typeof error.code === 'string' ? error.code : undefined;
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
 * Check if a path is a file
 */
export async function isFile(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isFile();
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
 * Write text to a temporary sibling and rename it over the target,
 * so readers see either the old or the new content.
 */
export async function writeFileAtomic(path: string, content: string): Promise<void> {
  const tempPath = join(dirname(path), `.${basename(path)}.${process.pid}.tmp`);
  try {
    await ensureDir(dirname(path));
    await fs.writeFile(tempPath, content, 'utf8');
    await fs.rename(tempPath, path);
    logger.debug(`Wrote file atomically: ${path}`);
  } catch (error) {
    await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      logger.debug(`Failed to clean up temporary file: ${tempPath}`, cleanupError);
    });
    throw new FileSystemError(`Failed to write file: ${path}`, { path, error });
  }
}

/**
 * Write binary content to a file, creating parent directories
 */
export async function writeBinaryFile(path: string, content: Uint8Array): Promise<void> {
  try {
    await ensureDir(dirname(path));
    await fs.writeFile(path, content);
  } catch (error) {
    throw new FileSystemError(`Failed to write file: ${path}`, { path, error });
  }
}

/**
 * Read a file as raw bytes
 */
export async function readBinaryFile(path: string): Promise<Buffer> {
  try {
    return await fs.readFile(path);
  } catch (error) {
    throw new FileSystemError(`Failed to read file: ${path}`, { path, error });
  }
}

/**
 * Move a file, falling back to copy + unlink across devices
 */
export async function moveFile(src: string, dest: string): Promise<void> {
  try {
    await ensureDir(dirname(dest));
    try {
      await fs.rename(src, dest);
    } catch (error) {
      if (errorCode(error) !== 'EXDEV') throw error;
      await fs.copyFile(src, dest);
      await fs.unlink(src);
    }
    logger.debug(`Moved: ${src} -> ${dest}`);
  } catch (error) {
    throw new FileSystemError(`Failed to move: ${src} -> ${dest}`, { src, dest, error });
  }
}

/**
 * Remove a file or directory recursively
 */
export async function remove(path: string): Promise<void> {
  try {
    const stats = await fs.stat(path);
    if (stats.isDirectory()) {
      await fs.rm(path, { recursive: true });
    } else {
      await fs.unlink(path);
    }
    logger.debug(`Removed: ${path}`);
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      // File doesn't exist, which is fine
      return;
    }
    throw new FileSystemError(`Failed to remove: ${path}`, { path, error });
  }
}

/**
 * List files in a directory (non-recursive)
 */
export async function listFiles(dirPath: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .filter(entry => entry.isFile() && !isJunk(entry.name))
      .map(entry => entry.name);
  } catch (error) {
    throw new FileSystemError(`Failed to list files in directory: ${dirPath}`, { dirPath, error });
  }
}

/**
 * True when `target` resolves inside `root` (or is `root` itself)
 */
export function isWithinDirectory(root: string, target: string): boolean {
  const rel = relative(resolve(root), resolve(target));
  return rel === '' || (!rel.startsWith(`..${sep}`) && rel !== '..' && !isAbsolute(rel));
}

/**
 * Walk up from each deleted file and remove directories left empty,
 * stopping at `root` (which is never removed).
 */
export async function cleanupEmptyParents(root: string, deletedPaths: string[]): Promise<string[]> {
  const removedDirs: string[] = [];
  const resolvedRoot = resolve(root);
  const candidates = new Set(deletedPaths.map(p => dirname(resolve(p))));

  // Deepest first so children go before their parents
  const ordered = [...candidates].sort((a, b) => b.length - a.length);

  for (const start of ordered) {
    let current = start;
    while (current !== resolvedRoot && isWithinDirectory(resolvedRoot, current)) {
      let entries: string[];
      try {
        entries = await fs.readdir(current);
      } catch (error) {
        if (errorCode(error) === 'ENOENT') {
          current = dirname(current);
          continue;
        }
        throw new FileSystemError(`Failed to read directory: ${current}`, { path: current, error });
      }
      if (entries.length > 0) break;
      await fs.rmdir(current);
      removedDirs.push(current);
      logger.debug(`Removed empty directory: ${current}`);
      current = dirname(current);
    }
  }

  return removedDirs;
}

/**
 * Read a JSON or JSONC file (JSON with comments) and parse it
 */
export async function readJsonOrJsoncFile(path: string): Promise<unknown> {
  const content = await readTextFile(path);
  const errors: ParseError[] = [];
  const result: unknown = parseJsonc(content, errors, { allowTrailingComma: true });
  if (errors.length > 0) {
    const first = errors[0];
    throw new FileSystemError(`Failed to parse JSON/JSONC file: ${path}`, {
      path,
      error: `${printParseErrorCode(first.error)} at offset ${first.offset}`
    });
  }
  return result;
}
