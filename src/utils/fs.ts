import { promises as fs, constants as fsConstants } from 'fs';
import { dirname } from 'path';
import { parse as parseJsonc, type ParseError } from 'jsonc-parser';
import { logger } from './logger.js';
import { FileSystemError } from './errors.js';

/**
 * File system utilities with proper error handling
 */

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
 * Write binary content to a file
 */
export async function writeBinaryFile(path: string, content: Uint8Array): Promise<void> {
  try {
    await ensureDir(dirname(path));
    await fs.writeFile(path, content);
    logger.debug(`Wrote file: ${path}`);
  } catch (error) {
    if (error instanceof FileSystemError) {
      throw error;
    }
    throw new FileSystemError(`Failed to write file: ${path}`, { path, error });
  }
}

/**
 * Move a file, replacing whatever is at the destination
 */
export async function moveFile(from: string, to: string): Promise<void> {
  try {
    await fs.rename(from, to);
  } catch (error) {
    throw new FileSystemError(`Failed to move file: ${from} -> ${to}`, { from, to, error });
  }
}

/**
 * Remove a file; a missing file is not an error
 */
export async function removeFile(path: string): Promise<void> {
  try {
    await fs.rm(path, { force: true });
    logger.debug(`Removed file: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to remove file: ${path}`, { path, error });
  }
}

/**
 * Read a JSON or JSONC file and parse it.
 * The result is untyped; callers validate its shape.
 */
export async function readJsonOrJsoncFile(path: string): Promise<unknown> {
  const content = await readTextFile(path);
  const errors: ParseError[] = [];
  const result: unknown = parseJsonc(content, errors, { allowTrailingComma: true });
  if (errors.length > 0 || result === undefined) {
    throw new FileSystemError(`Failed to parse JSON/JSONC file: ${path}`, { path, errors });
  }
  return result;
}

/**
 * Write data as JSONC (plain JSON is valid JSONC; users can add comments manually)
 */
export async function writeJsoncFile(path: string, data: unknown, indent: number = 2): Promise<void> {
  const content = JSON.stringify(data, null, indent);
  await writeTextFile(path, content + '\n');
}
