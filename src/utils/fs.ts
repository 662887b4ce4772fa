import { promises as fs, constants as fsConstants } from 'fs';
import { dirname } from 'path';
import { isJunk } from 'junk';
import { logger } from './logger.js';
import { FileSystemError, errorCode } from './errors.js';

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
 * Last modification time of a file or directory, in milliseconds
 */
export async function getModifiedTime(path: string): Promise<number> {
  try {
    const stats = await fs.stat(path);
    return stats.mtimeMs;
  } catch (error) {
    throw new FileSystemError(`Failed to stat: ${path}`, { path, error });
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
    throw new FileSystemError(`Failed to write file: ${path}`, { path, error });
  }
}

/**
 * Copy a file from source to destination
 */
export async function copyFile(src: string, dest: string): Promise<void> {
  try {
    await ensureDir(dirname(dest));
    await fs.copyFile(src, dest);
    logger.debug(`Copied file: ${src} -> ${dest}`);
  } catch (error) {
    throw new FileSystemError(`Failed to copy file: ${src} -> ${dest}`, { src, dest, error });
  }
}

/**
 * Remove a file or directory recursively. Read-only entries are made
 * writable first.
 */
export async function remove(path: string): Promise<void> {
  try {
    const stats = await fs.stat(path);
    if (stats.isDirectory()) {
      await fs.chmod(path, stats.mode | 0o200);
      await fs.rm(path, { recursive: true, force: true });
    } else {
      await fs.chmod(path, stats.mode | 0o200);
      await fs.unlink(path);
    }
    logger.debug(`Removed: ${path}`);
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
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
 * List files and directories in a directory (non-recursive), sorted by name
 */
export async function listEntries(dirPath: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .filter(entry => !isJunk(entry.name))
      .map(entry => entry.name)
      .sort();
  } catch (error) {
    throw new FileSystemError(`Failed to list directory: ${dirPath}`, { dirPath, error });
  }
}
