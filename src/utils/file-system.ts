/**
 * @arch codeout.infra.fs
 *
 * File system operations used by the artifact pipeline and the CLI.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Write content to a file, truncating whatever was there before.
 * Parent directories are not created; use ensureDir first.
 */
export async function overwriteFile(filePath: string, content: string): Promise<void> {
  await fs.promises.writeFile(filePath, content, { encoding: 'utf-8', flag: 'w' });
}

/**
 * Write content to a file, creating parent directories as needed.
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await overwriteFile(filePath, content);
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* file not found */ }
  return false;
}

/**
 * Ensure a directory exists, creating it and its parents if necessary.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.promises.mkdir(dirPath, { recursive: true });
}
