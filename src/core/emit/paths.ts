/**
 * @arch codeout.core.domain
 *
 * Output directory and file path resolution.
 */
import * as path from 'node:path';
import { PathError, ErrorCodes, isErrnoException } from '../../utils/errors.js';
import { ensureDir } from '../../utils/file-system.js';
import type { OutputSettings } from '../config/schema.js';
import type { ArtifactLocation } from './types.js';

export interface PathContext {
  cwd: string;
  output: Pick<OutputSettings, 'directory' | 'extension'>;
}

/**
 * The process working directory, which has no path once it is deleted.
 */
export function currentDirectory(): string {
  try {
    return process.cwd();
  } catch (error) {
    throw new PathError(
      ErrorCodes.INVALID_PATH,
      `Working directory is unavailable: ${error instanceof Error ? error.message : String(error)}`,
      { errno: isErrnoException(error) ? error.code : undefined }
    );
  }
}

/**
 * Resolve the directory an artifact goes to.
 * Without a location this is `<cwd>/<output.directory>`.
 */
export function resolveDirectory(location: string | undefined, context: PathContext): string {
  if (location === undefined) {
    return path.resolve(context.cwd, context.output.directory);
  }
  if (location.trim() === '' || location.includes('\0')) {
    throw new PathError(ErrorCodes.INVALID_PATH, `Invalid output path: ${JSON.stringify(location)}`, {
      location,
    });
  }
  return path.resolve(context.cwd, location);
}

/**
 * Reject identifiers that cannot serve as a single file name.
 */
function assertFileName(identifier: string): void {
  const unusable =
    identifier === '' ||
    identifier === '.' ||
    identifier === '..' ||
    /[/\\\0]/.test(identifier);
  if (unusable) {
    throw new PathError(
      ErrorCodes.INVALID_PATH,
      `Identifier ${JSON.stringify(identifier)} cannot be used as a file name`,
      { identifier }
    );
  }
}

/**
 * Combine directory, identifier and extension into the artifact location.
 */
export function resolveOutputPath(
  identifier: string,
  location: string | undefined,
  context: PathContext
): ArtifactLocation {
  const directory = resolveDirectory(location, context);
  assertFileName(identifier);
  return {
    directory,
    filePath: path.join(directory, `${identifier}${context.output.extension}`),
  };
}

/**
 * Create the output directory and its parents if missing.
 */
export async function prepareDirectory(directory: string): Promise<void> {
  try {
    await ensureDir(directory);
  } catch (error) {
    throw new PathError(
      ErrorCodes.DIRECTORY_CREATE_FAILED,
      `Cannot create output directory ${directory}: ${error instanceof Error ? error.message : String(error)}`,
      { directory, errno: isErrnoException(error) ? error.code : undefined }
    );
  }
}
