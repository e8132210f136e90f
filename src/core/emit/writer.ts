/**
 * @arch codeout.core.domain
 */
import { overwriteFile } from '../../utils/file-system.js';
import { IoError, ErrorCodes, isErrnoException } from '../../utils/errors.js';

/**
 * Write the artifact in one pass, replacing any existing file at the path.
 * The directory must already exist.
 */
export async function writeArtifact(filePath: string, content: string): Promise<void> {
  try {
    await overwriteFile(filePath, content);
  } catch (error) {
    throw new IoError(
      ErrorCodes.WRITE_FAILED,
      `Failed to write ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { filePath, errno: isErrnoException(error) ? error.code : undefined }
    );
  }
}
