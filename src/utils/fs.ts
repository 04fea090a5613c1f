import { promises as fs } from 'fs';
import { dirname, extname, resolve } from 'path';

/**
 * Ensures a directory exists, creating it recursively if needed
 */
export async function ensureDirectoryExists(dirPath: string): Promise<void> {
  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (error) {
    if (error instanceof Error) {
      throw new Error(`Failed to create directory ${dirPath}: ${error.message}`);
    }
    throw new Error(`Failed to create directory ${dirPath}: Unknown error`);
  }
}

/**
 * Validates that the output path has one of the allowed extensions
 * and that an existing file at that path is writable
 */
export async function validateOutputPath(filePath: string, allowedExtensions: readonly string[]): Promise<void> {
  const resolvedPath = resolve(filePath);
  const ext = extname(resolvedPath).toLowerCase();

  if (!allowedExtensions.includes(ext)) {
    throw new Error(`Invalid file extension: ${ext || '(none)'}. Expected ${allowedExtensions.join(' or ')}`);
  }

  if (await fileExists(resolvedPath)) {
    try {
      await fs.access(resolvedPath, fs.constants.W_OK);
    } catch {
      throw new Error(`File ${resolvedPath} exists but is not writable. Check file permissions.`);
    }
  }
}

/**
 * Checks if a file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Validate the path and create its parent directory
 */
export async function prepareOutputFile(filePath: string, allowedExtensions: readonly string[]): Promise<string> {
  await validateOutputPath(filePath, allowedExtensions);
  const resolvedPath = resolve(filePath);
  await ensureDirectoryExists(dirname(resolvedPath));
  return resolvedPath;
}
