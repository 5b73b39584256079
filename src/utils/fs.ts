/**
 * Filesystem Utilities
 * Shared filesystem helper functions
 */

import { access, mkdir, rename, unlink, writeFile } from "fs/promises";
import { constants } from "node:fs";
import { dirname, join, basename } from "node:path";
import ShortUniqueId from "short-unique-id";
import { isNotFoundError } from "./errors";

const uid = new ShortUniqueId({ length: 8, dictionary: "alphanum_lower" });

/**
 * Check if a file or directory exists and is readable
 *
 * @param path - Path to check
 * @returns True if the path exists and can be read, false otherwise
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Write a file through a temporary sibling and rename it into place
 * The target never holds a partial write; parent directories are created.
 */
export async function writeFileAtomic(
  path: string,
  content: string,
  encoding: BufferEncoding = "utf-8",
): Promise<void> {
  const directory = dirname(path);
  const tempPath = join(directory, `.${basename(path)}.${uid.rnd()}.tmp`);

  await mkdir(directory, { recursive: true });

  try {
    await writeFile(tempPath, content, encoding);
    await rename(tempPath, path);
  } catch (error) {
    await removeFile(tempPath);
    throw error;
  }
}

/**
 * Delete a file, tolerating one that is already gone
 *
 * @returns True if the file was removed, false if it did not exist
 * @throws Any filesystem error other than ENOENT (e.g. EACCES)
 */
export async function removeFile(path: string): Promise<boolean> {
  try {
    await unlink(path);
    return true;
  } catch (error) {
    if (isNotFoundError(error)) {
      return false;
    }
    throw error;
  }
}
