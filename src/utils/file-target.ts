/**
 * File Target
 * The output handle of a task: existence check, atomic write, delete
 */

import { fileExists, removeFile, writeFileAtomic } from "./fs";

export class FileTarget {
  constructor(readonly path: string) {}

  exists(): Promise<boolean> {
    return fileExists(this.path);
  }

  write(content: string, encoding: BufferEncoding = "utf-8"): Promise<void> {
    return writeFileAtomic(this.path, content, encoding);
  }

  /**
   * @returns False when there was nothing to remove
   */
  remove(): Promise<boolean> {
    return removeFile(this.path);
  }
}
