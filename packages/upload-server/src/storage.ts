/**
 * Single-file upload store
 *
 * Every accepted upload replaces the same file. Writes go to a temp file in
 * the destination directory and are renamed over the target, so readers
 * never see a partial image.
 */

import { access, constants, rename, rm, stat, writeFile } from "fs/promises";
import { join } from "path";
import { ServerValidationError } from "@paperday/core";

export class UploadStore {
  readonly path: string;

  constructor(
    readonly dir: string,
    readonly fileName: string
  ) {
    this.path = join(dir, fileName);
  }

  /**
   * Throws a 500 ServerValidationError when the directory is missing or read-only
   */
  async checkWritable(): Promise<void> {
    const info = await stat(this.dir).catch(() => null);
    if (!info?.isDirectory()) {
      throw new ServerValidationError(500, `Directory does not exist: ${this.dir}`);
    }
    try {
      await access(this.dir, constants.W_OK);
    } catch {
      throw new ServerValidationError(500, `Directory not writable: ${this.dir}`);
    }
  }

  async save(data: Uint8Array): Promise<void> {
    const tmpPath = join(this.dir, `.${this.fileName}.${process.pid}.${Date.now()}.tmp`);
    try {
      await writeFile(tmpPath, data);
      await rename(tmpPath, this.path);
    } catch (error) {
      console.error(`[server] Failed to save ${this.path}:`, error);
      await rm(tmpPath, { force: true });
      throw new ServerValidationError(500, "Failed to save file");
    }
  }
}
