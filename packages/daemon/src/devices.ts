/**
 * Panel devices
 *
 * HttpPanelDevice posts PNG bytes to the panel controller's local HTTP
 * endpoint; FilePanelDevice writes the PNG to disk, for machines without a
 * panel attached and for the preview file.
 */

import { mkdir, rename, rm, writeFile } from "fs/promises";
import { dirname } from "path";
import type { Frame } from "@paperday/core";
import { encodePng } from "@paperday/rendering";

export interface PanelDevice {
  /** Used in log lines and errors */
  readonly name: string;
  show(frame: Frame): Promise<void>;
}

export class HttpPanelDevice implements PanelDevice {
  readonly name: string;

  constructor(
    private readonly url: string,
    private readonly timeoutMs = 30_000
  ) {
    this.name = `panel ${url}`;
  }

  async show(frame: Frame): Promise<void> {
    const png = await encodePng(frame);
    const response = await fetch(this.url, {
      method: "POST",
      headers: { "Content-Type": "image/png" },
      body: new Uint8Array(png),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`Panel request failed: ${response.status} ${response.statusText}`);
    }
  }
}

/**
 * Write bytes to `path` through a temporary file, so readers never see a partial PNG
 */
export async function writeFileAtomic(path: string, data: Uint8Array): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmpPath = `${path}.${process.pid}.tmp`;
  try {
    await writeFile(tmpPath, data);
    await rename(tmpPath, path);
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw error;
  }
}

export class FilePanelDevice implements PanelDevice {
  readonly name: string;

  constructor(private readonly path: string) {
    this.name = `file ${path}`;
  }

  async show(frame: Frame): Promise<void> {
    await writeFileAtomic(this.path, await encodePng(frame));
  }
}
