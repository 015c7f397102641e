/**
 * PNG encoding for the preview file, the file panel device and uploads
 */

import sharp from "sharp";
import type { Frame } from "@paperday/core";

export async function encodePng(frame: Frame): Promise<Buffer> {
  const raw = Buffer.from(frame.pixels.buffer, frame.pixels.byteOffset, frame.pixels.byteLength);
  return sharp(raw, { raw: { width: frame.width, height: frame.height, channels: 3 } })
    .png()
    .toBuffer();
}
