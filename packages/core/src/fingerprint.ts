/**
 * Frame fingerprints
 * A stable digest of a frame's pixels, used to skip redundant panel refreshes.
 */

import { createHash } from "crypto";
import type { Frame, RenderedFrame } from "./types.js";

/**
 * SHA-256 over the frame dimensions followed by its pixel buffer
 */
export function fingerprintFrame(frame: Frame): string {
  return createHash("sha256")
    .update(`${frame.width}x${frame.height}:`)
    .update(frame.pixels)
    .digest("hex");
}

/**
 * Attach a fingerprint to a finished frame
 */
export function toRenderedFrame(frame: Frame): RenderedFrame {
  return { frame, fingerprint: fingerprintFrame(frame) };
}

/**
 * True when both frames carry the same fingerprint
 */
export function sameFrame(
  a: RenderedFrame | null | undefined,
  b: RenderedFrame | null | undefined
): boolean {
  if (!a || !b) return false;
  return a.fingerprint === b.fingerprint;
}
