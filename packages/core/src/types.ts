/**
 * Core types for the paperday system
 */

/** Display dimensions */
export interface DisplaySize {
  width: number;
  height: number;
}

/** RGB color (0-255 per channel) */
export interface RGB {
  r: number;
  g: number;
  b: number;
}

/** A single frame of pixel data */
export interface Frame {
  width: number;
  height: number;
  /** Flat array of RGB values: [r0,g0,b0, r1,g1,b1, ...] */
  pixels: Uint8Array;
}

/**
 * A finished frame plus the digest used to detect "nothing changed since
 * the last display". Consumed by the display adapter and the uploader.
 */
export interface RenderedFrame {
  frame: Frame;
  /** Hex SHA-256 over dimensions and pixels */
  fingerprint: string;
}

/** Point in frame coordinates */
export interface Point {
  x: number;
  y: number;
}
