/**
 * Frame buffer primitives
 *
 * Frames are flat RGB buffers (3 bytes per pixel, row-major). Every drawing
 * helper clips to the frame, so callers can pass coordinates that run past
 * the edges. Fractional coordinates are rounded to the nearest pixel.
 */

import type { Frame, Point, RGB } from "./types.js";

/** Bytes per pixel (RGB) */
export const BYTES_PER_PIXEL = 3;

/**
 * Create an empty frame filled with a single color
 */
export function createSolidFrame(
  width: number,
  height: number,
  color: RGB = { r: 255, g: 255, b: 255 }
): Frame {
  const pixels = new Uint8Array(width * height * BYTES_PER_PIXEL);
  for (let i = 0; i < width * height; i++) {
    const offset = i * BYTES_PER_PIXEL;
    pixels[offset] = color.r;
    pixels[offset + 1] = color.g;
    pixels[offset + 2] = color.b;
  }
  return { width, height, pixels };
}

/**
 * Set a single pixel in a frame
 */
export function setPixel(
  frame: Frame,
  x: number,
  y: number,
  color: RGB
): void {
  const px = Math.round(x);
  const py = Math.round(y);
  if (px < 0 || px >= frame.width || py < 0 || py >= frame.height) {
    return; // Out of bounds, silently ignore
  }
  const offset = (py * frame.width + px) * BYTES_PER_PIXEL;
  frame.pixels[offset] = color.r;
  frame.pixels[offset + 1] = color.g;
  frame.pixels[offset + 2] = color.b;
}

/**
 * Get a pixel color from a frame
 */
export function getPixel(frame: Frame, x: number, y: number): RGB | null {
  if (x < 0 || x >= frame.width || y < 0 || y >= frame.height) {
    return null;
  }
  const offset = (y * frame.width + x) * BYTES_PER_PIXEL;
  return {
    r: frame.pixels[offset],
    g: frame.pixels[offset + 1],
    b: frame.pixels[offset + 2],
  };
}

/**
 * Fill the rectangle spanning (x1, y1) to (x2, y2), both corners inclusive
 */
export function fillRect(
  frame: Frame,
  x1: number,
  y1: number,
  x2: number,
  y2: number,
  color: RGB
): void {
  const left = Math.max(0, Math.round(Math.min(x1, x2)));
  const right = Math.min(frame.width - 1, Math.round(Math.max(x1, x2)));
  const top = Math.max(0, Math.round(Math.min(y1, y2)));
  const bottom = Math.min(frame.height - 1, Math.round(Math.max(y1, y2)));

  for (let y = top; y <= bottom; y++) {
    for (let x = left; x <= right; x++) {
      const offset = (y * frame.width + x) * BYTES_PER_PIXEL;
      frame.pixels[offset] = color.r;
      frame.pixels[offset + 1] = color.g;
      frame.pixels[offset + 2] = color.b;
    }
  }
}

/**
 * Draw a horizontal line of the given thickness centered on y
 */
export function drawHLine(
  frame: Frame,
  x1: number,
  x2: number,
  y: number,
  color: RGB,
  width = 1
): void {
  const top = Math.round(y) - Math.floor((width - 1) / 2);
  fillRect(frame, x1, top, x2, top + Math.max(1, width) - 1, color);
}

/**
 * Draw a vertical line of the given thickness centered on x
 */
export function drawVLine(
  frame: Frame,
  x: number,
  y1: number,
  y2: number,
  color: RGB,
  width = 1
): void {
  const left = Math.round(x) - Math.floor((width - 1) / 2);
  fillRect(frame, left, y1, left + Math.max(1, width) - 1, y2, color);
}

/**
 * Draw an arbitrary line (Bresenham) with a square brush of the given width
 */
export function drawLine(
  frame: Frame,
  from: Point,
  to: Point,
  color: RGB,
  width = 1
): void {
  let x0 = Math.round(from.x);
  let y0 = Math.round(from.y);
  const x1 = Math.round(to.x);
  const y1 = Math.round(to.y);
  const dx = Math.abs(x1 - x0);
  const dy = -Math.abs(y1 - y0);
  const sx = x0 < x1 ? 1 : -1;
  const sy = y0 < y1 ? 1 : -1;
  const half = Math.floor((width - 1) / 2);
  let err = dx + dy;

  for (;;) {
    if (width <= 1) {
      setPixel(frame, x0, y0, color);
    } else {
      fillRect(frame, x0 - half, y0 - half, x0 - half + width - 1, y0 - half + width - 1, color);
    }
    if (x0 === x1 && y0 === y1) break;
    const e2 = 2 * err;
    if (e2 >= dy) {
      err += dy;
      x0 += sx;
    }
    if (e2 <= dx) {
      err += dx;
      y0 += sy;
    }
  }
}

/**
 * Fill a circle centered on (cx, cy)
 */
export function fillCircle(
  frame: Frame,
  cx: number,
  cy: number,
  radius: number,
  color: RGB
): void {
  const r = Math.max(0, radius);
  const rSquared = r * r;
  for (let y = Math.floor(cy - r); y <= Math.ceil(cy + r); y++) {
    for (let x = Math.floor(cx - r); x <= Math.ceil(cx + r); x++) {
      const ddx = x - cx;
      const ddy = y - cy;
      if (ddx * ddx + ddy * ddy <= rSquared) {
        setPixel(frame, x, y, color);
      }
    }
  }
}

/**
 * Fill a triangle using edge functions over its bounding box
 */
export function fillTriangle(
  frame: Frame,
  a: Point,
  b: Point,
  c: Point,
  color: RGB
): void {
  const edge = (p: Point, q: Point, x: number, y: number) =>
    (q.x - p.x) * (y - p.y) - (q.y - p.y) * (x - p.x);

  const area = edge(a, b, c.x, c.y);
  if (area === 0) return;

  const minX = Math.floor(Math.min(a.x, b.x, c.x));
  const maxX = Math.ceil(Math.max(a.x, b.x, c.x));
  const minY = Math.floor(Math.min(a.y, b.y, c.y));
  const maxY = Math.ceil(Math.max(a.y, b.y, c.y));

  for (let y = minY; y <= maxY; y++) {
    for (let x = minX; x <= maxX; x++) {
      const w0 = edge(b, c, x, y);
      const w1 = edge(c, a, x, y);
      const w2 = edge(a, b, x, y);
      const inside =
        area > 0
          ? w0 >= 0 && w1 >= 0 && w2 >= 0
          : w0 <= 0 && w1 <= 0 && w2 <= 0;
      if (inside) {
        setPixel(frame, x, y, color);
      }
    }
  }
}
