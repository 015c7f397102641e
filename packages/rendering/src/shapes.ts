/**
 * Rounded task boxes
 */

import { fillCircle, fillRect, type Frame, type RGB } from "@paperday/core";

export function fillRoundedRect(
  frame: Frame,
  x1: number,
  y1: number,
  x2: number,
  y2: number,
  radius: number,
  color: RGB
): void {
  const left = Math.round(Math.min(x1, x2));
  const right = Math.round(Math.max(x1, x2));
  const top = Math.round(Math.min(y1, y2));
  const bottom = Math.round(Math.max(y1, y2));
  const r = Math.max(0, Math.min(Math.round(radius), Math.floor((right - left) / 2), Math.floor((bottom - top) / 2)));

  if (r === 0) {
    fillRect(frame, left, top, right, bottom, color);
    return;
  }

  fillRect(frame, left + r, top, right - r, bottom, color);
  fillRect(frame, left, top + r, right, bottom - r, color);
  fillCircle(frame, left + r, top + r, r, color);
  fillCircle(frame, right - r, top + r, r, color);
  fillCircle(frame, left + r, bottom - r, r, color);
  fillCircle(frame, right - r, bottom - r, r, color);
}

/**
 * Filled rounded box with a border of the given width drawn inward
 */
export function drawRoundedBox(
  frame: Frame,
  x1: number,
  y1: number,
  x2: number,
  y2: number,
  radius: number,
  fill: RGB,
  border: RGB,
  borderWidth = 2
): void {
  fillRoundedRect(frame, x1, y1, x2, y2, radius, border);
  fillRoundedRect(
    frame,
    x1 + borderWidth,
    y1 + borderWidth,
    x2 - borderWidth,
    y2 - borderWidth,
    Math.max(0, radius - borderWidth),
    fill
  );
}
