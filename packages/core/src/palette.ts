/**
 * Panel palette
 *
 * The six inks of a Spectra-style color e-paper panel. Everything drawn on the
 * frame is either one of these or a weighted mix of them.
 */

import type { RGB } from "./types.js";

export const PANEL_COLORS = {
  white: { r: 255, g: 255, b: 255 },
  black: { r: 0, g: 0, b: 0 },
  red: { r: 196, g: 85, b: 49 },
  yellow: { r: 255, g: 255, b: 0 },
  green: { r: 0, g: 255, b: 0 },
  blue: { r: 0, g: 0, b: 255 },
} as const satisfies Record<string, RGB>;

/** Single-letter ink keys accepted by mixColors */
export type InkKey = "w" | "k" | "r" | "y" | "g" | "b";

const INKS: Record<InkKey, RGB> = {
  w: PANEL_COLORS.white,
  k: PANEL_COLORS.black,
  r: PANEL_COLORS.red,
  y: PANEL_COLORS.yellow,
  g: PANEL_COLORS.green,
  b: PANEL_COLORS.blue,
};

export function isInkKey(key: string): key is InkKey {
  return key in INKS;
}

/**
 * Mix panel inks by relative weight, e.g. mixColors({ w: 0.4, k: 0.6 }) is a gray.
 * Weights are normalized, so { r: 5, w: 15 } means one part red to three parts white.
 */
export function mixColors(weights: Partial<Record<InkKey, number>>): RGB {
  const entries: Array<[InkKey, number]> = [];
  for (const [key, weight] of Object.entries(weights)) {
    if (isInkKey(key) && weight !== undefined && weight > 0) entries.push([key, weight]);
  }
  const total = entries.reduce((sum, [, weight]) => sum + weight, 0);
  if (total === 0) return { ...PANEL_COLORS.white };

  const mixed = { r: 0, g: 0, b: 0 };
  for (const [key, weight] of entries) {
    const ink = INKS[key];
    const share = weight / total;
    mixed.r += ink.r * share;
    mixed.g += ink.g * share;
    mixed.b += ink.b * share;
  }

  return { r: Math.trunc(mixed.r), g: Math.trunc(mixed.g), b: Math.trunc(mixed.b) };
}
