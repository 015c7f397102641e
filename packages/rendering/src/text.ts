/**
 * Bitmap text rendering
 *
 * All text uses the compact 3x5 font from assets/font-3x5.json, scaled up by
 * whole pixels for the larger labels. Lowercase letters draw as uppercase and
 * characters missing from the font advance as spaces.
 */

import { readFileSync } from "fs";
import { fillRect, type Frame, type RGB } from "@paperday/core";

const FONT_URL = new URL("../assets/font-3x5.json", import.meta.url);

const ELLIPSIS = "...";

export interface BitmapFont {
  charWidth: number;
  charHeight: number;
  /** One number per row; bit (charWidth - 1) is the leftmost column */
  glyphs: ReadonlyMap<string, readonly number[]>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate a font file's parsed JSON
 */
export function parseFont(json: unknown): BitmapFont {
  if (!isRecord(json)) throw new Error("font file must be an object");
  const { width, height, glyphs } = json;
  if (typeof width !== "number" || typeof height !== "number" || width <= 0 || height <= 0) {
    throw new Error("font width and height must be positive numbers");
  }
  if (!isRecord(glyphs)) throw new Error("font glyphs must be an object");

  const map = new Map<string, readonly number[]>();
  for (const [char, rows] of Object.entries(glyphs)) {
    if (
      !Array.isArray(rows) ||
      rows.length !== height ||
      !rows.every((row) => typeof row === "number" && row >= 0 && row < 1 << width)
    ) {
      throw new Error(`font glyph "${char}" must have ${height} rows of ${width} bits`);
    }
    map.set(char, rows);
  }

  return { charWidth: width, charHeight: height, glyphs: map };
}

let defaultFont: BitmapFont | null = null;

export function getFont(): BitmapFont {
  if (!defaultFont) {
    defaultFont = parseFont(JSON.parse(readFileSync(FONT_URL, "utf-8")));
  }
  return defaultFont;
}

function glyphFor(font: BitmapFont, char: string): readonly number[] | undefined {
  return font.glyphs.get(char) ?? font.glyphs.get(char.toUpperCase());
}

export interface TextOptions {
  /** Whole-pixel scale factor (default 1) */
  scale?: number;
  /** Rows outside [minY, maxY] are not drawn */
  minY?: number;
  maxY?: number;
  font?: BitmapFont;
}

/**
 * Draw text with its top-left corner at (startX, startY).
 * Returns the drawn width in pixels.
 */
export function drawText(
  frame: Frame,
  text: string,
  startX: number,
  startY: number,
  color: RGB,
  options: TextOptions = {}
): number {
  const font = options.font ?? getFont();
  const scale = Math.max(1, Math.round(options.scale ?? 1));
  const minY = options.minY ?? 0;
  const maxY = options.maxY ?? frame.height - 1;
  const x0 = Math.round(startX);
  const y0 = Math.round(startY);
  let cursorX = x0;

  for (const char of text) {
    const bitmap = glyphFor(font, char);
    if (bitmap) {
      for (let row = 0; row < font.charHeight; row++) {
        const top = Math.max(minY, y0 + row * scale);
        const bottom = Math.min(maxY, y0 + row * scale + scale - 1);
        if (top > bottom) continue;

        for (let col = 0; col < font.charWidth; col++) {
          const bit = (bitmap[row] >> (font.charWidth - 1 - col)) & 1;
          if (bit) {
            const left = cursorX + col * scale;
            fillRect(frame, left, top, left + scale - 1, bottom, color);
          }
        }
      }
    }
    // Missing characters still advance the cursor
    cursorX += (font.charWidth + 1) * scale;
  }

  return measureText(text, scale, font);
}

/**
 * Pixel width of a string: each glyph plus one column of spacing, minus the trailing gap
 */
export function measureText(text: string, scale = 1, font: BitmapFont = getFont()): number {
  const length = Array.from(text).length;
  if (length === 0) return 0;
  return (length * (font.charWidth + 1) - 1) * scale;
}

export function textHeight(scale = 1, font: BitmapFont = getFont()): number {
  return font.charHeight * scale;
}

/**
 * X position that centers text between left and right (inclusive)
 */
export function centerX(text: string, left: number, right: number, scale = 1): number {
  return Math.floor(left + (right - left + 1 - measureText(text, scale)) / 2);
}

/**
 * Largest scale in [minScale, maxScale] at which text fits maxWidth; minScale if none does
 */
export function fitScale(text: string, maxWidth: number, maxScale: number, minScale = 1): number {
  for (let scale = maxScale; scale > minScale; scale--) {
    if (measureText(text, scale) <= maxWidth) return scale;
  }
  return minScale;
}

function ellipsize(chars: string[], maxWidth: number, scale: number): string {
  const kept = [...chars];
  while (kept.length > 0 && measureText(kept.join("") + ELLIPSIS, scale) > maxWidth) {
    kept.pop();
  }
  const result = kept.join("").trimEnd() + ELLIPSIS;
  return measureText(result, scale) <= maxWidth ? result : "";
}

/**
 * Cut text to maxWidth, ending in "..." when anything was dropped
 */
export function truncateText(text: string, maxWidth: number, scale = 1): string {
  if (measureText(text, scale) <= maxWidth) return text;
  return ellipsize(Array.from(text), maxWidth, scale);
}

/**
 * Word-wrap text into lines no wider than maxWidth.
 * Words wider than a line are broken; when more than maxLines are needed the
 * last kept line ends in "...".
 */
export function wrapText(text: string, maxWidth: number, scale = 1, maxLines = Infinity): string[] {
  const fits = (line: string) => measureText(line, scale) <= maxWidth;
  if (!fits("0")) return [];
  const words = text.split(/\s+/).filter((word) => word.length > 0);
  const lines: string[] = [];
  let current = "";

  for (const word of words) {
    const candidate = current ? `${current} ${word}` : word;
    if (fits(candidate)) {
      current = candidate;
      continue;
    }
    if (current) lines.push(current);

    let rest = Array.from(word);
    while (rest.length > 0 && !fits(rest.join(""))) {
      let take = 1;
      while (take < rest.length && fits(rest.slice(0, take + 1).join(""))) take++;
      lines.push(rest.slice(0, take).join(""));
      rest = rest.slice(take);
    }
    current = rest.join("");
  }
  if (current) lines.push(current);

  if (lines.length <= maxLines) return lines;

  const kept = lines.slice(0, Math.max(0, maxLines));
  if (kept.length > 0) {
    const last = kept.length - 1;
    kept[last] = ellipsize(Array.from(kept[last]), maxWidth, scale);
  }
  return kept;
}
