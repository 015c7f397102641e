/**
 * Tests for bitmap text helpers
 */

import { describe, it, expect } from "vitest";
import { createSolidFrame, getPixel } from "@paperday/core";
import {
  centerX,
  drawText,
  fitScale,
  measureText,
  parseFont,
  textHeight,
  truncateText,
  wrapText,
} from "./text.js";

const BLACK = { r: 0, g: 0, b: 0 };
const WHITE = { r: 255, g: 255, b: 255 };

describe("measureText", () => {
  it("returns 0 for empty string", () => {
    expect(measureText("")).toBe(0);
  });

  it("returns correct width for text", () => {
    // 3px glyphs with 1px spacing: "AB" = 3 + 1 + 3
    expect(measureText("A")).toBe(3);
    expect(measureText("AB")).toBe(7);
  });

  it("multiplies by the scale", () => {
    expect(measureText("AB", 2)).toBe(14);
    expect(textHeight(2)).toBe(10);
  });
});

describe("centerX", () => {
  it("centers text between two columns", () => {
    // (64 - 3) / 2 = 30.5 -> 30
    expect(centerX("A", 0, 63)).toBe(30);
  });
});

describe("fitScale", () => {
  it("picks the largest scale that fits", () => {
    expect(fitScale("AB", 20, 5)).toBe(2);
  });

  it("falls back to the minimum scale", () => {
    expect(fitScale("LONG TITLE", 10, 4, 2)).toBe(2);
  });
});

describe("drawText", () => {
  it("draws glyph pixels and returns the width", () => {
    const frame = createSolidFrame(20, 10);
    const width = drawText(frame, "A", 0, 0, BLACK);

    expect(width).toBe(3);
    // Top row of "A" is .#.
    expect(getPixel(frame, 0, 0)).toEqual(WHITE);
    expect(getPixel(frame, 1, 0)).toEqual(BLACK);
    // Middle row is ###
    expect(getPixel(frame, 0, 2)).toEqual(BLACK);
    expect(getPixel(frame, 2, 2)).toEqual(BLACK);
  });

  it("scales each font pixel into a block", () => {
    const frame = createSolidFrame(20, 20);
    drawText(frame, "A", 0, 0, BLACK, { scale: 2 });

    expect(getPixel(frame, 1, 0)).toEqual(WHITE);
    expect(getPixel(frame, 2, 0)).toEqual(BLACK);
    expect(getPixel(frame, 3, 1)).toEqual(BLACK);
    expect(getPixel(frame, 4, 0)).toEqual(WHITE);
  });

  it("draws lowercase as uppercase", () => {
    const upper = createSolidFrame(10, 10);
    const lower = createSolidFrame(10, 10);
    drawText(upper, "A", 0, 0, BLACK);
    drawText(lower, "a", 0, 0, BLACK);
    expect(lower.pixels).toEqual(upper.pixels);
  });

  it("clips rows outside minY and maxY", () => {
    const frame = createSolidFrame(10, 10);
    drawText(frame, "A", 0, 0, BLACK, { maxY: 1 });

    expect(getPixel(frame, 1, 0)).toEqual(BLACK);
    expect(getPixel(frame, 0, 2)).toEqual(WHITE);
  });
});

describe("truncateText", () => {
  it("returns text unchanged when it fits", () => {
    expect(truncateText("HELLO", 19)).toBe("HELLO");
  });

  it("truncates with ellipsis when over limit", () => {
    expect(truncateText("HELLO WORLD", 31)).toBe("HELLO...");
  });

  it("returns empty string when not even the ellipsis fits", () => {
    expect(truncateText("HELLO", 7)).toBe("");
  });
});

describe("wrapText", () => {
  it("wraps at word boundaries", () => {
    expect(wrapText("HELLO WORLD", 23)).toEqual(["HELLO", "WORLD"]);
  });

  it("breaks words wider than a line", () => {
    expect(wrapText("ABCDEFGH", 11)).toEqual(["ABC", "DEF", "GH"]);
  });

  it("ellipsizes the last line when there are too many", () => {
    expect(wrapText("ONE TWO THREE FOUR", 31, 1, 2)).toEqual(["ONE TWO", "THREE..."]);
  });

  it("returns no lines for blank text", () => {
    expect(wrapText("   ", 40)).toEqual([]);
  });

  it("returns no lines when not even one character fits", () => {
    expect(wrapText("FOCUS", 2)).toEqual([]);
    expect(wrapText("FOCUS", -9)).toEqual([]);
  });

  it("breaks down to single characters at the narrowest width", () => {
    expect(wrapText("AB", 3)).toEqual(["A", "B"]);
  });
});

describe("parseFont", () => {
  it("rejects glyphs with the wrong number of rows", () => {
    expect(() => parseFont({ width: 3, height: 5, glyphs: { A: [1, 2] } })).toThrow(
      'font glyph "A" must have 5 rows of 3 bits'
    );
  });

  it("rejects a font without dimensions", () => {
    expect(() => parseFont({ glyphs: {} })).toThrow("font width and height must be positive numbers");
  });
});
