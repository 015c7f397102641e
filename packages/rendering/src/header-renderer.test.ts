import { describe, it, expect } from "vitest";
import { createSolidFrame, getPixel, PANEL_COLORS } from "@paperday/core";
import { COLORS } from "./colors.js";
import { formatHeaderDate, renderHeaderRegion } from "./header-renderer.js";
import { createLayout } from "./layout.js";
import { makeContext } from "./__tests__/fixtures.js";

describe("formatHeaderDate", () => {
  it("formats the date with a weekday", () => {
    expect(formatHeaderDate(new Date(2024, 2, 5, 9, 30))).toBe("2024-03-05 TUE");
    expect(formatHeaderDate(new Date(2023, 11, 31))).toBe("2023-12-31 SUN");
  });
});

describe("renderHeaderRegion", () => {
  it("draws the title rule under the date", () => {
    const frame = createSolidFrame(800, 480);
    renderHeaderRegion(frame, makeContext(new Date(2024, 2, 5, 9)), createLayout());

    expect(getPixel(frame, 490, 47)).toEqual(PANEL_COLORS.red);
    expect(getPixel(frame, 490, 49)).toEqual(PANEL_COLORS.red);
    expect(getPixel(frame, 490, 50)).toEqual(PANEL_COLORS.white);
  });

  it("shows a placeholder when the lunar date is missing", () => {
    const frame = createSolidFrame(800, 480);
    renderHeaderRegion(frame, makeContext(new Date(2024, 2, 5, 9)), createLayout());

    // "--" right-aligned at x 769..782; the dash is the third glyph row
    expect(getPixel(frame, 769, 60)).toEqual(COLORS.placeholder);
    expect(getPixel(frame, 782, 61)).toEqual(COLORS.placeholder);
    expect(getPixel(frame, 769, 56)).toEqual(PANEL_COLORS.white);
  });
});
