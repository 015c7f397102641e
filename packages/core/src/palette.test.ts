import { describe, it, expect } from "vitest";
import { mixColors, PANEL_COLORS } from "./palette.js";

describe("mixColors", () => {
  it("returns a pure ink for a single weight", () => {
    expect(mixColors({ r: 1 })).toEqual(PANEL_COLORS.red);
  });

  it("normalizes weights", () => {
    // 1 part black, 1 part white
    expect(mixColors({ k: 5, w: 5 })).toEqual({ r: 127, g: 127, b: 127 });
  });

  it("truncates channel values", () => {
    // red 196,85,49 * 0.25 + white * 0.75 = 240.25, 212.5, 203.5
    expect(mixColors({ r: 5, w: 15 })).toEqual({ r: 240, g: 212, b: 203 });
  });

  it("falls back to white when all weights are zero", () => {
    expect(mixColors({})).toEqual(PANEL_COLORS.white);
  });
});
