import { describe, it, expect } from "vitest";
import { createSolidFrame, setPixel } from "./frame.js";
import { fingerprintFrame, sameFrame, toRenderedFrame } from "./fingerprint.js";

describe("fingerprintFrame", () => {
  it("is identical for identical pixels", () => {
    const a = createSolidFrame(8, 8);
    const b = createSolidFrame(8, 8);
    expect(fingerprintFrame(a)).toBe(fingerprintFrame(b));
  });

  it("changes when a single pixel changes", () => {
    const a = createSolidFrame(8, 8);
    const b = createSolidFrame(8, 8);
    setPixel(b, 7, 7, { r: 0, g: 0, b: 0 });
    expect(fingerprintFrame(a)).not.toBe(fingerprintFrame(b));
  });

  it("includes the dimensions", () => {
    // same byte count, different shape
    expect(fingerprintFrame(createSolidFrame(4, 2))).not.toBe(
      fingerprintFrame(createSolidFrame(2, 4))
    );
  });
});

describe("sameFrame", () => {
  it("compares fingerprints and treats missing frames as changed", () => {
    const a = toRenderedFrame(createSolidFrame(4, 4));
    const b = toRenderedFrame(createSolidFrame(4, 4));
    expect(sameFrame(a, b)).toBe(true);
    expect(sameFrame(null, b)).toBe(false);
  });
});
