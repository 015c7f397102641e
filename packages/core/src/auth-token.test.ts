import { describe, it, expect } from "vitest";
import {
  createUploadToken,
  createAuthorizationHeader,
  extractBearerToken,
  parseUploadToken,
  signTimestamp,
  verifyUploadToken,
} from "./auth-token.js";

const SECRET = "test-secret";
const ISSUED_AT = 1_760_000_000;

/** Flip one bit of the nibble at `index` in a hex string */
function flipHexBit(hex: string, index: number, bit: number): string {
  const nibble = parseInt(hex[index], 16) ^ (1 << bit);
  return hex.slice(0, index) + nibble.toString(16) + hex.slice(index + 1);
}

describe("createUploadToken", () => {
  it("joins timestamp and hex signature with a colon", () => {
    const token = createUploadToken(SECRET, ISSUED_AT);
    const [timestamp, signature] = token.split(":");

    expect(timestamp).toBe("1760000000");
    expect(signature).toMatch(/^[0-9a-f]{64}$/);
    expect(signature).toBe(signTimestamp(SECRET, ISSUED_AT));
  });

  it("produces different signatures for different secrets", () => {
    expect(signTimestamp("test-secret", ISSUED_AT)).not.toBe(
      signTimestamp("other-secret", ISSUED_AT)
    );
  });

  it("builds a bearer header", () => {
    expect(createAuthorizationHeader(SECRET, ISSUED_AT)).toBe(
      `Bearer ${createUploadToken(SECRET, ISSUED_AT)}`
    );
  });
});

describe("parseUploadToken", () => {
  it("rejects tokens without exactly one separator", () => {
    expect(parseUploadToken("abc")).toBeNull();
    expect(parseUploadToken("1:2:3")).toBeNull();
  });

  it("rejects non-numeric timestamps", () => {
    const sig = signTimestamp(SECRET, ISSUED_AT);
    expect(parseUploadToken(`soon:${sig}`)).toBeNull();
  });

  it("rejects signatures of the wrong length", () => {
    expect(parseUploadToken(`${ISSUED_AT}:abcd`)).toBeNull();
  });

  it("normalizes signature case", () => {
    const sig = signTimestamp(SECRET, ISSUED_AT);
    expect(parseUploadToken(`${ISSUED_AT}:${sig.toUpperCase()}`)).toEqual({
      timestamp: ISSUED_AT,
      signature: sig,
    });
  });
});

describe("extractBearerToken", () => {
  it("returns the token after the Bearer prefix", () => {
    expect(extractBearerToken("Bearer 1:abc")).toBe("1:abc");
  });

  it("returns null for missing or other schemes", () => {
    expect(extractBearerToken(undefined)).toBeNull();
    expect(extractBearerToken("")).toBeNull();
    expect(extractBearerToken("Basic dXNlcjpwYXNz")).toBeNull();
  });
});

describe("verifyUploadToken", () => {
  const token = createUploadToken(SECRET, ISSUED_AT);

  it("accepts a fresh, correctly signed token", () => {
    const result = verifyUploadToken(token, SECRET, { nowSeconds: ISSUED_AT + 100 });
    expect(result).toEqual({
      ok: true,
      token: { timestamp: ISSUED_AT, signature: signTimestamp(SECRET, ISSUED_AT) },
    });
  });

  it("accepts a token at the edge of the freshness window", () => {
    const result = verifyUploadToken(token, SECRET, { nowSeconds: ISSUED_AT + 300 });
    expect(result.ok).toBe(true);
  });

  it("rejects expired tokens", () => {
    const result = verifyUploadToken(token, SECRET, { nowSeconds: ISSUED_AT + 301 });
    expect(result).toEqual({ ok: false, reason: "expired" });
  });

  it("honors a custom max age", () => {
    const result = verifyUploadToken(token, SECRET, {
      nowSeconds: ISSUED_AT + 31,
      maxAgeSeconds: 30,
    });
    expect(result).toEqual({ ok: false, reason: "expired" });
  });

  it("rejects tokens too far in the future", () => {
    const result = verifyUploadToken(token, SECRET, { nowSeconds: ISSUED_AT - 61 });
    expect(result).toEqual({ ok: false, reason: "future" });
  });

  it("rejects tokens signed with another secret", () => {
    const result = verifyUploadToken(token, "other-secret", { nowSeconds: ISSUED_AT });
    expect(result).toEqual({ ok: false, reason: "bad-signature" });
  });

  it("rejects every single-bit mutation of the signature", () => {
    const [timestamp, signature] = token.split(":");
    for (let i = 0; i < signature.length; i++) {
      for (let bit = 0; bit < 4; bit++) {
        const mutated = `${timestamp}:${flipHexBit(signature, i, bit)}`;
        const result = verifyUploadToken(mutated, SECRET, { nowSeconds: ISSUED_AT });
        expect(result.ok).toBe(false);
      }
    }
  });

  it("rejects a re-signed timestamp mismatch", () => {
    const signature = signTimestamp(SECRET, ISSUED_AT);
    const result = verifyUploadToken(`${ISSUED_AT + 1}:${signature}`, SECRET, {
      nowSeconds: ISSUED_AT,
    });
    expect(result).toEqual({ ok: false, reason: "bad-signature" });
  });

  it("reports missing and malformed tokens", () => {
    expect(verifyUploadToken(null, SECRET)).toEqual({ ok: false, reason: "missing" });
    expect(verifyUploadToken("nonsense", SECRET)).toEqual({
      ok: false,
      reason: "malformed",
    });
  });
});
