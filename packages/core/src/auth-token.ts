/**
 * Upload tokens
 *
 * Wire format (Authorization header): `Bearer <unix-seconds>:<hex-signature>`
 * where signature = HMAC-SHA256(shared secret, timestamp string).
 *
 * Tokens are created per upload attempt and never stored. The server
 * recomputes the signature and compares it in constant time.
 */

import { createHmac, timingSafeEqual } from "crypto";

/** Default freshness window for a token */
export const DEFAULT_TOKEN_MAX_AGE_SECONDS = 300;

/** Tolerated clock skew for timestamps from the future */
export const DEFAULT_TOKEN_FUTURE_SKEW_SECONDS = 60;

const SIGNATURE_HEX_LENGTH = 64;

export interface UploadToken {
  /** Unix timestamp in seconds */
  timestamp: number;
  /** Lowercase hex HMAC-SHA256 */
  signature: string;
}

export type TokenRejection =
  | "missing"
  | "malformed"
  | "bad-signature"
  | "expired"
  | "future";

export type TokenVerification =
  | { ok: true; token: UploadToken }
  | { ok: false; reason: TokenRejection };

export interface VerifyTokenOptions {
  /** Current time in unix seconds (defaults to the wall clock) */
  nowSeconds?: number;
  maxAgeSeconds?: number;
  maxFutureSkewSeconds?: number;
}

/**
 * Keyed hash of the timestamp
 */
export function signTimestamp(secret: string, timestamp: number | string): string {
  return createHmac("sha256", secret).update(String(timestamp)).digest("hex");
}

/**
 * Build a fresh `<timestamp>:<signature>` token
 */
export function createUploadToken(
  secret: string,
  nowSeconds: number = Math.floor(Date.now() / 1000)
): string {
  return `${nowSeconds}:${signTimestamp(secret, nowSeconds)}`;
}

/**
 * Build the full Authorization header value
 */
export function createAuthorizationHeader(secret: string, nowSeconds?: number): string {
  return `Bearer ${createUploadToken(secret, nowSeconds)}`;
}

/**
 * Parse `<timestamp>:<signature>`; returns null on any shape mismatch
 */
export function parseUploadToken(raw: string): UploadToken | null {
  const parts = raw.split(":");
  if (parts.length !== 2) return null;

  const [timestampText, signature] = parts;
  if (!/^\d{1,12}$/.test(timestampText)) return null;
  if (!/^[0-9a-f]+$/i.test(signature) || signature.length !== SIGNATURE_HEX_LENGTH) {
    return null;
  }

  return { timestamp: parseInt(timestampText, 10), signature: signature.toLowerCase() };
}

/**
 * Extract the token from an `Authorization: Bearer ...` header value
 */
export function extractBearerToken(header: string | null | undefined): string | null {
  if (!header) return null;
  const match = header.match(/^Bearer (.+)$/);
  return match ? match[1] : null;
}

/**
 * Verify a raw token against the shared secret
 */
export function verifyUploadToken(
  raw: string | null | undefined,
  secret: string,
  options: VerifyTokenOptions = {}
): TokenVerification {
  if (!raw) return { ok: false, reason: "missing" };

  const token = parseUploadToken(raw);
  if (!token) return { ok: false, reason: "malformed" };

  const expected = Buffer.from(signTimestamp(secret, token.timestamp), "hex");
  const actual = Buffer.from(token.signature, "hex");
  if (expected.length !== actual.length || !timingSafeEqual(expected, actual)) {
    return { ok: false, reason: "bad-signature" };
  }

  const now = options.nowSeconds ?? Math.floor(Date.now() / 1000);
  const maxAge = options.maxAgeSeconds ?? DEFAULT_TOKEN_MAX_AGE_SECONDS;
  const maxSkew = options.maxFutureSkewSeconds ?? DEFAULT_TOKEN_FUTURE_SKEW_SECONDS;

  if (token.timestamp > now + maxSkew) {
    return { ok: false, reason: "future" };
  }
  if (now - token.timestamp > maxAge) {
    return { ok: false, reason: "expired" };
  }

  return { ok: true, token };
}
