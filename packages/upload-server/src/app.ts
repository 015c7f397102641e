/**
 * Upload endpoint
 *
 * POST / with a multipart `file` field and `Authorization: Bearer <ts>:<sig>`.
 * Checks run in a fixed order and the first failure decides the response:
 * destination, method, auth header, token shape, signature and age, request
 * size, file presence, file size, type, then the write itself.
 */

import { Hono, type Context } from "hono";
import { bodyLimit } from "hono/body-limit";
import {
  DEFAULT_TOKEN_MAX_AGE_SECONDS,
  extractBearerToken,
  ServerValidationError,
  verifyUploadToken,
  type TokenRejection,
} from "@paperday/core";
import type { UploadStore } from "./storage.js";

export const DEFAULT_MAX_BYTES = 1024 * 1024;
export const DEFAULT_ALLOWED_TYPES: readonly string[] = ["image/png"];
/** Room for multipart boundaries, part headers and the note field */
export const MULTIPART_OVERHEAD_BYTES = 16 * 1024;

const GENERIC_TYPE = "application/octet-stream";
const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

export interface UploadAppOptions {
  apiKey: string;
  store: UploadStore;
  maxBytes?: number;
  maxAgeSeconds?: number;
  allowedTypes?: readonly string[];
  /** Unix seconds; replaceable in tests */
  nowSeconds?: () => number;
}

const TOKEN_ERRORS: Record<TokenRejection, string> = {
  missing: "Auth header not found",
  malformed: "Invalid token",
  "bad-signature": "Verification failed",
  expired: "Token expired",
  future: "Token timestamp is in the future",
};

export function isPng(bytes: Uint8Array): boolean {
  return bytes.length >= PNG_SIGNATURE.length && PNG_SIGNATURE.every((byte, i) => bytes[i] === byte);
}

/**
 * The declared type, or a sniffed one when the client sent none or a generic one
 */
export function detectType(declared: string, bytes: Uint8Array): string {
  if (declared && declared !== GENERIC_TYPE) return declared;
  return isPng(bytes) ? "image/png" : GENERIC_TYPE;
}

async function readForm(c: Context): Promise<Record<string, unknown>> {
  try {
    return await c.req.parseBody();
  } catch (error) {
    if (error instanceof Error && error.name === "BodyLimitError") {
      throw new ServerValidationError(400, "File oversize");
    }
    console.warn("[server] Unreadable request body:", error);
    throw new ServerValidationError(400, "File failed to upload");
  }
}

export function createUploadApp(options: UploadAppOptions): Hono {
  const { apiKey, store } = options;
  const maxBytes = options.maxBytes ?? DEFAULT_MAX_BYTES;
  const maxAgeSeconds = options.maxAgeSeconds ?? DEFAULT_TOKEN_MAX_AGE_SECONDS;
  const allowedTypes = options.allowedTypes ?? DEFAULT_ALLOWED_TYPES;
  const nowSeconds = options.nowSeconds ?? (() => Math.floor(Date.now() / 1000));

  const app = new Hono();

  app.use("/", async (c, next) => {
    await store.checkWritable();

    if (c.req.method !== "POST") {
      throw new ServerValidationError(405, "POST Method not allowed");
    }

    const raw = extractBearerToken(c.req.header("Authorization"));
    const verification = verifyUploadToken(raw, apiKey, { nowSeconds: nowSeconds(), maxAgeSeconds });
    if (!verification.ok) {
      throw new ServerValidationError(401, TOKEN_ERRORS[verification.reason]);
    }
    await next();
  });

  app.use(
    "/",
    bodyLimit({
      maxSize: maxBytes + MULTIPART_OVERHEAD_BYTES,
      onError: (c) => {
        console.warn("[server] 400 File oversize");
        return c.json({ error: "File oversize" }, 400);
      },
    })
  );

  app.all("/", async (c) => {
    const form = await readForm(c);
    const file = form.file;
    if (!(file instanceof Blob)) {
      throw new ServerValidationError(400, "File failed to upload");
    }
    if (file.size > maxBytes) {
      throw new ServerValidationError(400, "File oversize");
    }

    const bytes = new Uint8Array(await file.arrayBuffer());
    const type = detectType(file.type, bytes);
    if (!allowedTypes.includes(type)) {
      throw new ServerValidationError(400, `File type mismatch; expected png, got ${file.type || type}`);
    }

    await store.save(bytes);
    const note = typeof form.note === "string" && form.note ? `: ${form.note}` : "";
    console.log(`[server] Stored ${store.fileName} (${bytes.length} bytes)${note}`);
    return c.json({ status: "success", file: store.fileName });
  });

  app.onError((error, c) => {
    if (error instanceof ServerValidationError) {
      if (error.status !== 405) console.warn(`[server] ${error.status} ${error.message}`);
      return c.json({ error: error.message }, error.status);
    }
    console.error("[server] Unhandled error:", error);
    return c.json({ error: "Internal server error" }, 500);
  });

  return app;
}
