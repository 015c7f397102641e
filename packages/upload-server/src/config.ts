/**
 * Upload server settings, read from the environment
 */

import { resolve } from "path";
import { DEFAULT_TOKEN_MAX_AGE_SECONDS } from "@paperday/core";
import { DEFAULT_MAX_BYTES } from "./app.js";

export interface ServerConfig {
  apiKey: string;
  destDir: string;
  fileName: string;
  maxBytes: number;
  maxAgeSeconds: number;
  port: number;
}

function positiveInteger(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const text = env[key];
  if (!text) return fallback;
  const value = Number(text);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${key} must be a positive integer, got "${text}"`);
  }
  return value;
}

export function readServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const apiKey = env.PAPERDAY_UPLOAD_API_KEY;
  if (!apiKey) throw new Error("PAPERDAY_UPLOAD_API_KEY is not set");

  const dest = env.PAPERDAY_UPLOAD_DEST;
  if (!dest) throw new Error("PAPERDAY_UPLOAD_DEST is not set");

  const fileName = env.PAPERDAY_UPLOAD_FILE_NAME || "timeline.png";
  if (fileName.includes("/") || fileName.includes("\\") || fileName.startsWith(".")) {
    throw new Error(`PAPERDAY_UPLOAD_FILE_NAME must be a plain file name, got "${fileName}"`);
  }

  return {
    apiKey,
    destDir: resolve(dest),
    fileName,
    maxBytes: positiveInteger(env, "PAPERDAY_UPLOAD_MAX_BYTES", DEFAULT_MAX_BYTES),
    maxAgeSeconds: positiveInteger(env, "PAPERDAY_UPLOAD_MAX_AGE_SECONDS", DEFAULT_TOKEN_MAX_AGE_SECONDS),
    port: positiveInteger(env, "PORT", 8787),
  };
}
