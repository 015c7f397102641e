#!/usr/bin/env tsx
/**
 * Upload server entry point
 *
 * Usage:
 *   PAPERDAY_UPLOAD_API_KEY=... PAPERDAY_UPLOAD_DEST=/var/www/paperday paperday-upload-server
 */

import { config as loadEnv } from "dotenv";
import { serve } from "@hono/node-server";
import { createUploadApp } from "./app.js";
import { readServerConfig, type ServerConfig } from "./config.js";
import { UploadStore } from "./storage.js";

loadEnv();

let config: ServerConfig;
try {
  config = readServerConfig();
} catch (error) {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
}

const store = new UploadStore(config.destDir, config.fileName);
const app = createUploadApp({
  apiKey: config.apiKey,
  store,
  maxBytes: config.maxBytes,
  maxAgeSeconds: config.maxAgeSeconds,
});

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  console.log(`[server] Listening on http://localhost:${info.port}`);
  console.log(`[server] Storing uploads at ${store.path}`);
});

const shutdown = () => {
  console.log("\n[server] Shutting down");
  server.close();
};
process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);
