export * from "./config.js";
export * from "./backoff.js";
export * from "./update-queue.js";
export * from "./devices.js";
export * from "./display.js";
export * from "./uploader.js";
export * from "./alarm.js";
export * from "./scheduler.js";
export * from "./app.js";
