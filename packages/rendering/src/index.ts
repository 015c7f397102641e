/**
 * Schedule rendering
 * Used by the daemon and by the one-shot render command.
 */

export * from "./types.js";
export * from "./text.js";
export * from "./colors.js";
export * from "./layout.js";
export * from "./shapes.js";
export * from "./header-renderer.js";
export * from "./now-renderer.js";
export * from "./timeline-renderer.js";
export * from "./frame-composer.js";
export * from "./png.js";
