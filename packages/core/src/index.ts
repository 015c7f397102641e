export * from "./types.js";
export * from "./frame.js";
export * from "./fingerprint.js";
export * from "./auth-token.js";
export * from "./errors.js";
export * from "./palette.js";
