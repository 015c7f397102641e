export * from "./types.js";
export * from "./templates.js";
export * from "./tasks.js";
export * from "./routine.js";
export * from "./providers/provider.js";
export * from "./providers/lunar.js";
export * from "./providers/calendar.js";
export * from "./providers/blurb.js";
