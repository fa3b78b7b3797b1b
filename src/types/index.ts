export * from "./audit.js";
export * from "./config.js";
export * from "./decision.js";
export * from "./session.js";
export * from "./tool.js";
