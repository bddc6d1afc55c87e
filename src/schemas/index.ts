/**
 * Schema exports
 */

export * from "./evidence.js";
export * from "./artifacts.js";
export * from "./session.js";
