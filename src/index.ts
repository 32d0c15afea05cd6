/**
 * Library entry for the harvest pipeline. The command-line entry is
 * src/cli/harvest.ts.
 */

export * from "./types/index.js";
export * from "./config/index.js";
export * from "./logging/index.js";
export * from "./storage/index.js";
export * from "./source/index.js";
export * from "./resolve/index.js";
export * from "./classify/index.js";
export * from "./enrich/index.js";
export * from "./aggregate/index.js";
export * from "./export/index.js";
export * from "./report/index.js";
export * from "./pipeline/index.js";
