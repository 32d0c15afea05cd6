/**
 * Shared type foundations for the harvest pipeline.
 */

export * from "./records.js";
