/**
 * CV-CUE Infrastructure Layer - Public API
 */

export * from "./types";
export * from "./errors";
export * from "./logger";
export * from "./filters";
export * from "./client";
export * from "./resources";
