/**
 * @policy-pulse/shared - Shared constants and utilities
 *
 * This package provides shared code used across the pipeline packages:
 * - Constants and domain types
 * - Utility functions (dates, throttle windows, content quality)
 * - Logging and configuration
 */

export * from "./constants";
export * from "./types";
export * from "./dates";
export * from "./throttle";
export * from "./content-quality";
export * from "./sleep";
export * from "./logger";
export * from "./config";
