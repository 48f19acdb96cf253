/**
 * Database schema exports.
 *
 * All tables for the policy pipeline.
 */

export * from "./policy-events";
export * from "./policy-analysis";
export * from "./fetch-log";
