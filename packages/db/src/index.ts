/**
 * @policy-pulse/db - Database client, schema, and queries
 *
 * This package provides the Drizzle ORM client factory over better-sqlite3,
 * schema definitions, and query functions for the policy pipeline.
 */

export { applySchema, createDb, type Database } from "./client";
export * from "./schema";
export * from "./queries";
