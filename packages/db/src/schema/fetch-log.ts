/**
 * Fetch log table - latest fetch attempt per source, used for throttling.
 */

import { sqliteTable, text, integer } from "drizzle-orm/sqlite-core";
import { FETCH_STATUSES } from "@policy-pulse/shared";

export const fetchLog = sqliteTable("fetch_log", {
	id: integer("id").primaryKey({ autoIncrement: true }),
	sourceName: text("source_name").notNull().unique(),
	lastFetchTime: text("last_fetch_time").notNull(), // ISO-8601
	status: text("status", { enum: FETCH_STATUSES }).notNull(),
	errorMessage: text("error_message"),
	recordsFetched: integer("records_fetched").notNull().default(0),
	createdAt: text("created_at").notNull(),
	updatedAt: text("updated_at").notNull(),
});

export type FetchLogRow = typeof fetchLog.$inferSelect;
