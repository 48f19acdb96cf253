/**
 * Policy events table - one row per scraped announcement.
 *
 * Deduplication is by (title, source_url) in application code; the pair is
 * indexed but not unique.
 */

import { sqliteTable, text, integer, index } from "drizzle-orm/sqlite-core";
import { DEFAULT_CONTENT_TYPE } from "@policy-pulse/shared";

export const policyEvents = sqliteTable(
	"policy_events",
	{
		id: integer("id").primaryKey({ autoIncrement: true }),

		// From the source list page
		date: text("date").notNull(), // YYYY-MM-DD
		title: text("title").notNull(),
		eventType: text("event_type").notNull(),
		sourceUrl: text("source_url"),

		// Heuristic metadata, NULL when the source does not provide it
		department: text("department"),
		policyLevel: text("policy_level"),
		impactLevel: text("impact_level"),

		contentType: text("content_type").notNull().default(DEFAULT_CONTENT_TYPE),
		content: text("content"),

		createdAt: text("created_at")
			.notNull()
			.$defaultFn(() => new Date().toISOString()),
	},
	(table) => ({
		titleUrlIdx: index("policy_events_title_url_idx").on(table.title, table.sourceUrl),
		dateIdx: index("policy_events_date_idx").on(table.date),
	}),
);

// Type exports
export type PolicyEvent = typeof policyEvents.$inferSelect;
export type NewPolicyEvent = typeof policyEvents.$inferInsert;
