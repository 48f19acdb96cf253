/**
 * Policy analysis table - at most one classification per policy.
 *
 * Re-analysis replaces the row in place (upsert on policy_id).
 */

import { sqliteTable, text, integer, real } from "drizzle-orm/sqlite-core";
import {
	ANALYSIS_OUTCOMES,
	ANALYSIS_STATUSES,
	CONTENT_QUALITIES,
} from "@policy-pulse/shared";
import { policyEvents } from "./policy-events";

export const policyAnalysis = sqliteTable("policy_analysis", {
	id: integer("id").primaryKey({ autoIncrement: true }),
	policyId: integer("policy_id")
		.notNull()
		.unique()
		.references(() => policyEvents.id),

	// Never empty: sentinels stand in for failed and no-industry results
	industries: text("industries", { mode: "json" }).$type<string[]>().notNull(),
	summary: text("analysis_summary").notNull(),
	confidenceScore: real("confidence_score").notNull(),
	impactType: text("impact_type"),

	contentQuality: text("content_quality", { enum: CONTENT_QUALITIES }).notNull(),
	fullContent: text("full_content").notNull().default(""), // text shown to the model
	status: text("analysis_status", { enum: ANALYSIS_STATUSES }).notNull(),
	outcome: text("outcome", { enum: ANALYSIS_OUTCOMES }).notNull(),

	createdAt: text("created_at").notNull(),
});

// Type exports
export type PolicyAnalysisRow = typeof policyAnalysis.$inferSelect;
export type NewPolicyAnalysisRow = typeof policyAnalysis.$inferInsert;
