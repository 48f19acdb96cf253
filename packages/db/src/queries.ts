/**
 * Database queries for policies, classifications and the fetch log.
 */

import { and, desc, eq, getTableColumns, inArray, isNull, like, sql } from "drizzle-orm";
import {
	type ClassificationDraft,
	type ClassificationResult,
	type ContentQuality,
	type FetchLogEntry,
	type IndustryMatch,
	type PipelineStatistics,
	type PolicyCandidate,
	type PolicyRecord,
} from "@policy-pulse/shared";
import { fetchLog } from "./schema/fetch-log";
import { policyAnalysis } from "./schema/policy-analysis";
import { policyEvents } from "./schema/policy-events";
import type { Database } from "./client";

/**
 * A policy whose stored classification is failed or no_industry, with the
 * text the previous analysis saw.
 */
export type DegradedPolicy = PolicyRecord & { cachedContent: string };

/**
 * Insert one policy record. Returns the assigned id.
 */
export async function insertPolicy(
	db: Database,
	candidate: PolicyCandidate,
): Promise<number> {
	const inserted = await db
		.insert(policyEvents)
		.values({
			date: candidate.date,
			title: candidate.title,
			eventType: candidate.eventType,
			sourceUrl: candidate.sourceUrl,
			department: candidate.department,
			policyLevel: candidate.policyLevel,
			impactLevel: candidate.impactLevel,
			contentType: candidate.contentType,
			content: candidate.content,
		})
		.returning({ id: policyEvents.id })
		.get();

	return inserted.id;
}

/**
 * Check whether a policy with this (title, sourceUrl) pair is stored.
 * A null URL only matches rows whose URL is also null.
 */
export async function policyExists(
	db: Database,
	title: string,
	sourceUrl: string | null,
): Promise<boolean> {
	const row = await db
		.select({ id: policyEvents.id })
		.from(policyEvents)
		.where(
			and(
				eq(policyEvents.title, title),
				sourceUrl === null
					? isNull(policyEvents.sourceUrl)
					: eq(policyEvents.sourceUrl, sourceUrl),
			),
		)
		.get();

	return row !== undefined;
}

/**
 * Get a single policy by id.
 */
export async function getPolicy(
	db: Database,
	id: number,
): Promise<PolicyRecord | null> {
	const result = await db
		.select()
		.from(policyEvents)
		.where(eq(policyEvents.id, id))
		.get();
	return result ?? null;
}

/**
 * Policies with no classification row, newest date first.
 */
export async function listUnanalyzedPolicies(
	db: Database,
	limit: number,
): Promise<PolicyRecord[]> {
	return db
		.select(getTableColumns(policyEvents))
		.from(policyEvents)
		.leftJoin(policyAnalysis, eq(policyAnalysis.policyId, policyEvents.id))
		.where(isNull(policyAnalysis.id))
		.orderBy(desc(policyEvents.date), desc(policyEvents.id))
		.limit(limit)
		.all();
}

/**
 * Policies whose classification failed or found no industry, newest first.
 */
export async function listDegradedPolicies(
	db: Database,
	limit: number,
): Promise<DegradedPolicy[]> {
	return db
		.select({
			...getTableColumns(policyEvents),
			cachedContent: policyAnalysis.fullContent,
		})
		.from(policyEvents)
		.innerJoin(policyAnalysis, eq(policyAnalysis.policyId, policyEvents.id))
		.where(inArray(policyAnalysis.outcome, ["failed", "no_industry"]))
		.orderBy(desc(policyEvents.date), desc(policyEvents.id))
		.limit(limit)
		.all();
}

/**
 * Insert a classification, or replace every field of the existing one.
 */
export async function upsertAnalysis(
	db: Database,
	policyId: number,
	draft: ClassificationDraft,
	createdAt: string = new Date().toISOString(),
): Promise<void> {
	const fields = {
		industries: draft.industries,
		summary: draft.summary,
		confidenceScore: draft.confidenceScore,
		impactType: draft.impactType,
		contentQuality: draft.contentQuality,
		fullContent: draft.fullContent,
		status: draft.status,
		outcome: draft.outcome,
		createdAt,
	};

	await db
		.insert(policyAnalysis)
		.values({ policyId, ...fields })
		.onConflictDoUpdate({
			target: policyAnalysis.policyId,
			set: fields,
		})
		.run();
}

/**
 * Get the classification for a policy.
 */
export async function getAnalysis(
	db: Database,
	policyId: number,
): Promise<ClassificationResult | null> {
	const { id: _id, ...columns } = getTableColumns(policyAnalysis);
	const result = await db
		.select(columns)
		.from(policyAnalysis)
		.where(eq(policyAnalysis.policyId, policyId))
		.get();
	return result ?? null;
}

/**
 * Classified policies with an industry containing the keyword, newest first.
 */
export async function findPoliciesByIndustry(
	db: Database,
	keyword: string,
	limit: number,
): Promise<IndustryMatch[]> {
	const rows = await db
		.select({
			policyId: policyEvents.id,
			title: policyEvents.title,
			date: policyEvents.date,
			eventType: policyEvents.eventType,
			industries: policyAnalysis.industries,
			summary: policyAnalysis.summary,
			confidenceScore: policyAnalysis.confidenceScore,
		})
		.from(policyAnalysis)
		.innerJoin(policyEvents, eq(policyAnalysis.policyId, policyEvents.id))
		.where(
			and(
				eq(policyAnalysis.outcome, "classified"),
				like(policyAnalysis.industries, `%${keyword}%`),
			),
		)
		.orderBy(desc(policyEvents.date), desc(policyEvents.id))
		.all();

	// LIKE runs over the JSON text; confirm the match is inside one entry
	return rows
		.filter((row) => row.industries.some((industry) => industry.includes(keyword)))
		.slice(0, limit);
}

/**
 * Get the fetch log entry for a source.
 */
export async function getFetchLogEntry(
	db: Database,
	sourceName: string,
): Promise<FetchLogEntry | null> {
	const result = await db
		.select({
			sourceName: fetchLog.sourceName,
			lastFetchTime: fetchLog.lastFetchTime,
			status: fetchLog.status,
			errorMessage: fetchLog.errorMessage,
			recordsFetched: fetchLog.recordsFetched,
		})
		.from(fetchLog)
		.where(eq(fetchLog.sourceName, sourceName))
		.get();
	return result ?? null;
}

/**
 * Record a fetch attempt, replacing the previous entry for the source.
 */
export async function upsertFetchLogEntry(
	db: Database,
	entry: FetchLogEntry,
): Promise<void> {
	const now = new Date().toISOString();

	await db
		.insert(fetchLog)
		.values({ ...entry, createdAt: now, updatedAt: now })
		.onConflictDoUpdate({
			target: fetchLog.sourceName,
			set: {
				lastFetchTime: entry.lastFetchTime,
				status: entry.status,
				errorMessage: entry.errorMessage,
				recordsFetched: entry.recordsFetched,
				updatedAt: now,
			},
		})
		.run();
}

function percentOf(count: number, total: number): number {
	if (total === 0) return 0;
	return Math.round((count / total) * 1000) / 10;
}

/**
 * Get aggregate counts for the stats command.
 */
export async function getStatistics(db: Database): Promise<PipelineStatistics> {
	const [totalResult, outcomeResults, qualityResults] = await Promise.all([
		db.select({ count: sql<number>`count(*)` }).from(policyEvents).get(),
		db
			.select({ outcome: policyAnalysis.outcome, count: sql<number>`count(*)` })
			.from(policyAnalysis)
			.groupBy(policyAnalysis.outcome)
			.all(),
		db
			.select({ quality: policyAnalysis.contentQuality, count: sql<number>`count(*)` })
			.from(policyAnalysis)
			.groupBy(policyAnalysis.contentQuality)
			.all(),
	]);

	const byOutcome = { classified: 0, no_industry: 0, failed: 0 };
	for (const row of outcomeResults) {
		byOutcome[row.outcome] = row.count;
	}

	const byContentQuality: Record<ContentQuality, number> = {
		full: 0,
		partial: 0,
		title_only: 0,
	};
	for (const row of qualityResults) {
		byContentQuality[row.quality] = row.count;
	}

	const totalPolicies = totalResult?.count ?? 0;
	const analyzedPolicies = byOutcome.classified + byOutcome.no_industry + byOutcome.failed;
	const needsReanalysis = byOutcome.failed + byOutcome.no_industry;

	return {
		totalPolicies,
		analyzedPolicies,
		unanalyzedPolicies: totalPolicies - analyzedPolicies,
		classified: byOutcome.classified,
		failed: byOutcome.failed,
		noIndustry: byOutcome.no_industry,
		needsReanalysis,
		classifiedRate: percentOf(byOutcome.classified, analyzedPolicies),
		failedRate: percentOf(byOutcome.failed, analyzedPolicies),
		noIndustryRate: percentOf(byOutcome.no_industry, analyzedPolicies),
		needsReanalysisRate: percentOf(needsReanalysis, analyzedPolicies),
		byContentQuality,
	};
}
