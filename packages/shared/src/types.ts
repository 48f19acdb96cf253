/**
 * Shared TypeScript types for the policy pipeline.
 *
 * Dates are `YYYY-MM-DD` strings; timestamps are ISO-8601 strings.
 */

import type {
	AnalysisOutcome,
	AnalysisStatus,
	ContentQuality,
	FetchStatus,
} from "./constants";

// ============ Result Types ============

/**
 * Outcome of an operation that can fail in an expected way.
 */
export type Result<T, E> =
	| { success: true; data: T }
	| { success: false; error: E };

// ============ Core Data Types ============

/**
 * One scraped announcement, before it has been persisted.
 */
export interface PolicyCandidate {
	date: string;
	title: string;
	eventType: string;
	sourceUrl: string | null;
	department: string | null;
	policyLevel: string | null;
	impactLevel: string | null;
	contentType: string;
	content: string | null;
}

/**
 * A persisted policy record.
 */
export interface PolicyRecord extends PolicyCandidate {
	id: number;
	createdAt: string;
}

/**
 * Classification fields produced by one analysis, before persistence.
 */
export interface ClassificationDraft {
	industries: string[];
	summary: string;
	confidenceScore: number;
	impactType: string | null;
	contentQuality: ContentQuality;
	fullContent: string;
	status: AnalysisStatus;
	outcome: AnalysisOutcome;
}

/**
 * A persisted classification, one-to-one with a policy record.
 */
export interface ClassificationResult extends ClassificationDraft {
	policyId: number;
	createdAt: string;
}

/**
 * Latest fetch attempt for a named source.
 */
export interface FetchLogEntry {
	sourceName: string;
	lastFetchTime: string;
	status: FetchStatus;
	errorMessage: string | null;
	recordsFetched: number;
}

// ============ Query Types ============

/**
 * Aggregate counts over policies and their classifications.
 * Rates are percentages of analysed records, with one decimal.
 */
export interface PipelineStatistics {
	totalPolicies: number;
	analyzedPolicies: number;
	unanalyzedPolicies: number;
	classified: number;
	failed: number;
	noIndustry: number;
	needsReanalysis: number;
	classifiedRate: number;
	failedRate: number;
	noIndustryRate: number;
	needsReanalysisRate: number;
	byContentQuality: Record<ContentQuality, number>;
}

/**
 * A classified policy matched by industry keyword.
 */
export interface IndustryMatch {
	policyId: number;
	title: string;
	date: string;
	eventType: string;
	industries: string[];
	summary: string;
	confidenceScore: number;
}
