import type { PolicyCandidate } from "@policy-pulse/shared";

export interface ExtractOptions {
	/** Keep only candidates dated in this month (YYYY-MM) */
	targetMonth?: string;
	/** URL the page was fetched from, for resolving relative links */
	pageUrl?: string;
	/** Fallback date when none can be extracted (defaults to today in CST) */
	today?: string;
}

/**
 * One policy source: where its pages are, how to fetch them, and how to
 * turn a page into candidates.
 */
export interface PolicySource {
	readonly name: string;
	readonly label: string;
	readonly maxPages: number;
	pageUrl(pageIndex: number): string;
	fetchSourcePage(url: string): Promise<string>;
	extractCandidates(raw: string, options?: ExtractOptions): PolicyCandidate[];
}
