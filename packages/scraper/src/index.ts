/**
 * Scraper package - policy sources, pagination, and detail-page text.
 *
 * Used by the ingestion job for list scraping and by the analyzer for
 * fetching full policy text.
 */

export type { ExtractOptions, PolicySource } from "./types";

// Page fetching
export { fetchPage, createPageFetcher, HttpStatusError, type PageFetcher } from "./http";

// Filters and heuristics
export { shouldSkipContent } from "./noise-filter";
export {
	classifyPolicyType,
	extractDepartment,
	determinePolicyLevel,
	assessImpactLevel,
	classifyCsrcPolicyType,
	isFinancePolicyContent,
} from "./metadata";

// Sources
export { extractLinkCandidates, resolveLink, type LinkListRules } from "./link-list";
export { extractCsrcCandidates, csrcPageUrl } from "./csrc";
export {
	SOURCE_NAMES,
	createSources,
	createLinkListSource,
	createGovCnSource,
	createNdrcSource,
	createMofSource,
	createCsrcSource,
	isSourceName,
	type SourceName,
	type SourceOptions,
} from "./sources";

// List scraper
export { scrapeSource, scrapeAll, SourceUnavailableError, type ScrapeOptions } from "./list-scraper";

// Body scraper
export { fetchPolicyContent, extractMainText, type ContentFetchError } from "./body-scraper";
