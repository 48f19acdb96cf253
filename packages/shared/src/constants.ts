/**
 * Shared constants for the policy ingestion and classification pipeline.
 */

// Content quality tiers, by how much source text was available when prompting
export const CONTENT_QUALITIES = ["full", "partial", "title_only"] as const;
export type ContentQuality = (typeof CONTENT_QUALITIES)[number];

/**
 * Character thresholds for content quality tiers.
 * A text must be strictly longer than the threshold to reach the tier.
 */
export const QUALITY_THRESHOLDS = {
	full: 500,
	partial: 100,
} as const;

export const ANALYSIS_STATUSES = ["success", "failed"] as const;
export type AnalysisStatus = (typeof ANALYSIS_STATUSES)[number];

/**
 * What an analysis found. `no_industry` is a successful analysis with no
 * finding, and is distinct from a pipeline failure.
 */
export const ANALYSIS_OUTCOMES = ["classified", "no_industry", "failed"] as const;
export type AnalysisOutcome = (typeof ANALYSIS_OUTCOMES)[number];

/**
 * Reserved markers stored in the industries column so it is never empty.
 * `status` and `outcome` remain the authoritative fields.
 */
export const FAILED_SENTINEL = "分析失败";
export const NO_INDUSTRY_SENTINEL = "分析后无相关行业";

export const FETCH_STATUSES = ["success", "error"] as const;
export type FetchStatus = (typeof FETCH_STATUSES)[number];

export const DEFAULT_CONTENT_TYPE = "政策";

/**
 * Prompt construction settings.
 */
export const PROMPT_CONFIG = {
	richContentThreshold: 50, // content longer than this uses the rich template
	maxContentLength: 3000,
	maxIndustries: 5,
	truncationMarker: "...(内容过长已截断)",
	richDefaultConfidence: 0.8,
	sparseDefaultConfidence: 0.5,
} as const;

/**
 * LLM call defaults. All time values in milliseconds.
 */
export const LLM_DEFAULTS = {
	baseUrl: "https://api.siliconflow.cn/v1",
	model: "Qwen/Qwen2.5-7B-Instruct",
	temperature: 0.3,
	maxTokens: 2000,
	timeoutMs: 120_000,

	// Retry with exponential backoff
	maxAttempts: 3,
	baseDelayMs: 2_000,
	maxDelayMs: 30_000,
	jitterMs: 1_000,

	// Sliding-window rate limit
	rateLimitMaxCalls: 10,
	rateLimitWindowMs: 60_000,
} as const;

/**
 * Scraping configuration. All time values in milliseconds.
 */
export const SCRAPE_CONFIG = {
	userAgent:
		"Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36",
	acceptLanguage: "zh-CN,zh;q=0.9,en;q=0.8",
	pageTimeoutMs: 10_000,
	pageDelayMs: 1_000,
	defaultMaxPages: 10,
	maxConsecutiveEmptyPages: 3,
	minTextLength: 8, // noise filter rejects shorter text
	minLinkTitleLength: 10, // list-page link titles must be longer than this
	minBodyLength: 200, // body text needed before a content selector is accepted
	minBodyLineLength: 10,
	contentFetchAttempts: 2,
} as const;

/**
 * Batch analysis settings.
 */
export const BATCH_CONFIG = {
	interItemDelayMs: 800,
	defaultLimit: 20,
	defaultMaxConcurrent: 5,
	fetchMinIntervalHours: 1,
	asyncThreshold: 5, // new records needed before a refresh analyses concurrently
	refreshConcurrency: 3,
} as const;
