/**
 * Classification of a single policy record.
 *
 * Resolves the text to show the model, builds the prompt, calls the model
 * and turns the outcome into a draft ready to persist. Nothing here throws:
 * any failure becomes a failed draft for that record.
 */

import {
	FAILED_SENTINEL,
	NO_INDUSTRY_SENTINEL,
	SCRAPE_CONFIG,
	classifyQuality,
	createLogger,
	type ClassificationDraft,
	type ContentQuality,
	type Result,
} from "@policy-pulse/shared";
import type { ContentFetchError } from "@policy-pulse/scraper";
import type { CompletionClient } from "./llm-client";
import { buildAnalysisPrompt } from "./prompt-builder";
import { parseAnalysisResponse } from "./response-parser";
import { errorMessage, withRetry, type RetryOptions, type RetryPolicy } from "./retry";

const log = createLogger("analysis:analyzer");

export interface AnalysisTarget {
	policyId: number;
	title: string;
	eventType: string;
	content: string | null;
	sourceUrl: string | null;
	/** Text stored by a previous analysis; reused instead of refetching */
	cachedContent?: string | null;
}

export type ContentFetcher = (url: string) => Promise<Result<string, ContentFetchError>>;

/**
 * Anything that can classify one record.
 */
export interface RecordAnalyzer {
	analyze(target: AnalysisTarget): Promise<ClassificationDraft>;
}

export interface PolicyAnalyzerOptions {
	llm: CompletionClient;
	fetchContent: ContentFetcher;
	/** Test hooks for the content-fetch retry */
	retryOptions?: Omit<RetryOptions, "label">;
}

const CONTENT_RETRY_POLICY: RetryPolicy = {
	maxAttempts: SCRAPE_CONFIG.contentFetchAttempts,
	baseDelayMs: 1_000,
	maxDelayMs: 5_000,
	jitterMs: 500,
	isRetryable: () => true,
};

class ContentUnavailableError extends Error {
	constructor(readonly reason: ContentFetchError) {
		super(reason.type === "fetch_failed" ? reason.message : `content too short (${reason.length})`);
		this.name = "ContentUnavailableError";
	}
}

export function failedDraft(
	reason: string,
	contentQuality: ContentQuality,
	fullContent: string,
): ClassificationDraft {
	return {
		industries: [FAILED_SENTINEL],
		summary: reason,
		confidenceScore: 0,
		impactType: null,
		contentQuality,
		fullContent,
		status: "failed",
		outcome: "failed",
	};
}

export class PolicyAnalyzer implements RecordAnalyzer {
	private readonly llm: CompletionClient;
	private readonly fetchContent: ContentFetcher;
	private readonly retryOptions: Omit<RetryOptions, "label">;

	constructor(options: PolicyAnalyzerOptions) {
		this.llm = options.llm;
		this.fetchContent = options.fetchContent;
		this.retryOptions = options.retryOptions ?? {};
	}

	/**
	 * Inline content first, then cached content, then the source page.
	 * A page that cannot be fetched leaves the record title-only.
	 */
	async resolveContent(target: AnalysisTarget): Promise<string> {
		const inline = target.content?.trim();
		if (inline) return inline;

		const cached = target.cachedContent?.trim();
		if (cached) return cached;

		if (!target.sourceUrl) return "";
		const url = target.sourceUrl;

		const result = await withRetry(
			async () => {
				const fetched = await this.fetchContent(url);
				if (!fetched.success) throw new ContentUnavailableError(fetched.error);
				return fetched.data;
			},
			{
				...CONTENT_RETRY_POLICY,
				// Short pages will not get longer on a retry
				isRetryable: (error) =>
					!(error instanceof ContentUnavailableError && error.reason.type === "too_short"),
			},
			{ ...this.retryOptions, label: "content" },
		);

		if (result.success) return result.data.value;

		log.info(
			{ policyId: target.policyId, url, reason: errorMessage(result.error.error) },
			"No source content, analysing from title",
		);
		return "";
	}

	async analyze(target: AnalysisTarget): Promise<ClassificationDraft> {
		let content = "";
		let contentQuality: ContentQuality = "title_only";

		try {
			content = await this.resolveContent(target);
			contentQuality = classifyQuality(content);

			const { template, prompt } = buildAnalysisPrompt({
				title: target.title,
				content,
				eventType: target.eventType,
				sourceUrl: target.sourceUrl,
			});

			const completion = await this.llm.complete(prompt);
			if (!completion.success) {
				const { type, message, attempts } = completion.error;
				log.warn({ policyId: target.policyId, type, attempts, message }, "LLM call failed");
				return failedDraft(`LLM call failed (${type} after ${attempts} attempt(s)): ${message}`, contentQuality, content);
			}

			const parsed = parseAnalysisResponse(completion.data.text);
			if (parsed.kind === "failed") {
				return failedDraft(`Unparseable model response: ${parsed.reason}`, contentQuality, content);
			}

			const base = {
				summary: parsed.summary,
				confidenceScore: parsed.confidence,
				impactType: parsed.impactType,
				contentQuality,
				fullContent: content,
				status: "success" as const,
			};

			if (parsed.industries.length === 0) {
				log.info({ policyId: target.policyId, template }, "No related industries");
				return { ...base, industries: [NO_INDUSTRY_SENTINEL], outcome: "no_industry" };
			}

			log.info(
				{ policyId: target.policyId, template, contentQuality, industries: parsed.industries },
				"Policy classified",
			);
			return { ...base, industries: parsed.industries, outcome: "classified" };
		} catch (error) {
			log.error({ err: error, policyId: target.policyId }, "Unexpected error during analysis");
			return failedDraft(`Unexpected error: ${errorMessage(error)}`, contentQuality, content);
		}
	}
}
