/**
 * Wires configuration into the store, sources and analysis pipeline.
 */

import {
	AnalysisOrchestrator,
	FetchThrottleController,
	PolicyAnalyzer,
	RateLimiter,
	SqlitePolicyStore,
	createLlmClient,
} from "@policy-pulse/analysis";
import { createDb } from "@policy-pulse/db";
import { createPageFetcher, createSources, fetchPolicyContent } from "@policy-pulse/scraper";
import type { AppConfig } from "@policy-pulse/shared";
import type { JobContext } from "./jobs";

export function createOrchestrator(config: AppConfig, store: SqlitePolicyStore): AnalysisOrchestrator {
	const rateLimiter = new RateLimiter(config.rateLimit);
	const fetchPage = createPageFetcher(config.scrape.pageTimeoutMs);

	const analyzer = new PolicyAnalyzer({
		llm: createLlmClient(config.llm, rateLimiter),
		fetchContent: (url) => fetchPolicyContent(url, fetchPage),
	});

	return new AnalysisOrchestrator({
		store,
		analyzer,
		interItemDelayMs: config.batch.interItemDelayMs,
	});
}

/**
 * Build the job context. The LLM client is only created when an API key
 * is configured.
 */
export function createJobContext(config: AppConfig): JobContext {
	const store = new SqlitePolicyStore(createDb(config.databasePath));
	const fetchPage = createPageFetcher(config.scrape.pageTimeoutMs);

	return {
		store,
		throttle: new FetchThrottleController(store),
		minIntervalHours: config.scrape.minIntervalHours,
		maxConcurrent: config.batch.maxConcurrent,
		createSources: (names) => createSources(names, { fetchPage }),
		orchestrator: config.llm.apiKey ? createOrchestrator(config, store) : null,
	};
}
