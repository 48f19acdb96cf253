/**
 * Analysis package - ingestion and LLM classification of policies.
 *
 * Provides fetch throttling, deduplication, persistence, prompt building,
 * the rate-limited LLM client, response parsing and batch orchestration.
 */

// Persistence
export {
	SqlitePolicyStore,
	type PolicyStore,
	type FetchLogStore,
	type StoreError,
	type DegradedPolicy,
} from "./policy-store";

// Ingestion
export { FetchThrottleController } from "./fetch-throttle";
export { filterNew, dedupeBatch, type ExistenceProbe } from "./deduplicator";
export {
	ingestSource,
	runIngestion,
	type IngestSourceOptions,
	type IngestionReport,
	type SourceIngestResult,
} from "./ingestion";

// LLM
export { buildAnalysisPrompt, truncateContent, SYSTEM_PROMPT, type BuiltPrompt, type PromptInput, type PromptTemplate } from "./prompt-builder";
export { RateLimiter, type RateLimiterOptions } from "./rate-limiter";
export { computeBackoffDelay, withRetry, type RetryPolicy, type RetryFailure } from "./retry";
export {
	LlmClient,
	OpenAiCompletionBackend,
	EmptyCompletionError,
	createLlmClient,
	isTransientLlmError,
	type CompletionBackend,
	type CompletionClient,
	type CompletionRequest,
	type CompletionStyle,
	type LlmResult,
} from "./llm-client";
export {
	extractJsonObject,
	parseAnalysisResponse,
	normalizeIndustries,
	normalizeConfidence,
	type ParseOk,
	type ParseFailed,
} from "./response-parser";

// Orchestration
export {
	PolicyAnalyzer,
	failedDraft,
	type AnalysisTarget,
	type ContentFetcher,
	type RecordAnalyzer,
} from "./analyzer";
export { runPool, type PoolOutcome } from "./worker-pool";
export {
	AnalysisOrchestrator,
	type AnalyzeAllOptions,
	type AnalyzeAllReport,
	type BatchOptions,
	type BatchReport,
} from "./orchestrator";
