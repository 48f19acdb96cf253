/**
 * Job runners behind each CLI command.
 */

import {
	runIngestion,
	type AnalysisOrchestrator,
	type BatchReport,
	type FetchThrottleController,
	type IngestionReport,
	type PolicyStore,
} from "@policy-pulse/analysis";
import type { PolicySource, SourceName } from "@policy-pulse/scraper";
import {
	BATCH_CONFIG,
	ConfigError,
	createLogger,
	type IndustryMatch,
	type PipelineStatistics,
} from "@policy-pulse/shared";
import type { Command } from "./args";

const log = createLogger("cron:jobs");

export interface JobContext {
	store: PolicyStore;
	throttle: FetchThrottleController;
	minIntervalHours: number;
	maxConcurrent: number;
	createSources: (names?: readonly SourceName[]) => PolicySource[];
	/** Null when no LLM is configured; analysis commands then fail */
	orchestrator: AnalysisOrchestrator | null;
	now?: () => number;
}

export interface RefreshReport {
	ingestion: IngestionReport;
	analysis: BatchReport | null;
}

export type JobOutput =
	| { command: "refresh"; report: RefreshReport }
	| { command: "analyze" | "analyze-async" | "reanalyze"; report: BatchReport }
	| { command: "stats"; statistics: PipelineStatistics }
	| { command: "search"; matches: IndustryMatch[] };

function requireOrchestrator(context: JobContext): AnalysisOrchestrator {
	if (!context.orchestrator) {
		throw new ConfigError("LLM_API_KEY is required for analysis");
	}
	return context.orchestrator;
}

function deadlineFrom(context: JobContext, timeBudgetSeconds: number | undefined): number | undefined {
	if (timeBudgetSeconds === undefined) return undefined;
	const now = context.now ?? Date.now;
	return now() + timeBudgetSeconds * 1000;
}

/**
 * Scrape, store and then analyse whatever was new. Larger intakes are
 * analysed concurrently.
 */
export async function runRefresh(
	context: JobContext,
	command: Extract<Command, { name: "refresh" }>,
): Promise<RefreshReport> {
	const sources = context.createSources(command.sources);
	const ingestion = await runIngestion(sources, context.store, {
		throttle: context.throttle,
		minIntervalHours: context.minIntervalHours,
		force: command.force,
		scrape: { targetMonth: command.targetMonth, maxPages: command.maxPages },
	});

	if (!command.analyze || ingestion.inserted === 0) {
		return { ingestion, analysis: null };
	}

	if (!context.orchestrator) {
		log.warn({ inserted: ingestion.inserted }, "No LLM configured, new policies left unanalysed");
		return { ingestion, analysis: null };
	}

	const analysis =
		ingestion.inserted >= BATCH_CONFIG.asyncThreshold
			? await context.orchestrator.analyzeBatchAsync(ingestion.inserted, BATCH_CONFIG.refreshConcurrency)
			: await context.orchestrator.analyzeBatch(ingestion.inserted);

	return { ingestion, analysis };
}

/**
 * Run a parsed command.
 */
export async function runCommand(context: JobContext, command: Command): Promise<JobOutput> {
	switch (command.name) {
		case "refresh":
			return { command: "refresh", report: await runRefresh(context, command) };

		case "analyze": {
			const orchestrator = requireOrchestrator(context);
			const deadline = deadlineFrom(context, command.timeBudgetSeconds);

			if (command.all) {
				const result = await orchestrator.analyzeAll({ batchSize: command.limit, deadline });
				return { command: "analyze", report: result.totals };
			}
			return { command: "analyze", report: await orchestrator.analyzeBatch(command.limit, { deadline }) };
		}

		case "analyze-async": {
			const orchestrator = requireOrchestrator(context);
			const report = await orchestrator.analyzeBatchAsync(
				command.limit,
				command.concurrency ?? context.maxConcurrent,
				{ deadline: deadlineFrom(context, command.timeBudgetSeconds) },
			);
			return { command: "analyze-async", report };
		}

		case "reanalyze": {
			const orchestrator = requireOrchestrator(context);
			const report = await orchestrator.reanalyzeDegraded(command.limit, {
				deadline: deadlineFrom(context, command.timeBudgetSeconds),
			});
			return { command: "reanalyze", report };
		}

		case "stats":
			return { command: "stats", statistics: await context.store.getStatistics() };

		case "search":
			return {
				command: "search",
				matches: await context.store.findByIndustryKeyword(command.keyword, command.limit),
			};
	}
}
