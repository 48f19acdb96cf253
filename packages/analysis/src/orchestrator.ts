/**
 * Batch analysis over stored policies.
 *
 * Three entry points share one per-record analyzer: a sequential batch, a
 * bounded-concurrent batch, and re-analysis of failed or empty results.
 * Per-record failures never abort a batch.
 */

import {
	BATCH_CONFIG,
	createLogger,
	sleep as defaultSleep,
	type ClassificationDraft,
	type PipelineStatistics,
	type PolicyRecord,
} from "@policy-pulse/shared";
import { failedDraft, type AnalysisTarget, type RecordAnalyzer } from "./analyzer";
import type { DegradedPolicy, PolicyStore } from "./policy-store";
import { errorMessage } from "./retry";
import { runPool } from "./worker-pool";

const log = createLogger("analysis:orchestrator");

export interface BatchReport {
	selected: number;
	processed: number;
	classified: number;
	noIndustry: number;
	failed: number;
	saved: number;
	skipped: number;
}

export interface BatchOptions {
	/** Epoch milliseconds; items not started by then are skipped */
	deadline?: number;
}

export interface AnalyzeAllOptions extends BatchOptions {
	batchSize?: number;
	maxBatches?: number;
	/** Fan out each batch with this many workers; sequential when omitted */
	maxConcurrent?: number;
}

export interface AnalyzeAllReport {
	batches: number;
	totals: BatchReport;
	statistics: PipelineStatistics | null;
}

export interface OrchestratorOptions {
	store: PolicyStore;
	analyzer: RecordAnalyzer;
	interItemDelayMs?: number;
	now?: () => number;
	sleep?: (ms: number) => Promise<void>;
}

export function emptyReport(selected = 0): BatchReport {
	return { selected, processed: 0, classified: 0, noIndustry: 0, failed: 0, saved: 0, skipped: 0 };
}

function addReports(a: BatchReport, b: BatchReport): BatchReport {
	return {
		selected: a.selected + b.selected,
		processed: a.processed + b.processed,
		classified: a.classified + b.classified,
		noIndustry: a.noIndustry + b.noIndustry,
		failed: a.failed + b.failed,
		saved: a.saved + b.saved,
		skipped: a.skipped + b.skipped,
	};
}

function tally(report: BatchReport, draft: ClassificationDraft): void {
	report.processed++;
	if (draft.outcome === "classified") report.classified++;
	else if (draft.outcome === "no_industry") report.noIndustry++;
	else report.failed++;
}

function toTarget(policy: PolicyRecord | DegradedPolicy): AnalysisTarget {
	return {
		policyId: policy.id,
		title: policy.title,
		eventType: policy.eventType,
		content: policy.content,
		sourceUrl: policy.sourceUrl,
		cachedContent: "cachedContent" in policy ? policy.cachedContent : null,
	};
}

export class AnalysisOrchestrator {
	private readonly store: PolicyStore;
	private readonly analyzer: RecordAnalyzer;
	private readonly interItemDelayMs: number;
	private readonly now: () => number;
	private readonly sleep: (ms: number) => Promise<void>;

	constructor(options: OrchestratorOptions) {
		this.store = options.store;
		this.analyzer = options.analyzer;
		this.interItemDelayMs = options.interItemDelayMs ?? BATCH_CONFIG.interItemDelayMs;
		this.now = options.now ?? Date.now;
		this.sleep = options.sleep ?? defaultSleep;
	}

	/**
	 * Analyse up to `limit` unanalysed policies one at a time, saving each
	 * result as soon as it is ready.
	 */
	async analyzeBatch(limit: number, options: BatchOptions = {}): Promise<BatchReport> {
		const policies = await this.select("unanalyzed", limit);
		return this.runSequential(policies.map(toTarget), options);
	}

	/**
	 * Analyse up to `limit` unanalysed policies with at most `maxConcurrent`
	 * in flight. Results are saved after the whole fan-out completes.
	 */
	async analyzeBatchAsync(
		limit: number,
		maxConcurrent: number,
		options: BatchOptions = {},
	): Promise<BatchReport> {
		const targets = (await this.select("unanalyzed", limit)).map(toTarget);
		const report = emptyReport(targets.length);
		if (targets.length === 0) return report;

		log.info({ count: targets.length, maxConcurrent }, "Starting concurrent batch");

		const outcomes = await runPool(targets, (target) => this.analyzer.analyze(target), {
			concurrency: maxConcurrent,
			canStart: () => !this.pastDeadline(options.deadline),
		});

		// Single persistence pass after the fan-out
		for (const [index, outcome] of outcomes.entries()) {
			const target = targets[index];

			if (outcome.status === "skipped") {
				report.skipped++;
				continue;
			}

			// Analyzers do not throw; a rejection here is a bug in one
			const draft =
				outcome.status === "fulfilled"
					? outcome.value
					: this.unexpectedFailure(target, outcome.reason);

			tally(report, draft);
			await this.save(target.policyId, draft, report);
		}

		this.logReport("Concurrent batch finished", report);
		return report;
	}

	/**
	 * Re-run policies whose result is failed or no_industry, reusing the
	 * stored text instead of refetching the source page.
	 */
	async reanalyzeDegraded(limit: number, options: BatchOptions = {}): Promise<BatchReport> {
		const policies = await this.select("degraded", limit);
		return this.runSequential(policies.map(toTarget), options);
	}

	/**
	 * Repeat batches until one processes nothing, saves nothing, or the
	 * batch limit is reached.
	 */
	async analyzeAll(options: AnalyzeAllOptions = {}): Promise<AnalyzeAllReport> {
		const batchSize = options.batchSize ?? BATCH_CONFIG.defaultLimit;
		const maxBatches = options.maxBatches ?? 100;
		let totals = emptyReport();
		let batches = 0;

		while (batches < maxBatches) {
			const report =
				options.maxConcurrent === undefined
					? await this.analyzeBatch(batchSize, options)
					: await this.analyzeBatchAsync(batchSize, options.maxConcurrent, options);

			batches++;
			totals = addReports(totals, report);

			if (report.processed === 0 || report.saved === 0) break;
		}

		let statistics: PipelineStatistics | null = null;
		try {
			statistics = await this.store.getStatistics();
		} catch (error) {
			log.error({ err: error }, "Could not load statistics");
		}

		this.logReport(`All batches finished (${batches})`, totals);
		return { batches, totals, statistics };
	}

	private async runSequential(targets: AnalysisTarget[], options: BatchOptions): Promise<BatchReport> {
		const report = emptyReport(targets.length);

		for (const [index, target] of targets.entries()) {
			if (this.pastDeadline(options.deadline)) {
				report.skipped = targets.length - index;
				log.warn({ skipped: report.skipped }, "Deadline reached, skipping remaining items");
				break;
			}

			let draft: ClassificationDraft;
			try {
				draft = await this.analyzer.analyze(target);
			} catch (error) {
				draft = this.unexpectedFailure(target, error);
			}
			tally(report, draft);
			await this.save(target.policyId, draft, report);

			if (index < targets.length - 1 && this.interItemDelayMs > 0) {
				await this.sleep(this.interItemDelayMs);
			}
		}

		this.logReport("Batch finished", report);
		return report;
	}

	private async select(kind: "unanalyzed", limit: number): Promise<PolicyRecord[]>;
	private async select(kind: "degraded", limit: number): Promise<DegradedPolicy[]>;
	private async select(
		kind: "unanalyzed" | "degraded",
		limit: number,
	): Promise<PolicyRecord[] | DegradedPolicy[]> {
		try {
			return kind === "unanalyzed"
				? await this.store.listUnanalyzed(limit)
				: await this.store.listDegraded(limit);
		} catch (error) {
			log.error({ err: error, kind }, "Could not load policies to analyse");
			return [];
		}
	}

	private async save(policyId: number, draft: ClassificationDraft, report: BatchReport): Promise<void> {
		try {
			const result = await this.store.upsertResult(policyId, draft);
			if (result.success) {
				report.saved++;
				return;
			}
			log.error({ policyId, error: result.error.message }, "Result not saved");
		} catch (error) {
			log.error({ err: error, policyId }, "Result not saved");
		}
	}

	private unexpectedFailure(target: AnalysisTarget, reason: unknown): ClassificationDraft {
		log.error({ err: reason, policyId: target.policyId }, "Analysis rejected");
		return failedDraft(`Unexpected error: ${errorMessage(reason)}`, "title_only", "");
	}

	private pastDeadline(deadline: number | undefined): boolean {
		return deadline !== undefined && this.now() >= deadline;
	}

	private logReport(message: string, report: BatchReport): void {
		log.info({ ...report }, message);
	}
}
