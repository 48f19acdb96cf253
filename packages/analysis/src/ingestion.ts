/**
 * Source ingestion: throttle, scrape, deduplicate, insert.
 *
 * A failing source is recorded in the fetch log and never aborts the run.
 */

import { createLogger, type PolicyCandidate } from "@policy-pulse/shared";
import { scrapeAll, type PolicySource, type ScrapeOptions } from "@policy-pulse/scraper";
import { filterNew } from "./deduplicator";
import type { FetchThrottleController } from "./fetch-throttle";
import type { PolicyStore } from "./policy-store";
import { errorMessage } from "./retry";

const log = createLogger("analysis:ingestion");

export type SourceIngestResult =
	| { status: "skipped" }
	| { status: "fetched"; candidates: PolicyCandidate[] }
	| { status: "failed"; message: string };

export interface IngestSourceOptions {
	throttle: FetchThrottleController;
	minIntervalHours: number;
	scrape?: ScrapeOptions;
	/** Ignore the fetch interval */
	force?: boolean;
}

export interface IngestionReport {
	fetched: number;
	unique: number;
	inserted: number;
	skippedSources: string[];
	failedSources: string[];
}

/**
 * Scrape one source unless it was fetched recently, and record the attempt.
 */
export async function ingestSource(
	source: PolicySource,
	options: IngestSourceOptions,
): Promise<SourceIngestResult> {
	if (!options.force && (await options.throttle.shouldSkip(source.name, options.minIntervalHours))) {
		return { status: "skipped" };
	}

	try {
		const candidates = await scrapeAll(source, options.scrape);
		await options.throttle.recordStatus(source.name, "success", candidates.length);
		log.info({ source: source.name, count: candidates.length }, "Source scraped");
		return { status: "fetched", candidates };
	} catch (error) {
		const message = errorMessage(error);
		await options.throttle.recordStatus(source.name, "error", 0, message);
		log.error({ source: source.name, err: error }, "Source failed");
		return { status: "failed", message };
	}
}

/**
 * Ingest every source, then deduplicate across sources and against the
 * store, and insert what is new.
 */
export async function runIngestion(
	sources: PolicySource[],
	store: PolicyStore,
	options: IngestSourceOptions,
): Promise<IngestionReport> {
	const report: IngestionReport = {
		fetched: 0,
		unique: 0,
		inserted: 0,
		skippedSources: [],
		failedSources: [],
	};
	const collected: PolicyCandidate[] = [];

	for (const source of sources) {
		const result = await ingestSource(source, options);

		switch (result.status) {
			case "skipped":
				report.skippedSources.push(source.name);
				break;
			case "failed":
				report.failedSources.push(source.name);
				break;
			case "fetched":
				collected.push(...result.candidates);
				break;
		}
	}

	report.fetched = collected.length;
	const fresh = await filterNew(collected, (title, sourceUrl) => store.policyExists(title, sourceUrl));
	report.unique = fresh.length;
	report.inserted = await store.insertPolicies(fresh);

	log.info({ ...report }, "Ingestion finished");
	return report;
}
