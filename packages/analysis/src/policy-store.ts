/**
 * Persistence for policies, classifications and the fetch log.
 *
 * Wraps the db package queries behind an interface so the orchestrator and
 * ingestion can run against a fake in tests. Writes that the batch paths
 * depend on report failures as results instead of throwing.
 */

import {
	findPoliciesByIndustry,
	getAnalysis,
	getFetchLogEntry,
	getStatistics,
	insertPolicy,
	listDegradedPolicies,
	listUnanalyzedPolicies,
	policyExists,
	upsertAnalysis,
	upsertFetchLogEntry,
	type Database,
	type DegradedPolicy,
} from "@policy-pulse/db";
import {
	createLogger,
	type ClassificationDraft,
	type ClassificationResult,
	type FetchLogEntry,
	type IndustryMatch,
	type PipelineStatistics,
	type PolicyCandidate,
	type PolicyRecord,
	type Result,
} from "@policy-pulse/shared";

export type { DegradedPolicy };

const log = createLogger("analysis:store");

export interface StoreError {
	type: "store_error";
	message: string;
	cause: unknown;
}

/**
 * Read and write access to the fetch log.
 */
export interface FetchLogStore {
	getFetchLog(sourceName: string): Promise<FetchLogEntry | null>;
	recordFetch(entry: FetchLogEntry): Promise<void>;
}

export interface PolicyStore extends FetchLogStore {
	/** Insert candidates one by one; a failing row is logged and skipped. */
	insertPolicies(candidates: PolicyCandidate[]): Promise<number>;
	policyExists(title: string, sourceUrl: string | null): Promise<boolean>;
	upsertResult(policyId: number, draft: ClassificationDraft): Promise<Result<void, StoreError>>;
	getClassification(policyId: number): Promise<ClassificationResult | null>;
	findByIndustryKeyword(keyword: string, limit?: number): Promise<IndustryMatch[]>;
	listUnanalyzed(limit: number): Promise<PolicyRecord[]>;
	listDegraded(limit: number): Promise<DegradedPolicy[]>;
	getStatistics(): Promise<PipelineStatistics>;
}

function toStoreError(error: unknown): StoreError {
	const message = error instanceof Error ? error.message : String(error);
	return { type: "store_error", message, cause: error };
}

export class SqlitePolicyStore implements PolicyStore {
	constructor(private readonly db: Database) {}

	async insertPolicies(candidates: PolicyCandidate[]): Promise<number> {
		let inserted = 0;

		for (const candidate of candidates) {
			try {
				await insertPolicy(this.db, candidate);
				inserted++;
			} catch (error) {
				log.error({ err: error, title: candidate.title }, "Failed to insert policy");
			}
		}

		return inserted;
	}

	policyExists(title: string, sourceUrl: string | null): Promise<boolean> {
		return policyExists(this.db, title, sourceUrl);
	}

	async upsertResult(
		policyId: number,
		draft: ClassificationDraft,
	): Promise<Result<void, StoreError>> {
		try {
			await upsertAnalysis(this.db, policyId, draft);
			return { success: true, data: undefined };
		} catch (error) {
			log.error({ err: error, policyId }, "Failed to save classification");
			return { success: false, error: toStoreError(error) };
		}
	}

	getClassification(policyId: number): Promise<ClassificationResult | null> {
		return getAnalysis(this.db, policyId);
	}

	findByIndustryKeyword(keyword: string, limit = 50): Promise<IndustryMatch[]> {
		return findPoliciesByIndustry(this.db, keyword, limit);
	}

	listUnanalyzed(limit: number): Promise<PolicyRecord[]> {
		return listUnanalyzedPolicies(this.db, limit);
	}

	listDegraded(limit: number): Promise<DegradedPolicy[]> {
		return listDegradedPolicies(this.db, limit);
	}

	getStatistics(): Promise<PipelineStatistics> {
		return getStatistics(this.db);
	}

	getFetchLog(sourceName: string): Promise<FetchLogEntry | null> {
		return getFetchLogEntry(this.db, sourceName);
	}

	recordFetch(entry: FetchLogEntry): Promise<void> {
		return upsertFetchLogEntry(this.db, entry);
	}
}
