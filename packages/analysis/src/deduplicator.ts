/**
 * Drops candidates that repeat within a batch or are already stored.
 */

import { createLogger, type PolicyCandidate } from "@policy-pulse/shared";

const log = createLogger("analysis:dedup");

/**
 * Answers whether a (title, sourceUrl) pair is already stored.
 */
export type ExistenceProbe = (title: string, sourceUrl: string | null) => Promise<boolean>;

function dedupKey(candidate: PolicyCandidate): string {
	return JSON.stringify([candidate.title.trim(), candidate.sourceUrl]);
}

/**
 * Keep the first candidate for each (title, sourceUrl) pair.
 */
export function dedupeBatch(candidates: PolicyCandidate[]): PolicyCandidate[] {
	const seen = new Set<string>();
	return candidates.filter((candidate) => {
		const key = dedupKey(candidate);
		if (seen.has(key)) return false;
		seen.add(key);
		return true;
	});
}

/**
 * Candidates that are neither repeated in the batch nor already stored.
 *
 * If the store cannot be probed, every batch-unique candidate passes
 * through; the insert is the backstop.
 */
export async function filterNew(
	candidates: PolicyCandidate[],
	exists: ExistenceProbe,
): Promise<PolicyCandidate[]> {
	const unique = dedupeBatch(candidates);
	const fresh: PolicyCandidate[] = [];

	try {
		for (const candidate of unique) {
			if (!(await exists(candidate.title, candidate.sourceUrl))) {
				fresh.push(candidate);
			}
		}
	} catch (error) {
		log.warn({ err: error, count: unique.length }, "Existence probe failed, keeping all candidates");
		return unique;
	}

	log.info(
		{ candidates: candidates.length, unique: unique.length, fresh: fresh.length },
		"Filtered known policies",
	);
	return fresh;
}
