import { describe, it, expect, vi } from "vitest";
import type { PolicyCandidate } from "@policy-pulse/shared";
import { dedupeBatch, filterNew } from "./deduplicator";

const candidate = (title: string, sourceUrl: string | null = `https://example.org/${title}`): PolicyCandidate => ({
	date: "2025-06-03",
	title,
	eventType: "国务院政策",
	sourceUrl,
	department: null,
	policyLevel: null,
	impactLevel: null,
	contentType: "政策",
	content: null,
});

describe("dedupeBatch", () => {
	it("keeps the first occurrence of each title and link pair", () => {
		const first = { ...candidate("政策A", "https://example.org/a"), department: "国务院" };
		const batch = [first, candidate("政策A", "https://example.org/a"), candidate("政策B")];

		const unique = dedupeBatch(batch);

		expect(unique).toHaveLength(2);
		expect(unique[0]).toBe(first);
	});

	it("treats surrounding whitespace in titles as equal", () => {
		const batch = [candidate("政策A", "https://example.org/a"), candidate(" 政策A ", "https://example.org/a")];
		expect(dedupeBatch(batch)).toHaveLength(1);
	});

	it("keeps same titles with different links", () => {
		const batch = [candidate("政策A", "https://example.org/a"), candidate("政策A", null)];
		expect(dedupeBatch(batch)).toHaveLength(2);
	});
});

describe("filterNew", () => {
	it("drops candidates the store already has", async () => {
		const stored = new Set(["政策A"]);
		const exists = vi.fn(async (title: string) => stored.has(title));

		const fresh = await filterNew([candidate("政策A"), candidate("政策B"), candidate("政策B")], exists);

		expect(fresh.map((c) => c.title)).toEqual(["政策B"]);
		expect(exists).toHaveBeenCalledTimes(2);
	});

	it("keeps every batch-unique candidate when the probe fails", async () => {
		const exists = vi.fn(async () => {
			throw new Error("database is locked");
		});

		const fresh = await filterNew([candidate("政策A"), candidate("政策A"), candidate("政策B")], exists);

		expect(fresh.map((c) => c.title)).toEqual(["政策A", "政策B"]);
	});
});
