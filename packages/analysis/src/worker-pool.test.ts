import { describe, it, expect } from "vitest";
import { runPool } from "./worker-pool";

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

describe("runPool", () => {
	it("returns outcomes in item order", async () => {
		const outcomes = await runPool([3, 1, 2], async (n) => {
			for (let i = 0; i < n; i++) await tick();
			return n * 10;
		}, { concurrency: 3 });

		expect(outcomes).toEqual([
			{ status: "fulfilled", value: 30 },
			{ status: "fulfilled", value: 10 },
			{ status: "fulfilled", value: 20 },
		]);
	});

	it("never runs more than the concurrency limit at once", async () => {
		let active = 0;
		let peak = 0;

		await runPool(Array.from({ length: 10 }, (_, i) => i), async () => {
			active++;
			peak = Math.max(peak, active);
			await tick();
			active--;
		}, { concurrency: 3 });

		expect(peak).toBe(3);
	});

	it("isolates a rejected item", async () => {
		const error = new Error("boom");
		const outcomes = await runPool(["a", "b"], async (item) => {
			if (item === "a") throw error;
			return item;
		}, { concurrency: 2 });

		expect(outcomes).toEqual([
			{ status: "rejected", reason: error },
			{ status: "fulfilled", value: "b" },
		]);
	});

	it("skips items once canStart turns false", async () => {
		let started = 0;
		const outcomes = await runPool([1, 2, 3, 4], async (n) => {
			started++;
			return n;
		}, { concurrency: 1, canStart: () => started < 2 });

		expect(outcomes.map((o) => o.status)).toEqual(["fulfilled", "fulfilled", "skipped", "skipped"]);
	});

	it("handles an empty list", async () => {
		expect(await runPool([], async () => 1, { concurrency: 4 })).toEqual([]);
	});
});
