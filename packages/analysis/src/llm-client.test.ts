import { describe, it, expect, vi } from "vitest";
import { APIConnectionError } from "openai";
import { EmptyCompletionError, LlmClient, isTransientLlmError, type CompletionBackend } from "./llm-client";
import { SYSTEM_PROMPT } from "./prompt-builder";
import { RateLimiter } from "./rate-limiter";

const httpError = (status: number) => Object.assign(new Error(`HTTP ${status}`), { status });

function scriptedBackend(...steps: Array<string | Error>): CompletionBackend & { calls: number } {
	const backend: CompletionBackend & { calls: number } = {
		calls: 0,
		async complete() {
			const step = steps[backend.calls++];
			if (step instanceof Error) throw step;
			return step ?? "";
		},
	};
	return backend;
}

function createClient(backend: CompletionBackend, rateLimiter = new RateLimiter({ maxCalls: 100, windowMs: 1000 })) {
	return new LlmClient({
		backend,
		rateLimiter,
		retry: { maxAttempts: 3, baseDelayMs: 10, maxDelayMs: 100, jitterMs: 0 },
		retryOptions: { sleep: async () => {}, random: () => 0 },
	});
}

describe("isTransientLlmError", () => {
	it("treats rate limits and server errors as transient", () => {
		expect(isTransientLlmError(httpError(429))).toBe(true);
		expect(isTransientLlmError(httpError(500))).toBe(true);
		expect(isTransientLlmError(httpError(503))).toBe(true);
	});

	it("treats connection failures and timeouts as transient", () => {
		expect(isTransientLlmError(new APIConnectionError({ message: "socket hang up" }))).toBe(true);
		const timeout = new Error("timed out");
		timeout.name = "TimeoutError";
		expect(isTransientLlmError(timeout)).toBe(true);
	});

	it("treats client errors and unknown errors as permanent", () => {
		expect(isTransientLlmError(httpError(400))).toBe(false);
		expect(isTransientLlmError(httpError(401))).toBe(false);
		expect(isTransientLlmError(new Error("no status"))).toBe(false);
		expect(isTransientLlmError(new EmptyCompletionError())).toBe(false);
	});
});

describe("LlmClient", () => {
	it("returns trimmed completion text", async () => {
		const client = createClient(scriptedBackend('  {"industries": []}\n'));

		const result = await client.complete("prompt");

		expect(result).toEqual({ success: true, data: { text: '{"industries": []}', attempts: 1 } });
	});

	it("sends the system prompt with every request", async () => {
		const complete = vi.fn(async () => "ok");
		const client = createClient({ complete });

		await client.complete("分析这条政策");

		expect(complete).toHaveBeenCalledWith({ systemPrompt: SYSTEM_PROMPT, prompt: "分析这条政策" });
	});

	it("retries a rate-limited call", async () => {
		const backend = scriptedBackend(httpError(429), "done");
		const client = createClient(backend);

		const result = await client.complete("prompt");

		expect(result).toEqual({ success: true, data: { text: "done", attempts: 2 } });
		expect(backend.calls).toBe(2);
	});

	it("does not retry a bad request", async () => {
		const backend = scriptedBackend(httpError(400), "never reached");
		const client = createClient(backend);

		const result = await client.complete("prompt");

		expect(result).toEqual({
			success: false,
			error: { type: "permanent", message: "HTTP 400", attempts: 1 },
		});
		expect(backend.calls).toBe(1);
	});

	it("treats an empty completion as permanent", async () => {
		const backend = scriptedBackend("   ", "never reached");
		const client = createClient(backend);

		const result = await client.complete("prompt");

		expect(result).toEqual({
			success: false,
			error: { type: "permanent", message: "Model returned an empty completion", attempts: 1 },
		});
	});

	it("reports exhaustion after repeated server errors", async () => {
		const backend = scriptedBackend(httpError(502), httpError(502), httpError(502));
		const client = createClient(backend);

		const result = await client.complete("prompt");

		expect(result).toEqual({
			success: false,
			error: { type: "exhausted", message: "HTTP 502", attempts: 3 },
		});
		expect(backend.calls).toBe(3);
	});

	it("acquires the rate limiter once per attempt", async () => {
		const rateLimiter = new RateLimiter({ maxCalls: 100, windowMs: 1000 });
		const acquire = vi.spyOn(rateLimiter, "acquire");
		const client = createClient(scriptedBackend(httpError(503), "ok"), rateLimiter);

		await client.complete("prompt");

		expect(acquire).toHaveBeenCalledTimes(2);
	});
});
