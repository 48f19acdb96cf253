/**
 * LLM client for policy classification.
 *
 * Every attempt waits on the shared rate limiter before calling the
 * completion backend. Transient failures are retried with backoff.
 */

import OpenAI, { APIConnectionError } from "openai";
import { ConfigError, LLM_DEFAULTS, createLogger, type AppConfig, type Result } from "@policy-pulse/shared";
import { SYSTEM_PROMPT } from "./prompt-builder";
import type { RateLimiter } from "./rate-limiter";
import { errorMessage, withRetry, type RetryOptions, type RetryPolicy } from "./retry";

const log = createLogger("analysis:llm");

export type CompletionStyle = "chat" | "text";

export interface CompletionRequest {
	systemPrompt: string;
	prompt: string;
}

/**
 * Sends one completion request and returns the raw completion text.
 * Errors are thrown; the client classifies them.
 */
export interface CompletionBackend {
	complete(request: CompletionRequest): Promise<string>;
}

export interface OpenAiBackendOptions {
	apiKey: string;
	baseUrl: string;
	model: string;
	style: CompletionStyle;
	timeoutMs: number;
	temperature?: number;
	maxTokens?: number;
}

/**
 * Completion backend for OpenAI-compatible endpoints.
 *
 * `chat` uses /chat/completions with a system message; `text` uses the
 * legacy /completions endpoint with the system prompt prepended.
 */
export class OpenAiCompletionBackend implements CompletionBackend {
	private client: OpenAI;
	private options: OpenAiBackendOptions;

	constructor(options: OpenAiBackendOptions) {
		this.options = options;
		this.client = new OpenAI({
			apiKey: options.apiKey,
			baseURL: options.baseUrl,
			timeout: options.timeoutMs,
			maxRetries: 0, // retries are handled by the LLM client
		});
	}

	async complete(request: CompletionRequest): Promise<string> {
		const temperature = this.options.temperature ?? LLM_DEFAULTS.temperature;
		const maxTokens = this.options.maxTokens ?? LLM_DEFAULTS.maxTokens;

		if (this.options.style === "chat") {
			const response = await this.client.chat.completions.create({
				model: this.options.model,
				temperature,
				max_tokens: maxTokens,
				messages: [
					{ role: "system", content: request.systemPrompt },
					{ role: "user", content: request.prompt },
				],
			});
			return response.choices[0]?.message?.content ?? "";
		}

		const response = await this.client.completions.create({
			model: this.options.model,
			temperature,
			max_tokens: maxTokens,
			prompt: `${request.systemPrompt}\n\n${request.prompt}`,
		});
		return response.choices[0]?.text ?? "";
	}
}

export class EmptyCompletionError extends Error {
	constructor() {
		super("Model returned an empty completion");
		this.name = "EmptyCompletionError";
	}
}

function statusOf(error: unknown): number | null {
	if (typeof error === "object" && error !== null && "status" in error) {
		return typeof error.status === "number" ? error.status : null;
	}
	return null;
}

/**
 * Transient: connection failures, timeouts, HTTP 429 and 5xx.
 * Everything else, including errors with no status, is permanent.
 */
export function isTransientLlmError(error: unknown): boolean {
	if (error instanceof EmptyCompletionError) return false;
	if (error instanceof APIConnectionError) return true; // includes timeouts
	if (error instanceof Error && error.name === "TimeoutError") return true;

	const status = statusOf(error);
	if (status === null) return false;
	return status === 429 || status >= 500;
}

export type LlmResult = Result<
	{ text: string; attempts: number },
	{ type: "exhausted" | "permanent"; message: string; attempts: number }
>;

/**
 * Anything that can turn a prompt into completion text.
 */
export interface CompletionClient {
	complete(prompt: string): Promise<LlmResult>;
}

export interface LlmClientOptions {
	backend: CompletionBackend;
	rateLimiter: RateLimiter;
	retry?: Partial<Omit<RetryPolicy, "isRetryable">>;
	systemPrompt?: string;
	/** Test hooks for backoff sleeps and jitter */
	retryOptions?: Omit<RetryOptions, "label">;
}

export class LlmClient implements CompletionClient {
	private readonly backend: CompletionBackend;
	private readonly rateLimiter: RateLimiter;
	private readonly policy: RetryPolicy;
	private readonly systemPrompt: string;
	private readonly retryOptions: Omit<RetryOptions, "label">;

	constructor(options: LlmClientOptions) {
		this.backend = options.backend;
		this.rateLimiter = options.rateLimiter;
		this.systemPrompt = options.systemPrompt ?? SYSTEM_PROMPT;
		this.retryOptions = options.retryOptions ?? {};
		this.policy = {
			maxAttempts: options.retry?.maxAttempts ?? LLM_DEFAULTS.maxAttempts,
			baseDelayMs: options.retry?.baseDelayMs ?? LLM_DEFAULTS.baseDelayMs,
			maxDelayMs: options.retry?.maxDelayMs ?? LLM_DEFAULTS.maxDelayMs,
			jitterMs: options.retry?.jitterMs ?? LLM_DEFAULTS.jitterMs,
			isRetryable: isTransientLlmError,
		};
	}

	async complete(prompt: string): Promise<LlmResult> {
		const result = await withRetry(
			async () => {
				await this.rateLimiter.acquire();
				const text = (await this.backend.complete({ systemPrompt: this.systemPrompt, prompt })).trim();
				if (!text) throw new EmptyCompletionError();
				return text;
			},
			this.policy,
			{ ...this.retryOptions, label: "llm" },
		);

		if (result.success) {
			log.debug({ attempts: result.data.attempts, length: result.data.value.length }, "Completion received");
			return { success: true, data: { text: result.data.value, attempts: result.data.attempts } };
		}

		return {
			success: false,
			error: {
				type: result.error.type,
				message: errorMessage(result.error.error),
				attempts: result.error.attempts,
			},
		};
	}
}

/**
 * Build the client from configuration, with the OpenAI backend.
 */
export function createLlmClient(config: AppConfig["llm"], rateLimiter: RateLimiter): LlmClient {
	if (!config.apiKey) {
		throw new ConfigError("LLM_API_KEY is required for analysis");
	}

	return new LlmClient({
		backend: new OpenAiCompletionBackend({
			apiKey: config.apiKey,
			baseUrl: config.baseUrl,
			model: config.model,
			style: config.completionStyle,
			timeoutMs: config.timeoutMs,
		}),
		rateLimiter,
		retry: {
			maxAttempts: config.maxAttempts,
			baseDelayMs: config.baseDelayMs,
			maxDelayMs: config.maxDelayMs,
		},
	});
}
