/**
 * Environment configuration.
 *
 * Loads `.env` through dotenv and validates every setting with zod. An
 * invalid environment is a programmer error and throws `ConfigError`.
 */

import dotenv from "dotenv";
import { z } from "zod";
import { BATCH_CONFIG, LLM_DEFAULTS, SCRAPE_CONFIG } from "./constants";

const envSchema = z.object({
	LLM_API_KEY: z.string().min(1).optional(),
	LLM_BASE_URL: z.string().url().default(LLM_DEFAULTS.baseUrl),
	LLM_MODEL: z.string().min(1).default(LLM_DEFAULTS.model),
	LLM_COMPLETION_STYLE: z.enum(["chat", "text"]).default("chat"),
	LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(LLM_DEFAULTS.timeoutMs),
	LLM_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(LLM_DEFAULTS.maxAttempts),
	LLM_BASE_DELAY_MS: z.coerce.number().int().min(0).default(LLM_DEFAULTS.baseDelayMs),
	LLM_MAX_DELAY_MS: z.coerce.number().int().min(0).default(LLM_DEFAULTS.maxDelayMs),
	RATE_LIMIT_MAX_CALLS: z.coerce.number().int().positive().default(LLM_DEFAULTS.rateLimitMaxCalls),
	RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(LLM_DEFAULTS.rateLimitWindowMs),
	PAGE_TIMEOUT_MS: z.coerce.number().int().positive().default(SCRAPE_CONFIG.pageTimeoutMs),
	DATABASE_PATH: z.string().min(1).default("events.db"),
	FETCH_MIN_INTERVAL_HOURS: z.coerce.number().min(0).default(BATCH_CONFIG.fetchMinIntervalHours),
	BATCH_DELAY_MS: z.coerce.number().int().min(0).default(BATCH_CONFIG.interItemDelayMs),
	MAX_CONCURRENT: z.coerce.number().int().positive().default(BATCH_CONFIG.defaultMaxConcurrent),
});

export interface AppConfig {
	llm: {
		apiKey: string | undefined;
		baseUrl: string;
		model: string;
		completionStyle: "chat" | "text";
		timeoutMs: number;
		maxAttempts: number;
		baseDelayMs: number;
		maxDelayMs: number;
	};
	rateLimit: {
		maxCalls: number;
		windowMs: number;
	};
	scrape: {
		pageTimeoutMs: number;
		minIntervalHours: number;
	};
	batch: {
		interItemDelayMs: number;
		maxConcurrent: number;
	};
	databasePath: string;
}

export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

/**
 * Load `.env` files into process.env. Existing variables win.
 */
export function loadEnvironment(): void {
	const nodeEnv = process.env.NODE_ENV || "development";
	dotenv.config({ path: `.env.${nodeEnv}` });
	dotenv.config();
}

/**
 * Validate an environment and map it to the application config.
 */
export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
	const parsed = envSchema.safeParse(env);

	if (!parsed.success) {
		const details = parsed.error.issues
			.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
			.join("; ");
		throw new ConfigError(`Invalid environment: ${details}`);
	}

	const e = parsed.data;
	return {
		llm: {
			apiKey: e.LLM_API_KEY,
			baseUrl: e.LLM_BASE_URL,
			model: e.LLM_MODEL,
			completionStyle: e.LLM_COMPLETION_STYLE,
			timeoutMs: e.LLM_TIMEOUT_MS,
			maxAttempts: e.LLM_MAX_ATTEMPTS,
			baseDelayMs: e.LLM_BASE_DELAY_MS,
			maxDelayMs: e.LLM_MAX_DELAY_MS,
		},
		rateLimit: {
			maxCalls: e.RATE_LIMIT_MAX_CALLS,
			windowMs: e.RATE_LIMIT_WINDOW_MS,
		},
		scrape: {
			pageTimeoutMs: e.PAGE_TIMEOUT_MS,
			minIntervalHours: e.FETCH_MIN_INTERVAL_HOURS,
		},
		batch: {
			interItemDelayMs: e.BATCH_DELAY_MS,
			maxConcurrent: e.MAX_CONCURRENT,
		},
		databasePath: e.DATABASE_PATH,
	};
}

/**
 * Load `.env` and parse the process environment.
 */
export function loadConfig(): AppConfig {
	loadEnvironment();
	return parseConfig(process.env);
}
