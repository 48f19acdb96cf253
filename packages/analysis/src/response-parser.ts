/**
 * Parsing of untrusted model output into a classification.
 */

import { z } from "zod";
import { createLogger, truncateForLog } from "@policy-pulse/shared";

const log = createLogger("analysis:parser");

const REQUIRED_KEYS = ["industries", "analysis_summary", "confidence_score"] as const;
const DEFAULT_CONFIDENCE = 0.5;

const jsonObjectSchema = z.record(z.string(), z.unknown());

export type JsonExtraction = { kind: "ok"; json: string } | { kind: "failed"; reason: string };

export interface ParseOk {
	kind: "ok";
	industries: string[];
	summary: string;
	confidence: number;
	impactType: string | null;
}

export interface ParseFailed {
	kind: "failed";
	reason: string;
}

/**
 * Find the first balanced `{...}` in the text.
 *
 * Scans from the first `{` and stops where brace depth returns to zero.
 * Braces inside double-quoted strings are ignored.
 */
export function extractJsonObject(text: string): JsonExtraction {
	const start = text.indexOf("{");
	if (start === -1) return { kind: "failed", reason: "no JSON object in response" };

	let depth = 0;
	let inString = false;
	let escaped = false;

	for (let i = start; i < text.length; i++) {
		const char = text[i];

		if (inString) {
			if (escaped) escaped = false;
			else if (char === "\\") escaped = true;
			else if (char === '"') inString = false;
			continue;
		}

		if (char === '"') {
			inString = true;
		} else if (char === "{") {
			depth++;
		} else if (char === "}") {
			depth--;
			if (depth === 0) return { kind: "ok", json: text.slice(start, i + 1) };
		}
	}

	return { kind: "failed", reason: "unbalanced braces in response" };
}

function toText(value: unknown): string | null {
	if (typeof value === "string") return value.trim();
	if (typeof value === "number" && Number.isFinite(value)) return String(value);
	return null;
}

/**
 * Lists pass through, scalars become one-element lists. Entries are
 * trimmed; empties and repeats are dropped, first occurrence kept.
 */
export function normalizeIndustries(value: unknown): string[] {
	const entries = Array.isArray(value) ? value : [value];
	const industries: string[] = [];

	for (const entry of entries) {
		const text = toText(entry);
		if (text && !industries.includes(text)) industries.push(text);
	}

	return industries;
}

/**
 * Coerce to a number in [0, 1]; unusable values become 0.5.
 */
export function normalizeConfidence(value: unknown): number {
	let score = DEFAULT_CONFIDENCE;

	if (typeof value === "number" && Number.isFinite(value)) {
		score = value;
	} else if (typeof value === "string" && value.trim() !== "") {
		const parsed = Number(value.trim());
		if (Number.isFinite(parsed)) score = parsed;
	}

	return Math.min(1, Math.max(0, score));
}

function fail(reason: string, raw: string): ParseFailed {
	log.warn({ reason, raw: truncateForLog(raw) }, "Could not parse model response");
	return { kind: "failed", reason };
}

/**
 * Parse model output into industries, summary, confidence and polarity.
 * A response missing any required key is a failure, not a partial result.
 */
export function parseAnalysisResponse(text: string): ParseOk | ParseFailed {
	const extraction = extractJsonObject(text);
	if (extraction.kind === "failed") return fail(extraction.reason, text);

	let value: unknown;
	try {
		value = JSON.parse(extraction.json);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		return fail(`invalid JSON: ${message}`, text);
	}

	const parsed = jsonObjectSchema.safeParse(value);
	if (!parsed.success) return fail("response JSON is not an object", text);

	const data = parsed.data;
	const missing = REQUIRED_KEYS.filter((key) => !(key in data));
	if (missing.length > 0) return fail(`missing required keys: ${missing.join(", ")}`, text);

	return {
		kind: "ok",
		industries: normalizeIndustries(data.industries),
		summary: toText(data.analysis_summary) ?? "",
		confidence: normalizeConfidence(data.confidence_score),
		impactType: toText(data.impact_type) || null,
	};
}
