/**
 * Command-line parsing for the job runner.
 */

import { parseArgs } from "node:util";
import { BATCH_CONFIG, isValidTargetMonth } from "@policy-pulse/shared";
import { SOURCE_NAMES, isSourceName, type SourceName } from "@policy-pulse/scraper";

export type Command =
	| {
			name: "refresh";
			targetMonth?: string;
			maxPages?: number;
			sources?: SourceName[];
			force: boolean;
			analyze: boolean;
	  }
	| { name: "analyze"; limit: number; all: boolean; timeBudgetSeconds?: number }
	| { name: "analyze-async"; limit: number; concurrency?: number; timeBudgetSeconds?: number }
	| { name: "reanalyze"; limit: number; timeBudgetSeconds?: number }
	| { name: "stats" }
	| { name: "search"; keyword: string; limit: number };

export const USAGE = `Usage: policy-pulse <command> [options]

Commands:
  refresh         Scrape sources, store new policies and analyse them
    --month YYYY-MM     Keep only policies dated in this month
    --max-pages N       Page limit per source
    --sources a,b       Sources to scrape (${SOURCE_NAMES.join(", ")})
    --force             Ignore the minimum fetch interval
    --no-analyze        Store new policies without analysing them
  analyze         Analyse unanalysed policies one at a time
    --limit N  --all  --time-budget SECONDS
  analyze-async   Analyse unanalysed policies concurrently
    --limit N  --concurrency N  --time-budget SECONDS
  reanalyze       Re-run failed and empty analyses
    --limit N  --time-budget SECONDS
  stats           Print pipeline statistics
  search KEYWORD  Find classified policies by industry
    --limit N`;

export class UsageError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "UsageError";
	}
}

function positiveInt(flag: string, value: string | undefined): number | undefined {
	if (value === undefined) return undefined;
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed < 1) {
		throw new UsageError(`--${flag} must be a positive integer, got "${value}"`);
	}
	return parsed;
}

function parseSources(value: string | undefined): SourceName[] | undefined {
	if (value === undefined) return undefined;

	const names = value
		.split(",")
		.map((name) => name.trim())
		.filter(Boolean);
	const sources: SourceName[] = [];

	for (const name of names) {
		if (!isSourceName(name)) {
			throw new UsageError(`Unknown source "${name}" (expected one of ${SOURCE_NAMES.join(", ")})`);
		}
		if (!sources.includes(name)) sources.push(name);
	}

	if (sources.length === 0) throw new UsageError("--sources needs at least one source");
	return sources;
}

function readArgs(argv: string[]) {
	try {
		return parseArgs({
			args: argv,
			allowPositionals: true,
			options: {
				month: { type: "string" },
				"max-pages": { type: "string" },
				sources: { type: "string" },
				force: { type: "boolean" },
				"no-analyze": { type: "boolean" },
				limit: { type: "string" },
				all: { type: "boolean" },
				concurrency: { type: "string" },
				"time-budget": { type: "string" },
			},
		});
	} catch (error) {
		throw new UsageError(error instanceof Error ? error.message : String(error));
	}
}

/**
 * Parse arguments (without the node and script paths) into a command.
 */
export function parseCommand(argv: string[]): Command {
	const { values, positionals } = readArgs(argv);
	const name: string | undefined = positionals[0];
	const limit = positiveInt("limit", values.limit) ?? BATCH_CONFIG.defaultLimit;
	const timeBudgetSeconds = positiveInt("time-budget", values["time-budget"]);

	switch (name) {
		case "refresh": {
			const month = values.month;
			if (month !== undefined && !isValidTargetMonth(month)) {
				throw new UsageError(`--month must be YYYY-MM, got "${month}"`);
			}
			return {
				name: "refresh",
				targetMonth: month,
				maxPages: positiveInt("max-pages", values["max-pages"]),
				sources: parseSources(values.sources),
				force: values.force === true,
				analyze: values["no-analyze"] !== true,
			};
		}
		case "analyze":
			return { name: "analyze", limit, all: values.all === true, timeBudgetSeconds };
		case "analyze-async":
			return {
				name: "analyze-async",
				limit,
				concurrency: positiveInt("concurrency", values.concurrency),
				timeBudgetSeconds,
			};
		case "reanalyze":
			return { name: "reanalyze", limit, timeBudgetSeconds };
		case "stats":
			return { name: "stats" };
		case "search": {
			const keyword = positionals.slice(1).join(" ").trim();
			if (!keyword) throw new UsageError("search needs a keyword");
			return { name: "search", keyword, limit: positiveInt("limit", values.limit) ?? 50 };
		}
		case undefined:
			throw new UsageError("No command given");
		default:
			throw new UsageError(`Unknown command "${name}"`);
	}
}
