/**
 * Job runner for scheduled policy refresh and analysis.
 *
 * Run from cron, e.g. `0 * * * * policy-pulse refresh` for an hourly
 * refresh followed by analysis of whatever was new.
 */

import { ConfigError, createLogger, loadConfig } from "@policy-pulse/shared";
import { USAGE, UsageError, parseCommand } from "./args";
import { createJobContext } from "./context";
import { runCommand, type JobOutput } from "./jobs";

const log = createLogger("cron");

function report(output: JobOutput): void {
	switch (output.command) {
		case "refresh":
			log.info({ ...output.report }, "Refresh complete");
			break;
		case "analyze":
		case "analyze-async":
		case "reanalyze":
			log.info({ command: output.command, ...output.report }, "Analysis complete");
			break;
		case "stats":
			log.info({ ...output.statistics }, "Pipeline statistics");
			break;
		case "search":
			log.info({ count: output.matches.length, matches: output.matches }, "Industry search");
			break;
	}
}

async function main(argv: string[]): Promise<number> {
	try {
		const command = parseCommand(argv);
		const context = createJobContext(loadConfig());
		report(await runCommand(context, command));
		return 0;
	} catch (error) {
		if (error instanceof UsageError) {
			console.error(`${error.message}\n\n${USAGE}`);
			return 2;
		}
		if (error instanceof ConfigError) {
			log.fatal({ err: error }, "Invalid configuration");
			return 1;
		}
		log.fatal({ err: error }, "Job failed");
		return 1;
	}
}

process.exitCode = await main(process.argv.slice(2));
