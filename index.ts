#!/usr/bin/env node
import chalk from "chalk";
import { hideBin } from "yargs/helpers";
import { parseArgs } from "./cli/args";
import { createLogger } from "./logger";
import { runGallery } from "./run/run";

async function main() {
	const config = await parseArgs(hideBin(process.argv));
	const logger = createLogger(config.logLevel);
	await runGallery(config, { logger });
}

main().catch((err) => {
	console.error(chalk.red(err instanceof Error ? err.message : String(err)));
	process.exitCode = 1;
});
