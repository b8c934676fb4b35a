#!/usr/bin/env tsx

import path from "node:path";
import process from "node:process";
import {
	createLogger,
	formatTimestamp,
	isMissingFieldPolicy,
	loadEngineConfig,
	parseTimestamp,
} from "@rollvol/core";
import type { EngineConfigOverrides, MissingFieldPolicy } from "@rollvol/core";
import { createCsvFileSink } from "@rollvol/metrics";
import { runStdevBatch } from "@rollvol/runtime";
import { parseCliArgs, parseIntegerArg, readFlag, readStringArg } from "./cliArgs";
import type { CliArgs } from "./cliArgs";

const logger = createLogger("stdev-cli");

const USAGE = `Usage:
  npm run stdev -- --input <csv> --start <iso> --end <iso> [options]

Options (all optional unless noted):
  --input <csv>                  Snapshot CSV file (required)
  --start <iso>                  First timestamp to emit results for (required)
  --end <iso>                    Last timestamp to apply (required)
  --state <path>                 State file (defaults to config statePath)
  --out <csv>                    Result CSV (defaults to config outputPath)
  --profile <name>               Engine config profile under <configDir>/engine
  --configDir <path>             Custom config directory
  --envPath <path>               Custom .env path
  --windowSize <n>               Rolling window length in snapshots
  --minPeriods <n>               Values required before a statistic is reported
  --missingFieldPolicy <policy>  carry | null
  --lookback <tf>                Warm-up before --start, e.g. 7d ("none" disables)
  --precision <n>                Decimal places in the result CSV
  --help                         Show this message

Timestamps without an offset are read as UTC.
`;

const parseTimestampArg = (args: CliArgs, label: string): number => {
	const value = readStringArg(args, label);
	if (!value) {
		throw new Error(`Missing required --${label} <iso>`);
	}
	const ts = parseTimestamp(value);
	if (ts === null) {
		throw new Error(`Invalid ${label} timestamp: ${value}`);
	}
	return ts;
};

const parsePolicyArg = (args: CliArgs): MissingFieldPolicy | undefined => {
	const value = readStringArg(args, "missingFieldPolicy");
	if (value === undefined) {
		return undefined;
	}
	if (!isMissingFieldPolicy(value)) {
		throw new Error(`Invalid --missingFieldPolicy: ${value} (expected carry or null)`);
	}
	return value;
};

const resolvePathArg = (args: CliArgs, key: string): string | undefined => {
	const value = readStringArg(args, key);
	return value === undefined ? undefined : path.resolve(process.cwd(), value);
};

const buildOverrides = (args: CliArgs): EngineConfigOverrides => {
	const lookback = readStringArg(args, "lookback");
	return {
		windowSize: parseIntegerArg(args, "windowSize"),
		minPeriods: parseIntegerArg(args, "minPeriods"),
		missingFieldPolicy: parsePolicyArg(args),
		lookback:
			lookback === undefined
				? undefined
				: lookback.toLowerCase() === "none"
					? null
					: lookback,
		statePath: resolvePathArg(args, "state"),
		outputPath: resolvePathArg(args, "out"),
	};
};

const main = async (): Promise<void> => {
	const args = parseCliArgs(process.argv.slice(2));
	if (readFlag(args, "help")) {
		console.log(USAGE);
		return;
	}

	const inputPath = resolvePathArg(args, "input");
	if (!inputPath) {
		throw new Error("Missing required --input <csv>");
	}
	const start = parseTimestampArg(args, "start");
	const end = parseTimestampArg(args, "end");
	if (start > end) {
		throw new Error("--start must not be after --end");
	}
	const precision = parseIntegerArg(args, "precision");

	const config = loadEngineConfig({
		envPath: resolvePathArg(args, "envPath"),
		configDir: resolvePathArg(args, "configDir"),
		profile: readStringArg(args, "profile"),
		overrides: buildOverrides(args),
	});

	const result = await runStdevBatch({
		config,
		inputPath,
		start,
		end,
		sinks: [createCsvFileSink(config.outputPath, { precision })],
	});

	console.log(
		JSON.stringify(
			{
				input: inputPath,
				output: config.outputPath,
				state: result.statePath,
				start: formatTimestamp(start),
				end: formatTimestamp(end),
				windowSize: config.windowSize,
				results: result.resultCount,
				highWaterMark:
					result.highWaterMark === null
						? null
						: formatTimestamp(result.highWaterMark),
				stats: result.stats,
			},
			null,
			2
		)
	);
};

main().catch((error: unknown) => {
	const message = error instanceof Error ? error.message : String(error);
	logger.error("batch_failed", {
		message,
		reason:
			error instanceof Error && "reason" in error ? error.reason : undefined,
	});
	console.error("Batch failed:", message);
	if (process.env.DEBUG) {
		console.error(error);
	}
	process.exitCode = 1;
});
