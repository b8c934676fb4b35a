import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	getConfigMetadata,
	loadEngineConfig,
	parseEngineConfigFile,
	resolveEngineConfig,
} from "./config";

const ENV_KEYS = [
	"STDEV_WINDOW_SIZE",
	"STDEV_CADENCE",
	"STDEV_GAP_TOLERANCE_MS",
	"STDEV_MIN_PERIODS",
	"STDEV_MISSING_FIELD_POLICY",
	"STDEV_LOOKBACK",
	"STDEV_STATE_PATH",
	"STDEV_OUTPUT_PATH",
];

const clearEnv = (): void => {
	for (const key of ENV_KEYS) {
		delete process.env[key];
	}
};

describe("resolveEngineConfig", () => {
	it("applies defaults", () => {
		const config = resolveEngineConfig();
		expect(config.windowSize).toBe(20);
		expect(config.cadence).toBe("1h");
		expect(config.cadenceMs).toBe(3_600_000);
		expect(config.gapToleranceMs).toBe(0);
		expect(config.minPeriods).toBe(1);
		expect(config.missingFieldPolicy).toBe("carry");
		expect(config.lookback).toBeNull();
		expect(config.lookbackMs).toBe(0);
		expect(config.valueBounds).toEqual({ min: -1e12, max: 1e12 });
	});

	it("lets later layers win and skips undefined values", () => {
		const config = resolveEngineConfig(
			{ windowSize: 5, minPeriods: 2 },
			{ windowSize: 3, minPeriods: undefined },
			{ lookback: "7d" }
		);
		expect(config.windowSize).toBe(3);
		expect(config.minPeriods).toBe(2);
		expect(config.lookbackMs).toBe(7 * 86_400_000);
	});

	it("rejects invalid values", () => {
		expect(() => resolveEngineConfig({ windowSize: 0 })).toThrowError(
			/windowSize must be an integer >= 1/
		);
		expect(() => resolveEngineConfig({ windowSize: 2.5 })).toThrowError(
			/windowSize/
		);
		expect(() =>
			resolveEngineConfig({ windowSize: 3, minPeriods: 4 })
		).toThrowError(/cannot exceed windowSize/);
		expect(() => resolveEngineConfig({ gapToleranceMs: -1 })).toThrowError(
			/gapToleranceMs/
		);
		expect(() => resolveEngineConfig({ cadence: "hourly" })).toThrowError(
			/Invalid timeframe format/
		);
		expect(() =>
			resolveEngineConfig({ valueBounds: { min: 5, max: 5 } })
		).toThrowError(/valueBounds.min/);
	});
});

describe("parseEngineConfigFile", () => {
	it("reads known keys", () => {
		expect(
			parseEngineConfigFile(
				{
					windowSize: 10,
					cadence: "30m",
					missingFieldPolicy: "null",
					lookback: null,
					valueBounds: { min: 0, max: 100 },
					comment: "ignored",
				},
				"test.json"
			)
		).toEqual({
			windowSize: 10,
			cadence: "30m",
			missingFieldPolicy: "null",
			lookback: null,
			valueBounds: { min: 0, max: 100 },
		});
	});

	it("throws on wrongly typed fields", () => {
		expect(() =>
			parseEngineConfigFile({ windowSize: "20" }, "bad.json")
		).toThrowError('Numeric field "windowSize" in bad.json must be a number');
		expect(() =>
			parseEngineConfigFile({ missingFieldPolicy: "drop" }, "bad.json")
		).toThrowError(/missingFieldPolicy in bad.json/);
		expect(() => parseEngineConfigFile([], "bad.json")).toThrowError(
			/must be a JSON object/
		);
	});
});

describe("loadEngineConfig", () => {
	let tempDir: string;

	beforeEach(() => {
		clearEnv();
		tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "rollvol-config-"));
		fs.mkdirSync(path.join(tempDir, "engine"), { recursive: true });
	});

	afterEach(() => {
		clearEnv();
		fs.rmSync(tempDir, { recursive: true, force: true });
	});

	it("layers profile file, environment and overrides", () => {
		fs.writeFileSync(
			path.join(tempDir, "engine", "hourly.json"),
			JSON.stringify({ windowSize: 10, minPeriods: 2, gapToleranceMs: 60_000 })
		);
		process.env.STDEV_WINDOW_SIZE = "8";
		const config = loadEngineConfig({
			configDir: tempDir,
			envPath: path.join(tempDir, ".env-missing"),
			profile: "hourly",
			overrides: { minPeriods: 3, statePath: path.join(tempDir, "s.json") },
		});
		expect(config.windowSize).toBe(8);
		expect(config.minPeriods).toBe(3);
		expect(config.gapToleranceMs).toBe(60_000);
		expect(config.statePath).toBe(path.join(tempDir, "s.json"));
		expect(getConfigMetadata(config)).toMatchObject({
			source: "merged",
			profile: "hourly",
			path: path.join(tempDir, "engine", "hourly.json"),
		});
	});

	it("reads STDEV_* values from the .env file", () => {
		const envPath = path.join(tempDir, ".env");
		fs.writeFileSync(envPath, "STDEV_MISSING_FIELD_POLICY=null\nSTDEV_LOOKBACK=2d\n");
		const config = loadEngineConfig({ configDir: tempDir, envPath });
		expect(config.missingFieldPolicy).toBe("null");
		expect(config.lookback).toBe("2d");
		expect(getConfigMetadata(config)?.source).toBe("defaults");
	});

	it("rejects a bad policy from the environment", () => {
		process.env.STDEV_MISSING_FIELD_POLICY = "skip";
		expect(() =>
			loadEngineConfig({
				configDir: tempDir,
				envPath: path.join(tempDir, ".env-missing"),
			})
		).toThrowError(/STDEV_MISSING_FIELD_POLICY must be one of carry, null/);
	});

	it("throws when a named profile is missing", () => {
		expect(() =>
			loadEngineConfig({
				configDir: tempDir,
				envPath: path.join(tempDir, ".env-missing"),
				profile: "absent",
			})
		).toThrowError(/Engine config profile not found/);
	});
});
