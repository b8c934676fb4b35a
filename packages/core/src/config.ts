import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

import { DEFAULT_CADENCE } from "./time/constants";
import { timeframeToMs } from "./time/time";
import type { MissingFieldPolicy, ValueBounds } from "./types";

export interface EngineConfig {
	/** Maximum samples held per field window */
	windowSize: number;
	/** Expected interval between consecutive snapshots of one entity */
	cadence: string;
	cadenceMs: number;
	/** Allowed deviation from the cadence before a window is reset */
	gapToleranceMs: number;
	/** Samples a window needs before its statistic is reported */
	minPeriods: number;
	missingFieldPolicy: MissingFieldPolicy;
	/** Warm-up period replayed before the requested start, if any */
	lookback: string | null;
	lookbackMs: number;
	valueBounds: ValueBounds;
	statePath: string;
	outputPath: string;
}

export interface EngineConfigOverrides {
	windowSize?: number;
	cadence?: string;
	gapToleranceMs?: number;
	minPeriods?: number;
	missingFieldPolicy?: MissingFieldPolicy;
	lookback?: string | null;
	valueBounds?: ValueBounds;
	statePath?: string;
	outputPath?: string;
}

export type ConfigSourceType = "defaults" | "file" | "merged";

export interface ConfigMetadata {
	path?: string;
	envPath?: string;
	source: ConfigSourceType;
	profile?: string;
}

export interface ConfigLoadOptions {
	envPath?: string;
	configDir?: string;
	/** Profile file name under `<configDir>/engine`; "default" when omitted */
	profile?: string;
	overrides?: EngineConfigOverrides;
}

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfigOverrides> = {
	windowSize: 20,
	cadence: DEFAULT_CADENCE,
	gapToleranceMs: 0,
	minPeriods: 1,
	missingFieldPolicy: "carry",
	lookback: null,
	valueBounds: { min: -1e12, max: 1e12 },
	statePath: path.join("state", "stdev-state.json"),
	outputPath: path.join("output", "stdev-results.csv"),
};

const MISSING_FIELD_POLICIES: readonly MissingFieldPolicy[] = ["carry", "null"];

const configMetadata = new WeakMap<object, ConfigMetadata>();

export const withConfigMetadata = <T extends object>(
	config: T,
	metadata: ConfigMetadata
): T => {
	const existing = configMetadata.get(config);
	configMetadata.set(config, { ...existing, ...metadata });
	return config;
};

export const getConfigMetadata = (config: object): ConfigMetadata | null =>
	configMetadata.get(config) ?? null;

let loadedEnvPath: string | undefined;
let cachedWorkspaceRoot: string | undefined;

const WORKSPACE_SENTINELS = [".git", path.join("config", "engine")];

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();

	while (
		!WORKSPACE_SENTINELS.some((file) => fs.existsSync(path.join(current, file)))
	) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = process.cwd();
			return cachedWorkspaceRoot;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

export const getWorkspaceRoot = (): string => findWorkspaceRoot();

export const isMissingFieldPolicy = (value: unknown): value is MissingFieldPolicy =>
	typeof value === "string" &&
	MISSING_FIELD_POLICIES.some((policy) => policy === value);

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const readOptionalEnvVar = (key: string): string | undefined => {
	const value = process.env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

const parseEnvNumber = (key: string): number | undefined => {
	const raw = readOptionalEnvVar(key);
	if (raw === undefined) {
		return undefined;
	}
	const value = Number(raw);
	if (!Number.isFinite(value)) {
		throw new Error(`Environment variable ${key} must be numeric, got "${raw}"`);
	}
	return value;
};

const parseNullableTimeframe = (value: string): string | null =>
	value.toLowerCase() === "none" ? null : value;

export const readEngineEnv = (): EngineConfigOverrides => {
	const overrides: EngineConfigOverrides = {};
	const windowSize = parseEnvNumber("STDEV_WINDOW_SIZE");
	if (windowSize !== undefined) overrides.windowSize = windowSize;
	const cadence = readOptionalEnvVar("STDEV_CADENCE");
	if (cadence !== undefined) overrides.cadence = cadence;
	const tolerance = parseEnvNumber("STDEV_GAP_TOLERANCE_MS");
	if (tolerance !== undefined) overrides.gapToleranceMs = tolerance;
	const minPeriods = parseEnvNumber("STDEV_MIN_PERIODS");
	if (minPeriods !== undefined) overrides.minPeriods = minPeriods;
	const policy = readOptionalEnvVar("STDEV_MISSING_FIELD_POLICY");
	if (policy !== undefined) {
		if (!isMissingFieldPolicy(policy)) {
			throw new Error(
				`STDEV_MISSING_FIELD_POLICY must be one of ${MISSING_FIELD_POLICIES.join(", ")}, got "${policy}"`
			);
		}
		overrides.missingFieldPolicy = policy;
	}
	const lookback = readOptionalEnvVar("STDEV_LOOKBACK");
	if (lookback !== undefined) overrides.lookback = parseNullableTimeframe(lookback);
	const statePath = readOptionalEnvVar("STDEV_STATE_PATH");
	if (statePath !== undefined) overrides.statePath = statePath;
	const outputPath = readOptionalEnvVar("STDEV_OUTPUT_PATH");
	if (outputPath !== undefined) overrides.outputPath = outputPath;
	return overrides;
};

const readOptionalNumber = (
	file: Record<string, unknown>,
	key: string,
	source: string
): number | undefined => {
	const value = file[key];
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== "number" || Number.isNaN(value)) {
		throw new Error(`Numeric field "${key}" in ${source} must be a number`);
	}
	return value;
};

const readOptionalString = (
	file: Record<string, unknown>,
	key: string,
	source: string
): string | undefined => {
	const value = file[key];
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== "string") {
		throw new Error(`Field "${key}" in ${source} must be a string`);
	}
	return value;
};

/**
 * Parse a JSON profile document into overrides. Unknown keys are ignored.
 */
export const parseEngineConfigFile = (
	raw: unknown,
	source: string
): EngineConfigOverrides => {
	if (!isRecord(raw)) {
		throw new Error(`Engine config at ${source} must be a JSON object`);
	}
	const overrides: EngineConfigOverrides = {};
	const windowSize = readOptionalNumber(raw, "windowSize", source);
	if (windowSize !== undefined) overrides.windowSize = windowSize;
	const cadence = readOptionalString(raw, "cadence", source);
	if (cadence !== undefined) overrides.cadence = cadence;
	const tolerance = readOptionalNumber(raw, "gapToleranceMs", source);
	if (tolerance !== undefined) overrides.gapToleranceMs = tolerance;
	const minPeriods = readOptionalNumber(raw, "minPeriods", source);
	if (minPeriods !== undefined) overrides.minPeriods = minPeriods;
	if (raw.missingFieldPolicy !== undefined) {
		if (!isMissingFieldPolicy(raw.missingFieldPolicy)) {
			throw new Error(
				`missingFieldPolicy in ${source} must be one of ${MISSING_FIELD_POLICIES.join(", ")}`
			);
		}
		overrides.missingFieldPolicy = raw.missingFieldPolicy;
	}
	if (raw.lookback === null) {
		overrides.lookback = null;
	} else {
		const lookback = readOptionalString(raw, "lookback", source);
		if (lookback !== undefined) overrides.lookback = lookback;
	}
	if (raw.valueBounds !== undefined) {
		if (!isRecord(raw.valueBounds)) {
			throw new Error(`valueBounds in ${source} must be an object`);
		}
		const min = readOptionalNumber(raw.valueBounds, "min", `${source} valueBounds`);
		const max = readOptionalNumber(raw.valueBounds, "max", `${source} valueBounds`);
		if (min === undefined || max === undefined) {
			throw new Error(`valueBounds in ${source} must define min and max`);
		}
		overrides.valueBounds = { min, max };
	}
	const statePath = readOptionalString(raw, "statePath", source);
	if (statePath !== undefined) overrides.statePath = statePath;
	const outputPath = readOptionalString(raw, "outputPath", source);
	if (outputPath !== undefined) overrides.outputPath = outputPath;
	return overrides;
};

const ensureInteger = (value: number, field: string, min: number): number => {
	if (!Number.isInteger(value) || value < min) {
		throw new Error(`${field} must be an integer >= ${min}, got ${value}`);
	}
	return value;
};

/**
 * Merge override layers over the defaults and validate the result.
 * Later layers win.
 */
export const resolveEngineConfig = (
	...layers: EngineConfigOverrides[]
): EngineConfig => {
	const merged: EngineConfigOverrides = { ...DEFAULT_ENGINE_CONFIG };
	for (const layer of layers) {
		for (const [key, value] of Object.entries(layer)) {
			if (value !== undefined) {
				Object.assign(merged, { [key]: value });
			}
		}
	}

	const windowSize = ensureInteger(merged.windowSize ?? 20, "windowSize", 1);
	const minPeriods = ensureInteger(merged.minPeriods ?? 1, "minPeriods", 1);
	if (minPeriods > windowSize) {
		throw new Error(
			`minPeriods (${minPeriods}) cannot exceed windowSize (${windowSize})`
		);
	}
	const gapToleranceMs = merged.gapToleranceMs ?? 0;
	if (!Number.isFinite(gapToleranceMs) || gapToleranceMs < 0) {
		throw new Error(
			`gapToleranceMs must be a non-negative number, got ${gapToleranceMs}`
		);
	}
	const cadence = merged.cadence ?? DEFAULT_CADENCE;
	const lookback = merged.lookback ?? null;
	const valueBounds = merged.valueBounds ?? { min: -1e12, max: 1e12 };
	if (!(valueBounds.min < valueBounds.max)) {
		throw new Error(
			`valueBounds.min (${valueBounds.min}) must be below valueBounds.max (${valueBounds.max})`
		);
	}

	return {
		windowSize,
		cadence,
		cadenceMs: timeframeToMs(cadence),
		gapToleranceMs,
		minPeriods,
		missingFieldPolicy: merged.missingFieldPolicy ?? "carry",
		lookback,
		lookbackMs: lookback ? timeframeToMs(lookback) : 0,
		valueBounds: { ...valueBounds },
		statePath: merged.statePath ?? "",
		outputPath: merged.outputPath ?? "",
	};
};

export const loadEnvFile = (envPath: string): void => {
	if (loadedEnvPath === envPath || !fs.existsSync(envPath)) {
		return;
	}
	dotenv.config({ path: envPath });
	loadedEnvPath = envPath;
};

/**
 * Load engine configuration: defaults, then the JSON profile, then
 * `STDEV_*` environment variables (after reading the .env file), then
 * explicit overrides. Relative state/output paths resolve against the
 * workspace root.
 */
export const loadEngineConfig = (
	options: ConfigLoadOptions = {}
): EngineConfig => {
	const workspaceRoot = findWorkspaceRoot();
	const envPath = options.envPath ?? path.join(workspaceRoot, ".env");
	const configDir = options.configDir ?? path.join(workspaceRoot, "config");
	const profile = options.profile ?? "default";
	const profilePath = path.join(configDir, "engine", `${profile}.json`);

	loadEnvFile(envPath);

	let fileLayer: EngineConfigOverrides = {};
	const hasProfileFile = fs.existsSync(profilePath);
	if (hasProfileFile) {
		const contents = fs.readFileSync(profilePath, "utf-8");
		fileLayer = parseEngineConfigFile(JSON.parse(contents), profilePath);
	} else if (options.profile !== undefined) {
		throw new Error(`Engine config profile not found: ${profilePath}`);
	}

	const config = resolveEngineConfig(
		fileLayer,
		readEngineEnv(),
		options.overrides ?? {}
	);
	config.statePath = path.resolve(workspaceRoot, config.statePath);
	config.outputPath = path.resolve(workspaceRoot, config.outputPath);

	return withConfigMetadata(config, {
		source: hasProfileFile ? "merged" : "defaults",
		path: hasProfileFile ? profilePath : undefined,
		envPath,
		profile,
	});
};
