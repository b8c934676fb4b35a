import fs from "node:fs";
import path from "node:path";
import { PRICE_FIELDS, createLogger, formatTimestamp, hashJson } from "@rollvol/core";
import type { ModuleLogger } from "@rollvol/core";
import { EntityState, StateMap } from "@rollvol/stdev-engine";
import { StateStoreError } from "./errors";
import {
	STATE_FORMAT_VERSION,
	persistedStateSchema,
} from "./stateSchema";
import type { PersistedEntity, PersistedState } from "./stateSchema";

export interface StateStoreOptions {
	windowSize: number;
	cadenceMs: number;
	logger?: ModuleLogger;
}

// Allowed relative disagreement between stored running sums and the values
const SUM_TOLERANCE = 1e-6;

const checksumEntities = (entities: Record<string, PersistedEntity>): string =>
	hashJson(entities, 0);

export const serializeState = (
	state: StateMap,
	cadenceMs: number,
	savedAt: Date = new Date()
): PersistedState => {
	const entities: Record<string, PersistedEntity> = {};
	for (const [entityId, entity] of state.entries()) {
		entities[entityId] = entity.toSnapshot();
	}
	return {
		version: STATE_FORMAT_VERSION,
		savedAt: savedAt.toISOString(),
		config: { windowSize: state.windowSize, cadenceMs },
		highWaterMark: state.highWaterMark,
		entityCount: state.size,
		checksum: checksumEntities(entities),
		entities,
	};
};

const withinTolerance = (stored: number, actual: number, scale: number): boolean =>
	Math.abs(stored - actual) <= SUM_TOLERANCE * Math.max(1, scale);

const verifyWindowSums = (
	filePath: string,
	entityId: string,
	entity: PersistedEntity,
	windowSize: number
): void => {
	for (const field of PRICE_FIELDS) {
		const { values, sum, sumOfSquares, peakSumOfSquares, evictionsSinceRecalibration } =
			entity.windows[field];
		if (evictionsSinceRecalibration >= windowSize) {
			throw new StateStoreError(
				"inconsistent_window",
				filePath,
				`${entityId}.${field} records ${evictionsSinceRecalibration} evictions since recalibration, window size is ${windowSize}`
			);
		}
		let actualSum = 0;
		let absSum = 0;
		let actualSquares = 0;
		for (const value of values) {
			actualSum += value;
			absSum += Math.abs(value);
			actualSquares += value * value;
		}
		// Rounding in the running sums is relative to the largest magnitude
		// they held since the last recalibration, not to the current values.
		const squaresScale = Math.max(actualSquares, peakSumOfSquares);
		const sumScale = Math.max(absSum, Math.sqrt(squaresScale * values.length));
		if (
			!withinTolerance(sum, actualSum, sumScale) ||
			!withinTolerance(sumOfSquares, actualSquares, squaresScale)
		) {
			throw new StateStoreError(
				"inconsistent_window",
				filePath,
				`${entityId}.${field} running sums do not match its values`
			);
		}
	}
};

/**
 * Validate a parsed state document and rebuild the entity states from it.
 */
export const deserializeState = (
	raw: unknown,
	options: Pick<StateStoreOptions, "windowSize" | "cadenceMs">,
	filePath: string
): StateMap => {
	const parsed = persistedStateSchema.safeParse(raw);
	if (!parsed.success) {
		const issues = parsed.error.issues
			.slice(0, 3)
			.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
			.join("; ");
		throw new StateStoreError("invalid_schema", filePath, issues, {
			cause: parsed.error,
		});
	}
	const document = parsed.data;

	if (checksumEntities(document.entities) !== document.checksum) {
		throw new StateStoreError(
			"checksum_mismatch",
			filePath,
			"entity checksum does not match contents"
		);
	}
	const entityIds = Object.keys(document.entities);
	if (entityIds.length !== document.entityCount) {
		throw new StateStoreError(
			"invalid_schema",
			filePath,
			`entityCount ${document.entityCount} but ${entityIds.length} entities present`
		);
	}
	if (
		document.config.windowSize !== options.windowSize ||
		document.config.cadenceMs !== options.cadenceMs
	) {
		throw new StateStoreError(
			"config_mismatch",
			filePath,
			`saved with windowSize=${document.config.windowSize} cadenceMs=${document.config.cadenceMs}, ` +
				`running with windowSize=${options.windowSize} cadenceMs=${options.cadenceMs}`
		);
	}

	const state = new StateMap(options.windowSize);
	for (const entityId of entityIds) {
		const entity = document.entities[entityId];
		for (const field of PRICE_FIELDS) {
			if (entity.windows[field].values.length > options.windowSize) {
				throw new StateStoreError(
					"inconsistent_window",
					filePath,
					`${entityId}.${field} holds ${entity.windows[field].values.length} values, window size is ${options.windowSize}`
				);
			}
		}
		verifyWindowSums(filePath, entityId, entity, options.windowSize);
		state.set(EntityState.restore(entityId, options.windowSize, entity));
	}
	return state;
};

/**
 * Read persisted state. A missing file is a cold start; a file that exists
 * but cannot be trusted raises StateStoreError.
 */
export const loadState = (
	filePath: string,
	options: StateStoreOptions
): StateMap => {
	const logger = options.logger ?? createLogger("persistence");
	if (!fs.existsSync(filePath)) {
		logger.info("state_cold_start", { path: filePath });
		return new StateMap(options.windowSize);
	}

	let contents: string;
	try {
		contents = fs.readFileSync(filePath, "utf-8");
	} catch (error) {
		throw new StateStoreError("unreadable", filePath, "could not be read", {
			cause: error,
		});
	}

	let raw: unknown;
	try {
		raw = JSON.parse(contents);
	} catch (error) {
		throw new StateStoreError(
			"invalid_json",
			filePath,
			error instanceof Error ? error.message : "invalid JSON",
			{ cause: error }
		);
	}

	const state = deserializeState(raw, options, filePath);
	const highWaterMark = state.highWaterMark;
	logger.info("state_loaded", {
		path: filePath,
		entityCount: state.size,
		highWaterMark: highWaterMark === null ? null : formatTimestamp(highWaterMark),
	});
	return state;
};

/**
 * Write state atomically: the document goes to a sibling temp file which is
 * flushed and then renamed over the target.
 */
export const saveState = (
	filePath: string,
	state: StateMap,
	options: StateStoreOptions
): PersistedState => {
	const logger = options.logger ?? createLogger("persistence");
	if (state.windowSize !== options.windowSize) {
		throw new StateStoreError(
			"config_mismatch",
			filePath,
			`state window size ${state.windowSize} differs from ${options.windowSize}`
		);
	}
	const document = serializeState(state, options.cadenceMs);
	const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

	try {
		fs.mkdirSync(path.dirname(filePath), { recursive: true });
		const fd = fs.openSync(tempPath, "w");
		try {
			fs.writeSync(fd, JSON.stringify(document));
			fs.fsyncSync(fd);
		} finally {
			fs.closeSync(fd);
		}
		fs.renameSync(tempPath, filePath);
	} catch (error) {
		if (fs.existsSync(tempPath)) {
			fs.rmSync(tempPath, { force: true });
		}
		throw new StateStoreError(
			"write_failed",
			filePath,
			error instanceof Error ? error.message : "write failed",
			{ cause: error }
		);
	}

	logger.info("state_saved", {
		path: filePath,
		entityCount: document.entityCount,
		highWaterMark:
			document.highWaterMark === null
				? null
				: formatTimestamp(document.highWaterMark),
	});
	return document;
};

export interface StateStore {
	readonly path: string;
	load(): StateMap;
	save(state: StateMap): PersistedState;
}

export const createStateStore = (
	filePath: string,
	options: StateStoreOptions
): StateStore => ({
	path: filePath,
	load: () => loadState(filePath, options),
	save: (state) => saveState(filePath, state, options),
});
