export { StdevEngine } from "./stdevEngine";
export type {
	EngineStats,
	ProcessRange,
	StdevEngineOptions,
} from "./stdevEngine";
export { EntityState, isUsableValue } from "./entityState";
export type {
	ApplyOptions,
	EntityStateSnapshot,
	EntityUpdate,
} from "./entityState";
export { StateMap } from "./stateMap";
export { classifyInterval } from "./gapDetection";
export type { GapPolicy, IntervalKind } from "./gapDetection";
