export { runStdevBatch } from "./batch/batchRunner";
export type { StdevBatchConfig, StdevBatchResult } from "./batch/batchTypes";
