export { STDEV_CSV_HEADERS, formatStdevCsv } from "./formatCSV";
export type { FormatCsvOptions } from "./formatCSV";
export { createCsvFileSink, createMemorySink } from "./resultSink";
export type { MemorySink, ResultSink } from "./resultSink";
