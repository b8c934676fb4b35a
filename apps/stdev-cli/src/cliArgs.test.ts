import { describe, it, expect } from "vitest";
import { parseCliArgs, parseIntegerArg, readFlag, readStringArg } from "./cliArgs";

describe("stdev CLI arg parsing", () => {
	it("captures flags with a space", () => {
		const args = parseCliArgs([
			"--input",
			"data/snapshots.csv",
			"--start",
			"2021-11-20T00:00:00Z",
			"--end",
			"2021-11-21T00:00:00Z",
		]);
		expect(args.input).toBe("data/snapshots.csv");
		expect(args.start).toBe("2021-11-20T00:00:00Z");
		expect(args.end).toBe("2021-11-21T00:00:00Z");
	});

	it("captures flags with equals syntax", () => {
		const args = parseCliArgs(["--windowSize=5", "--missingFieldPolicy=null"]);
		expect(args.windowSize).toBe("5");
		expect(args.missingFieldPolicy).toBe("null");
	});

	it("treats a flag followed by another flag as boolean", () => {
		const args = parseCliArgs(["--help", "--input", "x.csv"]);
		expect(args.help).toBe(true);
		expect(args.input).toBe("x.csv");
	});

	it("reads start and end from positionals", () => {
		const args = parseCliArgs(["2021-11-20", "2021-11-21", "--input", "x.csv"]);
		expect(args.start).toBe("2021-11-20");
		expect(args.end).toBe("2021-11-21");
	});

	it("prefers explicit --start over a positional", () => {
		const args = parseCliArgs(["2021-11-20", "--start", "2021-11-19"]);
		expect(args.start).toBe("2021-11-19");
		expect(args.end).toBeUndefined();
	});
});

describe("typed arg readers", () => {
	it("rejects a value flag given without a value", () => {
		const args = parseCliArgs(["--state"]);
		expect(() => readStringArg(args, "state")).toThrow("--state requires a value");
		expect(readStringArg(args, "out")).toBeUndefined();
	});

	it("reads boolean flags", () => {
		expect(readFlag(parseCliArgs(["--help"]), "help")).toBe(true);
		expect(readFlag(parseCliArgs(["--help=true"]), "help")).toBe(true);
		expect(readFlag(parseCliArgs([]), "help")).toBe(false);
	});

	it("parses integers and rejects fractions", () => {
		expect(parseIntegerArg(parseCliArgs(["--windowSize", "24"]), "windowSize")).toBe(24);
		expect(() =>
			parseIntegerArg(parseCliArgs(["--windowSize", "2.5"]), "windowSize")
		).toThrow("Invalid integer value for --windowSize: 2.5");
	});
});
