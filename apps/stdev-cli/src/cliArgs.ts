export type ArgValue = string | boolean;

export type CliArgs = Record<string, ArgValue>;

export const parseCliArgs = (argv: string[]): CliArgs => {
	const args: CliArgs = {};
	const positionals: string[] = [];
	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			positionals.push(token);
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			const key = token.slice(2, eqIdx);
			const value = token.slice(eqIdx + 1);
			args[key] = value;
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			args[key] = next;
			i += 1;
		} else {
			args[key] = true;
		}
	}
	if (positionals[0] && args.start === undefined) {
		args.start = positionals[0];
	}
	if (positionals[1] && args.end === undefined) {
		args.end = positionals[1];
	}
	return args;
};

export const readStringArg = (args: CliArgs, key: string): string | undefined => {
	const value = args[key];
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== "string") {
		throw new Error(`--${key} requires a value`);
	}
	return value;
};

export const readFlag = (args: CliArgs, key: string): boolean =>
	args[key] === true || args[key] === "true";

export const parseIntegerArg = (
	args: CliArgs,
	key: string
): number | undefined => {
	const value = readStringArg(args, key);
	if (value === undefined) {
		return undefined;
	}
	const num = Number(value);
	if (!Number.isInteger(num)) {
		throw new Error(`Invalid integer value for --${key}: ${value}`);
	}
	return num;
};
