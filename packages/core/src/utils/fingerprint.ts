import crypto from "node:crypto";

const stableStringifyInternal = (value: unknown): string => {
	if (value === null || typeof value !== "object") {
		return JSON.stringify(value);
	}
	if (Array.isArray(value)) {
		return `[${value.map(stableStringifyInternal).join(",")}]`;
	}
	const entries = Object.entries(value)
		.filter(([, val]) => typeof val !== "undefined")
		.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
		.map(
			([key, val]) => `${JSON.stringify(key)}:${stableStringifyInternal(val)}`
		);
	return `{${entries.join(",")}}`;
};

/**
 * JSON serialization with object keys sorted, so equal structures hash equally
 * regardless of insertion order.
 */
export const stableStringify = (value: unknown): string => {
	return stableStringifyInternal(value);
};

export const hashJson = (value: unknown, length = 12): string => {
	const digest = crypto
		.createHash("sha1")
		.update(stableStringify(value))
		.digest("hex");
	return length > 0 ? digest.slice(0, length) : digest;
};
