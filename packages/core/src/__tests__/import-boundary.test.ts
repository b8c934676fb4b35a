import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";

const packagesDir = path.resolve(
	path.dirname(fileURLToPath(import.meta.url)),
	"../../.."
);

// The engine and its math stay free of I/O so they can run anywhere.
const FORBIDDEN = /from "(node:(fs|path|child_process)|@rollvol\/(data|persistence|runtime|metrics))"/;
const FORBIDDEN_DEP = /^@rollvol\/(data|persistence|runtime|metrics)$/;
const TARGETS = ["stdev-engine", "indicators"];

const shouldScan = (file: string): boolean => {
	const base = path.basename(file);
	if (base.startsWith(".")) return false;
	if (base.endsWith(".test.ts")) return false;
	return base.endsWith(".ts");
};

const walkFiles = (root: string): string[] => {
	const results: string[] = [];
	const stack = [root];
	let current = stack.pop();
	while (current !== undefined) {
		const stat = fs.statSync(current);
		if (stat.isDirectory()) {
			for (const entry of fs.readdirSync(current)) {
				if (entry === "node_modules" || entry === "dist") continue;
				stack.push(path.join(current, entry));
			}
		} else if (shouldScan(current)) {
			results.push(current);
		}
		current = stack.pop();
	}
	return results;
};

const readDependencyNames = (pkgPath: string): string[] => {
	const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
	if (typeof pkg !== "object" || pkg === null) {
		return [];
	}
	const names: string[] = [];
	for (const field of ["dependencies", "devDependencies"]) {
		const deps: unknown = Reflect.get(pkg, field);
		if (typeof deps === "object" && deps !== null) {
			names.push(...Object.keys(deps));
		}
	}
	return names;
};

describe("engine import boundaries", () => {
	it("stdev-engine/indicators sources do not import I/O packages", () => {
		const offenders: string[] = [];
		for (const target of TARGETS) {
			const dir = path.join(packagesDir, target, "src");
			for (const file of walkFiles(dir)) {
				const content = fs.readFileSync(file, "utf8");
				if (FORBIDDEN.test(content)) {
					offenders.push(`${target}:${path.relative(dir, file)}`);
				}
			}
		}
		expect(offenders).toEqual([]);
	});

	it("stdev-engine/indicators package.json have no I/O package deps", () => {
		const offenders: string[] = [];
		for (const target of TARGETS) {
			const pkgPath = path.join(packagesDir, target, "package.json");
			for (const dep of readDependencyNames(pkgPath)) {
				if (FORBIDDEN_DEP.test(dep)) {
					offenders.push(`${target}:${dep}`);
				}
			}
		}
		expect(offenders).toEqual([]);
	});
});
