// tests/atomic_save_test.ts
import fs from "fs";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { atomicWriteFile, makeUniqueTmpPath } from "../src/utils/atomic";
import { mkTmpDir, rmrf } from "./_util";

describe("atomicWriteFile", () => {
	let dir = "";

	beforeEach(() => {
		dir = mkTmpDir("vector-index-atomic-");
	});

	afterEach(() => {
		rmrf(dir);
	});

	it("creates missing directories and writes the data", async () => {
		const target = path.join(dir, "a", "b", "out.json");
		await atomicWriteFile(target, "[1,2,3]");
		expect(fs.readFileSync(target, "utf8")).toBe("[1,2,3]");
	});

	it("replaces an existing file and leaves no temp files behind", async () => {
		const target = path.join(dir, "out.json");
		fs.writeFileSync(target, "old");
		for (let round = 0; round < 5; round++) {
			await atomicWriteFile(target, `round-${round}`);
		}
		expect(fs.readFileSync(target, "utf8")).toBe("round-4");
		expect(fs.readdirSync(dir)).toEqual(["out.json"]);
	});

	it("keeps one complete version under concurrent writers", async () => {
		const target = path.join(dir, "race.json");
		const bodies = Array.from({ length: 8 }, (_, i) => JSON.stringify({ writer: i, pad: "x".repeat(5000) }));
		await Promise.all(bodies.map((b) => atomicWriteFile(target, b)));
		expect(bodies).toContain(fs.readFileSync(target, "utf8"));
		expect(fs.readdirSync(dir)).toEqual(["race.json"]);
	});

	it("cleans up the temp file when the rename fails", async () => {
		// a directory in the way makes rename fail with EISDIR or similar
		const target = path.join(dir, "blocked");
		fs.mkdirSync(path.join(target, "child"), { recursive: true });
		await expect(atomicWriteFile(target, "data")).rejects.toThrow();
		expect(fs.readdirSync(dir)).toEqual(["blocked"]);
	});
});

describe("makeUniqueTmpPath", () => {
	it("derives distinct names next to the target", () => {
		const a = makeUniqueTmpPath("/data/index.json");
		const b = makeUniqueTmpPath("/data/index.json");
		expect(a.startsWith("/data/index.json.tmp-")).toBe(true);
		expect(a).not.toBe(b);
	});
});
