// tests/persistence_test.ts
import fs from "fs";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { readSnapshot } from "../src/storage/snapshot";
import { VectorIndex } from "../src/vector-index";
import { mkTmpDir, randomVectors, rmrf, silentLogger } from "./_util";

describe("persistence", () => {
	let dir = "";

	beforeEach(() => {
		dir = mkTmpDir("vector-index-persist-");
	});

	afterEach(() => {
		rmrf(dir);
	});

	it("answers every query identically after save and load", async () => {
		const file = path.join(dir, "snapshot.json");
		const vectors = randomVectors(250, 12, 31);

		const source = new VectorIndex({ seed: 11, logger: silentLogger }, {});
		await source.add(
			vectors.map((vector, i) => ({
				id: `doc-${i}`,
				ownerId: `file-${i % 7}`,
				vector,
				metadata: { bucket: String(i % 3) },
			})),
		);
		await source.removeMany(["doc-3", "doc-100", "doc-249"]);
		await source.save(file);

		const restored = new VectorIndex({ seed: 99, logger: silentLogger }, {});
		await restored.load(file);

		expect(restored.size).toBe(247);
		expect(restored.getStats().memoryUsage).toBe(source.getStats().memoryUsage);

		const strip = (rs: Awaited<ReturnType<VectorIndex["search"]>>) =>
			rs.map(({ documentId, ownerId, distance, similarity, metadata }) => ({
				documentId,
				ownerId,
				distance,
				similarity,
				metadata,
			}));

		for (const q of randomVectors(20, 12, 1234)) {
			expect(strip(await restored.search(q, 8))).toEqual(strip(await source.search(q, 8)));
		}
	});

	it("writes a JSON array in insertion order", async () => {
		const file = path.join(dir, "order.json");
		const index = new VectorIndex({ seed: 2, logger: silentLogger }, {});
		await index.add([
			{ id: "first", ownerId: "o", vector: [1, 0] },
			{ id: "second", ownerId: "o", vector: [0, 1] },
		]);
		await index.save(file);

		const raw: unknown = JSON.parse(fs.readFileSync(file, "utf8"));
		expect(Array.isArray(raw)).toBe(true);

		const records = await readSnapshot(file);
		expect(records.map((r) => [r.id, r.documentId, r.vector])).toEqual([
			["first", "first", [1, 0]],
			["second", "second", [0, 1]],
		]);
		expect(records[0].neighbors[0]).toEqual(["second"]);
		expect(records[1].neighbors[0]).toEqual(["first"]);
	});

	it("saves repeatedly over the same file", async () => {
		const file = path.join(dir, "rounds.json");
		const index = new VectorIndex({ seed: 5, snapshotPath: file, logger: silentLogger }, {});

		for (let round = 0; round < 6; round++) {
			await index.insert({ id: `r${round}`, ownerId: "o", vector: [round, round + 1] });
			await index.save();

			const reopened = await VectorIndex.open({ snapshotPath: file, logger: silentLogger }, {});
			expect(reopened.size).toBe(round + 1);
			const [top] = await reopened.search([round, round + 1], 1);
			expect(top.documentId).toBe(`r${round}`);
		}
		expect(fs.readdirSync(dir)).toEqual(["rounds.json"]);
	});
});
