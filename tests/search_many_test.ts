// tests/search_many_test.ts
import { describe, expect, it } from "vitest";

import { DimensionMismatchError } from "../src/errors";
import { VectorIndex } from "../src/vector-index";
import { oneHot, silentLogger } from "./_util";

const DIM = 32;

async function oneHotIndex(): Promise<VectorIndex> {
	const index = new VectorIndex({ seed: 4, logger: silentLogger }, {});
	await index.add(
		Array.from({ length: DIM }, (_, i) => ({
			id: `d-${i}`,
			ownerId: `o-${i}`,
			vector: oneHot(DIM, i),
			metadata: { i: String(i) },
		})),
	);
	return index;
}

describe("VectorIndex.searchMany", () => {
	it("returns one ranked list per query", async () => {
		const index = await oneHotIndex();
		const queries = Array.from({ length: 16 }, (_, i) => ({ vector: oneHot(DIM, i), limit: 3 }));

		const results = await index.searchMany(queries);

		expect(results).toHaveLength(16);
		results.forEach((row, i) => {
			expect(row).toHaveLength(3);
			expect(row[0]).toMatchObject({ documentId: `d-${i}`, distance: 0, similarity: 1 });
			// every other one-hot vector sits at squared distance 2
			expect(row.slice(1).map((r) => r.distance)).toEqual([2, 2]);
		});
	});

	it("applies the default limit per query", async () => {
		const index = await oneHotIndex();
		const [first, second] = await index.searchMany([
			{ vector: oneHot(DIM, 5) },
			{ vector: oneHot(DIM, 6), limit: 1 },
		]);
		expect(first).toHaveLength(10);
		expect(second.map((r) => r.documentId)).toEqual(["d-6"]);
	});

	it("fails the whole batch on a bad query", async () => {
		const index = await oneHotIndex();
		await expect(
			index.searchMany([{ vector: oneHot(DIM, 1) }, { vector: [1, 0] }]),
		).rejects.toBeInstanceOf(DimensionMismatchError);
	});

	it("returns empty lists from an empty index", async () => {
		const index = new VectorIndex({ logger: silentLogger }, {});
		expect(await index.searchMany([{ vector: [1, 2] }, { vector: [3, 4] }])).toEqual([[], []]);
	});
});
