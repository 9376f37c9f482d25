// tests/api_test.ts
import fs from "fs";
import path from "path";
import type { FastifyInstance } from "fastify";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { buildServer } from "../src/api/server";
import { VectorIndex } from "../src/vector-index";
import { mkTmpDir, rmrf, silentLogger } from "./_util";

const documents = [
	{ id: "A", ownerId: "file-a", vector: [0, 0], metadata: { name: "a.txt" } },
	{ id: "B", ownerId: "file-b", vector: [1, 1] },
	{ id: "C", ownerId: "file-c", vector: [10, 10] },
];

describe("HTTP API", () => {
	let dir = "";
	let index: VectorIndex;
	let server: FastifyInstance;

	beforeEach(async () => {
		dir = mkTmpDir("vector-index-api-");
		index = new VectorIndex(
			{ seed: 1, snapshotPath: path.join(dir, "index.json"), logger: silentLogger },
			{},
		);
		server = await buildServer(index, { logLevel: "silent" });
	});

	afterEach(async () => {
		await server.close();
		rmrf(dir);
	});

	async function seed(): Promise<void> {
		const res = await server.inject({ method: "POST", url: "/documents", payload: { documents } });
		expect(res.statusCode).toBe(200);
	}

	it("adds documents", async () => {
		const res = await server.inject({ method: "POST", url: "/documents", payload: { documents } });
		expect(res.statusCode).toBe(200);
		expect(res.json()).toEqual({ added: 3, ids: ["A", "B", "C"] });
		expect(index.size).toBe(3);
	});

	it("searches", async () => {
		await seed();
		const res = await server.inject({
			method: "POST",
			url: "/search",
			payload: { vector: [0, 1], limit: 2 },
		});
		expect(res.statusCode).toBe(200);
		const body = res.json<{ results: { documentId: string; distance: number; metadata: Record<string, string> }[] }>();
		expect(body.results.map((r) => [r.documentId, r.distance])).toEqual([
			["A", 1],
			["B", 1],
		]);
		expect(body.results[0].metadata).toEqual({ name: "a.txt" });
	});

	it("searches in batches", async () => {
		await seed();
		const res = await server.inject({
			method: "POST",
			url: "/search/batch",
			payload: { queries: [{ vector: [10, 9], limit: 1 }, { vector: [1, 1] }] },
		});
		expect(res.statusCode).toBe(200);
		const { results } = res.json<{ results: { documentId: string }[][] }>();
		expect(results.map((row) => row.map((r) => r.documentId))).toEqual([["C"], ["B", "A", "C"]]);
	});

	it("gets and deletes documents", async () => {
		await seed();

		const got = await server.inject({ method: "GET", url: "/documents/A" });
		expect(got.statusCode).toBe(200);
		expect(got.json()).toMatchObject({ id: "A", ownerId: "file-a", vector: [0, 0] });

		const del = await server.inject({ method: "DELETE", url: "/documents/A" });
		expect(del.json()).toEqual({ removed: true });

		const again = await server.inject({ method: "DELETE", url: "/documents/A" });
		expect(again.json()).toEqual({ removed: false });

		const missing = await server.inject({ method: "GET", url: "/documents/A" });
		expect(missing.statusCode).toBe(404);
		expect(missing.json()).toEqual({ error: "Document not found: A", code: "NOT_FOUND" });
	});

	it("maps dimension errors to 400", async () => {
		await seed();
		const res = await server.inject({ method: "POST", url: "/search", payload: { vector: [1, 2, 3] } });
		expect(res.statusCode).toBe(400);
		expect(res.json()).toEqual({
			error: "Query vector dimension mismatch. Expected 2, got 3",
			code: "DIMENSION_MISMATCH",
		});
	});

	it("rejects malformed bodies", async () => {
		const noVector = await server.inject({ method: "POST", url: "/search", payload: { limit: 3 } });
		expect(noVector.statusCode).toBe(400);
		expect(noVector.json()).toMatchObject({ code: "INVALID_PARAMETER" });

		const badLimit = await server.inject({
			method: "POST",
			url: "/search",
			payload: { vector: [1, 2], limit: -1 },
		});
		expect(badLimit.statusCode).toBe(400);

		const noDocs = await server.inject({ method: "POST", url: "/documents", payload: { documents: [] } });
		expect(noDocs.statusCode).toBe(400);
	});

	it("saves, loads and reports stats", async () => {
		await seed();

		const saved = await server.inject({ method: "POST", url: "/save" });
		expect(saved.json()).toEqual({ status: "saved" });

		await index.remove("C");
		const loaded = await server.inject({ method: "POST", url: "/load" });
		expect(loaded.json()).toEqual({ status: "loaded" });

		const stats = await server.inject({ method: "GET", url: "/stats" });
		expect(stats.statusCode).toBe(200);
		expect(stats.json()).toMatchObject({ documentCount: 3, vectorDimension: 2 });
	});

	it("maps an inconsistent snapshot to 500", async () => {
		const createdAt = new Date(0).toISOString();
		const record = (id: string, vector: number[]) => ({
			id,
			documentId: id,
			ownerId: "o",
			vector,
			neighbors: [[]],
			metadata: {},
			createdAt,
		});
		fs.writeFileSync(
			path.join(dir, "index.json"),
			JSON.stringify([record("p", [1, 2]), record("q", [1])]),
		);

		const res = await server.inject({ method: "POST", url: "/load" });
		expect(res.statusCode).toBe(500);
		expect(res.json()).toMatchObject({ code: "PERSISTENCE" });
	});

	it("maps a missing snapshot to 500", async () => {
		const res = await server.inject({ method: "POST", url: "/load" });
		expect(res.statusCode).toBe(500);
		expect(res.json()).toMatchObject({ code: "PERSISTENCE" });
	});
});
