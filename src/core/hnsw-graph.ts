// src/core/hnsw-graph.ts
import { randomUUID } from "crypto";
import type { Logger } from "pino";

import { validateGraphParams } from "../config";
import {
	DimensionMismatchError,
	EmptyIndexError,
	InvalidParameterError,
} from "../errors";
import type {
	AddOptions,
	GraphOptions,
	GraphParams,
	IndexStats,
	Metadata,
	SearchResult,
	SnapshotNode,
	VectorDocument,
	VectorDocumentInput,
} from "../types";
import { distanceFor, toSimilarity, type DistanceFn, type Vector } from "./distance";
import { compareCandidates, MaxHeap, MinHeap, type Candidate } from "./heap";
import { LevelGenerator, type RandomSource } from "./random";

interface GraphNode {
	readonly id: string;
	readonly ownerId: string;
	readonly vector: readonly number[];
	readonly metadata: Readonly<Metadata>;
	readonly createdAt: Date;
	readonly level: number;
	/** Out-edges per layer, as arena slots. */
	readonly neighbors: number[][];
	/** Reverse edges per layer; lets removal find every list that points here. */
	readonly inbound: Set<number>[];
}

type Arena = (GraphNode | undefined)[];

// memory estimate constants (bytes)
const NODE_OVERHEAD_BYTES = 80;
const FLOAT_BYTES = 4;
const ID_BYTES = 16;

const COMPACT_MIN_HOLES = 64;

function emptyLayers(level: number): { neighbors: number[][]; inbound: Set<number>[] } {
	const neighbors: number[][] = [];
	const inbound: Set<number>[] = [];
	for (let l = 0; l <= level; l++) {
		neighbors.push([]);
		inbound.push(new Set());
	}
	return { neighbors, inbound };
}

function pickEntryPoint(slots: Arena): { slot: number; level: number } {
	let slot = -1;
	let level = -1;
	for (let i = 0; i < slots.length; i++) {
		const node = slots[i];
		if (node && node.level > level) {
			slot = i;
			level = node.level;
		}
	}
	return { slot, level };
}

function assertFiniteVector(vector: readonly number[], field: string): void {
	if (vector.length === 0) {
		throw new InvalidParameterError(field, "must not be empty");
	}
	for (const x of vector) {
		if (!Number.isFinite(x)) {
			throw new InvalidParameterError(field, "must contain only finite numbers");
		}
	}
}

/**
 * Hierarchical Navigable Small World graph over an arena of nodes.
 *
 * Nodes live at dense slots; `idToSlot` resolves document ids, and every
 * neighbor list stores slots so dereferencing an edge is an array read.
 * Slots are never reused. Removal leaves a hole that is dropped by the next
 * compaction, which preserves insertion order.
 *
 * Not synchronized: callers own one instance per writer (see VectorIndex).
 */
export class HnswGraph {
	readonly params: GraphParams;

	private readonly distance: DistanceFn;
	private readonly random: RandomSource;
	private readonly levels: LevelGenerator;
	private readonly now: () => number;
	private readonly logger?: Logger;
	private readonly startedAt: number;

	private slots: Arena = [];
	private idToSlot = new Map<string, number>();
	private entrySlot = -1;
	private topLevel = -1;
	private dim = 0;

	constructor(opts: GraphOptions = {}) {
		const { random, now, logger, ...overrides } = opts;
		this.params = validateGraphParams(overrides);
		this.distance = distanceFor(this.params.metric);
		this.random = random ?? Math.random;
		this.levels = new LevelGenerator(
			this.params.maxLevel,
			this.random,
			this.params.levelFactor,
		);
		this.now = now ?? Date.now;
		this.logger = logger;
		this.startedAt = this.now();
	}

	get size(): number {
		return this.idToSlot.size;
	}

	/** 0 until the first document (or a non-empty snapshot) fixes it. */
	get dimension(): number {
		return this.dim;
	}

	has(id: string): boolean {
		return this.idToSlot.has(id);
	}

	get(id: string): VectorDocument | undefined {
		const slot = this.idToSlot.get(id);
		return slot === undefined ? undefined : this.toDocument(this.nodeAt(slot));
	}

	/** Live documents in insertion order. */
	documents(): VectorDocument[] {
		const out: VectorDocument[] = [];
		for (const node of this.slots) if (node) out.push(this.toDocument(node));
		return out;
	}

	/**
	 * Inserts a batch. Every document is checked before the graph is touched,
	 * so a bad vector anywhere in the batch leaves the index unchanged.
	 * An id that is already present is replaced. `onProgress` runs after each
	 * insert; if it throws, the rest of the batch is still inserted and the
	 * error is rethrown at the end.
	 */
	add(
		inputs: readonly VectorDocumentInput[],
		opts: AddOptions = {},
	): VectorDocument[] {
		if (inputs.length === 0) return [];

		const docs = this.prepare(inputs);
		let progressFailed = false;
		let progressError: unknown;
		for (let i = 0; i < docs.length; i++) {
			this.insertOne(docs[i]);
			try {
				opts.onProgress?.(i + 1, docs.length);
			} catch (e) {
				if (!progressFailed) {
					progressFailed = true;
					progressError = e;
				}
			}
		}
		if (progressFailed) throw progressError;
		return docs;
	}

	/** Returns false (and changes nothing) when the id is unknown. */
	remove(id: string): boolean {
		const slot = this.idToSlot.get(id);
		if (slot === undefined) return false;

		const node = this.nodeAt(slot);
		this.slots[slot] = undefined;
		this.idToSlot.delete(id);

		for (let l = 0; l <= node.level; l++) {
			const outs = node.neighbors[l];
			for (const o of outs) this.slots[o]?.inbound[l].delete(slot);

			const ins = Array.from(node.inbound[l]);
			for (const i of ins) {
				const from = this.nodeAt(i);
				from.neighbors[l] = from.neighbors[l].filter((s) => s !== slot);
			}
			for (const i of ins) this.repair(i, outs, l);
		}

		if (slot === this.entrySlot) {
			const ep = pickEntryPoint(this.slots);
			this.entrySlot = ep.slot;
			this.topLevel = ep.level;
		}

		this.maybeCompact();
		return true;
	}

	search(query: readonly number[], limit: number): SearchResult[] {
		if (!Number.isInteger(limit) || limit < 0) {
			throw new InvalidParameterError("limit", "must be a non-negative integer");
		}
		if (this.entrySlot < 0) return [];
		if (query.length !== this.dim) {
			throw new DimensionMismatchError(this.dim, query.length, "Query vector");
		}
		assertFiniteVector(query, "query");
		if (limit === 0) return [];

		const found = this.nearest(query, Math.max(this.params.efSearch, limit));
		return found.slice(0, limit).map((c) => {
			const node = this.nodeAt(c.slot);
			return {
				id: randomUUID(),
				documentId: node.id,
				ownerId: node.ownerId,
				similarity: toSimilarity(c.dist),
				distance: c.dist,
				metadata: { ...node.metadata },
			};
		});
	}

	/** Empties the graph; the dimension becomes unset again. */
	clear(): void {
		this.slots = [];
		this.idToSlot = new Map();
		this.entrySlot = -1;
		this.topLevel = -1;
		this.dim = 0;
	}

	/**
	 * Reinserts every live document, in insertion order, into a fresh graph
	 * and swaps it in. Drops holes and restores edges lost to removals.
	 */
	rebuild(): void {
		if (this.size === 0) throw new EmptyIndexError("rebuild");

		const fresh = new HnswGraph({
			...this.params,
			random: this.random,
			logger: this.logger,
		});
		fresh.add(this.documents());

		this.slots = fresh.slots;
		this.idToSlot = fresh.idToSlot;
		this.entrySlot = fresh.entrySlot;
		this.topLevel = fresh.topLevel;
		this.dim = fresh.dim;
	}

	getStats(): IndexStats {
		let memoryUsage = 0;
		for (const node of this.slots) {
			if (!node) continue;
			memoryUsage += NODE_OVERHEAD_BYTES + this.dim * FLOAT_BYTES;
			for (const layer of node.neighbors) memoryUsage += layer.length * ID_BYTES;
		}
		return {
			documentCount: this.size,
			vectorDimension: this.dim,
			memoryUsage,
			buildTime: (this.now() - this.startedAt) / 1000,
		};
	}

	/** Nodes in slot order, neighbor slots resolved to ids. */
	toSnapshot(): SnapshotNode[] {
		const out: SnapshotNode[] = [];
		for (const node of this.slots) {
			if (!node) continue;
			out.push({
				id: node.id,
				documentId: node.id,
				ownerId: node.ownerId,
				vector: [...node.vector],
				neighbors: node.neighbors.map((layer) =>
					layer.map((s) => this.nodeAt(s).id),
				),
				metadata: { ...node.metadata },
				createdAt: node.createdAt.toISOString(),
			});
		}
		return out;
	}

	/**
	 * Replaces the whole graph with `records`. The new arena is built and
	 * checked on the side; on any error the current graph is left as it was.
	 */
	restore(records: readonly SnapshotNode[]): void {
		const slots: GraphNode[] = [];
		const idToSlot = new Map<string, number>();
		let dim = 0;

		records.forEach((r, i) => {
			if (idToSlot.has(r.id)) {
				throw new InvalidParameterError(`snapshot[${i}].id`, `duplicate id ${r.id}`);
			}
			assertFiniteVector(r.vector, `snapshot[${i}].vector`);
			if (i === 0) dim = r.vector.length;
			else if (r.vector.length !== dim) {
				throw new DimensionMismatchError(dim, r.vector.length, `Snapshot node ${r.id}`);
			}

			const level = Math.max(0, r.neighbors.length - 1);
			slots.push({
				id: r.id,
				ownerId: r.ownerId,
				vector: [...r.vector],
				metadata: { ...r.metadata },
				createdAt: new Date(r.createdAt),
				level,
				...emptyLayers(level),
			});
			idToSlot.set(r.id, i);
		});

		let dropped = 0;
		records.forEach((r, i) => {
			const node = slots[i];
			r.neighbors.forEach((ids, l) => {
				for (const nid of ids) {
					const t = idToSlot.get(nid);
					if (
						t === undefined ||
						t === i ||
						slots[t].level < l ||
						node.neighbors[l].includes(t)
					) {
						dropped++;
						continue;
					}
					node.neighbors[l].push(t);
					slots[t].inbound[l].add(i);
				}
			});
		});

		for (let i = 0; i < slots.length; i++) {
			for (let l = 0; l <= slots[i].level; l++) {
				if (slots[i].neighbors[l].length > this.params.mMax) this.prune(slots, i, l);
			}
		}

		if (dropped > 0) {
			this.logger?.warn({ dropped }, "snapshot edges dropped on restore");
		}

		const ep = pickEntryPoint(slots);
		this.slots = slots;
		this.idToSlot = idToSlot;
		this.entrySlot = ep.slot;
		this.topLevel = ep.level;
		this.dim = dim;
	}

	// --- insertion ---

	private prepare(inputs: readonly VectorDocumentInput[]): VectorDocument[] {
		let expected = this.dim;
		return inputs.map((input, i) => {
			if (input.id !== undefined && input.id.length === 0) {
				throw new InvalidParameterError(`documents[${i}].id`, "must not be empty");
			}
			assertFiniteVector(input.vector, `documents[${i}].vector`);
			if (expected === 0) expected = input.vector.length;
			else if (input.vector.length !== expected) {
				throw new DimensionMismatchError(expected, input.vector.length);
			}
			return {
				id: input.id ?? randomUUID(),
				ownerId: input.ownerId,
				vector: [...input.vector],
				metadata: { ...input.metadata },
				createdAt: input.createdAt ?? new Date(),
			};
		});
	}

	private insertOne(doc: VectorDocument): void {
		if (this.idToSlot.has(doc.id)) this.remove(doc.id);
		if (this.dim === 0) this.dim = doc.vector.length;

		const level = this.levels.next();
		const node: GraphNode = {
			id: doc.id,
			ownerId: doc.ownerId,
			vector: doc.vector,
			metadata: doc.metadata,
			createdAt: doc.createdAt,
			level,
			...emptyLayers(level),
		};
		const slot = this.slots.length;

		if (this.entrySlot < 0) {
			this.slots.push(node);
			this.idToSlot.set(doc.id, slot);
			this.entrySlot = slot;
			this.topLevel = level;
			return;
		}

		let ep = this.entrySlot;
		for (let l = this.topLevel; l > level; l--) {
			ep = this.greedyClosest(node.vector, ep, l);
		}

		// no edge points at the new slot yet, so searches below cannot reach it
		this.slots.push(node);
		this.idToSlot.set(doc.id, slot);

		for (let l = Math.min(level, this.topLevel); l >= 0; l--) {
			const found = this.searchLayer(node.vector, [ep], this.params.efConstruction, l);
			for (const c of found.slice(0, this.params.m)) {
				node.neighbors[l].push(c.slot);
				this.nodeAt(c.slot).inbound[l].add(slot);
				this.addEdge(c.slot, slot, l);
			}
			if (found.length > 0) ep = found[0].slot;
		}

		if (level > this.topLevel) {
			this.entrySlot = slot;
			this.topLevel = level;
		}
	}

	private addEdge(from: number, to: number, layer: number): void {
		const node = this.nodeAt(from);
		const list = node.neighbors[layer];
		if (list.includes(to)) return;
		list.push(to);
		this.nodeAt(to).inbound[layer].add(from);
		if (list.length > this.params.mMax) this.prune(this.slots, from, layer);
	}

	/** Keeps the mMax closest out-edges of `slot` at `layer`. */
	private prune(slots: Arena, slot: number, layer: number): void {
		const node = slots[slot];
		if (!node) return;

		const ranked: Candidate[] = [];
		for (const s of node.neighbors[layer]) {
			const target = slots[s];
			if (target) ranked.push({ slot: s, dist: this.distance(node.vector, target.vector) });
		}
		ranked.sort(compareCandidates);

		const keep = ranked.slice(0, this.params.mMax);
		for (const c of ranked.slice(this.params.mMax)) {
			slots[c.slot]?.inbound[layer].delete(slot);
		}
		node.neighbors[layer] = keep.map((c) => c.slot);
	}

	/**
	 * Tops up the out-list of `slot` after it lost an edge, drawing on the
	 * removed node's former neighbors, closest first.
	 */
	private repair(slot: number, formerNeighbors: readonly number[], layer: number): void {
		const node = this.nodeAt(slot);
		if (node.neighbors[layer].length >= this.params.m) return;

		const pool: Candidate[] = [];
		for (const s of formerNeighbors) {
			const target = this.slots[s];
			if (!target || s === slot || node.neighbors[layer].includes(s)) continue;
			pool.push({ slot: s, dist: this.distance(node.vector, target.vector) });
		}
		pool.sort(compareCandidates);

		for (const c of pool) {
			if (node.neighbors[layer].length >= this.params.m) break;
			this.addEdge(slot, c.slot, layer);
		}
	}

	// --- search ---

	private nearest(query: Vector, ef: number): Candidate[] {
		let ep = this.entrySlot;
		for (let l = this.topLevel; l > 0; l--) {
			ep = this.greedyClosest(query, ep, l);
		}
		return this.searchLayer(query, [ep], ef, 0);
	}

	/** Moves to a strictly closer neighbor until none is closer. */
	private greedyClosest(query: Vector, start: number, layer: number): number {
		let current = start;
		let currentDist = this.distance(query, this.nodeAt(current).vector);

		while (true) {
			let best = current;
			let bestDist = currentDist;

			for (const s of this.nodeAt(current).neighbors[layer] ?? []) {
				const node = this.slots[s];
				if (!node) continue;
				const d = this.distance(query, node.vector);
				if (d < bestDist) {
					best = s;
					bestDist = d;
				}
			}

			if (best === current) return current;
			current = best;
			currentDist = bestDist;
		}
	}

	/**
	 * Beam search over one layer. Returns up to `ef` nodes ordered by
	 * (distance, slot).
	 */
	private searchLayer(
		query: Vector,
		entries: readonly number[],
		ef: number,
		layer: number,
	): Candidate[] {
		const visited = new Set<number>(entries);
		const candidates = new MinHeap();
		const results = new MaxHeap();

		for (const e of entries) {
			const node = this.slots[e];
			if (!node) continue;
			const c = { slot: e, dist: this.distance(query, node.vector) };
			candidates.push(c);
			results.push(c);
			if (results.size > ef) results.pop();
		}

		let current = candidates.pop();
		while (current !== undefined) {
			const worst = results.peek();
			if (worst !== undefined && results.size >= ef && current.dist > worst.dist) break;

			const layerList = this.slots[current.slot]?.neighbors[layer] ?? [];
			for (const s of layerList) {
				if (visited.has(s)) continue;
				visited.add(s);

				const node = this.slots[s];
				if (!node) continue;

				const c = { slot: s, dist: this.distance(query, node.vector) };
				const w = results.peek();
				if (results.size < ef || (w !== undefined && compareCandidates(c, w) < 0)) {
					candidates.push(c);
					results.push(c);
					if (results.size > ef) results.pop();
				}
			}

			current = candidates.pop();
		}

		return results.toSortedArray();
	}

	// --- housekeeping ---

	private nodeAt(slot: number): GraphNode {
		const node = this.slots[slot];
		if (!node) throw new Error(`HNSW graph corrupted: no node at slot ${slot}`);
		return node;
	}

	private toDocument(node: GraphNode): VectorDocument {
		return {
			id: node.id,
			ownerId: node.ownerId,
			vector: [...node.vector],
			metadata: { ...node.metadata },
			createdAt: node.createdAt,
		};
	}

	private maybeCompact(): void {
		const holes = this.slots.length - this.idToSlot.size;
		if (holes > COMPACT_MIN_HOLES && holes > this.idToSlot.size) this.compact();
	}

	/** Drops holes; slots are renumbered in their existing order. */
	private compact(): void {
		const remap = new Map<number, number>();
		const live: GraphNode[] = [];
		this.slots.forEach((node, slot) => {
			if (!node) return;
			remap.set(slot, live.length);
			live.push(node);
		});

		const moved = (s: number): number => {
			const to = remap.get(s);
			if (to === undefined) throw new Error(`HNSW graph corrupted: edge to empty slot ${s}`);
			return to;
		};

		for (const node of live) {
			for (let l = 0; l <= node.level; l++) {
				node.neighbors[l] = node.neighbors[l].map(moved);
				node.inbound[l] = new Set(Array.from(node.inbound[l], moved));
			}
		}

		const holes = this.slots.length - live.length;
		this.slots = live;
		this.idToSlot = new Map(live.map((node, slot) => [node.id, slot]));
		this.entrySlot = this.entrySlot < 0 ? -1 : moved(this.entrySlot);
		this.logger?.debug({ holes, live: live.length }, "graph compacted");
	}
}
