// src/vector-index.ts
import path from "path";
import type { Logger } from "pino";

import { resolveIndexConfig } from "./config";
import { HnswGraph } from "./core/hnsw-graph";
import { createSeededRandom } from "./core/random";
import { InvalidParameterError, NotFoundError, wrapPersistenceError } from "./errors";
import { readSnapshot, snapshotExists, writeSnapshot } from "./storage/snapshot";
import type {
	AddOptions,
	IndexOpenOptions,
	IndexStats,
	RemoveManyResult,
	ResolvedIndexConfig,
	SearchQuery,
	SearchResult,
	VectorDocument,
	VectorDocumentInput,
} from "./types";
import { createLogger } from "./utils/logger";
import { RwLock } from "./utils/locks";

export const DEFAULT_SEARCH_LIMIT = 10;

/**
 * Thread-safe façade over one HnswGraph.
 *
 * Searches and reads share the lock; anything that mutates the graph (or
 * replaces it, like load) takes it exclusively.
 */
export class VectorIndex {
	readonly config: ResolvedIndexConfig;

	private readonly graph: HnswGraph;
	private readonly lock = new RwLock();
	private readonly log: Logger;
	private dirty = false;
	private closed = false;

	constructor(opts: IndexOpenOptions = {}, env?: Record<string, string | undefined>) {
		this.config = resolveIndexConfig(opts, env);
		this.log = opts.logger ?? createLogger({ level: this.config.logLevel });

		const { mode, seed, snapshotPath, logLevel, ...params } = this.config;
		this.graph = new HnswGraph({
			...params,
			random: seed === undefined ? undefined : createSeededRandom(seed),
			logger: this.log,
		});
		this.log.debug({ mode, seed, snapshotPath, logLevel, ...params }, "index configured");
	}

	/**
	 * Creates an index and, when a snapshot path is configured and the file
	 * exists, loads it.
	 */
	static async open(
		opts: IndexOpenOptions = {},
		env?: Record<string, string | undefined>,
	): Promise<VectorIndex> {
		const index = new VectorIndex(opts, env);
		const file = index.config.snapshotPath;
		if (file && (await snapshotExists(file))) {
			await index.load(file);
		}
		return index;
	}

	get size(): number {
		return this.graph.size;
	}

	get dimension(): number {
		return this.graph.dimension;
	}

	async insert(doc: VectorDocumentInput): Promise<VectorDocument> {
		const [added] = await this.add([doc]);
		return added;
	}

	/**
	 * Inserts all documents or none: a bad vector rejects the whole batch.
	 * A throwing `onProgress` does not stop the batch; see HnswGraph.add.
	 */
	async add(
		docs: readonly VectorDocumentInput[],
		opts: AddOptions = {},
	): Promise<VectorDocument[]> {
		return this.lock.write(() => {
			this.assertOpen();
			const added = this.graph.add(docs, {
				onProgress: (done, total) => {
					// called once per inserted document, so the graph has changed
					this.dirty = true;
					opts.onProgress?.(done, total);
				},
			});
			if (added.length > 0) {
				this.log.debug({ count: added.length, total: this.graph.size }, "documents added");
			}
			return added;
		});
	}

	async remove(id: string): Promise<boolean> {
		return this.lock.write(() => {
			this.assertOpen();
			const removed = this.graph.remove(id);
			if (removed) {
				this.dirty = true;
				this.log.debug({ id }, "document removed");
			}
			return removed;
		});
	}

	async removeMany(ids: readonly string[]): Promise<RemoveManyResult> {
		return this.lock.write(() => {
			this.assertOpen();
			let removed = 0;
			for (const id of ids) if (this.graph.remove(id)) removed++;
			if (removed > 0) this.dirty = true;
			this.log.debug({ removed, missing: ids.length - removed }, "documents removed");
			return { removed, missing: ids.length - removed };
		});
	}

	async search(
		vector: readonly number[],
		limit: number = DEFAULT_SEARCH_LIMIT,
	): Promise<SearchResult[]> {
		return this.lock.read(() => {
			this.assertOpen();
			return this.graph.search(vector, limit);
		});
	}

	/** Runs every query against the same state of the graph. */
	async searchMany(queries: readonly SearchQuery[]): Promise<SearchResult[][]> {
		return this.lock.read(() => {
			this.assertOpen();
			return queries.map((q) => this.graph.search(q.vector, q.limit ?? DEFAULT_SEARCH_LIMIT));
		});
	}

	async getDocument(id: string): Promise<VectorDocument> {
		return this.lock.read(() => {
			this.assertOpen();
			const doc = this.graph.get(id);
			if (!doc) throw new NotFoundError(id);
			return doc;
		});
	}

	has(id: string): boolean {
		this.assertOpen();
		return this.graph.has(id);
	}

	async save(filePath?: string): Promise<void> {
		const target = this.targetPath(filePath);
		await this.lock.read(async () => {
			this.assertOpen();
			await writeSnapshot(target, this.graph.toSnapshot());
			// no writer runs while the read lock is held
			if (path.resolve(target) === this.config.snapshotPath) this.dirty = false;
			this.log.info({ path: target, count: this.graph.size }, "snapshot saved");
		});
	}

	/** Replaces the whole index with the snapshot; on failure nothing changes. */
	async load(filePath?: string): Promise<void> {
		const target = this.targetPath(filePath);
		await this.lock.write(async () => {
			this.assertOpen();
			const records = await readSnapshot(target);
			try {
				this.graph.restore(records);
			} catch (e) {
				// schema-valid but inconsistent (mixed dimensions, duplicate ids)
				throw wrapPersistenceError(e, target, "Snapshot load");
			}
			this.dirty = false;
			this.log.info({ path: target, count: this.graph.size }, "snapshot loaded");
		});
	}

	async rebuild(): Promise<void> {
		await this.lock.write(() => {
			this.assertOpen();
			const started = Date.now();
			this.graph.rebuild();
			this.dirty = true;
			this.log.info(
				{ count: this.graph.size, ms: Date.now() - started },
				"index rebuilt",
			);
		});
	}

	async clear(): Promise<void> {
		await this.lock.write(() => {
			this.assertOpen();
			this.graph.clear();
			this.dirty = true;
			this.log.debug("index cleared");
		});
	}

	getStats(): IndexStats {
		this.assertOpen();
		return this.graph.getStats();
	}

	/** Saves unsaved changes to the configured snapshot, then refuses further calls. */
	async close(): Promise<void> {
		await this.lock.write(async () => {
			if (this.closed) return;
			const file = this.config.snapshotPath;
			if (this.dirty && file) {
				await writeSnapshot(file, this.graph.toSnapshot());
				this.log.info({ path: file, count: this.graph.size }, "snapshot saved on close");
			}
			this.dirty = false;
			this.closed = true;
		});
	}

	private targetPath(filePath?: string): string {
		const target = filePath ?? this.config.snapshotPath;
		if (!target) {
			throw new InvalidParameterError("path", "no snapshot path given or configured");
		}
		return target;
	}

	private assertOpen(): void {
		if (this.closed) throw new InvalidParameterError("index", "index is closed");
	}
}
