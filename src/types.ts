// src/types.ts
import type { Logger } from "pino";
import type { RandomSource } from "./core/random";

export type ModePreset = "fast" | "balanced" | "accurate";
export type DistanceMetric = "l2" | "cosine";
export type Metadata = Record<string, string>;

/** What a caller hands to `add`; id and createdAt are filled in when absent. */
export interface VectorDocumentInput {
	id?: string;
	ownerId: string;
	vector: readonly number[];
	metadata?: Metadata;
	createdAt?: Date;
}

export interface VectorDocument {
	readonly id: string;
	readonly ownerId: string;
	readonly vector: readonly number[];
	readonly metadata: Readonly<Metadata>;
	readonly createdAt: Date;
}

export interface SearchResult {
	/** Fresh per result. */
	id: string;
	documentId: string;
	ownerId: string;
	/** 1 / (1 + distance), in (0, 1]. */
	similarity: number;
	distance: number;
	metadata: Metadata;
}

export interface SearchQuery {
	vector: readonly number[];
	limit?: number;
}

export interface IndexStats {
	documentCount: number;
	vectorDimension: number;
	/** Estimated bytes. */
	memoryUsage: number;
	/** Seconds since the graph was constructed. */
	buildTime: number;
}

export interface GraphParams {
	maxLevel: number;
	m: number;
	mMax: number;
	efConstruction: number;
	efSearch: number;
	metric: DistanceMetric;
	levelFactor: number;
}

export interface GraphOptions extends Partial<GraphParams> {
	random?: RandomSource;
	/** Milliseconds clock, used for buildTime. */
	now?: () => number;
	logger?: Logger;
}

export interface AddOptions {
	onProgress?: (done: number, total: number) => void;
}

export interface RemoveManyResult {
	removed: number;
	missing: number;
}

export interface IndexOpenOptions extends Partial<GraphParams> {
	mode?: ModePreset;
	seed?: number;
	/** Default location for save()/load(); loaded by open() when it exists. */
	snapshotPath?: string;
	logLevel?: string;
	logger?: Logger;
}

export type ResolvedIndexConfig = GraphParams & {
	mode: ModePreset;
	seed?: number;
	snapshotPath?: string;
	logLevel: string;
};

/** One record of the persisted snapshot array. */
export interface SnapshotNode {
	id: string;
	documentId: string;
	ownerId: string;
	vector: number[];
	neighbors: string[][];
	metadata: Metadata;
	createdAt: string;
}
