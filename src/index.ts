// src/index.ts
export { VectorIndex, DEFAULT_SEARCH_LIMIT } from "./vector-index";
export { HnswGraph } from "./core/hnsw-graph";
export {
	cosineDistance,
	cosineSimilarity,
	distanceFor,
	squaredEuclidean,
	toSimilarity,
} from "./core/distance";
export type { DistanceFn, Vector } from "./core/distance";
export {
	createSeededRandom,
	DEFAULT_LEVEL_FACTOR,
	LevelGenerator,
} from "./core/random";
export type { RandomSource } from "./core/random";
export {
	DEFAULT_GRAPH_PARAMS,
	MAX_LEVEL_LIMIT,
	loadEnvFile,
	resolveIndexConfig,
	validateGraphParams,
} from "./config";
export {
	decodeSnapshot,
	encodeSnapshot,
	readSnapshot,
	writeSnapshot,
} from "./storage/snapshot";
export * from "./errors";
export * from "./types";
export { createLogger } from "./utils/logger";
export { buildServer, startServer } from "./api/server";
