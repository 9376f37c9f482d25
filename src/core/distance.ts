// src/core/distance.ts

import type { DistanceMetric } from "../types";

export type Vector = readonly number[];
export type DistanceFn = (a: Vector, b: Vector) => number;

/**
 * Squared L2 distance. Skipping the square root keeps the nearest-neighbor
 * ordering intact. Only the common prefix of the two vectors is compared.
 */
export function squaredEuclidean(a: Vector, b: Vector): number {
	const n = Math.min(a.length, b.length);
	let s = 0;
	for (let i = 0; i < n; i++) {
		const d = a[i] - b[i];
		s += d * d;
	}
	return s;
}

export function cosineSimilarity(a: Vector, b: Vector): number {
	const n = Math.min(a.length, b.length);
	let dot = 0;
	let normA = 0;
	let normB = 0;
	for (let i = 0; i < n; i++) {
		dot += a[i] * b[i];
		normA += a[i] * a[i];
		normB += b[i] * b[i];
	}
	const denom = Math.sqrt(normA) * Math.sqrt(normB);
	return denom === 0 ? 0 : dot / denom;
}

/** 1 - cosine similarity, in [0, 2]. */
export function cosineDistance(a: Vector, b: Vector): number {
	return Math.max(0, 1 - cosineSimilarity(a, b));
}

export function distanceFor(metric: DistanceMetric): DistanceFn {
	switch (metric) {
		case "cosine":
			return cosineDistance;
		case "l2":
		default:
			return squaredEuclidean;
	}
}

/** Maps a distance onto (0, 1]; 0 → 1, monotonically decreasing. */
export function toSimilarity(distance: number): number {
	return 1 / (1 + distance);
}
