// src/core/heap.ts
// Binary heaps over (slot, distance) pairs for the layer search.

export interface Candidate {
	slot: number;
	dist: number;
}

/** Orders by distance, then slot, so equal distances resolve by insertion order. */
export function compareCandidates(a: Candidate, b: Candidate): number {
	return a.dist - b.dist || a.slot - b.slot;
}

class BinaryHeap {
	private readonly items: Candidate[] = [];

	/** `before(a, b)` is true when a belongs closer to the root than b. */
	constructor(private readonly before: (a: Candidate, b: Candidate) => boolean) {}

	get size(): number {
		return this.items.length;
	}

	peek(): Candidate | undefined {
		return this.items[0];
	}

	push(c: Candidate): void {
		const items = this.items;
		let i = items.length;
		items.push(c);
		while (i > 0) {
			const p = (i - 1) >> 1;
			if (!this.before(c, items[p])) break;
			items[i] = items[p];
			i = p;
		}
		items[i] = c;
	}

	pop(): Candidate | undefined {
		const items = this.items;
		const root = items[0];
		const last = items.pop();
		if (root === undefined || last === undefined || items.length === 0) {
			return root;
		}

		const size = items.length;
		let i = 0;
		while (true) {
			const l = (i << 1) + 1;
			if (l >= size) break;
			const r = l + 1;
			const c = r < size && this.before(items[r], items[l]) ? r : l;
			if (!this.before(items[c], last)) break;
			items[i] = items[c];
			i = c;
		}
		items[i] = last;
		return root;
	}

	toSortedArray(): Candidate[] {
		return [...this.items].sort(compareCandidates);
	}
}

/** Closest at the root. */
export class MinHeap extends BinaryHeap {
	constructor() {
		super((a, b) => compareCandidates(a, b) < 0);
	}
}

/** Farthest at the root; used to hold the current best `ef` results. */
export class MaxHeap extends BinaryHeap {
	constructor() {
		super((a, b) => compareCandidates(a, b) > 0);
	}
}
