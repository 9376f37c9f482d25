// src/utils/locks.ts

/**
 * Promise-chain reader/writer lock.
 *
 * Readers run concurrently with each other; a writer waits for every reader
 * and writer queued before it, and everything queued after a writer waits for
 * that writer. Order of arrival is kept, so a stream of readers cannot starve
 * a writer.
 */
export class RwLock {
	private writeTail: Promise<void> = Promise.resolve();
	private readonly activeReads = new Set<Promise<void>>();

	async read<T>(fn: () => Promise<T> | T): Promise<T> {
		const gate = this.writeTail;

		let release!: () => void;
		const done = new Promise<void>((r) => (release = r));
		this.activeReads.add(done);

		try {
			await gate;
			return await fn();
		} finally {
			this.activeReads.delete(done);
			release();
		}
	}

	async write<T>(fn: () => Promise<T> | T): Promise<T> {
		const gate = Promise.all([this.writeTail, ...this.activeReads]);

		let release!: () => void;
		this.writeTail = new Promise<void>((r) => (release = r));

		try {
			await gate;
			return await fn();
		} finally {
			release();
		}
	}
}
