// src/utils/atomic.ts
import fs from "fs/promises";
import path from "path";

function errorCode(e: unknown): string {
	if (typeof e === "object" && e !== null && "code" in e) {
		return String(e.code);
	}
	return "";
}

// Windows: antivirus/indexers briefly hold freshly written files
function isRetryableWinError(e: unknown): boolean {
	const code = errorCode(e);
	return (
		code === "EPERM" ||
		code === "EBUSY" ||
		code === "ENOENT" ||
		code === "EACCES"
	);
}

// filesystems that cannot fsync a directory handle
function isUnsupportedSyncError(e: unknown): boolean {
	const code = errorCode(e);
	return code === "EINVAL" || code === "ENOTSUP" || code === "EISDIR" || code === "EPERM";
}

async function delay(ms: number): Promise<void> {
	return new Promise((r) => setTimeout(r, ms));
}

export function makeUniqueTmpPath(finalPath: string): string {
	return (
		`${finalPath}.tmp-` +
		`${process.pid}-` +
		`${Date.now()}-` +
		Math.random().toString(16).slice(2)
	);
}

export interface AtomicWriteOptions {
	retries?: number;
	retryDelayMs?: number;
}

/**
 * atomicWriteFile:
 * 1) write to unique tmp in same dir
 * 2) fsync tmp
 * 3) rename tmp -> target (atomic on same volume)
 * 4) fsync directory on non-win
 *
 * Readers see either the old file or the new one, never a partial write.
 */
export async function atomicWriteFile(
	targetPath: string,
	data: string | Uint8Array,
	opts: AtomicWriteOptions = {},
): Promise<void> {
	const retries = opts.retries ?? 12;
	const retryDelayMs = opts.retryDelayMs ?? 20;

	const dir = path.dirname(targetPath);
	await fs.mkdir(dir, { recursive: true });

	const tmpPath = makeUniqueTmpPath(targetPath);

	try {
		const fh = await fs.open(tmpPath, "w");
		try {
			await fh.writeFile(data);
			await fh.sync();
		} finally {
			await fh.close();
		}

		for (let i = 0; ; i++) {
			try {
				await fs.rename(tmpPath, targetPath);
				break;
			} catch (e) {
				if (process.platform === "win32" && isRetryableWinError(e) && i < retries) {
					await delay(retryDelayMs);
					continue;
				}
				throw e;
			}
		}
	} catch (e) {
		await fs.rm(tmpPath, { force: true });
		throw e;
	}

	if (process.platform !== "win32") {
		const dirHandle = await fs.open(dir, "r");
		try {
			await dirHandle.sync();
		} catch (e) {
			if (!isUnsupportedSyncError(e)) throw e;
		} finally {
			await dirHandle.close();
		}
	}
}
