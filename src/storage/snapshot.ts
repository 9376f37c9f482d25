// src/storage/snapshot.ts
import fs from "fs/promises";
import { z } from "zod";

import { PersistenceError, wrapPersistenceError } from "../errors";
import type { SnapshotNode } from "../types";
import { atomicWriteFile } from "../utils/atomic";

const snapshotNodeSchema = z
	.object({
		id: z.string().min(1),
		documentId: z.string().min(1),
		ownerId: z.string(),
		vector: z.array(z.number().finite()).min(1),
		neighbors: z.array(z.array(z.string())),
		metadata: z.record(z.string()),
		createdAt: z.string().datetime({ offset: true }),
	})
	.refine((n) => n.documentId === n.id, {
		message: "documentId must equal id",
		path: ["documentId"],
	});

const snapshotSchema = z.array(snapshotNodeSchema);

/** Snapshot file body: a JSON array of nodes in insertion order. */
export function encodeSnapshot(nodes: readonly SnapshotNode[]): string {
	return JSON.stringify(nodes);
}

export function decodeSnapshot(text: string, source = "<memory>"): SnapshotNode[] {
	let raw: unknown;
	try {
		raw = JSON.parse(text);
	} catch (e) {
		throw wrapPersistenceError(e, source, "Snapshot decode");
	}

	const parsed = snapshotSchema.safeParse(raw);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const where = issue.path.length ? issue.path.join(".") : "snapshot";
		throw new PersistenceError(source, `Snapshot decode failed: ${where}: ${issue.message}`, {
			cause: parsed.error,
		});
	}
	return parsed.data;
}

export async function writeSnapshot(
	filePath: string,
	nodes: readonly SnapshotNode[],
): Promise<void> {
	try {
		await atomicWriteFile(filePath, encodeSnapshot(nodes));
	} catch (e) {
		throw wrapPersistenceError(e, filePath, "Snapshot save");
	}
}

export async function readSnapshot(filePath: string): Promise<SnapshotNode[]> {
	let text: string;
	try {
		text = await fs.readFile(filePath, "utf8");
	} catch (e) {
		throw wrapPersistenceError(e, filePath, "Snapshot load");
	}
	return decodeSnapshot(text, filePath);
}

export async function snapshotExists(filePath: string): Promise<boolean> {
	try {
		await fs.access(filePath);
		return true;
	} catch (e) {
		if (typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT") {
			return false;
		}
		throw wrapPersistenceError(e, filePath, "Snapshot lookup");
	}
}
