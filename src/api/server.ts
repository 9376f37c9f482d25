// src/api/server.ts
import Fastify, { type FastifyError, type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import { z } from "zod";

import { loadEnvFile } from "../config";
import {
	InvalidParameterError,
	isVectorIndexError,
	type VectorIndexErrorCode,
} from "../errors";
import { VectorIndex, DEFAULT_SEARCH_LIMIT } from "../vector-index";

const vectorSchema = z.array(z.number().finite()).min(1);
const limitSchema = z.number().int().min(0).default(DEFAULT_SEARCH_LIMIT);

const documentSchema = z.object({
	id: z.string().min(1).optional(),
	ownerId: z.string(),
	vector: vectorSchema,
	metadata: z.record(z.string()).optional(),
	createdAt: z
		.string()
		.datetime({ offset: true })
		.transform((s) => new Date(s))
		.optional(),
});

const addBodySchema = z.object({ documents: z.array(documentSchema).min(1) });
const searchBodySchema = z.object({ vector: vectorSchema, limit: limitSchema });
const batchBodySchema = z.object({
	queries: z.array(z.object({ vector: vectorSchema, limit: limitSchema })),
});

function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
	const parsed = schema.safeParse(body);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const field = issue.path.length ? issue.path.join(".") : "body";
		throw new InvalidParameterError(field, issue.message);
	}
	return parsed.data;
}

const STATUS_BY_CODE: Record<VectorIndexErrorCode, number> = {
	INVALID_PARAMETER: 400,
	DIMENSION_MISMATCH: 400,
	NOT_FOUND: 404,
	EMPTY_INDEX: 409,
	PERSISTENCE: 500,
};

export interface ServerOptions {
	logLevel?: string;
}

/** Routes over an already opened index. The caller owns the index lifecycle. */
export async function buildServer(
	index: VectorIndex,
	opts: ServerOptions = {},
): Promise<FastifyInstance> {
	const server = Fastify({
		logger: { level: opts.logLevel ?? "info" },
		// shorter keep-alive so close() does not wait on idle sockets
		keepAliveTimeout: 1_000,
		connectionTimeout: 1_000,
	});

	await server.register(cors, { origin: true });

	server.setErrorHandler((error: FastifyError, request, reply) => {
		if (isVectorIndexError(error)) {
			const status = STATUS_BY_CODE[error.code];
			if (status >= 500) request.log.error(error);
			return reply.code(status).send({ error: error.message, code: error.code });
		}
		// body parser errors and the like carry their own 4xx
		const status = error.statusCode ?? 500;
		if (status >= 500) request.log.error(error);
		return reply.code(status).send({ error: error.message });
	});

	server.post("/documents", async (request) => {
		const { documents } = parseBody(addBodySchema, request.body);
		const added = await index.add(documents);
		return { added: added.length, ids: added.map((d) => d.id) };
	});

	server.get<{ Params: { id: string } }>("/documents/:id", async (request) => {
		return index.getDocument(request.params.id);
	});

	server.delete<{ Params: { id: string } }>("/documents/:id", async (request) => {
		return { removed: await index.remove(request.params.id) };
	});

	server.post("/search", async (request) => {
		const { vector, limit } = parseBody(searchBodySchema, request.body);
		return { results: await index.search(vector, limit) };
	});

	server.post("/search/batch", async (request) => {
		const { queries } = parseBody(batchBodySchema, request.body);
		return { results: await index.searchMany(queries) };
	});

	server.post("/save", async () => {
		await index.save();
		return { status: "saved" };
	});

	server.post("/load", async () => {
		await index.load();
		return { status: "loaded" };
	});

	server.get("/stats", async () => index.getStats());

	return server;
}

/** Process entry: .env, open the index, listen, shut down on signals. */
export async function startServer(): Promise<FastifyInstance> {
	loadEnvFile();

	const index = await VectorIndex.open();
	const server = await buildServer(index, { logLevel: index.config.logLevel });

	server.addHook("onClose", async () => {
		await index.close();
	});

	let shuttingDown = false;
	const shutdown = (signal: string): void => {
		if (shuttingDown) return;
		shuttingDown = true;
		server.log.info({ signal }, "shutting down");
		server.close().then(
			() => process.exit(0),
			(err: unknown) => {
				server.log.error(err, "shutdown failed");
				process.exit(1);
			},
		);
	};
	process.on("SIGINT", () => shutdown("SIGINT"));
	process.on("SIGTERM", () => shutdown("SIGTERM"));

	const port = parseInt(process.env.API_PORT || "3000", 10);
	const host = process.env.API_HOST || "127.0.0.1";
	await server.listen({ port, host });
	return server;
}

if (require.main === module) {
	startServer().catch((err: unknown) => {
		console.error(err);
		process.exit(1);
	});
}
