// src/config.ts
import path from "path";
import dotenv from "dotenv";
import { z } from "zod";

import { DEFAULT_LEVEL_FACTOR } from "./core/random";
import { InvalidParameterError } from "./errors";
import type {
	DistanceMetric,
	GraphParams,
	IndexOpenOptions,
	ModePreset,
	ResolvedIndexConfig,
} from "./types";

/** Largest layer count a graph may be configured with. */
export const MAX_LEVEL_LIMIT = 64;

export const DEFAULT_GRAPH_PARAMS: GraphParams = {
	maxLevel: 16,
	m: 16,
	mMax: 32,
	efConstruction: 200,
	efSearch: 100,
	metric: "l2",
	levelFactor: DEFAULT_LEVEL_FACTOR,
};

type PresetParams = Pick<GraphParams, "m" | "mMax" | "efConstruction" | "efSearch">;

function resolvePreset(mode: ModePreset): PresetParams {
	switch (mode) {
		case "fast":
			return { m: 12, mMax: 24, efConstruction: 100, efSearch: 50 };
		case "accurate":
			return { m: 24, mMax: 48, efConstruction: 400, efSearch: 200 };
		case "balanced":
		default:
			return {
				m: DEFAULT_GRAPH_PARAMS.m,
				mMax: DEFAULT_GRAPH_PARAMS.mMax,
				efConstruction: DEFAULT_GRAPH_PARAMS.efConstruction,
				efSearch: DEFAULT_GRAPH_PARAMS.efSearch,
			};
	}
}

const positiveInt = z.number().int().min(1);

const graphParamsSchema = z
	.object({
		maxLevel: z.number().int().min(0).max(MAX_LEVEL_LIMIT),
		m: positiveInt,
		mMax: positiveInt,
		efConstruction: positiveInt,
		efSearch: positiveInt,
		metric: z.enum(["l2", "cosine"]),
		levelFactor: z.number().finite().positive(),
	})
	.superRefine((p, ctx) => {
		if (p.mMax < p.m) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["mMax"],
				message: `must be >= m (${p.m})`,
			});
		}
		if (p.efConstruction < p.m) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["efConstruction"],
				message: `must be >= m (${p.m})`,
			});
		}
	});

function toInvalidParameter(error: z.ZodError): InvalidParameterError {
	const issue = error.issues[0];
	const field = issue.path.length ? issue.path.join(".") : "config";
	return new InvalidParameterError(field, issue.message);
}

function fillParams(o: Partial<GraphParams>, base: GraphParams): GraphParams {
	return {
		maxLevel: o.maxLevel ?? base.maxLevel,
		m: o.m ?? base.m,
		mMax: o.mMax ?? base.mMax,
		efConstruction: o.efConstruction ?? base.efConstruction,
		efSearch: o.efSearch ?? base.efSearch,
		metric: o.metric ?? base.metric,
		levelFactor: o.levelFactor ?? base.levelFactor,
	};
}

/** Fills defaults and checks every structural constant. */
export function validateGraphParams(
	overrides: Partial<GraphParams> = {},
): GraphParams {
	const parsed = graphParamsSchema.safeParse(
		fillParams(overrides, DEFAULT_GRAPH_PARAMS),
	);
	if (!parsed.success) throw toInvalidParameter(parsed.error);
	return parsed.data;
}

type Env = Record<string, string | undefined>;

/** Unset or blank → undefined; anything else must parse as a number. */
function numEnv(env: Env, name: string): number | undefined {
	const raw = env[name];
	if (raw === undefined || raw.trim() === "") return undefined;
	const v = Number(raw);
	if (!Number.isFinite(v)) {
		throw new InvalidParameterError(name, `expected a number, got "${raw}"`);
	}
	return v;
}

function enumEnv<T extends string>(
	env: Env,
	name: string,
	allowed: readonly T[],
): T | undefined {
	const raw = env[name];
	if (raw === undefined || raw.trim() === "") return undefined;
	const found = allowed.find((a) => a === raw.trim());
	if (!found) {
		throw new InvalidParameterError(
			name,
			`expected one of ${allowed.join(", ")}, got "${raw}"`,
		);
	}
	return found;
}

const MODES: readonly ModePreset[] = ["fast", "balanced", "accurate"];
const METRICS: readonly DistanceMetric[] = ["l2", "cosine"];

/**
 * Options win over the environment, the environment over the preset.
 */
export function resolveIndexConfig(
	opts: IndexOpenOptions = {},
	env: Env = process.env,
): ResolvedIndexConfig {
	const mode = opts.mode ?? enumEnv(env, "VECTOR_INDEX_MODE", MODES) ?? "balanced";
	const preset = resolvePreset(mode);

	const fromEnv: Partial<GraphParams> = {
		m: numEnv(env, "HNSW_M"),
		mMax: numEnv(env, "HNSW_M_MAX"),
		efConstruction: numEnv(env, "HNSW_EF"),
		efSearch: numEnv(env, "HNSW_EF_SEARCH"),
		maxLevel: numEnv(env, "HNSW_MAX_LEVEL"),
		metric: enumEnv(env, "HNSW_METRIC", METRICS),
	};
	const base = fillParams(fromEnv, { ...DEFAULT_GRAPH_PARAMS, ...preset });
	const params = validateGraphParams(fillParams(opts, base));

	const seed = opts.seed ?? numEnv(env, "HNSW_SEED");
	if (seed !== undefined && !Number.isInteger(seed)) {
		throw new InvalidParameterError("seed", "must be an integer");
	}

	const snapshotPath = opts.snapshotPath ?? env.VECTOR_INDEX_PATH;

	return {
		...params,
		mode,
		seed,
		snapshotPath: snapshotPath ? path.resolve(snapshotPath) : undefined,
		logLevel: opts.logLevel ?? env.LOG_LEVEL ?? "info",
	};
}

/** Loads `.env` into process.env; variables already set are kept. */
export function loadEnvFile(file = path.join(process.cwd(), ".env")): void {
	dotenv.config({ path: file });
}
