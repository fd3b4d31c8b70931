import { existsSync } from "node:fs";
import path from "node:path";
import { config } from "dotenv";
import { expand } from "dotenv-expand";
import { z } from "zod";

// Load .env from the root of the monorepo if not already provided by environment
if (!process.env.DATABASE_URL) {
	const possiblePaths = [
		path.resolve(__dirname, "../../../.env"),
		path.resolve(process.cwd(), ".env"),
		path.resolve(process.cwd(), "../../.env"),
	];

	const envPath = possiblePaths.find((p) => existsSync(p));

	if (envPath) {
		expand(config({ path: envPath }));
	}
}

const booleanFlag = z
	.enum(["true", "false", "1", "0"])
	.default("false")
	.transform((value) => value === "true" || value === "1");

const unitInterval = z.coerce.number().min(0).max(1);

export const envSchema = z.object({
	NODE_ENV: z
		.enum(["development", "test", "production"])
		.default("development"),
	PORT: z.coerce.number().int().positive().default(4000),
	DATABASE_URL: z
		.string()
		.url()
		.default("postgres://localhost:5432/scene_search"),

	AUTH_SECRET: z.string().default(""),
	ENABLE_AUTH: z.enum(["true", "false"]).default("true"),

	GEMINI_API_KEY: z.string().default(""),
	ENABLE_GEMINI: booleanFlag,
	GEMINI_EMBEDDING_MODEL: z.string().default("models/text-embedding-004"),

	VISUAL_MODE: z.enum(["recall", "rerank", "auto", "skip"]).default("auto"),
	MULTI_DENSE_ENABLED: booleanFlag,
	WEIGHT_TRANSCRIPT: unitInterval.default(0.45),
	WEIGHT_SUMMARY: unitInterval.default(0.15),
	WEIGHT_LEXICAL: unitInterval.default(0.15),
	WEIGHT_VISUAL: unitInterval.default(0.25),

	RERANK_CANDIDATE_POOL_SIZE: z.coerce.number().int().min(1).default(500),
	RERANK_CLIP_WEIGHT: unitInterval.default(0.3),
	RERANK_MIN_SCORE_RANGE: unitInterval.default(0.05),

	FUSION_METHOD: z.enum(["weighted", "rrf"]).default("weighted"),
	RRF_K: z.coerce.number().int().min(1).default(60),

	CLIP_SERVICE_URL: z.string().default(""),
	CLIP_SERVICE_SECRET: z.string().default(""),
	CLIP_TEXT_EMBEDDING_TIMEOUT_S: z.coerce.number().positive().default(1.5),
	CLIP_TEXT_EMBEDDING_MAX_RETRIES: z.coerce.number().int().min(0).default(1),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
	const parsed = envSchema.safeParse(source);

	if (!parsed.success) {
		const errorMessage = `❌ Invalid environment variables: ${JSON.stringify(parsed.error.format(), null, 2)}`;
		console.error(errorMessage);
		throw new Error(errorMessage);
	}

	return parsed.data;
}

export const env = parseEnv(process.env);
