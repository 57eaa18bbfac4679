import { config as loadEnv } from "dotenv";
import { z } from "zod";

loadEnv();

const positiveInt = (fallback: number) =>
    z.preprocess(
        (value) => (value === undefined || value === "" ? undefined : Number(value)),
        z.number().int().min(1).default(fallback)
    );

const envSchema = z
    .object({
        MODEL_BUNDLE_PATH: z.string().min(1).optional(),
        SIMILARITY_TOP_K: positiveInt(5),
        MAX_BATCH_SIZE: positiveInt(5000),
        LOG_LEVEL: z
            .enum(["debug", "info", "warn", "error", "silent"])
            .optional(),
        NODE_ENV: z.string().optional()
    })
    .passthrough();

const parsed = envSchema.parse(process.env);

export const env = {
    modelBundlePath: parsed.MODEL_BUNDLE_PATH ?? "models/customer-genome.json",
    similarityTopK: parsed.SIMILARITY_TOP_K,
    maxBatchSize: parsed.MAX_BATCH_SIZE,
    logLevel: parsed.LOG_LEVEL ?? "info",
    nodeEnv: parsed.NODE_ENV ?? "development"
};

export type Env = typeof env;
