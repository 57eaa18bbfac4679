import { promises as fs } from "fs";
import path from "path";
import { z } from "zod";
import { ModelBundleError } from "../../../utils/error";
import {
  LinearRegression,
  LogisticClassifier,
  MinMaxScaler,
  ModelBundle,
  NearestCentroidPartition,
  StandardScaler
} from "./models";
import { FEATURE_KEYS } from "./types";

const DIMENSION = FEATURE_KEYS.length;

const vectorSchema = z.array(z.number().finite()).length(DIMENSION);

const nonZeroVectorSchema = vectorSchema.refine(
  (values) => values.every((value) => value !== 0),
  { message: "scale entries must be non-zero" }
);

const scalerSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("standard"),
    mean: vectorSchema,
    scale: nonZeroVectorSchema
  }),
  z.object({
    kind: z.literal("min_max"),
    min: vectorSchema,
    scale: nonZeroVectorSchema
  })
]);

const partitionSchema = z.object({
  kind: z.literal("nearest_centroid"),
  centroids: z.array(vectorSchema).min(1)
});

const linearSchema = z.object({
  kind: z.literal("linear"),
  coefficients: vectorSchema,
  intercept: z.number().finite()
});

const logisticSchema = z.object({
  kind: z.literal("logistic"),
  coefficients: vectorSchema,
  intercept: z.number().finite()
});

const bundleSchema = z.object({
  version: z.string().min(1),
  trained_at: z.string().optional(),
  features: z.array(z.string()).superRefine((features, ctx) => {
    const expected = FEATURE_KEYS.join(",");
    if (features.join(",") !== expected) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `feature order must be exactly [${expected}]`
      });
    }
  }),
  scaler: scalerSchema,
  partition: partitionSchema,
  regression: linearSchema,
  classifier: logisticSchema
});

export type ModelBundleDocument = z.infer<typeof bundleSchema>;

/** Validates a parsed bundle document and builds frozen model objects from it. */
export function parseModelBundle(document: unknown): ModelBundle {
  const parsed = bundleSchema.safeParse(document);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new ModelBundleError(`Invalid model bundle: ${issues.join("; ")}`, {
      issues
    });
  }

  const { version, trained_at, scaler, partition, regression, classifier } =
    parsed.data;

  return Object.freeze({
    version,
    trainedAt: trained_at,
    scaler:
      scaler.kind === "standard"
        ? new StandardScaler(scaler.mean, scaler.scale)
        : new MinMaxScaler(scaler.min, scaler.scale),
    partition: new NearestCentroidPartition(partition.centroids),
    regression: new LinearRegression(regression.coefficients, regression.intercept),
    classifier: new LogisticClassifier(classifier.coefficients, classifier.intercept)
  });
}

export async function loadModelBundle(bundlePath: string): Promise<ModelBundle> {
  const resolved = path.resolve(process.cwd(), bundlePath);
  let content: string;
  try {
    content = await fs.readFile(resolved, "utf-8");
  } catch (error) {
    throw new ModelBundleError(`Unable to read model bundle at ${resolved}`, {
      path: resolved,
      cause: error instanceof Error ? error.message : String(error)
    });
  }

  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (error) {
    throw new ModelBundleError(`Model bundle at ${resolved} is not valid JSON`, {
      path: resolved,
      cause: error instanceof Error ? error.message : String(error)
    });
  }

  return parseModelBundle(document);
}
