import { FeatureError, ModelOutputError } from "../../../utils/error";
import { ScalingTransform } from "./models";
import {
  CanonicalRecord,
  CustomerProfile,
  FEATURE_KEYS,
  FeatureMatrix,
  FeatureVector,
  ScaledFeatureVector
} from "./types";

export function buildFeatureVector(record: Readonly<CanonicalRecord>): FeatureVector {
  return FEATURE_KEYS.map((key) => {
    const value: unknown = record[key];
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new FeatureError(
        `Customer ${record.CustomerID}: feature ${key} is missing or not finite`,
        { customerId: record.CustomerID, feature: key }
      );
    }
    return value;
  });
}

export function scaleFeatureVector(
  vector: FeatureVector,
  transform: ScalingTransform
): ScaledFeatureVector {
  const scaled = transform.apply(vector);
  if (scaled.length !== FEATURE_KEYS.length) {
    throw new FeatureError(
      `Scaling transform returned ${scaled.length} dimensions, expected ${FEATURE_KEYS.length}`,
      { dimensions: scaled.length }
    );
  }
  const invalid = scaled.find((value) => !Number.isFinite(value));
  if (invalid !== undefined) {
    throw new ModelOutputError(
      "Scaling transform produced a non-finite value",
      "scaler",
      invalid
    );
  }
  return Object.freeze(scaled.slice());
}

export function buildFeatureMatrix(
  profiles: ReadonlyArray<Pick<CustomerProfile, "customerId" | "scaledFeatures">>
): FeatureMatrix {
  return Object.freeze({
    customerIds: Object.freeze(profiles.map((profile) => profile.customerId)),
    rows: Object.freeze(profiles.map((profile) => profile.scaledFeatures))
  });
}
