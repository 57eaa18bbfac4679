import { ModelOutputError } from "../../../utils/error";
import { ProbabilisticClassifier, RegressionModel } from "./models";
import { ScaledFeatureVector } from "./types";

export function predictValue(
  vector: ScaledFeatureVector,
  regression: RegressionModel
): number {
  const value = regression.predict(vector);
  if (!Number.isFinite(value)) {
    throw new ModelOutputError(
      `Regression model returned a non-finite value: ${value}`,
      "regression",
      value
    );
  }
  return value;
}

/** Out-of-range probabilities are rejected, never clamped. */
export function predictRisk(
  vector: ScaledFeatureVector,
  classifier: ProbabilisticClassifier
): number {
  const probability = classifier.predictProbability(vector);
  if (!Number.isFinite(probability) || probability < 0 || probability > 1) {
    throw new ModelOutputError(
      `Classifier returned a probability outside [0, 1]: ${probability}`,
      "classifier",
      probability
    );
  }
  return probability;
}

export function confidenceFromRisk(riskProbability: number): number {
  return 1 - riskProbability;
}
