import { FeatureVector, ScaledFeatureVector } from "./types";

export interface ScalingTransform {
  apply(vector: FeatureVector): ScaledFeatureVector;
}

export interface PartitionModel {
  assign(vector: ScaledFeatureVector): number;
}

export interface RegressionModel {
  predict(vector: ScaledFeatureVector): number;
}

export interface ProbabilisticClassifier {
  predictProbability(vector: ScaledFeatureVector): number;
}

export type ModelBundle = {
  readonly version: string;
  readonly trainedAt?: string;
  readonly scaler: ScalingTransform;
  readonly partition: PartitionModel;
  readonly regression: RegressionModel;
  readonly classifier: ProbabilisticClassifier;
};

function linearCombination(
  coefficients: readonly number[],
  intercept: number,
  vector: readonly number[]
): number {
  let sum = intercept;
  for (let i = 0; i < coefficients.length; i += 1) {
    sum += coefficients[i] * (vector[i] ?? Number.NaN);
  }
  return sum;
}

/** `(x - mean) / scale` per dimension. */
export class StandardScaler implements ScalingTransform {
  private readonly mean: readonly number[];
  private readonly scale: readonly number[];

  constructor(mean: readonly number[], scale: readonly number[]) {
    this.mean = Object.freeze(mean.slice());
    this.scale = Object.freeze(scale.slice());
  }

  apply(vector: FeatureVector): ScaledFeatureVector {
    return vector.map((value, i) => (value - this.mean[i]) / this.scale[i]);
  }
}

/** `x * scale + min` per dimension. */
export class MinMaxScaler implements ScalingTransform {
  private readonly min: readonly number[];
  private readonly scale: readonly number[];

  constructor(min: readonly number[], scale: readonly number[]) {
    this.min = Object.freeze(min.slice());
    this.scale = Object.freeze(scale.slice());
  }

  apply(vector: FeatureVector): ScaledFeatureVector {
    return vector.map((value, i) => value * this.scale[i] + this.min[i]);
  }
}

export class NearestCentroidPartition implements PartitionModel {
  private readonly centroids: ReadonlyArray<readonly number[]>;

  constructor(centroids: ReadonlyArray<readonly number[]>) {
    this.centroids = Object.freeze(
      centroids.map((centroid) => Object.freeze(centroid.slice()))
    );
  }

  assign(vector: ScaledFeatureVector): number {
    let best = -1;
    let bestDistance = Number.POSITIVE_INFINITY;
    this.centroids.forEach((centroid, index) => {
      let distance = 0;
      for (let i = 0; i < centroid.length; i += 1) {
        const delta = (vector[i] ?? Number.NaN) - centroid[i];
        distance += delta * delta;
      }
      // strict comparison keeps the lowest index on ties
      if (distance < bestDistance) {
        bestDistance = distance;
        best = index;
      }
    });
    return best;
  }
}

export class LinearRegression implements RegressionModel {
  private readonly coefficients: readonly number[];

  constructor(coefficients: readonly number[], private readonly intercept: number) {
    this.coefficients = Object.freeze(coefficients.slice());
  }

  predict(vector: ScaledFeatureVector): number {
    return linearCombination(this.coefficients, this.intercept, vector);
  }
}

export class LogisticClassifier implements ProbabilisticClassifier {
  private readonly coefficients: readonly number[];

  constructor(coefficients: readonly number[], private readonly intercept: number) {
    this.coefficients = Object.freeze(coefficients.slice());
  }

  predictProbability(vector: ScaledFeatureVector): number {
    const logit = linearCombination(this.coefficients, this.intercept, vector);
    return 1 / (1 + Math.exp(-logit));
  }
}
