import { FeatureError, ModelOutputError } from "../../../utils/error";
import {
  buildFeatureMatrix,
  buildFeatureVector,
  scaleFeatureVector
} from "../lib/feature-vector";
import { StandardScaler } from "../lib/models";
import { buildTestBundle, captureError, record } from "./fixtures";

describe("buildFeatureVector", () => {
  it("orders values by the fixed feature order", () => {
    expect(buildFeatureVector(record("C1", [10, 50, 500, 50, 5, 8]))).toEqual([
      10, 50, 500, 50, 5, 8
    ]);
  });

  it("rejects a non-finite feature and names it", () => {
    const input = { ...record("C1", [10, 50, 500, 50, 5, 8]), recency_days: Number.NaN };
    const error = captureError(() => buildFeatureVector(input), FeatureError);
    expect(error.details).toEqual({ customerId: "C1", feature: "recency_days" });
  });
});

describe("scaleFeatureVector", () => {
  const { scaler } = buildTestBundle();

  it("applies the fitted standard scaler", () => {
    const scaled = scaleFeatureVector([10, 50, 500, 50, 5, 8], scaler);
    const expected = [3 / 3.5, 0.8, 160 / 210, 0.6, -65 / 90, 2 / 3];
    expected.forEach((value, i) => expect(scaled[i]).toBeCloseTo(value, 12));
  });

  it("returns a frozen copy", () => {
    const scaled = scaleFeatureVector([10, 50, 500, 50, 5, 8], scaler);
    expect(Object.isFrozen(scaled)).toBe(true);
  });

  it("rejects a transform that changes the dimension", () => {
    const broken = { apply: () => [1, 2, 3] };
    expect(() => scaleFeatureVector([1, 2, 3, 4, 5, 6], broken)).toThrow(FeatureError);
  });

  it("rejects a non-finite scaled value", () => {
    const overflow = new StandardScaler([0, 0, 0, 0, 0, 0], [1e-320, 1, 1, 1, 1, 1]);
    const error = captureError(
      () => scaleFeatureVector([1e300, 1, 1, 1, 1, 1], overflow),
      ModelOutputError
    );
    expect(error.model).toBe("scaler");
  });
});

describe("repeated calls", () => {
  const { scaler } = buildTestBundle();

  it("build the same order and scale to identical values", () => {
    const input = record("C1", [10, 50, 500, 50, 5, 8]);
    const vectors = [1, 2, 3, 4, 5].map(() => buildFeatureVector(input));
    const scaled = vectors.map((vector) => scaleFeatureVector(vector, scaler));

    for (let i = 1; i < vectors.length; i += 1) {
      expect(vectors[i]).toEqual(vectors[0]);
      expect(scaled[i]).toEqual(scaled[0]);
      scaled[i].forEach((value, j) => expect(Object.is(value, scaled[0][j])).toBe(true));
    }
    expect(vectors[0]).toEqual([10, 50, 500, 50, 5, 8]);
  });
});

describe("buildFeatureMatrix", () => {
  it("keeps row order aligned with customer ids", () => {
    const matrix = buildFeatureMatrix([
      { customerId: "B", scaledFeatures: [1, 0, 0, 0, 0, 0] },
      { customerId: "A", scaledFeatures: [0, 1, 0, 0, 0, 0] }
    ]);
    expect(matrix.customerIds).toEqual(["B", "A"]);
    expect(matrix.rows[1]).toEqual([0, 1, 0, 0, 0, 0]);
  });
});
