import path from "path";
import { ModelBundleError } from "../../../utils/error";
import { loadModelBundle, parseModelBundle } from "../lib/model-loader";
import { MinMaxScaler, NearestCentroidPartition } from "../lib/models";
import { captureError, TEST_BUNDLE_DOCUMENT } from "./fixtures";

const SAMPLE_BUNDLE = path.resolve(__dirname, "../../../../models/customer-genome.json");

describe("parseModelBundle", () => {
  it("builds models that score a vector", () => {
    const bundle = parseModelBundle(TEST_BUNDLE_DOCUMENT);
    const scaled = bundle.scaler.apply([7, 34, 340, 41, 70, 6]);

    expect(bundle.version).toBe("test-1");
    expect(scaled).toEqual([0, 0, 0, 0, 0, 0]);
    expect(bundle.regression.predict(scaled)).toBe(500);
    expect(bundle.classifier.predictProbability(scaled)).toBe(0.5);
  });

  it("accepts a min-max scaler", () => {
    const bundle = parseModelBundle({
      ...TEST_BUNDLE_DOCUMENT,
      scaler: { kind: "min_max", min: [0, 0, 0, 0, 0, -1], scale: [1, 1, 1, 1, 1, 2] }
    });
    expect(bundle.scaler).toBeInstanceOf(MinMaxScaler);
    expect(bundle.scaler.apply([1, 2, 3, 4, 5, 1])).toEqual([1, 2, 3, 4, 5, 1]);
  });

  it("rejects a vector of the wrong dimension", () => {
    const error = captureError(
      () =>
        parseModelBundle({
          ...TEST_BUNDLE_DOCUMENT,
          regression: { kind: "linear", coefficients: [1, 2], intercept: 0 }
        }),
      ModelBundleError
    );
    expect(error.message).toContain("regression.coefficients");
  });

  it("rejects a zero scale entry", () => {
    expect(() =>
      parseModelBundle({
        ...TEST_BUNDLE_DOCUMENT,
        scaler: { kind: "standard", mean: [0, 0, 0, 0, 0, 0], scale: [1, 1, 0, 1, 1, 1] }
      })
    ).toThrow("scale entries must be non-zero");
  });

  it("rejects features listed in another order", () => {
    const features = [...TEST_BUNDLE_DOCUMENT.features].reverse();
    expect(() => parseModelBundle({ ...TEST_BUNDLE_DOCUMENT, features })).toThrow(
      ModelBundleError
    );
  });
});

describe("NearestCentroidPartition", () => {
  it("keeps the lowest index on a distance tie", () => {
    const partition = new NearestCentroidPartition([
      [1, 0, 0, 0, 0, 0],
      [-1, 0, 0, 0, 0, 0]
    ]);
    expect(partition.assign([0, 0, 0, 0, 0, 0])).toBe(0);
  });
});

describe("loadModelBundle", () => {
  it("loads the bundled sample model", async () => {
    const bundle = await loadModelBundle(SAMPLE_BUNDLE);
    expect(bundle.version).toBe("2025.10.0");
  });

  it("fails with a bundle error for a missing file", async () => {
    await expect(
      loadModelBundle(path.join(__dirname, "does-not-exist.json"))
    ).rejects.toBeInstanceOf(ModelBundleError);
  });
});
