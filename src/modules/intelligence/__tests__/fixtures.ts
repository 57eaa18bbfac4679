import { parseModelBundle } from "../lib/model-loader";
import { ModelBundle } from "../lib/models";
import { CanonicalRecord, FEATURE_KEYS, RawRecord } from "../lib/types";

export const TEST_BUNDLE_DOCUMENT = {
  version: "test-1",
  trained_at: "2025-01-01T00:00:00.000Z",
  features: [...FEATURE_KEYS],
  scaler: {
    kind: "standard",
    mean: [7, 34, 340, 41, 70, 6],
    scale: [3.5, 20, 210, 15, 90, 3]
  },
  partition: {
    kind: "nearest_centroid",
    centroids: [
      [1, 1, 1, 1, -1, 1],
      [-1, -1, -1, -1, 1, -1]
    ]
  },
  regression: {
    kind: "linear",
    coefficients: [0, 0, 100, 0, 0, 0],
    intercept: 500
  },
  classifier: {
    kind: "logistic",
    coefficients: [0, 0, 0, 0, 1, 0],
    intercept: 0
  }
};

export const buildTestBundle = (): ModelBundle =>
  parseModelBundle(TEST_BUNDLE_DOCUMENT);

export const record = (
  customerId: string,
  values: [number, number, number, number, number, number]
): CanonicalRecord => ({
  CustomerID: customerId,
  total_orders: values[0],
  total_quantity: values[1],
  total_spend: values[2],
  avg_order_value: values[3],
  recency_days: values[4],
  unique_products: values[5]
});

/** Three customers: C1 and C3 buy alike, C2 is small and lapsed. */
export const THREE_CUSTOMERS: CanonicalRecord[] = [
  record("C1", [10, 50, 500, 50, 5, 8]),
  record("C2", [2, 5, 40, 20, 200, 3]),
  record("C3", [9, 48, 480, 53, 7, 9])
];

export const rawRow = (
  customerId: string | number,
  values: [number, number, number, number, number, number]
): RawRecord => ({
  "Customer ID": customerId,
  "Total Orders": values[0],
  "Total_Quantity": values[1],
  "total spend": values[2],
  "AVG ORDER VALUE": values[3],
  "recency-days": values[4],
  "Unique Products": values[5]
});

/** Runs `fn` and returns the error it throws, narrowed to `type`. */
export function captureError<T extends Error>(
  fn: () => unknown,
  type: new (...args: never[]) => T
): T {
  try {
    fn();
  } catch (error) {
    if (error instanceof type) {
      return error;
    }
    throw error;
  }
  throw new Error(`expected ${type.name} to be thrown`);
}
