import { SchemaError } from "../../../utils/error";
import {
  normalizeBatch,
  normalizeColumnName,
  normalizeRows,
  resolveColumns
} from "../lib/schema-normalizer";
import { captureError, rawRow } from "./fixtures";

describe("normalizeColumnName", () => {
  it("is insensitive to case, whitespace and underscores", () => {
    const variants = ["CustomerID", "customer id", "Customer_ID", "  CUSTOMER  ID "];
    expect(new Set(variants.map(normalizeColumnName))).toEqual(new Set(["customerid"]));
  });
});

describe("normalizeBatch", () => {
  it("maps messy column names onto canonical keys and coerces values", () => {
    const records = normalizeBatch([
      {
        customerid: 12346,
        Total_Orders: "3",
        "Total Quantity": " 40 ",
        "TOTAL SPEND": "1,250.50",
        aov: 416.83,
        Recency: "12",
        "unique-products": "7",
        Notes: "ignored"
      }
    ]);

    expect(records).toEqual([
      {
        CustomerID: "12346",
        total_orders: 3,
        total_quantity: 40,
        total_spend: 1250.5,
        avg_order_value: 416.83,
        recency_days: 12,
        unique_products: 7
      }
    ]);
  });

  it("keeps a supplied cluster as an informational field", () => {
    const [record] = normalizeBatch([{ ...rawRow("A", [1, 2, 3, 4, 5, 6]), Cluster: "2" }]);
    expect(record.cluster).toBe(2);
  });

  it("names every missing required column", () => {
    const row = rawRow("A", [1, 2, 3, 4, 5, 6]);
    delete row["total spend"];
    delete row["Unique Products"];

    const error = captureError(() => normalizeBatch([row]), SchemaError);
    expect(error.message).toBe(
      "Missing required column(s): total_spend, unique_products"
    );
    expect(error.issues.map((issue) => issue.column)).toEqual([
      "total_spend",
      "unique_products"
    ]);
  });

  it("reports the row and column of a non-numeric value", () => {
    const rows = [
      rawRow("A", [1, 2, 3, 4, 5, 6]),
      { ...rawRow("B", [1, 2, 3, 4, 5, 6]), "Total Orders": "many" }
    ];

    const error = captureError(() => normalizeBatch(rows), SchemaError);
    expect(error.message).toBe("1 row(s) failed normalization");
    expect(error.issues).toEqual([
      { row: 1, column: "total_orders", reason: 'not numeric: "many"' }
    ]);
  });

  it("never substitutes a default for an empty feature value", () => {
    const rows = [{ ...rawRow("A", [1, 2, 3, 4, 5, 6]), "recency-days": "" }];
    expect(() => normalizeBatch(rows)).toThrow(SchemaError);
  });

  it("rejects duplicate customer ids", () => {
    const rows = [rawRow("A", [1, 2, 3, 4, 5, 6]), rawRow("A", [2, 3, 4, 5, 6, 7])];
    expect(() => normalizeBatch(rows)).toThrow("Duplicate CustomerID(s) in batch: A");
  });

  it("rejects a batch where an unreadable row repeats another row's id", () => {
    const rows = [
      { ...rawRow("C1", [1, 2, 3, 4, 5, 6]), "total spend": "oops" },
      rawRow("C1", [1, 2, 3, 4, 5, 6])
    ];
    const error = captureError(() => normalizeBatch(rows), SchemaError);
    expect(error.issues).toEqual([
      { row: 0, column: "total_spend", reason: 'not numeric: "oops"' }
    ]);
  });

  it("returns an empty list for an empty batch", () => {
    expect(normalizeBatch([])).toEqual([]);
  });
});

describe("normalizeRows", () => {
  it("flags bad rows individually and keeps the good ones", () => {
    const results = normalizeRows([
      rawRow("A", [1, 2, 3, 4, 5, 6]),
      { ...rawRow("B", [1, 2, 3, 4, 5, 6]), "total spend": null }
    ]);

    expect(results[0]).toMatchObject({ ok: true, rowIndex: 0 });
    expect(results[1]).toMatchObject({ ok: false, rowIndex: 1, customerId: "B" });
    if (!results[1].ok) {
      expect(results[1].error.issues).toEqual([
        { row: 1, column: "total_spend", reason: "missing value" }
      ]);
    }
  });

  it("rejects fractional customer ids", () => {
    const [result] = normalizeRows([rawRow(12.5, [1, 2, 3, 4, 5, 6])]);
    expect(result.ok).toBe(false);
  });
});

describe("resolveColumns", () => {
  it("fails when two columns claim the same canonical key", () => {
    expect(() =>
      resolveColumns(
        ["Total Spend", "total_spend"],
        ["total_spend"],
        { total_spend: ["spend"] },
        ["total_spend"]
      )
    ).toThrow("Ambiguous column mapping: total_spend");
  });
});
