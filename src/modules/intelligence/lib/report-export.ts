import Papa from "papaparse";
import { FEATURE_KEYS, IntelligenceReport } from "./types";

export const EXPORT_COLUMNS = [
  "CustomerID",
  ...FEATURE_KEYS,
  "cluster",
  "segment_label",
  "predicted_value",
  "risk_probability",
  "confidence_score",
  "recommended_action"
] as const;

export type ExportColumn = (typeof EXPORT_COLUMNS)[number];

export type ExportRow = Record<ExportColumn, string | number>;

const cell = (value: number | null): string | number => (value === null ? "" : value);

/** Profiled customers in report order; rejected predictions are empty cells. */
export function toExportRows(report: IntelligenceReport): ExportRow[] {
  return report.customers.flatMap((customer) => {
    if (customer.status === "failed") {
      return [];
    }
    const { profile } = customer;
    const { record } = profile;
    return [
      {
        CustomerID: profile.customerId,
        total_orders: record.total_orders,
        total_quantity: record.total_quantity,
        total_spend: record.total_spend,
        avg_order_value: record.avg_order_value,
        recency_days: record.recency_days,
        unique_products: record.unique_products,
        cluster: profile.cluster,
        segment_label: profile.segmentLabel,
        predicted_value: cell(profile.predictedValue),
        risk_probability: cell(profile.riskProbability),
        confidence_score: cell(profile.confidenceScore),
        recommended_action: profile.recommendedAction
      }
    ];
  });
}

export function exportReportCsv(report: IntelligenceReport): string {
  const rows = toExportRows(report);
  return Papa.unparse(
    {
      fields: [...EXPORT_COLUMNS],
      data: rows.map((row) => EXPORT_COLUMNS.map((column) => row[column]))
    },
    { newline: "\n" }
  );
}
