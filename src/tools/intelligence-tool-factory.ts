import { isValid, parseISO } from "date-fns";
import Papa from "papaparse";
import type { z as Zod } from "zod";
import type {
  CanonicalRecord,
  CustomerInsight,
  CustomerIntelligenceService,
  IntelligenceReport,
  RawRecord,
  ScoredCustomer,
  SortField,
  SortOption
} from "../modules/intelligence";
import { EXPORT_COLUMNS } from "../modules/intelligence";
import { IntelligenceError, SchemaError } from "../utils/error";
import { defineTool, ToolDefinition } from "../utils/define-tools";

type IntelligenceService = Pick<
  CustomerIntelligenceService,
  | "normalizeBatch"
  | "aggregateTransactions"
  | "scoreBatch"
  | "scoreRawBatch"
  | "findSimilar"
  | "describeCustomer"
  | "exportCsv"
  | "configuration"
>;

type InputKind = "customers" | "transactions";

const isRawValue = (
  value: unknown
): value is string | number | boolean | null =>
  value === null ||
  typeof value === "string" ||
  typeof value === "number" ||
  typeof value === "boolean";

function toRawRecord(value: unknown, index: number): RawRecord {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new SchemaError(`Row ${index} is not an object`, [
      { row: index, reason: "row must be an object of column -> value" }
    ]);
  }
  const record: RawRecord = {};
  for (const [key, cell] of Object.entries(value)) {
    if (cell !== undefined && !isRawValue(cell)) {
      throw new SchemaError(`Row ${index}: column ${key} is not a scalar`, [
        { row: index, column: key, reason: "value must be a string, number or null" }
      ]);
    }
    record[key] = cell;
  }
  return record;
}

function parseCsv(text: string): RawRecord[] {
  const result = Papa.parse<Record<string, string>>(text.trim(), {
    header: true,
    skipEmptyLines: "greedy"
  });
  if (result.errors.length) {
    throw new SchemaError(
      `CSV input could not be parsed (${result.errors.length} error(s))`,
      result.errors.map((error) => ({ row: error.row, reason: error.message }))
    );
  }
  return result.data;
}

function readRows(input: Record<string, unknown>): RawRecord[] {
  const { rows, csv } = input;
  if (Array.isArray(rows)) {
    return rows.map((row, index) => toRawRecord(row, index));
  }
  if (typeof csv === "string" && csv.trim()) {
    return parseCsv(csv);
  }
  throw new IntelligenceError(
    "Provide customer data as 'rows' (array of objects) or 'csv' (text with a header row).",
    "INVALID_INPUT"
  );
}

const dataShape = (z: typeof Zod) => ({
  rows: z
    .array(z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])))
    .optional(),
  csv: z.string().optional(),
  input_kind: z.string().optional()
});

// alias coercers
const coerceInputKind = (input: Record<string, unknown>): InputKind => {
  const raw = input.input_kind;
  if (raw === undefined) {
    return "customers";
  }
  const v = String(raw).toLowerCase().trim();
  if (["transactions", "transaction", "txn", "txns", "invoices", "lines"].includes(v)) {
    return "transactions";
  }
  if (["customers", "customer", "features", "profiles"].includes(v)) {
    return "customers";
  }
  throw new IntelligenceError(
    `Unknown input_kind '${String(raw)}'. Use 'customers' or 'transactions'.`,
    "INVALID_INPUT"
  );
};

const coerceSort = (input: Record<string, unknown>): SortOption | undefined => {
  const raw = input.sort_by ?? input.order_by;
  if (raw === undefined) {
    return undefined;
  }
  const [fieldToken = "", directionToken] = String(raw).toLowerCase().trim().split(/\s+/);
  const fields: Record<string, SortField> = {
    customer_id: "customer_id",
    customerid: "customer_id",
    id: "customer_id",
    predicted_value: "predicted_value",
    value: "predicted_value",
    risk_probability: "risk_probability",
    risk: "risk_probability",
    total_spend: "total_spend",
    spend: "total_spend"
  };
  const field = fields[fieldToken];
  if (!field) {
    throw new IntelligenceError(
      `Unknown sort field '${fieldToken}'. Use customer_id, predicted_value, risk_probability or total_spend.`,
      "INVALID_INPUT"
    );
  }
  const order = String(input.order ?? directionToken ?? "asc").toLowerCase();
  return { field, direction: order === "desc" ? "desc" : "asc" };
};

const coerceReferenceDate = (input: Record<string, unknown>): Date | undefined => {
  if (typeof input.reference_date !== "string") {
    return undefined;
  }
  const parsed = parseISO(input.reference_date);
  if (!isValid(parsed)) {
    throw new IntelligenceError(
      `reference_date '${input.reference_date}' is not an ISO date`,
      "INVALID_INPUT"
    );
  }
  return parsed;
};

const summarizeSlot = (customer: ScoredCustomer) => {
  if (customer.status === "failed") {
    return {
      customer_id: customer.customerId,
      row: customer.rowIndex,
      status: customer.status,
      failures: customer.failures
    };
  }
  const { profile } = customer;
  return {
    customer_id: profile.customerId,
    row: profile.rowIndex,
    status: customer.status,
    cluster: profile.cluster,
    segment: profile.segmentLabel,
    predicted_value: profile.predictedValue,
    risk_probability: profile.riskProbability,
    confidence_score: profile.confidenceScore,
    risk_tier: profile.riskTier,
    recommended_action: profile.recommendedAction,
    failures: customer.status === "degraded" ? customer.failures : []
  };
};

const summarizeInsight = (insight: CustomerInsight) => {
  if (insight.status === "failed") {
    return {
      customer_id: insight.customerId,
      status: insight.status,
      row: insight.rowIndex,
      failures: insight.failures,
      similar_customers: []
    };
  }
  const { profile } = insight;
  return {
    customer_id: insight.customerId,
    status: insight.status,
    features: profile.record,
    cluster: profile.cluster,
    segment: profile.segmentLabel,
    predicted_value: profile.predictedValue,
    risk_probability: profile.riskProbability,
    confidence_score: profile.confidenceScore,
    risk_tier: profile.riskTier,
    decision: insight.riskDecision,
    recommended_action: insight.recommendedAction,
    failures: insight.failures,
    similar_customers: insight.similar.map((neighbor) => ({
      customer_id: neighbor.customerId,
      similarity: neighbor.similarity,
      total_spend: neighbor.totalSpend,
      segment: neighbor.segmentLabel
    }))
  };
};

export function createIntelligenceTools(
  intelligence: IntelligenceService
): ToolDefinition[] {
  const toRecords = (input: Record<string, unknown>): CanonicalRecord[] => {
    const rows = readRows(input);
    if (coerceInputKind(input) === "transactions") {
      return intelligence.aggregateTransactions(rows, {
        referenceDate: coerceReferenceDate(input)
      });
    }
    return intelligence.normalizeBatch(rows);
  };

  const buildReport = (input: Record<string, unknown>): IntelligenceReport => {
    const sort = coerceSort(input);
    const rows = readRows(input);
    if (coerceInputKind(input) === "transactions") {
      const records = intelligence.aggregateTransactions(rows, {
        referenceDate: coerceReferenceDate(input)
      });
      return intelligence.scoreBatch(records, { sort });
    }
    return intelligence.scoreRawBatch(rows, { sort });
  };

  const coerceK = (input: Record<string, unknown>): number =>
    typeof input.k === "number" && Number.isInteger(input.k)
      ? Math.max(0, Math.min(50, input.k))
      : intelligence.configuration.similarityTopK;

  const requireCustomerId = (input: Record<string, unknown>): string => {
    const raw = input.customer_id;
    if (typeof raw === "number" && Number.isInteger(raw)) {
      return String(raw);
    }
    if (typeof raw === "string" && raw.trim()) {
      return raw.trim();
    }
    throw new IntelligenceError(
      "Missing 'customer_id' for the customer to look up.",
      "INVALID_INPUT"
    );
  };

  const customers_normalize = defineTool((z) => ({
    name: "customers_normalize",
    description:
      "Map customer rows with arbitrary column names onto the canonical schema (CustomerID + six behavioural features). With input_kind='transactions', aggregates transaction lines per customer first.",
    inputSchema: {
      ...dataShape(z),
      reference_date: z.string().optional()
    },
    handler: async (input: Record<string, unknown>): Promise<unknown> => {
      const records = toRecords(input);
      return { count: records.length, records };
    }
  }));

  const customers_score = defineTool((z) => ({
    name: "customers_score",
    description:
      "Score a batch of customers: cluster, segment, predicted value, risk probability, confidence and recommended action per customer, plus per-cluster aggregates. Rows that cannot be scored are flagged individually.",
    inputSchema: {
      ...dataShape(z),
      reference_date: z.string().optional(),
      sort_by: z.string().optional(),
      order_by: z.string().optional(),
      order: z.union([z.literal("asc"), z.literal("desc")]).optional(),
      limit: z.number().int().min(1).max(1000).default(100)
    },
    handler: async (input: Record<string, unknown>): Promise<unknown> => {
      const report = buildReport(input);
      const limit =
        typeof input.limit === "number" && Number.isInteger(input.limit)
          ? Math.max(1, Math.min(1000, input.limit))
          : 100;
      return {
        model_version: report.modelVersion,
        generated_at: report.generatedAt,
        summary: report.summary,
        clusters: report.clusters,
        customers: report.customers.slice(0, limit).map(summarizeSlot),
        truncated: report.customers.length > limit
      };
    }
  }));

  const customer_lookup = defineTool((z) => ({
    name: "customer_lookup",
    description:
      "Score the batch and describe one customer: segment, value, risk, confidence, decision, recommended action and the k most similar customers in the batch.",
    inputSchema: {
      ...dataShape(z),
      reference_date: z.string().optional(),
      customer_id: z.union([z.string(), z.number()]).optional(),
      k: z.number().int().min(0).max(50).optional()
    },
    handler: async (input: Record<string, unknown>): Promise<unknown> => {
      const customerId = requireCustomerId(input);
      const report = buildReport(input);
      return summarizeInsight(
        intelligence.describeCustomer(report, customerId, coerceK(input))
      );
    }
  }));

  const customers_similar = defineTool((z) => ({
    name: "customers_similar",
    description:
      "Return the k customers most similar to customer_id (cosine similarity over scaled features), highest first, excluding the customer itself.",
    inputSchema: {
      ...dataShape(z),
      reference_date: z.string().optional(),
      customer_id: z.union([z.string(), z.number()]).optional(),
      k: z.number().int().min(0).max(50).optional()
    },
    handler: async (input: Record<string, unknown>): Promise<unknown> => {
      const customerId = requireCustomerId(input);
      const report = buildReport(input);
      const result = intelligence.findSimilar(report, customerId, coerceK(input));
      return {
        customer_id: result.customerId,
        neighbors: result.neighbors.map((neighbor) => ({
          customer_id: neighbor.customerId,
          similarity: neighbor.similarity
        }))
      };
    }
  }));

  const customers_export = defineTool((z) => ({
    name: "customers_export",
    description:
      "Score the batch and return the intelligence report as CSV with a fixed column order.",
    inputSchema: {
      ...dataShape(z),
      reference_date: z.string().optional(),
      sort_by: z.string().optional(),
      order_by: z.string().optional(),
      order: z.union([z.literal("asc"), z.literal("desc")]).optional()
    },
    handler: async (input: Record<string, unknown>): Promise<unknown> => {
      const report = buildReport(input);
      return {
        columns: EXPORT_COLUMNS,
        rows: report.customers.filter((customer) => customer.status !== "failed").length,
        csv: intelligence.exportCsv(report)
      };
    }
  }));

  return [
    customers_normalize,
    customers_score,
    customer_lookup,
    customers_similar,
    customers_export
  ];
}

