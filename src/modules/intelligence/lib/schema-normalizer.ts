import { SchemaError, SchemaIssue } from "../../../utils/error";
import { isBlank, toOptionalNumber } from "../../../utils/number";
import { COLUMN_ALIASES } from "../config";
import {
  CanonicalKey,
  CanonicalRecord,
  CustomerId,
  FEATURE_KEYS,
  FeatureKey,
  RawRecord,
  RawValue
} from "./types";

const CANONICAL_KEYS: readonly CanonicalKey[] = [
  "CustomerID",
  ...FEATURE_KEYS,
  "cluster"
];

const REQUIRED_KEYS: readonly CanonicalKey[] = ["CustomerID", ...FEATURE_KEYS];

export type NormalizedRow =
  | { ok: true; rowIndex: number; record: CanonicalRecord }
  | {
      ok: false;
      rowIndex: number;
      customerId: CustomerId | null;
      error: SchemaError;
    };

/** Lower-cases and drops whitespace, underscores, hyphens and dots. */
export function normalizeColumnName(name: string): string {
  return name.trim().toLowerCase().replace(/[\s_.-]+/g, "");
}

export function collectColumns(rows: readonly RawRecord[]): string[] {
  const seen = new Set<string>();
  for (const row of rows) {
    for (const column of Object.keys(row)) {
      seen.add(column);
    }
  }
  return Array.from(seen);
}

/**
 * Maps canonical keys to the input column carrying them. Throws when a
 * required key has no column or when two columns claim the same key.
 */
export function resolveColumns<K extends string>(
  columns: readonly string[],
  keys: readonly K[],
  aliases: Record<K, readonly string[]>,
  required: readonly K[]
): Map<K, string> {
  const index = new Map<string, K>();
  for (const key of keys) {
    index.set(normalizeColumnName(key), key);
    for (const alias of aliases[key]) {
      index.set(normalizeColumnName(alias), key);
    }
  }

  const mapping = new Map<K, string>();
  const issues: SchemaIssue[] = [];

  for (const column of columns) {
    const key = index.get(normalizeColumnName(column));
    if (key === undefined) {
      continue;
    }
    const existing = mapping.get(key);
    if (existing !== undefined) {
      issues.push({
        column: key,
        reason: `ambiguous: both "${existing}" and "${column}" map to ${key}`
      });
      continue;
    }
    mapping.set(key, column);
  }

  const missing = required.filter((key) => !mapping.has(key));
  for (const key of missing) {
    issues.push({ column: key, reason: "missing required column" });
  }

  if (issues.length) {
    const message = missing.length
      ? `Missing required column(s): ${missing.join(", ")}`
      : `Ambiguous column mapping: ${issues.map((issue) => issue.column).join(", ")}`;
    throw new SchemaError(message, issues);
  }

  return mapping;
}

export function coerceCustomerId(value: RawValue): CustomerId | null {
  if (typeof value === "number") {
    return Number.isInteger(value) ? String(value) : null;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length ? trimmed : null;
  }
  return null;
}

function formatRaw(value: RawValue): string {
  return typeof value === "string" ? `"${value}"` : String(value);
}

function normalizeRow(
  row: RawRecord,
  rowIndex: number,
  mapping: Map<CanonicalKey, string>
): NormalizedRow {
  const issues: SchemaIssue[] = [];
  const pick = (key: CanonicalKey): RawValue => {
    const column = mapping.get(key);
    return column === undefined ? undefined : row[column];
  };

  const rawId = pick("CustomerID");
  const customerId = coerceCustomerId(rawId);
  if (customerId === null) {
    issues.push({
      row: rowIndex,
      column: "CustomerID",
      reason: isBlank(rawId)
        ? "missing value"
        : `not a valid identifier: ${formatRaw(rawId)}`
    });
  }

  const features: Partial<Record<FeatureKey, number>> = {};
  for (const key of FEATURE_KEYS) {
    const raw = pick(key);
    if (isBlank(raw)) {
      issues.push({ row: rowIndex, column: key, reason: "missing value" });
      continue;
    }
    const parsed = typeof raw === "boolean" ? undefined : toOptionalNumber(raw);
    if (parsed === undefined) {
      issues.push({
        row: rowIndex,
        column: key,
        reason: `not numeric: ${formatRaw(raw)}`
      });
      continue;
    }
    features[key] = parsed;
  }

  let cluster: number | undefined;
  const rawCluster = pick("cluster");
  if (!isBlank(rawCluster)) {
    const parsed =
      typeof rawCluster === "boolean" ? undefined : toOptionalNumber(rawCluster);
    if (parsed === undefined || !Number.isInteger(parsed) || parsed < 0) {
      issues.push({
        row: rowIndex,
        column: "cluster",
        reason: `not a cluster id: ${formatRaw(rawCluster)}`
      });
    } else {
      cluster = parsed;
    }
  }

  const {
    total_orders,
    total_quantity,
    total_spend,
    avg_order_value,
    recency_days,
    unique_products
  } = features;

  if (
    issues.length ||
    customerId === null ||
    total_orders === undefined ||
    total_quantity === undefined ||
    total_spend === undefined ||
    avg_order_value === undefined ||
    recency_days === undefined ||
    unique_products === undefined
  ) {
    const summary = issues
      .map((issue) => `${issue.column}: ${issue.reason}`)
      .join("; ");
    return {
      ok: false,
      rowIndex,
      customerId,
      error: new SchemaError(`Row ${rowIndex}: ${summary}`, issues)
    };
  }

  const record: CanonicalRecord = {
    CustomerID: customerId,
    total_orders,
    total_quantity,
    total_spend,
    avg_order_value,
    recency_days,
    unique_products
  };
  if (cluster !== undefined) {
    record.cluster = cluster;
  }
  return { ok: true, rowIndex, record };
}

/**
 * Normalizes every row and reports row-level problems per row. Column-level
 * problems (missing or ambiguous columns) still throw for the whole batch.
 */
export function normalizeRows(rows: readonly RawRecord[]): NormalizedRow[] {
  if (!rows.length) {
    return [];
  }
  const mapping = resolveColumns(
    collectColumns(rows),
    CANONICAL_KEYS,
    COLUMN_ALIASES.customers,
    REQUIRED_KEYS
  );
  return rows.map((row, rowIndex) => normalizeRow(row, rowIndex, mapping));
}

export function assertUniqueCustomerIds(
  records: ReadonlyArray<{ CustomerID: CustomerId }>
): void {
  const seen = new Set<CustomerId>();
  const duplicates = new Set<CustomerId>();
  for (const record of records) {
    if (seen.has(record.CustomerID)) {
      duplicates.add(record.CustomerID);
    }
    seen.add(record.CustomerID);
  }
  if (duplicates.size) {
    const ids = Array.from(duplicates);
    throw new SchemaError(
      `Duplicate CustomerID(s) in batch: ${ids.join(", ")}`,
      ids.map((id) => ({ column: "CustomerID", reason: `duplicate id ${id}` }))
    );
  }
}

/** Strict form: any row-level issue fails the batch with every issue attached. */
export function normalizeBatch(rows: readonly RawRecord[]): CanonicalRecord[] {
  const normalized = normalizeRows(rows);
  const records: CanonicalRecord[] = [];
  const issues: SchemaIssue[] = [];
  for (const entry of normalized) {
    if (entry.ok) {
      records.push(entry.record);
    } else {
      issues.push(...entry.error.issues);
    }
  }
  if (issues.length) {
    const rowsAffected = new Set(issues.map((issue) => issue.row)).size;
    throw new SchemaError(
      `${rowsAffected} row(s) failed normalization`,
      issues
    );
  }
  assertUniqueCustomerIds(records);
  return records;
}
