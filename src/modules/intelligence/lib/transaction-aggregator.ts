import { differenceInCalendarDays, isValid, parseISO } from "date-fns";
import { IntelligenceError, SchemaError, SchemaIssue } from "../../../utils/error";
import { isBlank, toOptionalNumber } from "../../../utils/number";
import { COLUMN_ALIASES } from "../config";
import {
  coerceCustomerId,
  collectColumns,
  resolveColumns
} from "./schema-normalizer";
import { CanonicalRecord, CustomerId, RawRecord, RawValue } from "./types";

type TransactionKey =
  | "customer_id"
  | "invoice_no"
  | "invoice_date"
  | "quantity"
  | "price"
  | "transaction_value"
  | "product_id";

const TRANSACTION_KEYS: readonly TransactionKey[] = [
  "customer_id",
  "invoice_no",
  "invoice_date",
  "quantity",
  "price",
  "transaction_value",
  "product_id"
];

const REQUIRED_TRANSACTION_KEYS: readonly TransactionKey[] = [
  "customer_id",
  "invoice_no",
  "invoice_date",
  "quantity",
  "product_id"
];

type CustomerAggregate = {
  invoices: Set<string>;
  products: Set<string>;
  quantity: number;
  spend: number;
  lines: number;
  lastInvoice: Date;
};

export type AggregateOptions = {
  /**
   * Day recency is measured against; defaults to the latest invoice in the
   * batch and may not fall before it.
   */
  referenceDate?: Date;
};

function parseDate(value: RawValue): Date | null {
  if (typeof value !== "string") {
    return null;
  }
  const parsed = parseISO(value.trim());
  return isValid(parsed) ? parsed : null;
}

function asKey(value: RawValue): string | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value === "string" && value.trim()) {
    return value.trim();
  }
  return null;
}

/**
 * Rolls transaction lines up into one canonical record per customer, in
 * first-seen order. Any unreadable line fails the whole aggregation.
 */
export function aggregateTransactions(
  rows: readonly RawRecord[],
  options: AggregateOptions = {}
): CanonicalRecord[] {
  if (!rows.length) {
    return [];
  }

  const mapping = resolveColumns(
    collectColumns(rows),
    TRANSACTION_KEYS,
    COLUMN_ALIASES.transactions,
    REQUIRED_TRANSACTION_KEYS
  );
  if (!mapping.has("transaction_value") && !mapping.has("price")) {
    throw new SchemaError(
      "Missing required column(s): transaction_value or price",
      [{ column: "transaction_value", reason: "missing required column" }]
    );
  }

  const issues: SchemaIssue[] = [];
  const aggregates = new Map<CustomerId, CustomerAggregate>();
  let latest: Date | null = null;

  for (const [rowIndex, row] of rows.entries()) {
    const pick = (key: TransactionKey): RawValue => {
      const column = mapping.get(key);
      return column === undefined ? undefined : row[column];
    };
    const rowIssues: SchemaIssue[] = [];
    const flag = (column: TransactionKey, raw: RawValue, what: string) => {
      rowIssues.push({
        row: rowIndex,
        column,
        reason: isBlank(raw) ? "missing value" : `${what}: ${String(raw)}`
      });
    };

    const customerId = coerceCustomerId(pick("customer_id"));
    if (customerId === null) {
      flag("customer_id", pick("customer_id"), "not a valid identifier");
    }
    const invoice = asKey(pick("invoice_no"));
    if (invoice === null) {
      flag("invoice_no", pick("invoice_no"), "not a valid invoice");
    }
    const product = asKey(pick("product_id"));
    if (product === null) {
      flag("product_id", pick("product_id"), "not a valid product");
    }
    const date = parseDate(pick("invoice_date"));
    if (date === null) {
      flag("invoice_date", pick("invoice_date"), "not an ISO date");
    }
    const quantity = toOptionalNumber(pick("quantity"));
    if (quantity === undefined) {
      flag("quantity", pick("quantity"), "not numeric");
    }

    let value: number | undefined;
    if (mapping.has("transaction_value")) {
      value = toOptionalNumber(pick("transaction_value"));
      if (value === undefined) {
        flag("transaction_value", pick("transaction_value"), "not numeric");
      }
    } else {
      const price = toOptionalNumber(pick("price"));
      if (price === undefined) {
        flag("price", pick("price"), "not numeric");
      } else if (quantity !== undefined) {
        value = quantity * price;
      }
    }

    if (
      rowIssues.length ||
      customerId === null ||
      invoice === null ||
      product === null ||
      date === null ||
      quantity === undefined ||
      value === undefined
    ) {
      issues.push(...rowIssues);
      continue;
    }

    const entry = aggregates.get(customerId) ?? {
      invoices: new Set<string>(),
      products: new Set<string>(),
      quantity: 0,
      spend: 0,
      lines: 0,
      lastInvoice: date
    };
    entry.invoices.add(invoice);
    entry.products.add(product);
    entry.quantity += quantity;
    entry.spend += value;
    entry.lines += 1;
    if (date > entry.lastInvoice) {
      entry.lastInvoice = date;
    }
    aggregates.set(customerId, entry);

    if (latest === null || date > latest) {
      latest = date;
    }
  }

  if (issues.length) {
    const rowsAffected = new Set(issues.map((issue) => issue.row)).size;
    throw new SchemaError(`${rowsAffected} transaction row(s) are unreadable`, issues);
  }

  const { referenceDate: given } = options;
  if (given !== undefined) {
    if (!isValid(given)) {
      throw new IntelligenceError("Reference date is not a valid date", "INVALID_INPUT");
    }
    // recency is never negative: the reference date cannot precede any invoice
    if (latest !== null && differenceInCalendarDays(given, latest) < 0) {
      throw new IntelligenceError(
        `Reference date ${given.toISOString()} is earlier than the latest invoice ${latest.toISOString()}`,
        "INVALID_INPUT",
        { referenceDate: given.toISOString(), latestInvoice: latest.toISOString() }
      );
    }
  }
  const referenceDate = given ?? latest ?? new Date();

  return Array.from(aggregates.entries()).map(([customerId, entry]) => ({
    CustomerID: customerId,
    total_orders: entry.invoices.size,
    total_quantity: entry.quantity,
    total_spend: entry.spend,
    avg_order_value: entry.spend / entry.lines,
    recency_days: differenceInCalendarDays(referenceDate, entry.lastInvoice),
    unique_products: entry.products.size
  }));
}
