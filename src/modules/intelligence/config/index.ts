import { z } from "zod";
import rawAliases from "./column-aliases.json";

const aliasListSchema = z.array(z.string().min(1)).min(1);

const aliasFileSchema = z.object({
  customers: z.object({
    CustomerID: aliasListSchema,
    total_orders: aliasListSchema,
    total_quantity: aliasListSchema,
    total_spend: aliasListSchema,
    avg_order_value: aliasListSchema,
    recency_days: aliasListSchema,
    unique_products: aliasListSchema,
    cluster: aliasListSchema
  }),
  transactions: z.object({
    customer_id: aliasListSchema,
    invoice_no: aliasListSchema,
    invoice_date: aliasListSchema,
    quantity: aliasListSchema,
    price: aliasListSchema,
    transaction_value: aliasListSchema,
    product_id: aliasListSchema
  })
});

export type ColumnAliases = z.infer<typeof aliasFileSchema>;

export const COLUMN_ALIASES: ColumnAliases = aliasFileSchema.parse(rawAliases);

export const KNOWN_CLUSTER_IDS = [0, 1, 2, 3, 4] as const;

export type KnownClusterId = (typeof KNOWN_CLUSTER_IDS)[number];

export const SEGMENT_LABELS = {
  0: "Loyal & High Value",
  1: "Growing Customers",
  2: "Price Sensitive",
  3: "At Risk",
  4: "High Churn Risk"
} as const satisfies Record<KnownClusterId, string>;

export const UNLABELED_SEGMENT = "Unlabeled Segment";

export const CLUSTER_STRATEGIES = {
  0: "Reward with loyalty perks, early access and premium bundles.",
  1: "Nurture with personalised cross-sell and volume incentives.",
  2: "Engage with targeted discounts and value packs.",
  3: "Run a win-back sequence with time-limited incentives.",
  4: "Escalate to an immediate retention campaign with direct outreach."
} as const satisfies Record<KnownClusterId, string>;

export const FALLBACK_STRATEGY =
  "Monitor behaviour and collect more history before acting.";

export const RISK_TIER_THRESHOLDS = {
  low: 0.3,
  moderate: 0.6
} as const;

export interface IntelligenceOptions {
  /** Neighbours returned by single-customer lookups when no k is given */
  similarityTopK: number;
  /** Largest batch scored in one pass; all-pairs similarity grows quadratically */
  maxBatchSize: number;
}

export const DEFAULT_INTELLIGENCE_OPTIONS: IntelligenceOptions = {
  similarityTopK: 5,
  maxBatchSize: 5000
};
