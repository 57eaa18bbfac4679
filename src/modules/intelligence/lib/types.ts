export const FEATURE_KEYS = [
  "total_orders",
  "total_quantity",
  "total_spend",
  "avg_order_value",
  "recency_days",
  "unique_products"
] as const;

export type FeatureKey = (typeof FEATURE_KEYS)[number];

export type CanonicalKey = "CustomerID" | FeatureKey | "cluster";

export type CustomerId = string;

export type RawValue = string | number | boolean | null | undefined;

export type RawRecord = Record<string, RawValue>;

export type CanonicalRecord = {
  CustomerID: CustomerId;
  cluster?: number;
} & Record<FeatureKey, number>;

/** Six values in `FEATURE_KEYS` order. */
export type FeatureVector = readonly number[];

export type ScaledFeatureVector = readonly number[];

export type RiskTier = "low" | "moderate" | "high";

export type FailureStage = "normalize" | "features" | "cluster" | "value" | "risk";

export type RecordFailure = {
  kind: "SchemaError" | "FeatureError" | "ModelOutputError";
  stage: FailureStage;
  message: string;
  column?: string;
};

export type CustomerProfile = {
  readonly customerId: CustomerId;
  readonly rowIndex: number;
  readonly record: Readonly<CanonicalRecord>;
  readonly features: FeatureVector;
  readonly scaledFeatures: ScaledFeatureVector;
  readonly cluster: number;
  readonly segmentLabel: string;
  readonly recommendedAction: string;
  readonly predictedValue: number | null;
  readonly riskProbability: number | null;
  readonly confidenceScore: number | null;
  readonly riskTier: RiskTier | null;
};

export type ScoredCustomer =
  | { status: "ok"; profile: CustomerProfile }
  | { status: "degraded"; profile: CustomerProfile; failures: RecordFailure[] }
  | {
      status: "failed";
      customerId: CustomerId | null;
      rowIndex: number;
      failures: RecordFailure[];
    };

export type FeatureMatrix = {
  readonly customerIds: readonly CustomerId[];
  readonly rows: readonly ScaledFeatureVector[];
};

export type SimilarNeighbor = {
  customerId: CustomerId;
  similarity: number;
};

export type SimilarityResult = {
  customerId: CustomerId;
  neighbors: SimilarNeighbor[];
};

export type ClusterSummary = {
  cluster: number;
  segmentLabel: string;
  count: number;
  avgSpend: number;
  /** Averages skip customers whose prediction was rejected; null when none remain. */
  avgPredictedValue: number | null;
  avgRiskProbability: number | null;
};

export type ReportSummary = {
  totalCustomers: number;
  scored: number;
  degraded: number;
  failed: number;
  avgOrders: number | null;
  avgSpend: number | null;
  clusterCount: number;
};

export type IntelligenceReport = {
  generatedAt: string;
  modelVersion: string;
  customers: ScoredCustomer[];
  clusters: ClusterSummary[];
  summary: ReportSummary;
  featureMatrix: FeatureMatrix;
};

export type SortField =
  | "customer_id"
  | "predicted_value"
  | "risk_probability"
  | "total_spend";

export type SortOption = {
  field: SortField;
  direction?: "asc" | "desc";
};
