import {
  BatchLimitError,
  FeatureError,
  ModelOutputError,
  SchemaError
} from "../../../utils/error";
import { mean } from "../../../utils/number";
import { assignCluster, segmentLabel } from "./cluster-assigner";
import {
  buildFeatureMatrix,
  buildFeatureVector,
  scaleFeatureVector
} from "./feature-vector";
import { ModelBundle } from "./models";
import { assertUniqueCustomerIds, NormalizedRow } from "./schema-normalizer";
import { recommendAction, riskTier } from "./strategy";
import {
  CanonicalRecord,
  ClusterSummary,
  CustomerProfile,
  FailureStage,
  FeatureVector,
  IntelligenceReport,
  RecordFailure,
  ReportSummary,
  ScaledFeatureVector,
  ScoredCustomer,
  SortOption
} from "./types";
import { confidenceFromRisk, predictRisk, predictValue } from "./value-risk-predictor";

export type ScoreBatchOptions = {
  maxBatchSize?: number;
  sort?: SortOption;
  now?: Date;
};

/**
 * Converts a pipeline error into a per-record failure. Anything that is not a
 * pipeline error is rethrown.
 */
export function toRecordFailure(error: unknown, stage: FailureStage): RecordFailure {
  if (error instanceof SchemaError) {
    return {
      kind: "SchemaError",
      stage,
      message: error.message,
      column: error.issues[0]?.column
    };
  }
  if (error instanceof FeatureError) {
    const feature = error.details?.feature;
    return {
      kind: "FeatureError",
      stage,
      message: error.message,
      column: typeof feature === "string" ? feature : undefined
    };
  }
  if (error instanceof ModelOutputError) {
    return { kind: "ModelOutputError", stage, message: error.message };
  }
  throw error;
}

function scoreRecord(
  record: CanonicalRecord,
  rowIndex: number,
  models: ModelBundle
): ScoredCustomer {
  const fail = (failure: RecordFailure): ScoredCustomer => ({
    status: "failed",
    customerId: record.CustomerID,
    rowIndex,
    failures: [failure]
  });

  let features: FeatureVector;
  let scaledFeatures: ScaledFeatureVector;
  try {
    features = Object.freeze(buildFeatureVector(record));
    scaledFeatures = scaleFeatureVector(features, models.scaler);
  } catch (error) {
    return fail(toRecordFailure(error, "features"));
  }

  let cluster: number;
  try {
    cluster = assignCluster(scaledFeatures, models.partition);
  } catch (error) {
    return fail(toRecordFailure(error, "cluster"));
  }

  // value and risk are independent: one rejection never blocks the other
  const failures: RecordFailure[] = [];
  let predictedValue: number | null = null;
  try {
    predictedValue = predictValue(scaledFeatures, models.regression);
  } catch (error) {
    failures.push(toRecordFailure(error, "value"));
  }

  let riskProbability: number | null = null;
  try {
    riskProbability = predictRisk(scaledFeatures, models.classifier);
  } catch (error) {
    failures.push(toRecordFailure(error, "risk"));
  }

  const profile: CustomerProfile = Object.freeze({
    customerId: record.CustomerID,
    rowIndex,
    record: Object.freeze({ ...record }),
    features,
    scaledFeatures,
    cluster,
    segmentLabel: segmentLabel(cluster),
    recommendedAction: recommendAction(cluster),
    predictedValue,
    riskProbability,
    confidenceScore:
      riskProbability === null ? null : confidenceFromRisk(riskProbability),
    riskTier: riskProbability === null ? null : riskTier(riskProbability)
  });

  return failures.length
    ? { status: "degraded", profile, failures }
    : { status: "ok", profile };
}

function profileOf(customer: ScoredCustomer): CustomerProfile | null {
  return customer.status === "failed" ? null : customer.profile;
}

const collator = new Intl.Collator("en", { numeric: true });

function sortValue(
  profile: CustomerProfile,
  field: SortOption["field"]
): string | number | null {
  switch (field) {
    case "customer_id":
      return profile.customerId;
    case "predicted_value":
      return profile.predictedValue;
    case "risk_probability":
      return profile.riskProbability;
    case "total_spend":
      return profile.record.total_spend;
  }
}

/** Stable sort; failed slots and null values always go last. */
export function sortCustomers(
  customers: readonly ScoredCustomer[],
  sort: SortOption
): ScoredCustomer[] {
  const sign = sort.direction === "desc" ? -1 : 1;
  return customers.slice().sort((left, right) => {
    const a = profileOf(left);
    const b = profileOf(right);
    const va = a === null ? null : sortValue(a, sort.field);
    const vb = b === null ? null : sortValue(b, sort.field);
    if (va === null || vb === null) {
      return va === vb ? 0 : va === null ? 1 : -1;
    }
    if (typeof va === "string" || typeof vb === "string") {
      return sign * collator.compare(String(va), String(vb));
    }
    return sign * (va - vb);
  });
}

export function summarizeClusters(
  profiles: readonly CustomerProfile[]
): ClusterSummary[] {
  const groups = new Map<number, CustomerProfile[]>();
  for (const profile of profiles) {
    const group = groups.get(profile.cluster) ?? [];
    group.push(profile);
    groups.set(profile.cluster, group);
  }

  return Array.from(groups.entries())
    .sort(([a], [b]) => a - b)
    .map(([cluster, members]) => {
      const values = members.flatMap((member) =>
        member.predictedValue === null ? [] : [member.predictedValue]
      );
      const risks = members.flatMap((member) =>
        member.riskProbability === null ? [] : [member.riskProbability]
      );
      return {
        cluster,
        segmentLabel: segmentLabel(cluster),
        count: members.length,
        avgSpend: mean(members.map((member) => member.record.total_spend)) ?? 0,
        avgPredictedValue: mean(values),
        avgRiskProbability: mean(risks)
      };
    });
}

function summarize(
  customers: readonly ScoredCustomer[],
  profiles: readonly CustomerProfile[],
  clusters: readonly ClusterSummary[]
): ReportSummary {
  return {
    totalCustomers: customers.length,
    scored: customers.filter((customer) => customer.status === "ok").length,
    degraded: customers.filter((customer) => customer.status === "degraded").length,
    failed: customers.filter((customer) => customer.status === "failed").length,
    avgOrders: mean(profiles.map((profile) => profile.record.total_orders)),
    avgSpend: mean(profiles.map((profile) => profile.record.total_spend)),
    clusterCount: clusters.length
  };
}

/**
 * Scores normalized rows, turning row-level schema failures into failed
 * slots. Row order is preserved unless a sort is requested.
 */
export function scoreNormalizedRows(
  rows: readonly NormalizedRow[],
  models: ModelBundle,
  options: ScoreBatchOptions = {}
): IntelligenceReport {
  if (options.maxBatchSize !== undefined && rows.length > options.maxBatchSize) {
    throw new BatchLimitError(rows.length, options.maxBatchSize);
  }
  // failed rows still claim their id when one was readable
  assertUniqueCustomerIds(
    rows.flatMap((row) => {
      if (row.ok) {
        return [row.record];
      }
      return row.customerId === null ? [] : [{ CustomerID: row.customerId }];
    })
  );

  const scored = rows.map((row): ScoredCustomer => {
    if (row.ok) {
      return scoreRecord(row.record, row.rowIndex, models);
    }
    return {
      status: "failed",
      customerId: row.customerId,
      rowIndex: row.rowIndex,
      failures: row.error.issues.map((issue): RecordFailure => ({
        kind: "SchemaError",
        stage: "normalize",
        message: issue.reason,
        column: issue.column
      }))
    };
  });

  const customers = options.sort ? sortCustomers(scored, options.sort) : scored;
  const profiles = customers.flatMap((customer) => {
    const profile = profileOf(customer);
    return profile === null ? [] : [profile];
  });
  const clusters = summarizeClusters(profiles);

  return {
    generatedAt: (options.now ?? new Date()).toISOString(),
    modelVersion: models.version,
    customers,
    clusters,
    summary: summarize(customers, profiles, clusters),
    featureMatrix: buildFeatureMatrix(profiles)
  };
}

export function scoreBatch(
  records: readonly CanonicalRecord[],
  models: ModelBundle,
  options: ScoreBatchOptions = {}
): IntelligenceReport {
  return scoreNormalizedRows(
    records.map((record, rowIndex): NormalizedRow => ({ ok: true, rowIndex, record })),
    models,
    options
  );
}
