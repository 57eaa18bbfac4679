import CustomerIntelligenceService from "./service";

export { CustomerIntelligenceService };
export * from "./config";
export * from "./lib/types";
export * from "./lib/models";
export { loadModelBundle, parseModelBundle } from "./lib/model-loader";
export type { ModelBundleDocument } from "./lib/model-loader";
export {
  normalizeBatch,
  normalizeRows,
  normalizeColumnName
} from "./lib/schema-normalizer";
export type { NormalizedRow } from "./lib/schema-normalizer";
export { buildFeatureMatrix, buildFeatureVector, scaleFeatureVector } from "./lib/feature-vector";
export { assignCluster, resolveSegment, segmentLabel } from "./lib/cluster-assigner";
export type { Segment } from "./lib/cluster-assigner";
export { predictRisk, predictValue, confidenceFromRisk } from "./lib/value-risk-predictor";
export { cosineSimilarity, findSimilar, rankNeighbors } from "./lib/similarity";
export { recommendAction, riskDecision, riskTier } from "./lib/strategy";
export { scoreBatch, scoreNormalizedRows } from "./lib/scoring";
export type { ScoreBatchOptions } from "./lib/scoring";
export { describeCustomer } from "./lib/customer-insight";
export type { CustomerInsight, NeighborDetail } from "./lib/customer-insight";
export { aggregateTransactions } from "./lib/transaction-aggregator";
export { EXPORT_COLUMNS, exportReportCsv, toExportRows } from "./lib/report-export";
