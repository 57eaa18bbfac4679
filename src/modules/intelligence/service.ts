import { BatchLimitError } from "../../utils/error";
import { createLogger } from "../../utils/logger";
import { DEFAULT_INTELLIGENCE_OPTIONS, IntelligenceOptions } from "./config";
import { CustomerInsight, describeCustomer } from "./lib/customer-insight";
import { ModelBundle } from "./lib/models";
import { exportReportCsv } from "./lib/report-export";
import {
  normalizeBatch,
  normalizeRows
} from "./lib/schema-normalizer";
import { scoreBatch, scoreNormalizedRows } from "./lib/scoring";
import { findSimilar } from "./lib/similarity";
import {
  aggregateTransactions,
  AggregateOptions
} from "./lib/transaction-aggregator";
import {
  CanonicalRecord,
  CustomerId,
  IntelligenceReport,
  RawRecord,
  SimilarityResult,
  SortOption
} from "./lib/types";

const logger = createLogger("intelligence");

export type ScoreOptions = {
  sort?: SortOption;
};

/**
 * Binds a loaded model bundle for the lifetime of the process. Every scoring
 * pass builds its own profiles and feature matrix; the bundle is never
 * mutated.
 */
class CustomerIntelligenceService {
  private readonly options: IntelligenceOptions;

  constructor(
    private readonly models: ModelBundle,
    options: Partial<IntelligenceOptions> = {}
  ) {
    this.options = {
      ...DEFAULT_INTELLIGENCE_OPTIONS,
      ...options
    };
  }

  get modelVersion(): string {
    return this.models.version;
  }

  get configuration(): IntelligenceOptions {
    return { ...this.options };
  }

  normalizeBatch(rows: readonly RawRecord[]): CanonicalRecord[] {
    this.assertBatchSize(rows.length);
    return normalizeBatch(rows);
  }

  aggregateTransactions(
    rows: readonly RawRecord[],
    options: AggregateOptions = {}
  ): CanonicalRecord[] {
    return aggregateTransactions(rows, options);
  }

  scoreBatch(
    records: readonly CanonicalRecord[],
    options: ScoreOptions = {}
  ): IntelligenceReport {
    const report = scoreBatch(records, this.models, {
      maxBatchSize: this.options.maxBatchSize,
      sort: options.sort
    });
    this.logReport(report);
    return report;
  }

  /** Lenient scoring of raw rows: unreadable rows become failed slots. */
  scoreRawBatch(
    rows: readonly RawRecord[],
    options: ScoreOptions = {}
  ): IntelligenceReport {
    this.assertBatchSize(rows.length);
    const report = scoreNormalizedRows(normalizeRows(rows), this.models, {
      maxBatchSize: this.options.maxBatchSize,
      sort: options.sort
    });
    this.logReport(report);
    return report;
  }

  findSimilar(
    report: IntelligenceReport,
    customerId: CustomerId,
    k: number = this.options.similarityTopK
  ): SimilarityResult {
    return findSimilar(customerId, report.featureMatrix, k);
  }

  describeCustomer(
    report: IntelligenceReport,
    customerId: CustomerId,
    k: number = this.options.similarityTopK
  ): CustomerInsight {
    return describeCustomer(report, customerId, k);
  }

  exportCsv(report: IntelligenceReport): string {
    return exportReportCsv(report);
  }

  private assertBatchSize(size: number): void {
    if (size > this.options.maxBatchSize) {
      throw new BatchLimitError(size, this.options.maxBatchSize);
    }
  }

  private logReport(report: IntelligenceReport): void {
    const { summary } = report;
    logger.debug("Batch scored", {
      modelVersion: report.modelVersion,
      customers: summary.totalCustomers,
      clusters: summary.clusterCount
    });
    if (summary.degraded || summary.failed) {
      logger.warn("Batch completed with flagged records", {
        degraded: summary.degraded,
        failed: summary.failed
      });
    }
  }
}

export default CustomerIntelligenceService;
