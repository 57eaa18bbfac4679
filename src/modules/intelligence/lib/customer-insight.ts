import { CustomerNotFoundError } from "../../../utils/error";
import { findSimilar } from "./similarity";
import { riskDecision } from "./strategy";
import {
  CustomerId,
  CustomerProfile,
  IntelligenceReport,
  RecordFailure,
  ScoredCustomer
} from "./types";

export type NeighborDetail = {
  customerId: CustomerId;
  similarity: number;
  totalSpend: number;
  segmentLabel: string;
};

export type CustomerInsight =
  | {
      customerId: CustomerId;
      status: "ok" | "degraded";
      profile: CustomerProfile;
      failures: RecordFailure[];
      recommendedAction: string;
      riskDecision: string | null;
      similar: NeighborDetail[];
    }
  | {
      customerId: CustomerId;
      status: "failed";
      rowIndex: number;
      failures: RecordFailure[];
      similar: [];
    };

function slotCustomerId(customer: ScoredCustomer): CustomerId | null {
  return customer.status === "failed" ? customer.customerId : customer.profile.customerId;
}

/** Interactive single-customer lookup against an already scored batch. */
export function describeCustomer(
  report: IntelligenceReport,
  customerId: CustomerId,
  k: number
): CustomerInsight {
  const slot = report.customers.find(
    (customer) => slotCustomerId(customer) === customerId
  );
  if (!slot) {
    throw new CustomerNotFoundError(customerId);
  }
  if (slot.status === "failed") {
    return {
      customerId,
      status: "failed",
      rowIndex: slot.rowIndex,
      failures: slot.failures,
      similar: []
    };
  }

  const profiles = new Map<CustomerId, CustomerProfile>();
  for (const customer of report.customers) {
    if (customer.status !== "failed") {
      profiles.set(customer.profile.customerId, customer.profile);
    }
  }

  const { neighbors } = findSimilar(customerId, report.featureMatrix, k);
  const similar = neighbors.flatMap((neighbor) => {
    const profile = profiles.get(neighbor.customerId);
    return profile
      ? [
          {
            customerId: neighbor.customerId,
            similarity: neighbor.similarity,
            totalSpend: profile.record.total_spend,
            segmentLabel: profile.segmentLabel
          }
        ]
      : [];
  });

  const { profile } = slot;
  return {
    customerId,
    status: slot.status,
    profile,
    failures: slot.status === "degraded" ? slot.failures : [],
    recommendedAction: profile.recommendedAction,
    riskDecision: profile.riskTier === null ? null : riskDecision(profile.riskTier),
    similar
  };
}
