import { CLUSTER_STRATEGIES, FALLBACK_STRATEGY, RISK_TIER_THRESHOLDS } from "../config";
import { resolveSegment } from "./cluster-assigner";
import { RiskTier } from "./types";

export function recommendAction(clusterId: number): string {
  const segment = resolveSegment(clusterId);
  switch (segment.kind) {
    case "labeled":
      return CLUSTER_STRATEGIES[segment.clusterId];
    case "unlabeled":
      return FALLBACK_STRATEGY;
    default: {
      const unreachable: never = segment;
      return unreachable;
    }
  }
}

export function riskTier(riskProbability: number): RiskTier {
  if (riskProbability < RISK_TIER_THRESHOLDS.low) {
    return "low";
  }
  if (riskProbability < RISK_TIER_THRESHOLDS.moderate) {
    return "moderate";
  }
  return "high";
}

export function riskDecision(tier: RiskTier): string {
  switch (tier) {
    case "low":
      return "Low risk customer. Focus on loyalty programs and premium offers.";
    case "moderate":
      return "Moderate risk customer. Use engagement and targeted promotions.";
    case "high":
      return "High risk customer. Start retention actions immediately.";
  }
}
