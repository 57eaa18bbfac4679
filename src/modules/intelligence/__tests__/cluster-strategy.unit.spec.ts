import { ModelOutputError } from "../../../utils/error";
import { CLUSTER_STRATEGIES, FALLBACK_STRATEGY, UNLABELED_SEGMENT } from "../config";
import { assignCluster, resolveSegment, segmentLabel } from "../lib/cluster-assigner";
import { recommendAction, riskDecision, riskTier } from "../lib/strategy";
import { buildTestBundle } from "./fixtures";

describe("assignCluster", () => {
  const { partition } = buildTestBundle();

  it("returns the nearest centroid", () => {
    expect(assignCluster([0.86, 0.8, 0.76, 0.6, -0.72, 0.67], partition)).toBe(0);
    expect(assignCluster([-1.43, -1.45, -1.43, -1.4, 1.44, -1], partition)).toBe(1);
  });

  it("rejects a negative or fractional id", () => {
    expect(() => assignCluster([0, 0, 0, 0, 0, 0], { assign: () => -1 })).toThrow(
      ModelOutputError
    );
    expect(() => assignCluster([0, 0, 0, 0, 0, 0], { assign: () => 1.5 })).toThrow(
      ModelOutputError
    );
  });
});

describe("segments", () => {
  it("labels every known cluster", () => {
    expect(segmentLabel(0)).toBe("Loyal & High Value");
    expect(segmentLabel(4)).toBe("High Churn Risk");
    expect(resolveSegment(2)).toEqual({
      kind: "labeled",
      clusterId: 2,
      label: "Price Sensitive"
    });
  });

  it("falls back for an unknown cluster id", () => {
    expect(resolveSegment(99)).toEqual({
      kind: "unlabeled",
      clusterId: 99,
      label: UNLABELED_SEGMENT
    });
    expect(recommendAction(99)).toBe(FALLBACK_STRATEGY);
  });

  it("recommends the cluster strategy", () => {
    expect(recommendAction(3)).toBe(CLUSTER_STRATEGIES[3]);
  });
});

describe("risk tiers", () => {
  it.each([
    [0, "low"],
    [0.29, "low"],
    [0.3, "moderate"],
    [0.59, "moderate"],
    [0.6, "high"],
    [1, "high"]
  ] as const)("maps %p to %s", (probability, tier) => {
    expect(riskTier(probability)).toBe(tier);
  });

  it("phrases a decision per tier", () => {
    expect(riskDecision("high")).toBe(
      "High risk customer. Start retention actions immediately."
    );
  });
});
