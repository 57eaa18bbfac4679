import { ModelOutputError } from "../../../utils/error";
import {
  KNOWN_CLUSTER_IDS,
  KnownClusterId,
  SEGMENT_LABELS,
  UNLABELED_SEGMENT
} from "../config";
import { PartitionModel } from "./models";
import { ScaledFeatureVector } from "./types";

export type Segment =
  | { kind: "labeled"; clusterId: KnownClusterId; label: string }
  | { kind: "unlabeled"; clusterId: number; label: string };

export function isKnownClusterId(clusterId: number): clusterId is KnownClusterId {
  return KNOWN_CLUSTER_IDS.some((known) => known === clusterId);
}

export function assignCluster(
  vector: ScaledFeatureVector,
  partition: PartitionModel
): number {
  const clusterId = partition.assign(vector);
  if (!Number.isInteger(clusterId) || clusterId < 0) {
    throw new ModelOutputError(
      `Partition model returned an invalid cluster id: ${clusterId}`,
      "partition",
      clusterId
    );
  }
  return clusterId;
}

export function resolveSegment(clusterId: number): Segment {
  if (isKnownClusterId(clusterId)) {
    return { kind: "labeled", clusterId, label: SEGMENT_LABELS[clusterId] };
  }
  return { kind: "unlabeled", clusterId, label: UNLABELED_SEGMENT };
}

export function segmentLabel(clusterId: number): string {
  return resolveSegment(clusterId).label;
}
