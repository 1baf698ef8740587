import type { Cluster } from "../store/schemas.ts";

export type ClusterCoverage = {
  clusterId: number;
  size: number;
  analyzed: number;
  remainingIds: string[];
  coverage: number;
  required: number;
  meetsThreshold: boolean;
};

export type CoverageProjection = {
  clusterId: number;
  size: number;
  alreadyAnalyzed: number;
  incoming: number;
  projectedAnalyzed: number;
  projectedCoverage: number;
  required: number;
  shortfall: number;
  meetsThreshold: boolean;
};

/** ceil(size * threshold), tolerant of float error such as 10 * 0.7. */
export function requiredCount(size: number, threshold: number): number {
  return Math.max(0, Math.ceil(size * threshold - 1e-9));
}

export function clusterCoverage(cluster: Cluster, analyzedIds: ReadonlySet<string>, threshold: number): ClusterCoverage {
  const remainingIds = cluster.memberIds.filter((id) => !analyzedIds.has(id));
  const analyzed = cluster.size - remainingIds.length;
  const required = requiredCount(cluster.size, threshold);
  return {
    clusterId: cluster.id,
    size: cluster.size,
    analyzed,
    remainingIds,
    coverage: cluster.size > 0 ? analyzed / cluster.size : 0,
    required,
    meetsThreshold: analyzed >= required,
  };
}

/**
 * Coverage the cluster would reach if `incomingIds` were committed. Incoming
 * ids outside the cluster, or already analyzed, do not count.
 */
export function projectCoverage(
  cluster: Cluster,
  analyzedIds: ReadonlySet<string>,
  incomingIds: Iterable<string>,
  threshold: number,
): CoverageProjection {
  const members = new Set(cluster.memberIds);
  const alreadyAnalyzed = cluster.memberIds.filter((id) => analyzedIds.has(id)).length;
  const incoming = new Set([...incomingIds].filter((id) => members.has(id) && !analyzedIds.has(id))).size;
  const projectedAnalyzed = alreadyAnalyzed + incoming;
  const required = requiredCount(cluster.size, threshold);
  const shortfall = Math.max(0, required - projectedAnalyzed);
  return {
    clusterId: cluster.id,
    size: cluster.size,
    alreadyAnalyzed,
    incoming,
    projectedAnalyzed,
    projectedCoverage: cluster.size > 0 ? projectedAnalyzed / cluster.size : 0,
    required,
    shortfall,
    meetsThreshold: shortfall === 0,
  };
}

export function describeShortfall(projection: CoverageProjection, threshold: number): string {
  return (
    `cluster ${projection.clusterId}: projected ${projection.projectedAnalyzed}/${projection.size} ` +
    `(${Math.round(projection.projectedCoverage * 100)}%) is below ${Math.round(threshold * 100)}%; ` +
    `need ${projection.shortfall} more of ${projection.required} required`
  );
}

/** Real clusters that have been started but are still below the threshold. */
export function incompleteClusters(
  clusters: Cluster[],
  analyzedIds: ReadonlySet<string>,
  threshold: number,
): ClusterCoverage[] {
  return clusters
    .filter((cluster) => !cluster.isNoise)
    .map((cluster) => clusterCoverage(cluster, analyzedIds, threshold))
    .filter((coverage) => coverage.analyzed > 0 && !coverage.meetsThreshold);
}

/** First real cluster (snapshot order) that still has unanalyzed members. */
export function nextClusterToAnalyze(clusters: Cluster[], analyzedIds: ReadonlySet<string>): number | null {
  for (const cluster of clusters) {
    if (!cluster.isNoise && cluster.memberIds.some((id) => !analyzedIds.has(id))) {
      return cluster.id;
    }
  }
  return null;
}
