export type HealthIssueType = "few_clusters" | "many_clusters" | "high_noise" | "moderate_noise" | "low_silhouette";

export type HealthIssue = {
  type: HealthIssueType;
  severity: "warning" | "info";
  message: string;
  suggestion: string;
};

export type ClusterSizeSummary = {
  size: number;
  isNoise: boolean;
};

export type HealthInput = {
  clusters: ClusterSizeSummary[];
  totalRecords: number;
  silhouette: number | null;
};

/** Noise members over all records. Sums member counts, not noise clusters. */
export function computeNoiseRatio(clusters: ClusterSizeSummary[], totalRecords: number): number {
  if (totalRecords <= 0) {
    return 0;
  }
  const noise = clusters.filter((cluster) => cluster.isNoise).reduce((sum, cluster) => sum + cluster.size, 0);
  return Math.min(1, noise / totalRecords);
}

function percent(ratio: number): string {
  return `${Math.round(ratio * 100)}%`;
}

/** Advisory diagnostics; never blocks a run. */
export function assessClusterHealth(input: HealthInput): HealthIssue[] {
  const realClusters = input.clusters.filter((cluster) => !cluster.isNoise).length;
  const noiseRatio = computeNoiseRatio(input.clusters, input.totalRecords);
  const issues: HealthIssue[] = [];

  if (realClusters < 3) {
    issues.push({
      type: "few_clusters",
      severity: "warning",
      message: `Only ${realClusters} cluster(s) found - this may be underwhelming`,
      suggestion: "The corpus may be stylistically uniform, or the density parameters need tuning.",
    });
  }
  if (realClusters > 10) {
    issues.push({
      type: "many_clusters",
      severity: "warning",
      message: `${realClusters} clusters found - this may be too fragmented`,
      suggestion: "Raise the minimum cluster size to consolidate similar styles.",
    });
  }

  if (noiseRatio > 0.3) {
    issues.push({
      type: "high_noise",
      severity: "warning",
      message: `${percent(noiseRatio)} of records are noise - poor cluster fit`,
      suggestion: "Density clustering could not place many records. Try k-means to force assignment.",
    });
  } else if (noiseRatio > 0.1) {
    issues.push({
      type: "moderate_noise",
      severity: "info",
      message: `${percent(noiseRatio)} of records are noise - moderate`,
      suggestion: "Some records do not fit cleanly. This is often acceptable.",
    });
  }

  if (input.silhouette !== null && realClusters > 1 && input.silhouette < 0.15) {
    issues.push({
      type: "low_silhouette",
      severity: "warning",
      message: `Silhouette score ${input.silhouette.toFixed(2)} indicates weak cluster separation`,
      suggestion: "Clusters may overlap significantly. Adjust parameters or switch algorithm.",
    });
  }

  return issues;
}

/** Rule-of-thumb cluster count for a corpus size. */
export function suggestedClusterRange(totalRecords: number): { min: number; max: number } {
  if (totalRecords < 200) {
    return { min: 3, max: 4 };
  }
  if (totalRecords < 500) {
    return { min: 4, max: 6 };
  }
  return { min: 5, max: 8 };
}
