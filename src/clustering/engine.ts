import type { ClusteringConfig } from "../config.ts";
import { ValidationError } from "../errors.ts";
import { getLogger } from "../log/logger.ts";
import { NOISE_CLUSTER_ID } from "../store/schemas.ts";
import type { Cluster, ClusterSnapshot } from "../store/schemas.ts";
import { euclideanDistance, meanVector, round } from "../utils.ts";
import type { Vector } from "../utils.ts";
import { dbscan, NOISE_LABEL } from "./density.ts";
import { assessClusterHealth, computeNoiseRatio } from "./health.ts";
import { chooseK, kmeans } from "./kmeans.ts";
import { nearestToCentroid, silhouetteScore } from "./quality.ts";

const log = getLogger({ module: "clustering" });

export type ClusterInput = {
  ids: string[];
  vectors: Vector[];
  embeddingModel?: string | null;
};

export type LabelledRun = {
  algorithm: "density" | "kmeans";
  labels: number[];
  parameters: ClusterSnapshot["parameters"];
};

export class ClusterEngine {
  private config: ClusteringConfig;

  constructor(config: ClusteringConfig) {
    this.config = config;
  }

  selectAlgorithm(recordCount: number): "density" | "kmeans" {
    if (this.config.algorithm !== "auto") {
      return this.config.algorithm;
    }
    return recordCount >= this.config.densityMinRecords ? "density" : "kmeans";
  }

  label(vectors: Vector[]): LabelledRun {
    const algorithm = this.selectAlgorithm(vectors.length);
    const { seed, minSamples, minClusterSize } = this.config;

    if (algorithm === "density") {
      const result = dbscan(vectors, { eps: this.config.eps, minSamples, minClusterSize });
      return {
        algorithm,
        labels: result.labels,
        parameters: { eps: round(result.eps, 6), minSamples, minClusterSize, seed },
      };
    }

    const requested = this.config.k ?? chooseK(vectors, { seed });
    const k = Math.min(requested, vectors.length);
    const result = kmeans(vectors, k, { seed });
    return { algorithm, labels: result.labels, parameters: { k, seed } };
  }

  /**
   * Clusters the given vectors and returns a complete snapshot. Real clusters
   * are renumbered from 0 by descending size; noise, if any, comes last with
   * id -1.
   */
  run(input: ClusterInput, now: Date = new Date()): ClusterSnapshot {
    const { ids, vectors } = input;
    if (ids.length !== vectors.length) {
      throw new ValidationError(`Got ${ids.length} record ids for ${vectors.length} vectors`);
    }
    if (vectors.length === 0) {
      throw new ValidationError("No embedded records to cluster");
    }

    log.info({ records: vectors.length, algorithm: this.selectAlgorithm(vectors.length) }, "clustering started");
    const run = this.label(vectors);

    const groups = new Map<number, number[]>();
    run.labels.forEach((label, index) => {
      const members = groups.get(label) ?? [];
      members.push(index);
      groups.set(label, members);
    });

    const realLabels = [...groups.keys()]
      .filter((label) => label !== NOISE_LABEL)
      .sort((a, b) => (groups.get(b)?.length ?? 0) - (groups.get(a)?.length ?? 0) || a - b);

    const clusters: Cluster[] = realLabels.map((label, position) => {
      const members = groups.get(label) ?? [];
      const centroid = meanVector(members.map((i) => vectors[i] ?? []));
      const meanDistance =
        members.reduce((sum, i) => sum + euclideanDistance(vectors[i] ?? [], centroid), 0) / members.length;
      return {
        id: position,
        memberIds: members.map((i) => ids[i] ?? ""),
        size: members.length,
        isNoise: false,
        exemplarIds: nearestToCentroid(vectors, members, 3).map((i) => ids[i] ?? ""),
        meanDistance: round(meanDistance, 4),
      };
    });

    const noiseMembers = groups.get(NOISE_LABEL) ?? [];
    if (noiseMembers.length > 0) {
      clusters.push({
        id: NOISE_CLUSTER_ID,
        memberIds: noiseMembers.map((i) => ids[i] ?? ""),
        size: noiseMembers.length,
        isNoise: true,
        exemplarIds: [],
        meanDistance: null,
      });
    }

    const silhouette = silhouetteScore(vectors, run.labels);
    const noiseRatio = computeNoiseRatio(clusters, vectors.length);
    const healthIssues = assessClusterHealth({ clusters, totalRecords: vectors.length, silhouette });

    const snapshot: ClusterSnapshot = {
      createdAt: now.toISOString(),
      algorithm: run.algorithm,
      parameters: run.parameters,
      totalRecords: vectors.length,
      clusterCount: realLabels.length,
      noiseCount: noiseMembers.length,
      noiseRatio: round(noiseRatio, 4),
      silhouette: silhouette === null ? null : round(silhouette, 4),
      embeddingModel: input.embeddingModel ?? null,
      clusters,
      healthIssues,
    };

    log.info(
      {
        clusters: snapshot.clusterCount,
        noise: snapshot.noiseCount,
        silhouette: snapshot.silhouette,
        issues: healthIssues.map((issue) => issue.type),
      },
      "clustering finished",
    );
    return snapshot;
  }
}

/** Maps record id to cluster id for every member of the snapshot. */
export function clusterAssignments(snapshot: ClusterSnapshot): Map<string, number> {
  const out = new Map<string, number>();
  for (const cluster of snapshot.clusters) {
    for (const id of cluster.memberIds) {
      out.set(id, cluster.id);
    }
  }
  return out;
}
