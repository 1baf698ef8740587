import { NotFoundError, ValidationError } from "../errors.ts";
import { clusterCoverage } from "../coverage/tracker.ts";
import type { ClusterCoverage } from "../coverage/tracker.ts";
import type { Cluster, ClusterSnapshot } from "../store/schemas.ts";
import { buildAnalysisPrompt } from "./prompt.ts";
import type { PromptRecord } from "./prompt.ts";

export type BatchPayload = {
  batchId: string;
  clusterId: number;
  recordIds: string[];
  records: PromptRecord[];
  prompt: string;
};

export type ClusterBatchPlan = {
  cluster: Cluster;
  coverage: ClusterCoverage;
  batches: BatchPayload[];
};

export type PrepareOptions = {
  snapshot: ClusterSnapshot;
  clusterId: number;
  texts: ReadonlyMap<string, string>;
  analyzedIds: ReadonlySet<string>;
  maxBatchSize: number;
  coverageThreshold: number;
  calibration: string;
};

export type TokenEstimate = {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
};

/** Sequential, non-overlapping chunks of at most `cap` ids. */
export function splitIntoBatches(ids: string[], cap: number): string[][] {
  if (cap < 1) {
    throw new ValidationError(`Batch size cap must be at least 1, got ${cap}`);
  }
  const out: string[][] = [];
  for (let start = 0; start < ids.length; start += cap) {
    out.push(ids.slice(start, start + cap));
  }
  return out;
}

export function batchIdFor(clusterId: number, index: number, total: number): string {
  return total > 1 ? `${clusterId}_${index + 1}` : String(clusterId);
}

export function findCluster(snapshot: ClusterSnapshot, clusterId: number): Cluster {
  const cluster = snapshot.clusters.find((candidate) => candidate.id === clusterId);
  if (!cluster) {
    throw new NotFoundError(`Cluster ${clusterId} not found in the current cluster snapshot`);
  }
  return cluster;
}

/**
 * Builds request payloads for a cluster's unanalyzed members. Read-only; an
 * already fully analyzed cluster yields no batches.
 */
export function prepareClusterBatches(options: PrepareOptions): ClusterBatchPlan {
  const cluster = findCluster(options.snapshot, options.clusterId);
  if (cluster.isNoise) {
    throw new ValidationError(`Cluster ${cluster.id} is the noise group and cannot be analyzed as a persona`);
  }

  const coverage = clusterCoverage(cluster, options.analyzedIds, options.coverageThreshold);
  const chunks = splitIntoBatches(coverage.remainingIds, options.maxBatchSize);

  const batches = chunks.map((recordIds, index) => {
    const records = recordIds.map((id) => {
      const text = options.texts.get(id);
      if (text === undefined) {
        throw new NotFoundError(`Record ${id} of cluster ${cluster.id} is missing from the corpus`);
      }
      return { id, text };
    });
    const batchId = batchIdFor(cluster.id, index, chunks.length);
    return {
      batchId,
      clusterId: cluster.id,
      recordIds,
      records,
      prompt: buildAnalysisPrompt({
        clusterId: cluster.id,
        batchId,
        clusterSize: cluster.size,
        exemplarIds: cluster.exemplarIds,
        records,
        calibration: options.calibration,
      }),
    };
  });

  return { cluster, coverage, batches };
}

/** Rough ~4 characters per token; output scales with record count. */
export function estimateTokens(prompt: string, recordCount: number): TokenEstimate {
  const inputTokens = Math.floor(prompt.length / 4);
  const outputTokens = Math.max(1500, recordCount * 100);
  return { inputTokens, outputTokens, totalTokens: inputTokens + outputTokens };
}
