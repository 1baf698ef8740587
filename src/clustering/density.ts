import { euclideanDistance, median } from "../utils.ts";
import type { Vector } from "../utils.ts";

export const NOISE_LABEL = -1;

export type DensityOptions = {
  /** Neighbourhood radius. Derived from the data when omitted. */
  eps?: number;
  /** Neighbours (excluding the point itself) a core point needs within eps. */
  minSamples?: number;
  /** Groups smaller than this are relabelled as noise. */
  minClusterSize?: number;
};

export type DensityResult = {
  labels: number[];
  eps: number;
  clusterCount: number;
  noiseCount: number;
};

function distanceMatrix(vectors: Vector[]): number[][] {
  const n = vectors.length;
  const matrix = Array.from({ length: n }, () => new Array<number>(n).fill(0));
  for (let i = 0; i < n; i += 1) {
    for (let j = i + 1; j < n; j += 1) {
      const d = euclideanDistance(vectors[i] ?? [], vectors[j] ?? []);
      (matrix[i] ?? [])[j] = d;
      (matrix[j] ?? [])[i] = d;
    }
  }
  return matrix;
}

/** Median distance from each point to its `minSamples`-th nearest neighbour. */
export function estimateEps(vectors: Vector[], minSamples: number): number {
  if (vectors.length < 2) {
    return 0;
  }
  const matrix = distanceMatrix(vectors);
  const kth = matrix.map((row, i) => {
    const others = row.filter((_, j) => j !== i).sort((a, b) => a - b);
    return others[Math.min(minSamples, others.length) - 1] ?? 0;
  });
  return median(kth);
}

/**
 * DBSCAN. Points not density-reachable from any core point get NOISE_LABEL.
 * Cluster labels are assigned in discovery order starting at 0.
 */
export function dbscan(vectors: Vector[], options: DensityOptions = {}): DensityResult {
  const minSamples = Math.max(1, options.minSamples ?? 2);
  const minClusterSize = Math.max(1, options.minClusterSize ?? 5);
  const n = vectors.length;
  if (n === 0) {
    return { labels: [], eps: options.eps ?? 0, clusterCount: 0, noiseCount: 0 };
  }

  const matrix = distanceMatrix(vectors);
  const eps = options.eps ?? estimateEps(vectors, minSamples);
  const neighbours = matrix.map((row, i) => {
    const out: number[] = [];
    row.forEach((d, j) => {
      if (j !== i && d <= eps) {
        out.push(j);
      }
    });
    return out;
  });
  const isCore = neighbours.map((list) => list.length >= minSamples);

  const UNVISITED = -2;
  const labels = new Array<number>(n).fill(UNVISITED);
  let nextLabel = 0;

  for (let i = 0; i < n; i += 1) {
    if (labels[i] !== UNVISITED) {
      continue;
    }
    if (!isCore[i]) {
      labels[i] = NOISE_LABEL;
      continue;
    }
    const label = nextLabel;
    nextLabel += 1;
    labels[i] = label;
    const queue = [...(neighbours[i] ?? [])];
    while (queue.length > 0) {
      const j = queue.shift() ?? 0;
      if (labels[j] === NOISE_LABEL) {
        labels[j] = label;
      }
      if (labels[j] !== UNVISITED) {
        continue;
      }
      labels[j] = label;
      if (isCore[j]) {
        queue.push(...(neighbours[j] ?? []));
      }
    }
  }

  const sizes = new Map<number, number>();
  for (const label of labels) {
    if (label >= 0) {
      sizes.set(label, (sizes.get(label) ?? 0) + 1);
    }
  }
  const remap = new Map<number, number>();
  for (let label = 0; label < nextLabel; label += 1) {
    if ((sizes.get(label) ?? 0) >= minClusterSize) {
      remap.set(label, remap.size);
    }
  }

  const finalLabels = labels.map((label) => remap.get(label) ?? NOISE_LABEL);
  return {
    labels: finalLabels,
    eps,
    clusterCount: remap.size,
    noiseCount: finalLabels.filter((label) => label === NOISE_LABEL).length,
  };
}
