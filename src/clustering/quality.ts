import { euclideanDistance, meanVector } from "../utils.ts";
import type { Vector } from "../utils.ts";
import { NOISE_LABEL } from "./density.ts";

/**
 * Mean silhouette coefficient over non-noise points. `null` when fewer than
 * two real clusters or fewer than two non-noise points exist.
 */
export function silhouetteScore(vectors: Vector[], labels: number[]): number | null {
  const indices = labels.map((label, i) => ({ label, i })).filter((entry) => entry.label !== NOISE_LABEL);
  const clusterLabels = new Set(indices.map((entry) => entry.label));
  if (clusterLabels.size < 2 || indices.length < 2) {
    return null;
  }

  let total = 0;
  for (const { label, i } of indices) {
    const point = vectors[i] ?? [];
    const sums = new Map<number, { sum: number; count: number }>();
    for (const other of indices) {
      if (other.i === i) {
        continue;
      }
      const entry = sums.get(other.label) ?? { sum: 0, count: 0 };
      entry.sum += euclideanDistance(point, vectors[other.i] ?? []);
      entry.count += 1;
      sums.set(other.label, entry);
    }

    const own = sums.get(label);
    // Singleton clusters score 0.
    if (!own || own.count === 0) {
      continue;
    }
    const a = own.sum / own.count;
    let b = Number.POSITIVE_INFINITY;
    for (const [otherLabel, entry] of sums) {
      if (otherLabel !== label && entry.count > 0) {
        b = Math.min(b, entry.sum / entry.count);
      }
    }
    const denom = Math.max(a, b);
    total += denom === 0 || !Number.isFinite(b) ? 0 : (b - a) / denom;
  }
  return total / indices.length;
}

/** Indices of the `count` members nearest the members' mean vector. */
export function nearestToCentroid(vectors: Vector[], memberIndices: number[], count = 3): number[] {
  if (memberIndices.length === 0) {
    return [];
  }
  const centroid = meanVector(memberIndices.map((i) => vectors[i] ?? []));
  return memberIndices
    .map((i) => ({ i, distance: euclideanDistance(vectors[i] ?? [], centroid) }))
    .sort((a, b) => a.distance - b.distance || a.i - b.i)
    .slice(0, count)
    .map((entry) => entry.i);
}
