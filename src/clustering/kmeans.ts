import { squaredDistance, meanVector } from "../utils.ts";
import type { Vector } from "../utils.ts";
import { SeededRandom } from "./random.ts";

export type KMeansOptions = {
  seed?: number;
  nInit?: number;
  maxIterations?: number;
  tolerance?: number;
};

export type KMeansResult = {
  labels: number[];
  centroids: Vector[];
  inertia: number;
  iterations: number;
};

function nearestCentroid(point: Vector, centroids: Vector[]): { index: number; distance: number } {
  let index = 0;
  let distance = Number.POSITIVE_INFINITY;
  centroids.forEach((centroid, i) => {
    const d = squaredDistance(point, centroid);
    if (d < distance) {
      distance = d;
      index = i;
    }
  });
  return { index, distance };
}

function seedCentroids(vectors: Vector[], k: number, rng: SeededRandom): Vector[] {
  const first = vectors[rng.nextInt(0, vectors.length)] ?? [];
  const centroids: Vector[] = [first.slice()];
  while (centroids.length < k) {
    const weights = vectors.map((point) => nearestCentroid(point, centroids).distance);
    const next = vectors[rng.weightedIndex(weights)] ?? first;
    centroids.push(next.slice());
  }
  return centroids;
}

function runOnce(vectors: Vector[], k: number, rng: SeededRandom, maxIterations: number, tolerance: number): KMeansResult {
  let centroids = seedCentroids(vectors, k, rng);
  let labels = new Array<number>(vectors.length).fill(0);
  let iterations = 0;

  for (; iterations < maxIterations; iterations += 1) {
    labels = vectors.map((point) => nearestCentroid(point, centroids).index);

    const next: Vector[] = [];
    for (let c = 0; c < k; c += 1) {
      const members = vectors.filter((_, i) => labels[i] === c);
      if (members.length > 0) {
        next.push(meanVector(members));
        continue;
      }
      // Empty cluster: restart it on the point worst served by its centroid.
      let worst = 0;
      let worstDistance = -1;
      vectors.forEach((point, i) => {
        const d = squaredDistance(point, centroids[labels[i] ?? 0] ?? point);
        if (d > worstDistance) {
          worstDistance = d;
          worst = i;
        }
      });
      next.push((vectors[worst] ?? []).slice());
    }

    const shift = next.reduce((sum, centroid, c) => sum + squaredDistance(centroid, centroids[c] ?? centroid), 0);
    centroids = next;
    if (shift <= tolerance) {
      iterations += 1;
      break;
    }
  }

  labels = vectors.map((point) => nearestCentroid(point, centroids).index);
  const inertia = vectors.reduce((sum, point, i) => sum + squaredDistance(point, centroids[labels[i] ?? 0] ?? point), 0);
  return { labels, centroids, inertia, iterations };
}

/**
 * Lloyd's k-means with k-means++ seeding. Runs `nInit` restarts from one
 * seeded generator and keeps the lowest-inertia solution. `k` is capped at the
 * number of points.
 */
export function kmeans(vectors: Vector[], k: number, options: KMeansOptions = {}): KMeansResult {
  if (vectors.length === 0) {
    return { labels: [], centroids: [], inertia: 0, iterations: 0 };
  }
  const clusters = Math.max(1, Math.min(k, vectors.length));
  const rng = new SeededRandom(options.seed ?? 42);
  const nInit = Math.max(1, options.nInit ?? 10);
  const maxIterations = options.maxIterations ?? 300;
  const tolerance = options.tolerance ?? 1e-8;

  let best: KMeansResult | null = null;
  for (let run = 0; run < nInit; run += 1) {
    const result = runOnce(vectors, clusters, rng, maxIterations, tolerance);
    if (!best || result.inertia < best.inertia) {
      best = result;
    }
  }
  return best ?? runOnce(vectors, clusters, rng, maxIterations, tolerance);
}

/**
 * Picks k from an inertia curve: the k at argmax of the second difference
 * (offset by two), clamped to [3, 7].
 */
export function elbowFromInertias(inertias: number[], kValues: number[]): number {
  if (inertias.length < 3) {
    return 3;
  }
  const diffs = inertias.slice(1).map((value, i) => value - (inertias[i] ?? 0));
  const diffs2 = diffs.slice(1).map((value, i) => value - (diffs[i] ?? 0));

  let argmax = 0;
  diffs2.forEach((value, i) => {
    if (value > (diffs2[argmax] ?? Number.NEGATIVE_INFINITY)) {
      argmax = i;
    }
  });

  const elbowIndex = argmax + 2;
  const chosen = kValues[elbowIndex] ?? kValues[kValues.length - 1] ?? 3;
  return Math.max(3, Math.min(7, chosen));
}

export function chooseK(vectors: Vector[], options: KMeansOptions & { maxK?: number } = {}): number {
  const maxK = Math.min(options.maxK ?? 10, vectors.length - 1);
  if (maxK < 2) {
    return 2;
  }
  const kValues: number[] = [];
  const inertias: number[] = [];
  for (let k = 2; k <= maxK; k += 1) {
    kValues.push(k);
    inertias.push(kmeans(vectors, k, options).inertia);
  }
  return elbowFromInertias(inertias, kValues);
}
