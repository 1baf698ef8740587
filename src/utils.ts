export type Vector = number[];

export function dot(a: Vector, b: Vector): number {
  const len = Math.min(a.length, b.length);
  let sum = 0;
  for (let i = 0; i < len; i += 1) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return sum;
}

export function norm(v: Vector): number {
  return Math.sqrt(dot(v, v));
}

export function l2Normalize(v: Vector): Vector {
  const length = norm(v);
  if (length === 0) {
    return v.slice();
  }
  return v.map((x) => x / length);
}

export function cosineSimilarity(a: Vector, b: Vector): number {
  const denom = norm(a) * norm(b);
  if (denom === 0) {
    return 0;
  }
  return dot(a, b) / denom;
}

export function squaredDistance(a: Vector, b: Vector): number {
  const len = Math.min(a.length, b.length);
  let sum = 0;
  for (let i = 0; i < len; i += 1) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    sum += diff * diff;
  }
  return sum;
}

export function euclideanDistance(a: Vector, b: Vector): number {
  return Math.sqrt(squaredDistance(a, b));
}

export function meanVector(vectors: Vector[]): Vector {
  const first = vectors[0];
  if (!first) {
    return [];
  }
  const out = new Array<number>(first.length).fill(0);
  for (const v of vectors) {
    for (let i = 0; i < out.length; i += 1) {
      out[i] = (out[i] ?? 0) + (v[i] ?? 0);
    }
  }
  return out.map((x) => x / vectors.length);
}

export function round(value: number, digits = 2): number {
  return Number(value.toFixed(digits));
}

export function median(values: number[]): number {
  if (values.length === 0) {
    return 0;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 1) {
    return sorted[mid] ?? 0;
  }
  return ((sorted[mid - 1] ?? 0) + (sorted[mid] ?? 0)) / 2;
}
