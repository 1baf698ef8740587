/**
 * Deterministic PRNG (Mulberry32) so clustering runs are reproducible for a
 * given seed.
 */
export class SeededRandom {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Next value in [0, 1). */
  next(): number {
    this.state |= 0;
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Integer in [min, max). */
  nextInt(min: number, max: number): number {
    return Math.floor(this.next() * (max - min)) + min;
  }

  /**
   * Index drawn with probability proportional to `weights`. Falls back to a
   * uniform draw when every weight is zero.
   */
  weightedIndex(weights: number[]): number {
    const total = weights.reduce((sum, weight) => sum + weight, 0);
    if (total <= 0) {
      return this.nextInt(0, weights.length);
    }
    let target = this.next() * total;
    for (let i = 0; i < weights.length; i += 1) {
      target -= weights[i] ?? 0;
      if (target < 0) {
        return i;
      }
    }
    return weights.length - 1;
  }

  nextSeed(): number {
    return this.nextInt(0, 0x7fffffff);
  }
}
