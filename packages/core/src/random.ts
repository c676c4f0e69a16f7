/**
 * Seedable pseudo-random stream (mulberry32).
 *
 * One instance is handed to the runner and reseeded at every step entry, so two
 * runs of the same schedule hand workloads the same sequence of draws.
 */
export class SeededRandom {
  private state = 0;
  private initialSeed = 0;

  constructor(seed: number = 0) {
    this.seed(seed);
  }

  /** Reset the stream to the start of `seed`'s sequence. */
  seed(seed: number): void {
    if (!Number.isInteger(seed)) {
      throw new RangeError(`Seed must be an integer, got ${seed}`);
    }
    this.initialSeed = seed;
    this.state = seed | 0;
  }

  get currentSeed(): number {
    return this.initialSeed;
  }

  /** Next float in [0, 1). */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Integer in [min, max], both inclusive. */
  int(min: number, max: number): number {
    if (max < min) throw new RangeError(`max (${max}) must be >= min (${min})`);
    return min + Math.floor(this.next() * (max - min + 1));
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) throw new RangeError('Cannot pick from an empty list');
    const item = items[this.int(0, items.length - 1)];
    if (item === undefined) throw new RangeError('Cannot pick from an empty list');
    return item;
  }

  /** Fisher-Yates shuffle into a new array. */
  shuffle<T>(items: readonly T[]): T[] {
    const out = [...items];
    for (let i = out.length - 1; i > 0; i--) {
      const j = this.int(0, i);
      const a = out[i];
      const b = out[j];
      if (a === undefined || b === undefined) continue;
      out[i] = b;
      out[j] = a;
    }
    return out;
  }
}
