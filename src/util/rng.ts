// src/util/rng.ts
import seedrandom, { PRNG } from "seedrandom";

export class RNG {
  private r: PRNG;

  constructor(seed = "seed-42") {
    this.r = seedrandom(seed);
  }

  uniform(): number {
    return this.r.quick(); // [0,1)
  }

  int(min: number, max: number): number {
    // integer on [min, max]
    return Math.floor(min + this.uniform() * (max - min + 1));
  }

  /** exponential inter-arrival with the given rate */
  expovariate(rate: number): number {
    const u = Math.max(Number.MIN_VALUE, 1 - this.uniform());
    return -Math.log(u) / rate;
  }

  pick<T>(items: readonly T[]): T | undefined {
    if (items.length === 0) return undefined;
    return items[this.int(0, items.length - 1)];
  }

  /** Fisher-Yates, in place */
  shuffle<T>(items: T[]): T[] {
    for (let i = items.length - 1; i > 0; i--) {
      const j = this.int(0, i);
      const a = items[i];
      const b = items[j];
      if (a === undefined || b === undefined) continue;
      items[i] = b;
      items[j] = a;
    }
    return items;
  }
}
