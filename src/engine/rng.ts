/**
 * Seeded PRNG (mulberry32). Every random choice a game makes goes through the
 * instance stored on its state, so a seed fully determines setup, shuffles and
 * reshuffles.
 */
export class SeededRandom {
  private t: number;

  constructor(seed: number) {
    this.t = seed >>> 0;
  }

  next(): number {
    this.t = (this.t + 0x6d2b79f5) >>> 0;
    let x = this.t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  }

  /** Integer in [0, maxExclusive). */
  int(maxExclusive: number): number {
    return Math.floor(this.next() * maxExclusive);
  }

  pick<T>(items: readonly T[]): T {
    const item = items[this.int(items.length)];
    if (item === undefined) throw new Error('Cannot pick from an empty list');
    return item;
  }

  // Fisher–Yates, in place.
  shuffle<T>(arr: T[]): T[] {
    for (let i = arr.length - 1; i > 0; i--) {
      const j = this.int(i + 1);
      const a = arr[i];
      const b = arr[j];
      if (a === undefined || b === undefined) continue;
      arr[i] = b;
      arr[j] = a;
    }
    return arr;
  }
}

export function randomSeed(): number {
  return Math.floor(Math.random() * 0x7fffffff);
}
