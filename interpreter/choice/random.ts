/**
 * Stand-alone seeded random source (mulberry32).
 *
 * Each random generator owns one, so draws made elsewhere in the process
 * (noise, `toss`, `uniform`) never shift a seeded sequence.
 */
export class RandomSource {
  private state: number;

  constructor(seed?: number | null) {
    const initial = seed ?? Math.floor(Math.random() * 4294967296);
    this.state = initial >>> 0;
  }

  /** Uniform float in [0, 1) */
  next(): number {
    this.state = (this.state + 0x6D2B79F5) >>> 0;
    let x = this.state;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  }

  /** Uniform integer in [0, maxExclusive) */
  nextInt(maxExclusive: number): number {
    return Math.floor(this.next() * maxExclusive);
  }

  /** Fisher-Yates shuffle, in place */
  shuffle<T>(items: T[]): T[] {
    for (let i = items.length - 1; i > 0; i--) {
      const j = this.nextInt(i + 1);
      const held = items[i];
      items[i] = items[j];
      items[j] = held;
    }
    return items;
  }
}
