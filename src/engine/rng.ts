// Deterministic PRNG (Mulberry32) with Box-Muller normal and the sampling helpers the agents need.
export class RNG {
  private state: number;
  private spare: number | null = null;

  constructor(seed: number | string) {
    this.state = RNG.hashToSeed(seed);
  }

  static hashToSeed(s: number | string): number {
    let x = typeof s === 'number' ? Math.floor(s) : 0;
    if (typeof s === 'string') {
      for (let i = 0; i < s.length; i++) {
        x = (x ^ s.charCodeAt(i)) >>> 0;
        x = (x + 0x9e3779b9 + ((x << 6) >>> 0) + (x >>> 2)) >>> 0;
      }
    }
    return x >>> 0;
  }

  // Mulberry32, [0, 1)
  next(): number {
    this.state |= 0;
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  uniform(lo: number, hi: number): number {
    return lo + (hi - lo) * this.next();
  }

  // Inclusive on both ends.
  int(lo: number, hi: number): number {
    const a = Math.ceil(Math.min(lo, hi));
    const b = Math.floor(Math.max(lo, hi));
    return a + Math.floor(this.next() * (b - a + 1));
  }

  chance(p: number): boolean {
    return this.next() < p;
  }

  pick<T>(items: readonly T[]): T | undefined {
    if (items.length === 0) return undefined;
    return items[Math.floor(this.next() * items.length)];
  }

  // Fisher-Yates, returns a new array.
  shuffle<T>(items: readonly T[]): T[] {
    const out = items.slice();
    for (let i = out.length - 1; i > 0; i--) {
      const j = Math.floor(this.next() * (i + 1));
      const tmp = out[i];
      out[i] = out[j];
      out[j] = tmp;
    }
    return out;
  }

  // Standard normal via Box-Muller with caching.
  normal(mean = 0, std = 1): number {
    if (this.spare !== null) {
      const z = this.spare;
      this.spare = null;
      return mean + std * z;
    }
    let u = 0, v = 0, s = 0;
    do {
      u = this.next() * 2 - 1;
      v = this.next() * 2 - 1;
      s = u * u + v * v;
    } while (s === 0 || s >= 1);
    const m = Math.sqrt(-2 * Math.log(s) / s);
    this.spare = v * m;
    return mean + std * u * m;
  }
}
