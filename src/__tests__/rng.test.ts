import { describe, expect, it } from 'vitest';
import { RNG } from '../engine/rng';

describe('RNG', () => {
  it('replays the same sequence for the same seed', () => {
    const a = new RNG(42);
    const b = new RNG(42);
    const seqA = Array.from({ length: 20 }, () => a.next());
    const seqB = Array.from({ length: 20 }, () => b.next());
    expect(seqA).toEqual(seqB);
  });

  it('accepts string seeds and diverges from other seeds', () => {
    const a = new RNG('alpha');
    const b = new RNG('alpha');
    const c = new RNG('beta');
    const first = a.next();
    expect(b.next()).toBe(first);
    expect(c.next()).not.toBe(first);
  });

  it('gives seed 0 its own stream', () => {
    expect(new RNG(0).next()).not.toBe(new RNG(0x6d2b79f5).next());
  });

  it('keeps next() in [0, 1)', () => {
    const rng = new RNG(7);
    for (let i = 0; i < 1000; i++) {
      const x = rng.next();
      expect(x).toBeGreaterThanOrEqual(0);
      expect(x).toBeLessThan(1);
    }
  });

  it('int() is inclusive on both ends', () => {
    const rng = new RNG(3);
    const seen = new Set<number>();
    for (let i = 0; i < 500; i++) {
      const n = rng.int(1, 3);
      expect(Number.isInteger(n)).toBe(true);
      seen.add(n);
    }
    expect([...seen].sort()).toEqual([1, 2, 3]);
  });

  it('chance() honours the 0 and 1 extremes', () => {
    const rng = new RNG(5);
    for (let i = 0; i < 100; i++) {
      expect(rng.chance(0)).toBe(false);
      expect(rng.chance(1)).toBe(true);
    }
  });

  it('pick() returns undefined for an empty list', () => {
    expect(new RNG(1).pick([])).toBeUndefined();
  });

  it('shuffle() returns a permutation and leaves the input alone', () => {
    const input = [1, 2, 3, 4, 5, 6, 7, 8];
    const out = new RNG(9).shuffle(input);
    expect(input).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
    expect([...out].sort((x, y) => x - y)).toEqual(input);
  });

  it('normal() centres on the requested mean', () => {
    const rng = new RNG(11);
    let total = 0;
    const n = 4000;
    for (let i = 0; i < n; i++) total += rng.normal(5, 1);
    expect(total / n).toBeGreaterThan(4.9);
    expect(total / n).toBeLessThan(5.1);
  });
});
