import { describe, expect, it } from 'vitest';

import { SeededRandom } from '../random.js';

function draws(random: SeededRandom, count: number): number[] {
  return Array.from({ length: count }, () => random.next());
}

describe('SeededRandom', () => {
  it('repeats the same sequence for the same seed', () => {
    expect(draws(new SeededRandom(42), 5)).toEqual(draws(new SeededRandom(42), 5));
  });

  it('differs between seeds', () => {
    expect(draws(new SeededRandom(1), 5)).not.toEqual(draws(new SeededRandom(2), 5));
  });

  it('restarts the sequence when reseeded', () => {
    const random = new SeededRandom(7);
    const first = draws(random, 3);
    random.seed(7);
    expect(draws(random, 3)).toEqual(first);
    expect(random.currentSeed).toBe(7);
  });

  it('keeps draws in [0, 1)', () => {
    for (const value of draws(new SeededRandom(99), 200)) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('draws inclusive integers', () => {
    const random = new SeededRandom(3);
    for (let i = 0; i < 100; i++) {
      const value = random.int(2, 4);
      expect([2, 3, 4]).toContain(value);
    }
  });

  it('rejects non-integer seeds and inverted ranges', () => {
    expect(() => new SeededRandom(1.5)).toThrow(RangeError);
    expect(() => new SeededRandom(1).int(5, 1)).toThrow('max (1) must be >= min (5)');
  });

  it('picks and shuffles without losing items', () => {
    const random = new SeededRandom(11);
    const items = ['nst', 'sandstone', 'cornet'];
    expect(items).toContain(random.pick(items));
    expect(random.shuffle(items).sort()).toEqual([...items].sort());
    expect(() => random.pick([])).toThrow('Cannot pick from an empty list');
  });
});
