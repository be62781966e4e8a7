import { describe, test, expect } from '@jest/globals';
import fc from 'fast-check';
import { SeededRandom, deriveSeed } from '../core/random/seeded-random';

function draw(rng: SeededRandom, count: number): number[] {
  return Array.from({ length: count }, () => rng.next());
}

describe('SeededRandom', () => {
  test('the same seed replays the same stream', () => {
    expect(draw(new SeededRandom(42), 20)).toEqual(draw(new SeededRandom(42), 20));
    expect(draw(new SeededRandom(42), 5)).not.toEqual(draw(new SeededRandom(43), 5));
  });

  test('next stays in [0, 1) and nextInt in its inclusive range', () => {
    fc.assert(fc.property(fc.integer({ min: 0, max: 0xffffffff }), fc.integer({ min: -50, max: 50 }), fc.nat(20), (seed, min, span) => {
      const rng = new SeededRandom(seed);
      for (let i = 0; i < 10; i++) {
        const value = rng.next();
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThan(1);
        const int = rng.nextInt(min, min + span);
        expect(Number.isInteger(int)).toBe(true);
        expect(int).toBeGreaterThanOrEqual(min);
        expect(int).toBeLessThanOrEqual(min + span);
      }
    }));
  });

  test('uniform with an empty range returns its lower bound', () => {
    expect(new SeededRandom(1).uniform(0.3, 0.3)).toBe(0.3);
  });

  test('forks are reproducible and independent of the parent position', () => {
    const parent = new SeededRandom(7);
    const before = draw(parent.fork('node-1'), 5);
    parent.next();
    expect(draw(parent.fork('node-1'), 5)).toEqual(before);
    expect(draw(parent.fork('node-2'), 5)).not.toEqual(before);
    expect(parent.fork('node-1').getSeed()).toBe(deriveSeed(7, 'node-1'));
  });

  test('shuffle returns a permutation without touching the input', () => {
    const items = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9];
    const shuffled = new SeededRandom(5).shuffle(items);
    expect([...shuffled].sort((a, b) => a - b)).toEqual(items);
    expect(items).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  test('gaussian draws have roughly the requested moments', () => {
    const rng = new SeededRandom(2024);
    const samples = Array.from({ length: 5000 }, () => rng.gaussian(3, 0.5));
    const mean = samples.reduce((sum, value) => sum + value, 0) / samples.length;
    expect(mean).toBeGreaterThan(2.95);
    expect(mean).toBeLessThan(3.05);
  });
});
