/**
 * Injectable random source.
 *
 * Correctors pick transitions and title templates through this interface
 * so a seeded run is reproducible. The seeded generator is mulberry32.
 */

export interface RandomSource {
  /** Uniform in [0, 1) */
  next(): number;
  /** Uniform integer in [0, maxExclusive) */
  int(maxExclusive: number): number;
  pick<T>(items: readonly [T, ...T[]]): T;
}

function fromGenerator(next: () => number): RandomSource {
  const int = (maxExclusive: number) => Math.floor(next() * Math.max(0, maxExclusive));
  return {
    next,
    int,
    pick<T>(items: readonly [T, ...T[]]): T {
      return items[int(items.length)] ?? items[0];
    },
  };
}

export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return fromGenerator(() => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  });
}

export const systemRandom: RandomSource = fromGenerator(Math.random);
