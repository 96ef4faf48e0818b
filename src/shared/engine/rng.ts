/**
 * Seeded random source used for board generation and robot choices.
 * Returns a float in [0, 1).
 */
export type Rng = () => number;

export function createRng(seed: number): Rng {
  // mulberry32
  let state = seed;

  return (): number => {
    state |= 0;
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Seed used when the caller does not pin one. */
export function randomSeed(): number {
  return Math.floor(Math.random() * 0x7fffffff);
}

export function randomInt(rng: Rng, maxExclusive: number): number {
  return Math.floor(rng() * maxExclusive);
}

export function coinFlip(rng: Rng): boolean {
  return rng() < 0.5;
}

/** Fisher-Yates, in place. */
export function shuffleInPlace<T>(items: T[], rng: Rng): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = randomInt(rng, i + 1);
    const tmp = items[i];
    items[i] = items[j];
    items[j] = tmp;
  }
  return items;
}
