// Seeded pseudo-random numbers shared by all piece generators

// Simple string hash (FNV-1a, 32-bit) for stable seeds
export function hashString(str: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < str.length; i++) {
    h ^= str.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0; // unsigned 32-bit
}

// Simple PRNG (Linear Congruential Generator)
export function nextSeed(seed: number): number {
  return (seed * 1664525 + 1013904223) % 2 ** 32;
}

// Advance the seed and map it to [0, 1)
export function nextUnit(seed: number): { value: number; nextSeed: number } {
  const advanced = nextSeed(seed);
  return { nextSeed: advanced, value: (advanced >>> 0) / 4294967296 };
}

// Shuffle array using Fisher-Yates algorithm
export function shuffle<T>(
  array: ReadonlyArray<T>,
  seed: number,
): { shuffled: Array<T>; nextSeed: number } {
  const result = [...array];
  let currentSeed = seed;

  for (let i = result.length - 1; i > 0; i--) {
    const draw = nextUnit(currentSeed);
    currentSeed = draw.nextSeed;
    const j = Math.floor(draw.value * (i + 1));
    const temp = result[i];
    const other = result[j];
    if (temp === undefined || other === undefined) {
      throw new Error("Shuffle index out of bounds");
    }
    result[i] = other;
    result[j] = temp;
  }

  return { nextSeed: currentSeed, shuffled: result };
}

/**
 * Index drawn with probability proportional to its weight.
 * Weights must be non-negative with a positive sum.
 */
export function weightedIndex(
  weights: ReadonlyArray<number>,
  seed: number,
): { index: number; nextSeed: number } {
  const total = weights.reduce((a, b) => a + b, 0);
  if (!(total > 0)) throw new Error("Weights must have a positive sum");
  const draw = nextUnit(seed);
  let remaining = draw.value * total;
  let last = 0;
  for (let i = 0; i < weights.length; i++) {
    const w = weights[i] ?? 0;
    if (w <= 0) continue;
    last = i;
    if (remaining < w) return { index: i, nextSeed: draw.nextSeed };
    remaining -= w;
  }
  // floating point leftovers land on the last weighted entry
  return { index: last, nextSeed: draw.nextSeed };
}
