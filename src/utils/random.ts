export type RandomSource = () => number;

const LARGEST_UNIT_FRACTION = 0.999999999999;

function toFiniteNumber(value: number, fallback: number): number {
  if (!Number.isFinite(value)) {
    return fallback;
  }
  return value;
}

/**
 * Wraps a caller-supplied source so every draw lands in [0, 1).
 * Non-finite draws count as 0.
 */
export function normalizeRandom(random: RandomSource | undefined): RandomSource {
  if (!random) {
    return () => Math.random();
  }
  return () => {
    const value = toFiniteNumber(random(), 0);
    if (value <= 0) {
      return 0;
    }
    if (value >= 1) {
      return LARGEST_UNIT_FRACTION;
    }
    return value;
  };
}

/** mulberry32: small, fast and reproducible for a given 32-bit seed. */
export function createSeededRandom(seed: number): RandomSource {
  let state = Math.trunc(toFiniteNumber(seed, 0)) >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomIndex(length: number, random: RandomSource): number {
  if (length <= 0) {
    throw new Error("Cannot pick an index from an empty range.");
  }
  return Math.min(length - 1, Math.floor(random() * length));
}
