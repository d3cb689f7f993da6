// ============================================
// VALLEY ECONOMY - Seeded Random Source
// ============================================

export interface RngState {
  seed: number;
}

/** Seeded random number generator (Mulberry32). */
export function createRng(seed: number): RngState {
  return { seed: seed >>> 0 };
}

/** Next random number in [0, 1). */
export function nextRandom(rng: RngState): number {
  let t = (rng.seed += 0x6d2b79f5);
  t = Math.imul(t ^ (t >>> 15), t | 1);
  t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
  return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
}

/** Random float in [min, max). */
export function nextFloat(rng: RngState, min: number, max: number): number {
  return nextRandom(rng) * (max - min) + min;
}

/**
 * Seed for production sessions: the configured seed, or the wall clock
 * when none is set.
 */
export function resolveSeed(configured?: number): number {
  return configured ?? Date.now();
}

/** Restart an existing generator in place so every holder sees the new sequence. */
export function reseed(rng: RngState, seed: number): void {
  rng.seed = seed >>> 0;
}
