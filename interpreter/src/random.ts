/**
 * Seeded pseudo-random generator (mulberry32). The generator state is a single
 * integer kept in the execution state, so runs with the same seed repeat.
 */

export interface RandomState {
  seed: number;
}

export function nextU32(state: RandomState): number {
  state.seed = (state.seed + 0x6d2b79f5) | 0;
  let t = state.seed;
  t = Math.imul(t ^ (t >>> 15), t | 1);
  t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
  return (t ^ (t >>> 14)) >>> 0;
}

/** Float in [0, 1). */
export function nextFloat(state: RandomState): number {
  return nextU32(state) / 4294967296;
}

/** Integer in [min, max). */
export function nextInt(state: RandomState, min: number, max: number): number {
  return min + Math.floor(nextFloat(state) * (max - min));
}
