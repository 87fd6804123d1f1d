/** Seedable random source with the same contract as Math.random(): values in [0, 1). */
export type RNG = () => number;

/** Mulberry32 generator. Same seed, same sequence. */
export function createRNG(seed: number): RNG {
  let state = seed | 0;

  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
