/**
 * Seeded PRNG (mulberry32)
 *
 * Math.random cannot be seeded; the layout needs the same start positions on
 * every run so an unchanged corpus renders the same picture.
 */

export type RandomSource = () => number;

/**
 * Returns a generator of floats in [0, 1) fully determined by `seed`
 */
export function createRandom(seed: number): RandomSource {
  let state = seed >>> 0;

  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
