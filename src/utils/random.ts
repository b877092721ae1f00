/**
 * Seeded pseudo-random helpers. Every stochastic step in a run draws from
 * these so that a fixed seed reproduces the same output.
 * @module utils/random
 */

/** Largest seed that maps to its own generator state */
export const MAX_SEED = 0x7fffffff

/**
 * Linear congruential generator returning values in [0, 1).
 * Seeds are taken modulo 2^31, so only 0..MAX_SEED give distinct sequences.
 */
export function seededRandom(seed: number): () => number {
  let state = Math.abs(Math.floor(seed)) & MAX_SEED
  return () => {
    state = (Math.imul(state, 1103515245) + 12345) & MAX_SEED
    return state / 0x80000000
  }
}

/**
 * Fisher-Yates shuffle into a new array
 */
export function seededShuffle<T>(items: readonly T[], rng: () => number): T[] {
  const result = items.slice()
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1))
    const tmp = result[i]
    result[i] = result[j]
    result[j] = tmp
  }
  return result
}
