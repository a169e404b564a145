/**
 * Source of uniformly distributed numbers in [0, 1)
 */
export type RandomSource = () => number

/**
 * Seedable generator (mulberry32). The same seed always yields the same
 * sequence.
 */
export function createRandom(seed: number = Date.now()): RandomSource {
  let state = seed >>> 0
  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

/**
 * Pick one element using the given source
 */
export function pick<T>(random: RandomSource, items: readonly T[]): T {
  const index = Math.floor(random() * items.length)
  return items[Math.min(index, items.length - 1)]
}
