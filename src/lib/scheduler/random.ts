import type { RandomSource } from "./types"

export const defaultRandom: RandomSource = Math.random

/** Fisher-Yates shuffle into a new array. */
export function shuffle<T>(items: readonly T[], random: RandomSource = defaultRandom): T[] {
  const next = [...items]
  for (let i = next.length - 1; i > 0; i -= 1) {
    const j = Math.floor(random() * (i + 1))
    ;[next[i], next[j]] = [next[j], next[i]]
  }
  return next
}

/**
 * Picks `count` distinct items uniformly at random (partial Fisher-Yates).
 * With a source that always returns 0 this is the first `count` items.
 */
export function sampleDistinct<T>(
  items: readonly T[],
  count: number,
  random: RandomSource = defaultRandom
): T[] {
  if (count > items.length) {
    throw new RangeError(`Cannot sample ${count} items from ${items.length}`)
  }
  const pool = [...items]
  for (let i = 0; i < count; i++) {
    const j = i + Math.floor(random() * (pool.length - i))
    ;[pool[i], pool[j]] = [pool[j], pool[i]]
  }
  return pool.slice(0, count)
}

/** Deterministic mulberry32 generator for tests and reproducible runs. */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0
  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}
