import { describe, it, expect } from "vitest"
import { createSeededRandom, sampleDistinct, shuffle } from "../random"

describe("shuffle", () => {
  it("returns a permutation without touching the input", () => {
    const items = [1, 2, 3, 4, 5]
    const result = shuffle(items, createSeededRandom(7))

    expect(items).toEqual([1, 2, 3, 4, 5])
    expect([...result].sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5])
  })

  it("is deterministic for a scripted source", () => {
    // j is always 0: swap(2,0) then swap(1,0)
    expect(shuffle(["a", "b", "c"], () => 0)).toEqual(["b", "c", "a"])
  })
})

describe("sampleDistinct", () => {
  it("takes the leading items when the source always returns 0", () => {
    expect(sampleDistinct([1, 2, 3, 4], 2, () => 0)).toEqual([1, 2])
  })

  it("never repeats an item", () => {
    const picked = sampleDistinct([1, 2, 3, 4, 5, 6], 6, createSeededRandom(3))
    expect(new Set(picked).size).toBe(6)
  })

  it("rejects asking for more items than exist", () => {
    expect(() => sampleDistinct([1, 2], 3)).toThrow(RangeError)
  })
})

describe("createSeededRandom", () => {
  it("repeats its sequence for the same seed", () => {
    const a = createSeededRandom(42)
    const b = createSeededRandom(42)
    const first = [a(), a(), a()]
    expect([b(), b(), b()]).toEqual(first)
    for (const value of first) {
      expect(value).toBeGreaterThanOrEqual(0)
      expect(value).toBeLessThan(1)
    }
  })
})
