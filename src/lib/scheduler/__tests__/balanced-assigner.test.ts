import { describe, it, expect } from "vitest"
import { assignBalanced, computeJudgeTargets } from "../balanced-assigner"
import { createSeededRandom } from "../random"
import { buildSlotGrid } from "../slot-grid"

const START = "2025-03-01T09:00:00.000Z"
const alwaysZero = () => 0

function grid(judgeCount: number, slotsPerJudge: number) {
  return buildSlotGrid({ judgeCount, windowStart: START, durationMinutes: slotsPerJudge * 10, slotMinutes: 10 })
}

function teams(count: number): string[] {
  return Array.from({ length: count }, (_, i) => String(100 + i))
}

describe("computeJudgeTargets", () => {
  it("gives the remainder to randomly chosen judges", () => {
    const targets = computeJudgeTargets(10, [1, 2, 3], alwaysZero)
    expect(Object.fromEntries(targets)).toEqual({ 1: 4, 2: 3, 3: 3 })
  })

  it("allows zero quotas when there are more judges than items", () => {
    const targets = computeJudgeTargets(1, [1, 2, 3], alwaysZero)
    expect(Object.fromEntries(targets)).toEqual({ 1: 1, 2: 0, 3: 0 })
  })
})

describe("assignBalanced", () => {
  it("keeps judge loads within one of each other", () => {
    const random = createSeededRandom(2024)
    for (let judgeCount = 1; judgeCount <= 4; judgeCount++) {
      for (let teamCount = 0; teamCount <= 12; teamCount++) {
        const { slots, unassigned } = assignBalanced(grid(judgeCount, 12), teams(teamCount), judgeCount, random)

        const loads = Array.from(
          { length: judgeCount },
          (_, i) => slots.filter((s) => s.judgeId === i + 1 && s.team !== null).length
        )
        expect(unassigned).toEqual([])
        expect(loads.reduce((a, b) => a + b, 0)).toBe(teamCount)
        expect(Math.max(...loads) - Math.min(...loads)).toBeLessThanOrEqual(1)
        expect(new Set(slots.flatMap((s) => (s.team ? [s.team] : []))).size).toBe(teamCount)
      }
    }
  })

  it("fills each judge's slots from the earliest", () => {
    const { slots } = assignBalanced(grid(2, 2), ["A", "B", "C", "D"], 2, alwaysZero)

    expect(slots.map((s) => [s.judgeId, s.start, s.team])).toEqual([
      [1, "2025-03-01T09:00:00.000Z", "B"],
      [1, "2025-03-01T09:10:00.000Z", "A"],
      [2, "2025-03-01T09:00:00.000Z", "C"],
      [2, "2025-03-01T09:10:00.000Z", "D"],
    ])
  })

  it("uses the earliest slot even when the grid arrives out of order", () => {
    const { slots } = assignBalanced([...grid(1, 3)].reverse(), ["A"], 1, alwaysZero)

    expect(slots.map((s) => s.team)).toEqual([null, null, "A"])
    expect(slots[2].start).toBe(START)
  })

  it("reports teams that do not fit", () => {
    const { slots, unassigned } = assignBalanced(grid(1, 3), ["A", "B", "C", "D", "E"], 1, alwaysZero)

    expect(slots.map((s) => s.team)).toEqual(["B", "C", "D"])
    expect(unassigned).toEqual(["E", "A"])
  })

  it("fills a single judge completely", () => {
    const { slots, unassigned } = assignBalanced(grid(1, 3), ["1", "2", "3"], 1, createSeededRandom(5))
    expect(slots.every((s) => s.team !== null)).toBe(true)
    expect(unassigned).toEqual([])
  })

  it("leaves its inputs untouched", () => {
    const slots = grid(1, 2)
    const list = ["A", "B"]
    assignBalanced(slots, list, 1, alwaysZero)

    expect(slots.every((s) => s.team === null)).toBe(true)
    expect(list).toEqual(["A", "B"])
  })

  it("returns an empty grid when there are no teams", () => {
    const { slots, unassigned } = assignBalanced(grid(2, 2), [], 2)
    expect(slots.every((s) => s.team === null)).toBe(true)
    expect(unassigned).toEqual([])
  })
})
