import { describe, it, expect } from "vitest"
import { buildNoShowSuggestion, computeGaps } from "../gap-analyzer"

function iso(hour: number, minute = 0, second = 0): string {
  return new Date(Date.UTC(2025, 2, 1, hour, minute, second)).toISOString()
}

describe("computeGaps", () => {
  it("lists the gaps between consecutive matches, largest first", () => {
    const gaps = computeGaps([
      { time: iso(9, 0), label: "Q1" },
      { time: iso(9, 5), label: "Q2" },
      { time: iso(9, 25), label: "Q3" },
    ])

    expect(gaps).toEqual([
      { start: iso(9, 5), end: iso(9, 25), minutes: 20, between: "Q2 and Q3" },
      { start: iso(9, 0), end: iso(9, 5), minutes: 5, between: "Q1 and Q2" },
    ])
  })

  it("needs at least two matches", () => {
    expect(computeGaps([])).toEqual([])
    expect(computeGaps([{ time: iso(9), label: "Q1" }])).toEqual([])
  })

  it("drops gaps between matches at the same time", () => {
    const gaps = computeGaps([
      { time: iso(9), label: "Q1" },
      { time: iso(9), label: "Q2" },
      { time: iso(9, 30), label: "Q3" },
    ])
    expect(gaps.map((g) => g.between)).toEqual(["Q2 and Q3"])
  })

  it("keeps chronological order for equal gaps", () => {
    const gaps = computeGaps([
      { time: iso(9), label: "Q1" },
      { time: iso(9, 15), label: "Q2" },
      { time: iso(9, 30), label: "Q3" },
    ])
    expect(gaps.map((g) => g.between)).toEqual(["Q1 and Q2", "Q2 and Q3"])
  })

  it("rounds partial minutes down", () => {
    const gaps = computeGaps([
      { time: iso(9), label: "Q1" },
      { time: iso(9, 10, 59), label: "Q2" },
    ])
    expect(gaps[0].minutes).toBe(10)
  })
})

describe("buildNoShowSuggestion", () => {
  it("sorts the team's matches before measuring gaps", () => {
    const suggestion = buildNoShowSuggestion("101", [
      { time: iso(10), label: "Q9" },
      { time: iso(9), label: "Q4" },
    ])

    expect(suggestion).toEqual({
      team: "101",
      gaps: [{ start: iso(9), end: iso(10), minutes: 60, between: "Q4 and Q9" }],
    })
  })
})
