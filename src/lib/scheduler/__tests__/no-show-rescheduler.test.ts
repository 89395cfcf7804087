import { describe, it, expect } from "vitest"
import { findBestSlotForJudge, findSlotInGap, rescheduleNoShows } from "../no-show-rescheduler"
import { IntervalIndex } from "../interval-index"
import { NoFeasibleSlotError } from "../errors"
import type { Gap } from "../types"

const alwaysZero = () => 0

function iso(hour: number, minute = 0): string {
  return new Date(Date.UTC(2025, 2, 1, hour, minute)).toISOString()
}

function ms(hour: number, minute = 0): number {
  return Date.UTC(2025, 2, 1, hour, minute)
}

function gap(from: [number, number], to: [number, number], between: string): Gap {
  const start = iso(...from)
  const end = iso(...to)
  return { start, end, minutes: (Date.parse(end) - Date.parse(start)) / 60_000, between }
}

function busy(entries: [number, [number, number], [number, number]][]): IntervalIndex {
  const index = new IntervalIndex()
  for (const [judgeId, from, to] of entries) {
    index.insert(judgeId, { start: ms(...from), end: ms(...to) })
  }
  return index
}

describe("findSlotInGap", () => {
  it("skips past conflicting intervals", () => {
    const index = busy([
      [1, [9, 0], [9, 10]],
      [1, [9, 10], [9, 20]],
    ])
    expect(findSlotInGap(ms(9), ms(9, 40), 10 * 60_000, index, 1)).toEqual({
      start: ms(9, 20),
      end: ms(9, 30),
    })
  })

  it("returns null when the gap cannot hold a slot", () => {
    expect(findSlotInGap(ms(9), ms(9, 5), 10 * 60_000, new IntervalIndex(), 1)).toBeNull()
  })

  it("fits a slot ending exactly at the gap end", () => {
    expect(findSlotInGap(ms(9), ms(9, 10), 10 * 60_000, new IntervalIndex(), 1)).toEqual({
      start: ms(9),
      end: ms(9, 10),
    })
  })
})

describe("findBestSlotForJudge", () => {
  it("keeps the damping margin clear", () => {
    const found = findBestSlotForJudge([gap([9, 0], [9, 40], "Q1 and Q2")], 10, new IntervalIndex(), 1, 5 * 60_000)
    expect(found).toMatchObject({ start: ms(9, 5), end: ms(9, 15) })
  })

  it("skips a gap the damping swallows", () => {
    const found = findBestSlotForJudge([gap([9, 0], [9, 10], "Q1 and Q2")], 5, new IntervalIndex(), 1, 5 * 60_000)
    expect(found).toBeNull()
  })

  it("takes the earliest start across all gaps", () => {
    const gaps = [gap([9, 30], [10, 30], "Q2 and Q3"), gap([9, 0], [9, 20], "Q1 and Q2")]
    const found = findBestSlotForJudge(gaps, 10, new IntervalIndex(), 1, 0)

    expect(found?.start).toBe(ms(9))
    expect(found?.gap.between).toBe("Q1 and Q2")
  })
})

describe("rescheduleNoShows", () => {
  it("places a team in its gap", () => {
    const { slots, unscheduled } = rescheduleNoShows({
      suggestions: [{ team: "101", gaps: [gap([9, 0], [9, 40], "Q1 and Q2")] }],
      slotMinutes: 10,
      judgeCount: 2,
      dampingMinutes: 0,
      index: new IntervalIndex(),
      random: alwaysZero,
    })

    expect(slots).toEqual([
      {
        judgeId: 1,
        start: iso(9, 0),
        end: iso(9, 10),
        team: "101",
        status: "rescheduled",
        between: "Q1 and Q2",
      },
    ])
    expect(unscheduled).toEqual([])
  })

  it("prefers judges still under their quota", () => {
    const window = gap([9, 0], [10, 0], "Q1 and Q2")
    const { slots } = rescheduleNoShows({
      suggestions: [
        { team: "A", gaps: [window] },
        { team: "B", gaps: [window] },
      ],
      slotMinutes: 10,
      judgeCount: 2,
      dampingMinutes: 0,
      index: busy([[1, [9, 0], [9, 20]]]),
      random: alwaysZero,
    })

    expect(slots.map((s) => [s.team, s.judgeId, s.start])).toEqual([
      ["A", 2, iso(9, 0)],
      ["B", 1, iso(9, 20)],
    ])
  })

  it("gives equal earliest starts to the lowest judge id", () => {
    const window = gap([9, 0], [10, 0], "Q1 and Q2")
    const { slots } = rescheduleNoShows({
      suggestions: [
        { team: "A", gaps: [window] },
        { team: "B", gaps: [window] },
        { team: "C", gaps: [window] },
      ],
      slotMinutes: 10,
      judgeCount: 3,
      dampingMinutes: 0,
      index: new IntervalIndex(),
      random: () => 0.99,
    })

    expect(slots.map((s) => [s.team, s.judgeId, s.start])).toEqual([
      ["A", 1, iso(9, 0)],
      ["B", 2, iso(9, 0)],
      ["C", 3, iso(9, 0)],
    ])
  })

  it("falls back to any judge when no judge under quota fits", () => {
    const window = gap([9, 0], [10, 0], "Q1 and Q2")
    const index = busy([[2, [9, 0], [10, 0]]])
    const { slots } = rescheduleNoShows({
      suggestions: [
        { team: "A", gaps: [window] },
        { team: "B", gaps: [window] },
      ],
      slotMinutes: 10,
      judgeCount: 2,
      dampingMinutes: 0,
      index,
      random: alwaysZero,
    })

    expect(slots.map((s) => [s.team, s.judgeId, s.start])).toEqual([
      ["A", 1, iso(9, 0)],
      ["B", 1, iso(9, 10)],
    ])
    expect(index.intervals(1)).toEqual([
      { start: ms(9, 0), end: ms(9, 10) },
      { start: ms(9, 10), end: ms(9, 20) },
    ])
  })

  it("reports teams without gaps as unscheduled", () => {
    const { slots, unscheduled } = rescheduleNoShows({
      suggestions: [
        { team: "A", gaps: [] },
        { team: "B", gaps: [gap([9, 0], [9, 30], "Q1 and Q2")] },
      ],
      slotMinutes: 10,
      judgeCount: 1,
      dampingMinutes: 0,
      index: new IntervalIndex(),
      random: alwaysZero,
    })

    expect(slots.map((s) => s.team)).toEqual(["B"])
    expect(unscheduled).toEqual(["A"])
  })

  it("throws when no team can be placed", () => {
    const run = () =>
      rescheduleNoShows({
        suggestions: [{ team: "A", gaps: [gap([9, 0], [9, 5], "Q1 and Q2")] }],
        slotMinutes: 10,
        judgeCount: 1,
        dampingMinutes: 0,
        index: new IntervalIndex(),
        random: alwaysZero,
      })

    expect(run).toThrow(NoFeasibleSlotError)
    try {
      run()
    } catch (error) {
      expect(error).toBeInstanceOf(NoFeasibleSlotError)
      if (error instanceof NoFeasibleSlotError) {
        expect(error.unscheduled).toEqual(["A"])
      }
    }
  })
})
