import { toMillis } from "./clock-time"
import type { Interval, Slot } from "./types"

export function overlaps(a: Interval, b: Interval): boolean {
  return a.start < b.end && a.end > b.start
}

/** Committed judge time, per judge, sorted by start. */
export class IntervalIndex {
  private readonly byJudge = new Map<number, Interval[]>()

  /** Seeds from every slot that holds a team. */
  static fromSlots(slots: readonly Slot[]): IntervalIndex {
    const index = new IntervalIndex()
    for (const slot of slots) {
      if (slot.team == null) continue
      index.insert(slot.judgeId, { start: toMillis(slot.start), end: toMillis(slot.end) })
    }
    return index
  }

  intervals(judgeId: number): readonly Interval[] {
    return this.byJudge.get(judgeId) ?? []
  }

  /** First stored interval (by start) overlapping the candidate, if any. */
  findConflict(judgeId: number, candidate: Interval): Interval | undefined {
    for (const interval of this.intervals(judgeId)) {
      if (interval.start >= candidate.end) break
      if (overlaps(candidate, interval)) return interval
    }
    return undefined
  }

  hasConflict(judgeId: number, candidate: Interval): boolean {
    return this.findConflict(judgeId, candidate) !== undefined
  }

  insert(judgeId: number, interval: Interval): void {
    let list = this.byJudge.get(judgeId)
    if (!list) {
      list = []
      this.byJudge.set(judgeId, list)
    }
    let at = list.length
    while (at > 0 && list[at - 1].start > interval.start) at--
    list.splice(at, 0, { ...interval })
  }
}
