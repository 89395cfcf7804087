import { computeJudgeTargets, judgeIdsFor } from "./balanced-assigner"
import { MINUTE_MS, toMillis, toTimestamp } from "./clock-time"
import { NoFeasibleSlotError } from "./errors"
import { IntervalIndex } from "./interval-index"
import { defaultRandom } from "./random"
import type { Gap, Interval, NoShowSuggestion, RandomSource, Slot } from "./types"

export interface RescheduleInput {
  suggestions: NoShowSuggestion[]
  slotMinutes: number
  judgeCount: number
  /** Kept clear at both ends of every gap */
  dampingMinutes: number
  index: IntervalIndex
  random?: RandomSource
}

export interface RescheduleResult {
  slots: Slot[]
  unscheduled: string[]
}

type Candidate = Interval & { gap: Gap }

/**
 * Earliest `slotMs`-long window in [gapStart, gapEnd) clear of the judge's
 * committed time. On a conflict the search resumes at the end of the
 * conflicting interval.
 */
export function findSlotInGap(
  gapStart: number,
  gapEnd: number,
  slotMs: number,
  index: IntervalIndex,
  judgeId: number
): Interval | null {
  let start = gapStart
  while (start + slotMs <= gapEnd) {
    const candidate = { start, end: start + slotMs }
    const conflict = index.findConflict(judgeId, candidate)
    if (!conflict) return candidate
    start = conflict.end
  }
  return null
}

/** The judge's earliest candidate over all gaps; on equal starts the larger gap wins. */
export function findBestSlotForJudge(
  gaps: readonly Gap[],
  slotMinutes: number,
  index: IntervalIndex,
  judgeId: number,
  dampingMs: number
): Candidate | null {
  let best: Candidate | null = null
  for (const gap of gaps) {
    const gapStart = toMillis(gap.start) + dampingMs
    const gapEnd = toMillis(gap.end) - dampingMs
    if (gapEnd <= gapStart) continue
    const found = findSlotInGap(gapStart, gapEnd, slotMinutes * MINUTE_MS, index, judgeId)
    if (!found) continue
    if (best === null || found.start < best.start) {
      best = { ...found, gap }
    }
  }
  return best
}

function pickJudge(
  judgeIds: readonly number[],
  gaps: readonly Gap[],
  slotMinutes: number,
  index: IntervalIndex,
  dampingMs: number,
  eligible: (judgeId: number) => boolean
): { judgeId: number; candidate: Candidate } | null {
  let best: { judgeId: number; candidate: Candidate } | null = null
  // judgeIds ascend, and only a strictly earlier start replaces the pick
  for (const judgeId of judgeIds) {
    if (!eligible(judgeId)) continue
    const candidate = findBestSlotForJudge(gaps, slotMinutes, index, judgeId, dampingMs)
    if (!candidate) continue
    if (best === null || candidate.start < best.candidate.start) {
      best = { judgeId, candidate }
    }
  }
  return best
}

/**
 * Places each no-show team, in suggestion order, into one of its match gaps
 * on the judge offering the earliest conflict-free slot. Judges under their
 * quota are preferred; when none of them fits, any judge may take the team.
 *
 * `input.index` is updated with every placement.
 */
export function rescheduleNoShows(input: RescheduleInput): RescheduleResult {
  const { suggestions, slotMinutes, judgeCount, dampingMinutes, index } = input
  const random = input.random ?? defaultRandom

  const judgeIds = judgeIdsFor(judgeCount)
  const targets = computeJudgeTargets(suggestions.length, judgeIds, random)
  const counts = new Map<number, number>(judgeIds.map((id) => [id, 0]))
  const dampingMs = Math.max(0, dampingMinutes) * MINUTE_MS

  const slots: Slot[] = []
  const unscheduled: string[] = []

  for (const { team, gaps } of suggestions) {
    if (gaps.length === 0) {
      unscheduled.push(team)
      continue
    }

    const underQuota = (judgeId: number) => (counts.get(judgeId) ?? 0) < (targets.get(judgeId) ?? 0)
    const choice =
      pickJudge(judgeIds, gaps, slotMinutes, index, dampingMs, underQuota) ??
      pickJudge(judgeIds, gaps, slotMinutes, index, dampingMs, () => true)

    if (!choice) {
      unscheduled.push(team)
      continue
    }

    const { judgeId, candidate } = choice
    index.insert(judgeId, { start: candidate.start, end: candidate.end })
    counts.set(judgeId, (counts.get(judgeId) ?? 0) + 1)
    slots.push({
      judgeId,
      start: toTimestamp(candidate.start),
      end: toTimestamp(candidate.end),
      team,
      status: "rescheduled",
      between: candidate.gap.between,
    })
  }

  if (slots.length === 0) {
    throw new NoFeasibleSlotError(unscheduled)
  }

  return { slots, unscheduled }
}
